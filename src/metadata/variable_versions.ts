/**
 * @module metadata/variable_versions
 *
 * Lineage of field versions. Renaming a field to a fresh AccessID removes a false dependency; the
 * table remembers, per original, every version created for it in creation order.
 *
 * Invariants:
 * - a version belongs to exactly one original;
 * - an original is never one of its own versions, and is never itself a version;
 * - the inverse map and the set of version IDs agree with the forward map.
 */

import { DiagnosticCode, Diagnostics, IrError } from '../diagnostics/diagnostics.js';
import type { AccessID } from '../types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('variable-versions');

export class VariableVersions {
  private readonly versionsByOriginal = new Map<AccessID, AccessID[]>();
  private readonly originalByVersion = new Map<AccessID, AccessID>();
  private readonly versionIds = new Set<AccessID>();

  registerVersion(original: AccessID, version: AccessID): void {
    if (original === version) {
      throw new IrError(DiagnosticCode.V003_SelfVersion, `AccessID ${original} cannot be a version of itself`, {
        accessId: original,
      });
    }
    const owner = this.originalByVersion.get(version);
    if (owner === original) return;
    if (owner !== undefined) {
      throw new IrError(
        DiagnosticCode.V002_VersionReparented,
        `Version ${version} already belongs to original ${owner}, cannot re-parent it under ${original}`,
        { accessId: version }
      );
    }
    if (this.versionIds.has(original)) {
      throw new IrError(DiagnosticCode.V003_SelfVersion, `AccessID ${original} is a version and cannot have versions`, {
        accessId: original,
      });
    }
    if (this.versionsByOriginal.has(version)) {
      throw new IrError(
        DiagnosticCode.V002_VersionReparented,
        `AccessID ${version} has versions of its own and cannot become a version of ${original}`,
        { accessId: version }
      );
    }

    const list = this.versionsByOriginal.get(original);
    if (list) list.push(version);
    else this.versionsByOriginal.set(original, [version]);
    this.originalByVersion.set(version, original);
    this.versionIds.add(version);
    logger.debug('Registered field version', { original, version });
  }

  /** The original of a version, or the ID itself when it is an original with versions. */
  originalOf(id: AccessID): AccessID {
    const original = this.originalByVersion.get(id);
    if (original !== undefined) return original;
    if (this.versionsByOriginal.has(id)) return id;
    throw Diagnostics.unknownAccessId(id, 'variable versions');
  }

  /** Versions of `id`'s lineage in creation order; `id` may be the original or any version. */
  versionsOf(id: AccessID): readonly AccessID[] {
    const versions = this.versionsByOriginal.get(this.originalOf(id));
    return versions ? [...versions] : [];
  }

  /** True for originals that have versions and for the versions themselves. */
  isVersioned(id: AccessID): boolean {
    return this.versionIds.has(id) || this.versionsByOriginal.has(id);
  }

  isVersion(id: AccessID): boolean {
    return this.versionIds.has(id);
  }

  originals(): AccessID[] {
    return [...this.versionsByOriginal.keys()];
  }

  allVersionIds(): AccessID[] {
    return [...this.versionIds];
  }

  /** Forward map entries in insertion order. */
  entries(): Array<[AccessID, readonly AccessID[]]> {
    return [...this.versionsByOriginal].map(([original, versions]) => [original, [...versions]]);
  }

  /** Inverse map entries in insertion order. */
  inverseEntries(): Array<[AccessID, AccessID]> {
    return [...this.originalByVersion];
  }

  get size(): number {
    return this.versionIds.size;
  }

  /**
   * Builds the table from its three stored parts without checking them, so that a decoded table
   * can be inspected by {@link checkInvariants}.
   */
  static fromTables(
    forward: Iterable<readonly [AccessID, readonly AccessID[]]>,
    versionIds: Iterable<AccessID>,
    inverse: Iterable<readonly [AccessID, AccessID]>
  ): VariableVersions {
    const table = new VariableVersions();
    for (const [original, versions] of forward) table.versionsByOriginal.set(original, [...versions]);
    for (const id of versionIds) table.versionIds.add(id);
    for (const [version, original] of inverse) table.originalByVersion.set(version, original);
    return table;
  }

  checkInvariants(): IrError[] {
    const errors: IrError[] = [];
    const seenUnder = new Map<AccessID, AccessID>();

    for (const [original, versions] of this.versionsByOriginal) {
      if (this.versionIds.has(original)) {
        errors.push(
          new IrError(DiagnosticCode.V003_SelfVersion, `Original ${original} is itself registered as a version`, {
            accessId: original,
          })
        );
      }
      for (const version of versions) {
        if (version === original) {
          errors.push(
            new IrError(DiagnosticCode.V003_SelfVersion, `AccessID ${original} is listed as its own version`, {
              accessId: original,
            })
          );
          continue;
        }
        const previous = seenUnder.get(version);
        if (previous !== undefined && previous !== original) {
          errors.push(
            new IrError(
              DiagnosticCode.V002_VersionReparented,
              `Version ${version} is listed under originals ${previous} and ${original}`,
              { accessId: version }
            )
          );
        }
        seenUnder.set(version, original);
        if (this.originalByVersion.get(version) !== original || !this.versionIds.has(version)) {
          errors.push(
            new IrError(
              DiagnosticCode.V004_VersionTablesDisagree,
              `Version ${version} of ${original} is missing from the inverse table or the version set`,
              { accessId: version }
            )
          );
        }
      }
    }

    for (const [version, original] of this.originalByVersion) {
      if (seenUnder.get(version) !== original) {
        errors.push(
          new IrError(
            DiagnosticCode.V004_VersionTablesDisagree,
            `Inverse entry ${version} -> ${original} has no forward entry`,
            { accessId: version }
          )
        );
      }
    }
    for (const version of this.versionIds) {
      if (!this.originalByVersion.has(version)) {
        errors.push(
          new IrError(DiagnosticCode.V004_VersionTablesDisagree, `Version ${version} has no original`, {
            accessId: version,
          })
        );
      }
    }
    return errors;
  }
}
