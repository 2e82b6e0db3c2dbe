/**
 * @module serialization/json
 *
 * Canonical JSON projection of a stencil instantiation, for debugging, diffing and structural
 * comparison. The projection uses the wire field names; object keys are sorted and the
 * unordered ID sets are sorted ascending, so equal instantiations project to equal JSON.
 */

import { isDeepStrictEqual } from 'node:util';

import { DiagnosticCode, Diagnostics, IrError } from '../diagnostics/diagnostics.js';
import type { StencilInstantiation } from '../stencil_instantiation.js';
import { instantiationFromWire, instantiationToWire } from './iir_codec.js';
import { WireReader } from './wire.js';
import type { WireObject, WireValue } from './wire.js';

export interface InstantiationEnvelope {
  /** JSON schema version */
  version: '1.0';
  instantiation: WireObject;
  metadata?: {
    /** ISO 8601 */
    generatedAt?: string;
    source?: string;
  };
}

const UNORDERED_ID_LISTS = new Set([
  'field_access_ids',
  'temporary_field_ids',
  'global_variable_ids',
  'version_ids',
]);

function isWireList(value: WireValue): value is readonly WireValue[] {
  return Array.isArray(value);
}

function isWireObject(value: WireValue): value is WireObject {
  return typeof value === 'object' && !Array.isArray(value);
}

function canonical(value: WireValue, key = ''): WireValue {
  if (isWireList(value)) {
    const items = value.map(item => canonical(item));
    if (UNORDERED_ID_LISTS.has(key)) {
      return [...items].sort((a, b) => (typeof a === 'number' && typeof b === 'number' ? a - b : 0));
    }
    return items;
  }
  if (isWireObject(value)) {
    const out: WireObject = {};
    for (const k of Object.keys(value).sort()) {
      const child = value[k];
      if (child !== undefined) out[k] = canonical(child, k);
    }
    return out;
  }
  return value;
}

export function instantiationToJson(inst: StencilInstantiation): WireObject {
  const projected = canonical(instantiationToWire(inst));
  return isWireObject(projected) ? projected : {};
}

/** Structural equality of two instantiations, node bindings and unset globals included. */
export function instantiationEquals(a: StencilInstantiation, b: StencilInstantiation): boolean {
  return isDeepStrictEqual(instantiationToJson(a), instantiationToJson(b));
}

/**
 * Serializes an instantiation to a versioned JSON envelope.
 *
 * @example
 * ```typescript
 * const json = serializeInstantiationJson(inst, { source: 'copy_stencil.cpp' });
 * ```
 */
export function serializeInstantiationJson(
  inst: StencilInstantiation,
  metadata?: InstantiationEnvelope['metadata']
): string {
  const envelope: InstantiationEnvelope = {
    version: '1.0',
    instantiation: instantiationToJson(inst),
    ...(metadata ? { metadata } : {}),
  };
  return JSON.stringify(envelope, null, 2);
}

export function deserializeInstantiationJson(json: string): StencilInstantiation {
  let envelope: unknown;
  try {
    envelope = JSON.parse(json);
  } catch (e) {
    throw Diagnostics.unreadableBytes(e);
  }

  const root = WireReader.of(envelope);
  const version = root.string('version');
  if (version !== '1.0') {
    throw new IrError(DiagnosticCode.W002_WrongValueType, `Unsupported instantiation JSON version '${version}'`, {
      path: 'version',
    });
  }
  return instantiationFromWire(root.message('instantiation'));
}
