/**
 * @module ast/offsets
 *
 * Second phase of field-offset resolution.
 *
 * Inside a stencil function `u(i + off)` cannot know its final offset until the function is called:
 * the front-end records, per dimension, which function argument supplies the offset
 * (`argumentMap`, -1 when unused) and how far from it the access lies (`argumentOffset`).
 * The inlining stage later calls {@link resolveFieldOffset} with the arguments of one concrete call.
 */

import { DiagnosticCode, IrError } from '../diagnostics/diagnostics.js';
import { Dimension } from '../types.js';
import type { FieldAccess, Int3, StencilFunctionArgument } from '../types.js';

/** Concrete value of one stencil-function argument at a call site. */
export type OffsetArgument =
  /** A directional argument bound to a dimension, e.g. `k`. */
  | { readonly kind: 'direction'; readonly dimension: Dimension }
  /** An offset argument, e.g. `i+1`. */
  | { readonly kind: 'offset'; readonly dimension: Dimension; readonly offset: number }
  /** Any argument that does not carry an offset (a field or a value). */
  | { readonly kind: 'other' };

/** Reads the call-site value of a `StencilFunctionArgument` expression. */
export function offsetArgumentOf(arg: StencilFunctionArgument): OffsetArgument {
  return arg.offset === 0
    ? { kind: 'direction', dimension: arg.dimension }
    : { kind: 'offset', dimension: arg.dimension, offset: arg.offset };
}

function dimensionIndex(dimension: Dimension, name: string): 0 | 1 | 2 {
  switch (dimension) {
    case Dimension.I:
      return 0;
    case Dimension.J:
      return 1;
    case Dimension.K:
      return 2;
    case Dimension.Invalid:
      throw new IrError(DiagnosticCode.V011_StatementShape, `Argument bound to field '${name}' has no dimension`, {
        name,
      });
  }
}

/**
 * Returns a copy of `access` whose offset is resolved against the arguments of one call.
 * Already resolved accesses are returned unchanged.
 */
export function resolveFieldOffset(access: FieldAccess, args: readonly OffsetArgument[]): FieldAccess {
  if (access.offset.state === 'resolved') return access;

  const { offset, argumentMap, argumentOffset } = access.offset;
  const result: [number, number, number] = [offset[0], offset[1], offset[2]];

  argumentMap.forEach((argIndex, dim) => {
    if (argIndex < 0) return;
    const arg = args[argIndex];
    if (arg === undefined || arg.kind === 'other') {
      throw new IrError(
        DiagnosticCode.L006_UnknownArgument,
        `Field '${access.name}' takes its offset from argument ${argIndex}, which is not a direction or offset`,
        { name: access.name, location: access.loc }
      );
    }
    const target = dimensionIndex(arg.dimension, access.name);
    if (arg.kind === 'direction') {
      result[target] += argumentOffset[dim] ?? 0;
    } else {
      result[target] += access.negateOffset ? -arg.offset : arg.offset;
    }
  });

  const resolved: Int3 = result;
  return { ...access, offset: { state: 'resolved', offset: resolved } };
}

/** The offset known without instantiation: the resolved offset or the static part. */
export function staticOffsetOf(access: FieldAccess): Int3 {
  return access.offset.offset;
}
