import { DiagnosticCode, IrError } from '../diagnostics/diagnostics.js';
import type { GlobalValue } from '../types.js';

/** Non-null when an integer global holds a fractional value. */
export function globalValueError(global: GlobalValue, name?: string): IrError | null {
  if (global.type !== 'integer' || global.value === null || Number.isInteger(global.value)) return null;
  return new IrError(
    DiagnosticCode.V014_GlobalValueType,
    `Integer global${name === undefined ? '' : ` '${name}'`} holds ${global.value}`,
    name === undefined ? {} : { name }
  );
}

export function checkGlobalValue(global: GlobalValue, name?: string): GlobalValue {
  const error = globalValueError(global, name);
  if (error) throw error;
  return global;
}

export const GlobalValues = {
  boolean: (value: boolean | null = null): GlobalValue => ({ type: 'boolean', value }),
  integer: (value: number | null = null): GlobalValue => checkGlobalValue({ type: 'integer', value }),
  double: (value: number | null = null): GlobalValue => ({ type: 'double', value }),
};

/** Declared but unset is not the same as set to zero. */
export function isSet(global: GlobalValue): boolean {
  return global.value !== null;
}

export function globalValueEquals(a: GlobalValue, b: GlobalValue): boolean {
  return a.type === b.type && a.value === b.value;
}

export function globalValueToString(global: GlobalValue): string {
  return `${global.type} ${global.value === null ? '<unset>' : String(global.value)}`;
}
