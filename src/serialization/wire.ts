/**
 * @module serialization/wire
 *
 * Typed access to a decoded message in its plain-object form (protobufjs `toObject` with
 * `defaults: false`). Absent proto3 scalars read as their zero value, an absent message reads
 * as an empty one. Every error carries the dotted path of the offending field.
 */

import protobuf from 'protobufjs';
import type { Enum, MapField, Reader, Type } from 'protobufjs';

import { Diagnostics, isIrError } from '../diagnostics/diagnostics.js';

export interface WireObject {
  [key: string]: WireValue | undefined;
}

export type WireValue = string | number | boolean | WireObject | readonly WireValue[];

type Plain = { readonly [key: string]: unknown };

function isPlain(value: unknown): value is Plain {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

export class WireReader {
  private constructor(
    private readonly data: Plain,
    readonly path: string
  ) {}

  static of(data: unknown, path = ''): WireReader {
    if (!isPlain(data)) throw Diagnostics.wrongValueType(path || '<root>', 'message', describe(data));
    return new WireReader(data, path);
  }

  at(key: string): string {
    return this.path ? `${this.path}.${key}` : key;
  }

  has(key: string): boolean {
    const value = this.data[key];
    return value !== undefined && value !== null;
  }

  int(key: string): number {
    const value = this.data[key];
    if (value === undefined || value === null) return 0;
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw Diagnostics.wrongValueType(this.at(key), 'integer', describe(value));
    }
    return value;
  }

  double(key: string): number {
    const value = this.data[key];
    if (value === undefined || value === null) return 0;
    if (typeof value !== 'number') throw Diagnostics.wrongValueType(this.at(key), 'number', describe(value));
    return value;
  }

  bool(key: string): boolean {
    const value = this.data[key];
    if (value === undefined || value === null) return false;
    if (typeof value !== 'boolean') throw Diagnostics.wrongValueType(this.at(key), 'boolean', describe(value));
    return value;
  }

  string(key: string): string {
    const value = this.data[key];
    if (value === undefined || value === null) return '';
    if (typeof value !== 'string') throw Diagnostics.wrongValueType(this.at(key), 'string', describe(value));
    return value;
  }

  /** Enum code, checked against the codes the schema defines. */
  enumValue<E extends number>(key: string, enumName: string, allowed: readonly E[]): E {
    const code = this.int(key);
    const match = allowed.find(candidate => candidate === code);
    if (match === undefined) throw Diagnostics.unknownEnumValue(this.at(key), enumName, code);
    return match;
  }

  /** Nested message; an absent one reads as empty. */
  message(key: string): WireReader {
    const value = this.data[key];
    if (value === undefined || value === null) return new WireReader({}, this.at(key));
    return WireReader.of(value, this.at(key));
  }

  optionalMessage(key: string): WireReader | null {
    return this.has(key) ? this.message(key) : null;
  }

  private list(key: string): readonly unknown[] {
    const value = this.data[key];
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) throw Diagnostics.wrongValueType(this.at(key), 'list', describe(value));
    return value;
  }

  messages(key: string): WireReader[] {
    return this.list(key).map((item, i) => WireReader.of(item, `${this.at(key)}[${i}]`));
  }

  ints(key: string): number[] {
    return this.list(key).map((item, i) => {
      if (typeof item !== 'number' || !Number.isInteger(item)) {
        throw Diagnostics.wrongValueType(`${this.at(key)}[${i}]`, 'integer', describe(item));
      }
      return item;
    });
  }

  /** Exactly three integers, e.g. an offset. */
  int3(key: string): [number, number, number] {
    const values = this.ints(key);
    const [a, b, c] = values;
    if (values.length !== 3 || a === undefined || b === undefined || c === undefined) {
      throw Diagnostics.badArity(this.at(key), 3, values.length);
    }
    return [a, b, c];
  }

  private mapEntries(key: string): Array<[string, unknown]> {
    const value = this.data[key];
    if (value === undefined || value === null) return [];
    if (!isPlain(value)) throw Diagnostics.wrongValueType(this.at(key), 'map', describe(value));
    return Object.entries(value);
  }

  private intKey(key: string, raw: string): number {
    const id = Number(raw);
    if (!Number.isInteger(id)) throw Diagnostics.wrongValueType(`${this.at(key)}[${raw}]`, 'integer key', 'string');
    return id;
  }

  /** Map with int32 keys and message values. */
  intMessageMap(key: string): Array<[number, WireReader]> {
    return this.mapEntries(key).map(([raw, value]) => [
      this.intKey(key, raw),
      WireReader.of(value, `${this.at(key)}[${raw}]`),
    ]);
  }

  stringMessageMap(key: string): Array<[string, WireReader]> {
    return this.mapEntries(key).map(([name, value]) => [name, WireReader.of(value, `${this.at(key)}[${name}]`)]);
  }

  intStringMap(key: string): Array<[number, string]> {
    return this.mapEntries(key).map(([raw, value]) => {
      if (typeof value !== 'string') {
        throw Diagnostics.wrongValueType(`${this.at(key)}[${raw}]`, 'string', describe(value));
      }
      return [this.intKey(key, raw), value];
    });
  }

  intIntMap(key: string): Array<[number, number]> {
    return this.mapEntries(key).map(([raw, value]) => {
      if (typeof value !== 'number' || !Number.isInteger(value)) {
        throw Diagnostics.wrongValueType(`${this.at(key)}[${raw}]`, 'integer', describe(value));
      }
      return [this.intKey(key, raw), value];
    });
  }

  /**
   * The one branch of a oneof that is present. None, or more than one, is an UnknownVariant:
   * decoding never falls back to a default branch.
   */
  oneof<K extends string>(union: string, branches: readonly K[]): K {
    const present = branches.filter(branch => this.has(branch));
    const [branch] = present;
    if (branch === undefined) throw Diagnostics.noBranchSet(this.path || '<root>', union);
    if (present.length > 1) throw Diagnostics.multipleBranchesSet(this.path || '<root>', union, present);
    return branch;
  }
}

// ---------------------------------------------------------------------------
// Schema checks the protobufjs reflection codec leaves out
// ---------------------------------------------------------------------------

const LENGTH_DELIMITED = 2;

interface TypedField {
  readonly type: string;
  readonly resolvedType: Type | Enum | null;
}

function tableLookup(table: Readonly<Record<string, number>>, name: string): number | undefined {
  return table[name];
}

/** Wire type of a single value of the field's type. */
function valueWireType(field: TypedField): number {
  if (field.resolvedType instanceof protobuf.Type) return LENGTH_DELIMITED;
  if (field.resolvedType instanceof protobuf.Enum) return 0;
  return tableLookup(protobuf.types.basic, field.type) ?? LENGTH_DELIMITED;
}

function isPackable(field: TypedField): boolean {
  return field.resolvedType instanceof protobuf.Enum || tableLookup(protobuf.types.packed, field.type) !== undefined;
}

function readTag(reader: Reader): { id: number; wireType: number } {
  const offset = reader.pos;
  const tag = reader.uint32();
  const wireType = tag & 7;
  if (wireType > 5) throw Diagnostics.unreadableBytes(new Error(`invalid wire type ${wireType} at offset ${offset}`));
  return { id: tag >>> 3, wireType };
}

function expectWireType(path: string, expected: number, actual: number): void {
  if (expected !== actual) throw Diagnostics.wrongWireType(path, expected, actual);
}

function checkMapEntry(field: MapField, bytes: Uint8Array, path: string): void {
  const reader = protobuf.Reader.create(bytes);
  while (reader.pos < reader.len) {
    const { id, wireType } = readTag(reader);
    if (id === 1) {
      expectWireType(`${path}.key`, tableLookup(protobuf.types.mapKey, field.keyType) ?? LENGTH_DELIMITED, wireType);
      reader.skipType(wireType);
    } else if (id === 2) {
      expectWireType(`${path}.value`, valueWireType(field), wireType);
      if (field.resolvedType instanceof protobuf.Type) checkWireTypes(field.resolvedType, reader.bytes(), `${path}.value`);
      else reader.skipType(wireType);
    } else {
      reader.skipType(wireType);
    }
  }
}

/**
 * Walks the encoded message and rejects a known field sent with another wire type than its
 * schema type. Unknown fields are skipped.
 */
function checkWireTypes(type: Type, bytes: Uint8Array, path: string): void {
  const reader = protobuf.Reader.create(bytes);
  while (reader.pos < reader.len) {
    const { id, wireType } = readTag(reader);
    const field = type.fieldsById[id];
    if (field === undefined) {
      reader.skipType(wireType);
      continue;
    }
    const at = path ? `${path}.${field.name}` : field.name;
    if (field instanceof protobuf.MapField) {
      expectWireType(at, LENGTH_DELIMITED, wireType);
      checkMapEntry(field, reader.bytes(), at);
      continue;
    }
    if (field.repeated && wireType === LENGTH_DELIMITED && isPackable(field)) {
      reader.skipType(wireType);
      continue;
    }
    expectWireType(at, valueWireType(field), wireType);
    if (field.resolvedType instanceof protobuf.Type) checkWireTypes(field.resolvedType, reader.bytes(), at);
    else reader.skipType(wireType);
  }
}

const INT32: readonly [number, number] = [-0x80000000, 0x7fffffff];
const UINT32: readonly [number, number] = [0, 0xffffffff];

function rangeOf(typeName: string): readonly [number, number] | undefined {
  switch (typeName) {
    case 'int32':
    case 'sint32':
    case 'sfixed32':
      return INT32;
    case 'uint32':
    case 'fixed32':
      return UINT32;
    default:
      return undefined;
  }
}

function checkIntRange(typeName: string, value: WireValue | undefined, path: string): void {
  const range = rangeOf(typeName);
  if (range === undefined) return;
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isInteger(n)) return;
  if (n < range[0] || n > range[1]) throw Diagnostics.integerOutOfRange(path, typeName, n);
}

function isWireObject(value: WireValue | undefined): value is WireObject {
  return typeof value === 'object' && !Array.isArray(value);
}

function isWireList(value: WireValue): value is readonly WireValue[] {
  return Array.isArray(value);
}

function checkValueRange(field: TypedField, value: WireValue | undefined, path: string): void {
  if (field.resolvedType instanceof protobuf.Type) {
    if (isWireObject(value)) checkIntRanges(field.resolvedType, value, path);
    return;
  }
  checkIntRange(field.type, value, path);
}

/** 32-bit integer fields and map keys would wrap silently on encode. */
function checkIntRanges(type: Type, message: WireObject, path: string): void {
  for (const field of type.fieldsArray) {
    const value = message[field.name];
    if (value === undefined) continue;
    const at = path ? `${path}.${field.name}` : field.name;
    if (field instanceof protobuf.MapField) {
      if (!isWireObject(value)) continue;
      for (const [key, entry] of Object.entries(value)) {
        checkIntRange(field.keyType, key, `${at}[${key}]`);
        checkValueRange(field, entry, `${at}[${key}]`);
      }
    } else if (isWireList(value)) {
      value.forEach((item, i) => checkValueRange(field, item, `${at}[${i}]`));
    } else {
      checkValueRange(field, value, at);
    }
  }
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

/** Encodes a plain message object; an object the schema rejects is a programming error. */
export function encodeMessage(type: Type, message: WireObject): Uint8Array {
  const problem = type.verify(message);
  if (problem) throw Diagnostics.malformedEncoding(type.fullName, `Cannot encode ${type.name}: ${problem}`);
  checkIntRanges(type, message, '');
  return type.encode(type.fromObject(message)).finish();
}

/** Decodes bytes to the plain-object form read by {@link WireReader}. */
export function decodeMessage(type: Type, bytes: Uint8Array): WireReader {
  let decoded: Record<string, unknown>;
  try {
    checkWireTypes(type, bytes, '');
    decoded = type.toObject(type.decode(bytes), {
      enums: Number,
      longs: Number,
      defaults: false,
      arrays: false,
      objects: false,
      oneofs: false,
    });
  } catch (error) {
    if (isIrError(error)) throw error;
    throw Diagnostics.unreadableBytes(error);
  }
  return WireReader.of(decoded);
}
