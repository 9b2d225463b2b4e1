/**
 * Scalar coercion table.
 *
 * Signed and unsigned kinds of the same width share one tag class. Writing
 * wraps the value into the signed storage width; reading reinterprets the
 * stored bits according to the kind the target declares.
 */

import {
  NbtByte,
  NbtByteArray,
  NbtDouble,
  NbtFloat,
  NbtInt,
  NbtIntArray,
  NbtLong,
  NbtShort,
  NbtString,
  type NbtTag,
} from '../tags';
import type { ScalarKind, ScalarValueMap } from './types';

export type ScalarValue = ScalarValueMap[ScalarKind];

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

/**
 * Integers inside the signed or unsigned range of a storage width. Anything
 * else would be truncated by the tag's normalisation.
 */
function fitsWidth(value: unknown, bits: 8 | 16 | 32): value is number {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= -(2 ** (bits - 1)) &&
    value <= 2 ** bits - 1
  );
}

/**
 * Build the leaf tag for a value of the given kind.
 * Returns null when the runtime value does not fit the kind. Integer kinds
 * take whole numbers within the signed or unsigned range of their width.
 */
export function scalarToTag(name: string | null, value: unknown, kind: ScalarKind): NbtTag | null {
  switch (kind) {
    case 'int8':
    case 'uint8':
      return fitsWidth(value, 8) ? new NbtByte(name, value) : null;
    case 'int16':
    case 'uint16':
      return fitsWidth(value, 16) ? new NbtShort(name, value) : null;
    case 'int32':
    case 'uint32':
      return fitsWidth(value, 32) ? new NbtInt(name, value) : null;
    case 'int64':
    case 'uint64':
      return typeof value === 'bigint' ? new NbtLong(name, value) : null;
    case 'float32':
      return typeof value === 'number' ? new NbtFloat(name, value) : null;
    case 'float64':
      return typeof value === 'number' ? new NbtDouble(name, value) : null;
    case 'bool':
      return typeof value === 'boolean' ? new NbtByte(name, value ? 1 : 0) : null;
    case 'string':
      return typeof value === 'string' ? new NbtString(name, value) : null;
    case 'byteArray':
      return value instanceof Uint8Array ? new NbtByteArray(name, value) : null;
    case 'intArray':
      return value instanceof Int32Array ? new NbtIntArray(name, value) : null;
  }
}

/**
 * Read a leaf tag as the given kind.
 * Returns null when the tag's class does not hold that kind.
 */
export function scalarFromTag(tag: NbtTag, kind: ScalarKind): ScalarValue | null {
  switch (kind) {
    case 'int8':
      return tag instanceof NbtByte ? tag.value : null;
    case 'uint8':
      return tag instanceof NbtByte ? tag.value & 0xff : null;
    case 'int16':
      return tag instanceof NbtShort ? tag.value : null;
    case 'uint16':
      return tag instanceof NbtShort ? tag.value & 0xffff : null;
    case 'int32':
      return tag instanceof NbtInt ? tag.value : null;
    case 'uint32':
      return tag instanceof NbtInt ? tag.value >>> 0 : null;
    case 'int64':
      return tag instanceof NbtLong ? tag.value : null;
    case 'uint64':
      return tag instanceof NbtLong ? BigInt.asUintN(64, tag.value) : null;
    case 'float32':
      return tag instanceof NbtFloat ? tag.value : null;
    case 'float64':
      return tag instanceof NbtDouble ? tag.value : null;
    case 'bool':
      return tag instanceof NbtByte ? tag.value !== 0 : null;
    case 'string':
      return tag instanceof NbtString ? tag.value : null;
    case 'byteArray':
      return tag instanceof NbtByteArray ? tag.value : null;
    case 'intArray':
      return tag instanceof NbtIntArray ? tag.value : null;
  }
}

/** Scalar kind for an undeclared runtime value, or null for non-scalars. */
export function inferKind(value: unknown): ScalarKind | null {
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'boolean':
      return 'bool';
    case 'bigint':
      return 'int64';
    case 'number':
      return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX ? 'int32' : 'float64';
    default:
      if (value instanceof Uint8Array) return 'byteArray';
      if (value instanceof Int32Array) return 'intArray';
      return null;
  }
}

/** Natural kind of a leaf tag, or null for list and compound tags. */
export function kindOfTag(tag: NbtTag): ScalarKind | null {
  switch (tag.kind) {
    case 'byte':
      return 'int8';
    case 'short':
      return 'int16';
    case 'int':
      return 'int32';
    case 'long':
      return 'int64';
    case 'float':
      return 'float32';
    case 'double':
      return 'float64';
    case 'string':
      return 'string';
    case 'byteArray':
      return 'byteArray';
    case 'intArray':
      return 'intArray';
    default:
      return null;
  }
}

/**
 * Zero value of a kind: 0 for numeric kinds, 0n for 64-bit kinds, false for
 * bool. Strings and arrays have none.
 */
export function defaultValueOf(kind: ScalarKind): ScalarValue | null {
  switch (kind) {
    case 'int64':
    case 'uint64':
      return 0n;
    case 'bool':
      return false;
    case 'string':
    case 'byteArray':
    case 'intArray':
      return null;
    default:
      return 0;
  }
}

export function isDefaultValue(value: unknown, kind: ScalarKind | null): boolean {
  if (kind === null) return false;
  const fallback = defaultValueOf(kind);
  return fallback !== null && value === fallback;
}
