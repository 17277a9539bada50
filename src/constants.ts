/**
 * @tessera/core — layout constants
 *
 * These constants define the binary contract shared with the storage format.
 * Any change to a byte width, a type tag or a housekeeping path is a
 * BREAKING CHANGE for files written by earlier versions.
 */

import type { ElementKind, NumericPrimitive, PrimitiveType } from './types';

// ─── Byte Widths ──────────────────────────────────────────────────────────────

/**
 * Byte width of each fixed-width primitive.
 * string, enum, compound and bitfield widths depend on the member spec and are
 * resolved by planLayout().
 */
export const PRIMITIVE_BYTE_WIDTHS: Readonly<Record<NumericPrimitive | 'bool', number>> = {
  int8:    1,
  int16:   2,
  int32:   4,
  int64:   8,
  uint8:   1,
  uint16:  2,
  uint32:  4,
  uint64:  8,
  float32: 4,
  float64: 8,
  bool:    1,
};

export const NUMERIC_PRIMITIVES: ReadonlySet<PrimitiveType> = new Set<PrimitiveType>([
  'int8', 'int16', 'int32', 'int64',
  'uint8', 'uint16', 'uint32', 'uint64',
  'float32', 'float64',
]);

/** Enum storage widens to 2 bytes at this many values, and to 4 bytes at ENUM_SHORT_LIMIT. */
export const ENUM_BYTE_LIMIT  = 127;
export const ENUM_SHORT_LIMIT = 32767;

/** Bitfields are stored in whole words of this many bytes. */
export const BITFIELD_WORD_BYTES = 8;

// ─── Descriptor Tags ──────────────────────────────────────────────────────────

/** Tags used by encodeTypeDescriptor(). Stable across versions. */
export const PRIMITIVE_TAGS: Readonly<Record<PrimitiveType, number>> = {
  int8: 0, int16: 1, int32: 2, int64: 3,
  uint8: 4, uint16: 5, uint32: 6, uint64: 7,
  float32: 8, float64: 9, bool: 10, string: 11, enum: 12, compound: 13,
  bitfield: 14,
};

export const KIND_TAGS: Readonly<Record<ElementKind, number>> = {
  Scalar: 0, FixedArray: 1, Matrix: 2, NDArray: 3,
};

/** Version byte leading every encoded type descriptor. */
export const DESCRIPTOR_VERSION = 1;

// ─── Housekeeping Paths ───────────────────────────────────────────────────────

/** Group holding every committed data type of a container. */
export const DATATYPE_GROUP = '/__DATA_TYPES__';

export const COMPOUND_PREFIX = 'Compound_';

/** Attribute on a committed compound type listing one type-variant ordinal per member. */
export const TYPE_VARIANT_MEMBERS_ATTRIBUTE = '__TYPE_VARIANT_MEMBERS__';

/** Path of the committed compound type called `name`. */
export function compoundTypePath(name: string): string {
  return `${DATATYPE_GROUP}/${COMPOUND_PREFIX}${name}`;
}

// ─── Dataset Geometry ─────────────────────────────────────────────────────────

/** maxDimensions marker for an axis that may be extended without bound. */
export const UNLIMITED = -1;
