/**
 * @tessera/core — type definitions
 *
 * These types describe compound record shapes, their flat binary layouts,
 * and the block geometry of N-dimensional datasets.
 * The byte layout IS the contract; TypeScript types are a lens into it.
 */

// ─── Primitive Types ──────────────────────────────────────────────────────────

/**
 * Element types a compound member can hold.
 *
 * string:   Fixed-length UTF-8, stored as maxLength + 1 bytes. The value is
 *           truncated to maxLength bytes on a code-point boundary and is
 *           always followed by at least one NUL byte.
 *
 * enum:     Stored as the ordinal of the value within `enumValues`. The
 *           storage width depends on the number of values: 1 byte below 127
 *           values, 2 bytes below 32767, 4 bytes otherwise.
 *
 * compound: A nested record. Its storage width is the nested layout size.
 *
 * bitfield: `bitLength` bits packed into little-endian 64-bit words, so
 *           the storage width is ceil(bitLength / 64) × 8 bytes.
 */
export type PrimitiveType =
  | 'int8'
  | 'int16'
  | 'int32'
  | 'int64'
  | 'uint8'
  | 'uint16'
  | 'uint32'
  | 'uint64'
  | 'float32'
  | 'float64'
  | 'bool'
  | 'string'
  | 'enum'
  | 'compound'
  | 'bitfield';

/** Primitives whose values are plain numbers or bigints. Matrix and NDArray members require one of these. */
export type NumericPrimitive =
  | 'int8'
  | 'int16'
  | 'int32'
  | 'int64'
  | 'uint8'
  | 'uint16'
  | 'uint32'
  | 'uint64'
  | 'float32'
  | 'float64';

export type ElementKind = 'Scalar' | 'FixedArray' | 'Matrix' | 'NDArray';

// ─── Type Variants ────────────────────────────────────────────────────────────

/**
 * Semantic role of a member beyond its raw primitive type.
 *
 * Order matters: the persisted form is the index into TYPE_VARIANTS.
 */
export const TYPE_VARIANTS = [
  'none',
  'timestamp-ms',
  'duration-us',
  'duration-ms',
  'duration-s',
  'duration-min',
  'duration-h',
  'duration-d',
] as const;

export type TypeVariant = (typeof TYPE_VARIANTS)[number];

// ─── Record Shape ─────────────────────────────────────────────────────────────

/**
 * One member of a compound record, as declared by the caller.
 *
 * dimensions length must match kind: 0 for Scalar, 1 for FixedArray,
 * 2 for Matrix, >= 1 for NDArray.
 */
export interface MemberSpec {
  readonly name:         string;
  readonly kind:         ElementKind;
  readonly primitive:    PrimitiveType;
  readonly dimensions:   readonly number[];
  readonly typeVariant?: TypeVariant;
  /** Maximum UTF-8 byte length of a string member. */
  readonly maxLength?:   number;
  /** Number of bits of a bitfield member. */
  readonly bitLength?:   number;
  /** Allowed values of an enum member, in ordinal order. */
  readonly enumValues?:  readonly string[];
  /** Shape of a nested compound member. */
  readonly members?:     RecordShape;
}

/** Ordered member list. Declaration order is storage order. */
export type RecordShape = readonly MemberSpec[];

// ─── Record Layout ────────────────────────────────────────────────────────────

export interface MemberLayout {
  readonly spec:         MemberSpec;
  /** Absolute start of the member inside the flat record buffer. */
  readonly offset:       number;
  /** Total bytes occupied: elementSize × elementCount. */
  readonly size:         number;
  /** Bytes of one element (one scalar, one nested record, one string). */
  readonly elementSize:  number;
  /** Product of dimensions; 1 for Scalar. */
  readonly elementCount: number;
  /** Layout of a nested compound member. */
  readonly nested?:      RecordLayout;
}

/**
 * Fully-resolved layout of a record shape.
 *
 * members are in declaration order with strictly contiguous offsets;
 * size is the sum of all member sizes.
 */
export interface RecordLayout {
  readonly members: readonly MemberLayout[];
  readonly byName:  ReadonlyMap<string, MemberLayout>;
  readonly size:    number;
}

// ─── Datasets & Blocks ────────────────────────────────────────────────────────

/**
 * Geometry of an N-dimensional dataset.
 *
 * maxDimensions uses UNLIMITED (-1) for axes that may grow without bound.
 * When chunkShape is absent the dataset is monolithic and its natural block
 * is the whole dataset.
 */
export interface DatasetExtent {
  readonly dimensions:     readonly number[];
  readonly maxDimensions?: readonly number[];
  readonly chunkShape?:    readonly number[];
}

/**
 * One block of a dataset.
 *
 * For every axis i: offset[i] + shape[i] <= dimensions[i] (read plans), and
 * shape[i] equals the block shape except on the final block along axis i.
 */
export interface BlockDescriptor {
  readonly index:  readonly number[];
  readonly offset: readonly number[];
  readonly shape:  readonly number[];
}

/** A materialized block together with its position. */
export interface DataBlock<T> {
  readonly data:   T;
  readonly index:  readonly number[];
  readonly offset: readonly number[];
  readonly shape:  readonly number[];
}
