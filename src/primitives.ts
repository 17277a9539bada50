/**
 * @tessera/core — primitive lanes
 *
 * One lane per fixed-width primitive: how to read and write a single element
 * through a little-endian DataView, and how to read a run of elements into
 * the matching typed array. Strings, booleans and enum ordinals have their
 * own helpers below.
 */

import type { NumericPrimitive } from './types';
import type { NumericArray } from './ndarray';

// ─── Value coercion helpers ───────────────────────────────────────────────────
//
// Cross-type coercion is allowed (bigint → number, number → bigint, boolean →
// 0/1) because callers often hold plain JS numbers even for 64-bit members.
// null and undefined write zero. Anything else is a TypeError.

function toNumber(v: unknown, name: string, primitive: string): number {
  if (v == null) return 0;
  if (typeof v === 'number')  return v;
  if (typeof v === 'bigint')  return Number(v);
  if (typeof v === 'boolean') return v ? 1 : 0;
  throw new TypeError(`Member '${name}' (${primitive}) received ${typeof v}; expected number.`);
}

function toInteger(v: unknown, name: string, primitive: string): number {
  const n = toNumber(v, name, primitive);
  return Number.isFinite(n) ? Math.trunc(n) : 0;
}

function toBigInt(v: unknown, name: string, primitive: string): bigint {
  if (v == null) return 0n;
  if (typeof v === 'bigint')  return v;
  if (typeof v === 'number')  return Number.isFinite(v) ? BigInt(Math.trunc(v)) : 0n;
  if (typeof v === 'boolean') return v ? 1n : 0n;
  throw new TypeError(`Member '${name}' (${primitive}) received ${typeof v}; expected bigint or number.`);
}

export function toBool(v: unknown, name: string): boolean {
  if (v == null) return false;
  if (typeof v === 'boolean') return v;
  if (typeof v === 'number')  return v !== 0;
  if (typeof v === 'bigint')  return v !== 0n;
  throw new TypeError(`Member '${name}' (bool) received ${typeof v}; expected boolean.`);
}

// ─── Numeric lanes ────────────────────────────────────────────────────────────

type NumberArray =
  | Int8Array | Int16Array | Int32Array
  | Uint8Array | Uint16Array | Uint32Array
  | Float32Array | Float64Array;

type BigIntArray = BigInt64Array | BigUint64Array;

interface NumberLane {
  readonly bigint: false;
  readonly width:  number;
  alloc(length: number): NumberArray;
  get(dv: DataView, at: number): number;
  set(dv: DataView, at: number, v: number): void;
  coerce(v: unknown, name: string): number;
}

interface BigIntLane {
  readonly bigint: true;
  readonly width:  8;
  alloc(length: number): BigIntArray;
  get(dv: DataView, at: number): bigint;
  set(dv: DataView, at: number, v: bigint): void;
  coerce(v: unknown, name: string): bigint;
}

type Lane = NumberLane | BigIntLane;

// DataView setters wrap out-of-range integers modulo 2^width, matching the
// storage format's truncating conversion.
const LANES: Readonly<Record<NumericPrimitive, Lane>> = {
  int8: {
    bigint: false, width: 1,
    alloc:  n => new Int8Array(n),
    get:    (dv, at) => dv.getInt8(at),
    set:    (dv, at, v) => dv.setInt8(at, v),
    coerce: (v, name) => toInteger(v, name, 'int8'),
  },
  int16: {
    bigint: false, width: 2,
    alloc:  n => new Int16Array(n),
    get:    (dv, at) => dv.getInt16(at, /* le */ true),
    set:    (dv, at, v) => dv.setInt16(at, v, true),
    coerce: (v, name) => toInteger(v, name, 'int16'),
  },
  int32: {
    bigint: false, width: 4,
    alloc:  n => new Int32Array(n),
    get:    (dv, at) => dv.getInt32(at, true),
    set:    (dv, at, v) => dv.setInt32(at, v, true),
    coerce: (v, name) => toInteger(v, name, 'int32'),
  },
  int64: {
    bigint: true, width: 8,
    alloc:  n => new BigInt64Array(n),
    get:    (dv, at) => dv.getBigInt64(at, true),
    set:    (dv, at, v) => dv.setBigInt64(at, v, true),
    coerce: (v, name) => toBigInt(v, name, 'int64'),
  },
  uint8: {
    bigint: false, width: 1,
    alloc:  n => new Uint8Array(n),
    get:    (dv, at) => dv.getUint8(at),
    set:    (dv, at, v) => dv.setUint8(at, v),
    coerce: (v, name) => toInteger(v, name, 'uint8'),
  },
  uint16: {
    bigint: false, width: 2,
    alloc:  n => new Uint16Array(n),
    get:    (dv, at) => dv.getUint16(at, true),
    set:    (dv, at, v) => dv.setUint16(at, v, true),
    coerce: (v, name) => toInteger(v, name, 'uint16'),
  },
  uint32: {
    bigint: false, width: 4,
    alloc:  n => new Uint32Array(n),
    get:    (dv, at) => dv.getUint32(at, true),
    set:    (dv, at, v) => dv.setUint32(at, v, true),
    coerce: (v, name) => toInteger(v, name, 'uint32'),
  },
  uint64: {
    bigint: true, width: 8,
    alloc:  n => new BigUint64Array(n),
    get:    (dv, at) => dv.getBigUint64(at, true),
    set:    (dv, at, v) => dv.setBigUint64(at, v, true),
    coerce: (v, name) => toBigInt(v, name, 'uint64'),
  },
  float32: {
    bigint: false, width: 4,
    alloc:  n => new Float32Array(n),
    get:    (dv, at) => dv.getFloat32(at, true),
    set:    (dv, at, v) => dv.setFloat32(at, v, true),
    coerce: (v, name) => toNumber(v, name, 'float32'),
  },
  float64: {
    bigint: false, width: 8,
    alloc:  n => new Float64Array(n),
    get:    (dv, at) => dv.getFloat64(at, true),
    set:    (dv, at, v) => dv.setFloat64(at, v, true),
    coerce: (v, name) => toNumber(v, name, 'float64'),
  },
};

/** @throws TypeError if `v` cannot be coerced to `primitive`. */
export function writeNumeric(
  primitive: NumericPrimitive,
  dv:        DataView,
  at:        number,
  v:         unknown,
  name:      string,
): void {
  const lane = LANES[primitive];
  if (lane.bigint) lane.set(dv, at, lane.coerce(v, name));
  else             lane.set(dv, at, lane.coerce(v, name));
}

export function readNumeric(primitive: NumericPrimitive, dv: DataView, at: number): number | bigint {
  return LANES[primitive].get(dv, at);
}

/** Read `count` contiguous elements into a freshly allocated typed array. */
export function readNumericArray(
  primitive: NumericPrimitive,
  dv:        DataView,
  at:        number,
  count:     number,
): NumericArray {
  const lane = LANES[primitive];
  if (lane.bigint) {
    const out = lane.alloc(count);
    for (let i = 0; i < count; i++) out[i] = lane.get(dv, at + i * lane.width);
    return out;
  }
  const out = lane.alloc(count);
  for (let i = 0; i < count; i++) out[i] = lane.get(dv, at + i * lane.width);
  return out;
}

// ─── Strings ──────────────────────────────────────────────────────────────────

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder();

function byteView(dv: DataView, at: number, width: number): Uint8Array {
  return new Uint8Array(dv.buffer, dv.byteOffset + at, width);
}

/**
 * Write a fixed-length string slot of `width` bytes (maxLength + 1).
 * The value is truncated to width − 1 bytes without splitting a code point,
 * and the rest of the slot is NUL-filled.
 */
export function writeString(dv: DataView, at: number, width: number, v: unknown, name: string): void {
  let text: string;
  if (v == null)                text = '';
  else if (typeof v === 'string') text = v;
  else throw new TypeError(`Member '${name}' (string) received ${typeof v}; expected string.`);

  const bytes = utf8Encoder.encode(text);
  let cut = Math.min(bytes.length, width - 1);
  // Back off over UTF-8 continuation bytes (10xxxxxx).
  while (cut > 0 && cut < bytes.length && ((bytes[cut] ?? 0) & 0xc0) === 0x80) cut--;

  const slot = byteView(dv, at, width);
  slot.fill(0);
  slot.set(bytes.subarray(0, cut));
}

export function readString(dv: DataView, at: number, width: number): string {
  const slot = byteView(dv, at, width);
  const end  = slot.indexOf(0);
  return utf8Decoder.decode(slot.subarray(0, end === -1 ? width : end));
}

// ─── Enum ordinals ────────────────────────────────────────────────────────────

/**
 * Write the ordinal of `v` within `values`. Accepts the value itself or its
 * ordinal as a number; null and undefined write ordinal 0.
 * @throws RangeError for a value that is not one of `values`.
 */
export function writeEnum(
  dv:     DataView,
  at:     number,
  width:  1 | 2 | 4,
  values: readonly string[],
  v:      unknown,
  name:   string,
): void {
  let ordinal: number;
  if (v == null) {
    ordinal = 0;
  } else if (typeof v === 'string') {
    ordinal = values.indexOf(v);
    if (ordinal === -1) {
      throw new RangeError(
        `Member '${name}' (enum) received '${v}'; expected one of ${values.map(x => `'${x}'`).join(', ')}.`,
      );
    }
  } else if (typeof v === 'number') {
    if (!Number.isInteger(v) || v < 0 || v >= values.length) {
      throw new RangeError(`Member '${name}' (enum) ordinal ${v} out of range [0, ${values.length}).`);
    }
    ordinal = v;
  } else {
    throw new TypeError(`Member '${name}' (enum) received ${typeof v}; expected string.`);
  }

  switch (width) {
    case 1: dv.setUint8(at, ordinal);        break;
    case 2: dv.setUint16(at, ordinal, true); break;
    case 4: dv.setUint32(at, ordinal, true); break;
  }
}

/** @throws RangeError for an ordinal outside `values`. */
export function readEnum(
  dv:     DataView,
  at:     number,
  width:  1 | 2 | 4,
  values: readonly string[],
  name:   string,
): string {
  const ordinal =
    width === 1 ? dv.getUint8(at) :
    width === 2 ? dv.getUint16(at, true) :
                  dv.getUint32(at, true);
  const value = values[ordinal];
  if (value === undefined) {
    throw new RangeError(`Member '${name}' (enum) stored ordinal ${ordinal} has no value.`);
  }
  return value;
}

/** Zero a byte range of `dv`. */
export function zeroFill(dv: DataView, at: number, width: number): void {
  byteView(dv, at, width).fill(0);
}
