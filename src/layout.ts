/**
 * @tessera/core — record layout planning, type descriptors, fingerprinting
 *
 * planLayout() turns a RecordShape into a RecordLayout: one byte offset and
 * size per member, assigned strictly in declaration order with no alignment
 * padding. Storage-format readers expect exactly this packing, so members are
 * never re-ordered.
 *
 * encodeTypeDescriptor() is the canonical binary form of a layout. Two
 * layouts are structurally equal iff their descriptors are byte-identical.
 * Wire format (all values little-endian):
 *
 *   [version:      u8]
 *   [member_count: u16]
 *   [record_size:  u32]
 *   For each member:
 *     [name_len: u16][name: UTF-8]
 *     [primitive_tag: u8][kind_tag: u8]
 *     [offset: u32]
 *     [rank: u8][dimension: u32] × rank
 *     string:   [max_length: u32]
 *     enum:     [value_count: u32] then per value [len: u16][UTF-8]
 *     compound: [nested_len: u32][nested descriptor]
 *     bitfield: [bit_length: u32]
 *
 * Type variants are NOT part of the descriptor. They travel as attribute
 * metadata on the committed type and do not affect structural equality.
 */

import {
  BITFIELD_WORD_BYTES,
  DESCRIPTOR_VERSION,
  ENUM_BYTE_LIMIT,
  ENUM_SHORT_LIMIT,
  KIND_TAGS,
  NUMERIC_PRIMITIVES,
  PRIMITIVE_BYTE_WIDTHS,
  PRIMITIVE_TAGS,
} from './constants';
import type { ElementKind, MemberLayout, MemberSpec, RecordLayout, RecordShape } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/** Thrown for a malformed RecordShape. Always raised before any I/O. */
export class InvalidShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidShapeError';
  }
}

// ─── FNV-1a 32-bit ────────────────────────────────────────────────────────────

/**
 * FNV-1a 32-bit hash.
 * Math.imul() keeps the multiply in 32-bit integer space.
 */
export function fnv1a32(bytes: Uint8Array): number {
  let hash = 0x811c9dc5;
  for (const byte of bytes) {
    hash ^= byte;
    hash  = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

/** Storage width of an enum with `valueCount` values. */
export function enumStorageWidth(valueCount: number): 1 | 2 | 4 {
  if (valueCount < ENUM_BYTE_LIMIT)  return 1;
  if (valueCount < ENUM_SHORT_LIMIT) return 2;
  return 4;
}

/** Product of dimensions; 1 for an empty list. */
export function elementCountOf(dimensions: readonly number[]): number {
  let count = 1;
  for (const d of dimensions) count *= d;
  return count;
}

function expectedRank(kind: ElementKind): number | null {
  switch (kind) {
    case 'Scalar':     return 0;
    case 'FixedArray': return 1;
    case 'Matrix':     return 2;
    case 'NDArray':    return null; // any rank >= 1
  }
}

function memberLabel(path: string, spec: MemberSpec): string {
  return `planLayout: member '${path}${spec.name}' (${spec.kind} ${spec.primitive})`;
}

// ─── Planning ─────────────────────────────────────────────────────────────────

function validateDimensions(spec: MemberSpec, path: string): void {
  const rank = expectedRank(spec.kind);
  const dims = spec.dimensions;

  if (rank === null ? dims.length === 0 : dims.length !== rank) {
    throw new InvalidShapeError(
      `${memberLabel(path, spec)} declares ${dims.length} dimension(s); ` +
      `${spec.kind} requires ${rank === null ? 'at least 1' : rank}.`,
    );
  }

  for (const d of dims) {
    if (!Number.isSafeInteger(d) || d < 0) {
      throw new InvalidShapeError(
        `${memberLabel(path, spec)} has invalid dimension ${d}; ` +
        `dimensions must be non-negative integers.`,
      );
    }
  }

  if ((spec.primitive === 'string' || spec.primitive === 'bitfield') && spec.kind !== 'Scalar') {
    throw new InvalidShapeError(`${memberLabel(path, spec)}: ${spec.primitive} members must be Scalar.`);
  }
  if (spec.typeVariant === 'timestamp-ms' &&
      (spec.primitive !== 'int64' || (spec.kind !== 'Scalar' && spec.kind !== 'FixedArray'))) {
    throw new InvalidShapeError(
      `${memberLabel(path, spec)}: timestamp-ms applies to int64 Scalar and FixedArray members only.`,
    );
  }
  if ((spec.kind === 'Matrix' || spec.kind === 'NDArray') && !NUMERIC_PRIMITIVES.has(spec.primitive)) {
    throw new InvalidShapeError(
      `${memberLabel(path, spec)}: ${spec.kind} members require a numeric primitive.`,
    );
  }
}

function resolveElement(
  spec: MemberSpec,
  path: string,
): { elementSize: number; nested?: RecordLayout } {
  switch (spec.primitive) {
    case 'string': {
      const max = spec.maxLength;
      if (max === undefined || !Number.isSafeInteger(max) || max <= 0) {
        throw new InvalidShapeError(
          `${memberLabel(path, spec)} requires a positive integer maxLength; got ${String(max)}.`,
        );
      }
      return { elementSize: max + 1 };
    }

    case 'enum': {
      const values = spec.enumValues;
      if (values === undefined || values.length === 0) {
        throw new InvalidShapeError(`${memberLabel(path, spec)} requires a non-empty enumValues list.`);
      }
      if (new Set(values).size !== values.length) {
        throw new InvalidShapeError(`${memberLabel(path, spec)} has duplicate enumValues.`);
      }
      return { elementSize: enumStorageWidth(values.length) };
    }

    case 'compound': {
      if (spec.members === undefined) {
        throw new InvalidShapeError(`${memberLabel(path, spec)} requires nested members.`);
      }
      const nested = planLayoutAt(spec.members, `${path}${spec.name}.`);
      return { elementSize: nested.size, nested };
    }

    case 'bitfield': {
      const bits = spec.bitLength;
      if (bits === undefined || !Number.isSafeInteger(bits) || bits <= 0) {
        throw new InvalidShapeError(
          `${memberLabel(path, spec)} requires a positive integer bitLength; got ${String(bits)}.`,
        );
      }
      return { elementSize: Math.ceil(bits / (BITFIELD_WORD_BYTES * 8)) * BITFIELD_WORD_BYTES };
    }

    default:
      return { elementSize: PRIMITIVE_BYTE_WIDTHS[spec.primitive] };
  }
}

function planLayoutAt(shape: RecordShape, path: string): RecordLayout {
  if (shape.length === 0) {
    throw new InvalidShapeError(
      `planLayout: shape${path ? ` '${path.slice(0, -1)}'` : ''} must declare at least one member.`,
    );
  }

  const seen    = new Set<string>();
  const members: MemberLayout[] = [];
  let   offset  = 0;

  for (const spec of shape) {
    if (typeof spec.name !== 'string' || spec.name.length === 0) {
      throw new InvalidShapeError(`planLayout: member names must be non-empty strings.`);
    }
    if (seen.has(spec.name)) {
      throw new InvalidShapeError(
        `planLayout: duplicate member name '${path}${spec.name}'. ` +
        `All member names must be unique within a shape.`,
      );
    }
    seen.add(spec.name);

    validateDimensions(spec, path);
    const { elementSize, nested } = resolveElement(spec, path);
    const elementCount = elementCountOf(spec.dimensions);
    const size         = elementSize * elementCount;

    const member: MemberLayout = nested
      ? { spec, offset, size, elementSize, elementCount, nested }
      : { spec, offset, size, elementSize, elementCount };
    members.push(Object.freeze(member));
    offset += size;
  }

  return Object.freeze({
    members: Object.freeze(members),
    byName:  new Map(members.map(m => [m.spec.name, m])),
    size:    offset,
  });
}

/**
 * Compute the flat layout of a record shape.
 *
 * Usage:
 *   const layout = planLayout([
 *     { name: 'a', kind: 'Scalar',     primitive: 'int32',   dimensions: [] },
 *     { name: 'b', kind: 'FixedArray', primitive: 'float64', dimensions: [3] },
 *   ]);
 *   // a: offset 0, size 4; b: offset 4, size 24; layout.size 28
 *
 * @throws InvalidShapeError
 */
export function planLayout(shape: RecordShape): RecordLayout {
  return planLayoutAt(shape, '');
}

// ─── Descriptor Encoding ──────────────────────────────────────────────────────

const utf8Encoder = new TextEncoder();

/** Growable little-endian byte sink. */
class DescriptorWriter {
  private buf = new Uint8Array(64);
  private dv  = new DataView(this.buf.buffer);
  private len = 0;

  private reserve(n: number): number {
    if (this.len + n > this.buf.length) {
      const next = new Uint8Array(Math.max(this.buf.length * 2, this.len + n));
      next.set(this.buf.subarray(0, this.len));
      this.buf = next;
      this.dv  = new DataView(next.buffer);
    }
    const at = this.len;
    this.len += n;
    return at;
  }

  u8(v: number):  void { this.dv.setUint8(this.reserve(1), v); }
  u16(v: number): void { this.dv.setUint16(this.reserve(2), v, /* le */ true); }
  u32(v: number): void { this.dv.setUint32(this.reserve(4), v, true); }

  bytes(b: Uint8Array): void {
    this.buf.set(b, this.reserve(b.length));
  }

  str(s: string): void {
    const b = utf8Encoder.encode(s);
    this.u16(b.length);
    this.bytes(b);
  }

  finish(): Uint8Array {
    return this.buf.slice(0, this.len);
  }
}

/**
 * Encode a RecordLayout to its canonical binary type descriptor.
 * This is the input to layoutFingerprint() and the unit of structural
 * comparison between a committed type and a freshly planned one.
 */
export function encodeTypeDescriptor(layout: RecordLayout): Uint8Array {
  const w = new DescriptorWriter();
  w.u8(DESCRIPTOR_VERSION);
  w.u16(layout.members.length);
  w.u32(layout.size);

  for (const m of layout.members) {
    const spec = m.spec;
    w.str(spec.name);
    w.u8(PRIMITIVE_TAGS[spec.primitive]);
    w.u8(KIND_TAGS[spec.kind]);
    w.u32(m.offset);
    w.u8(spec.dimensions.length);
    for (const d of spec.dimensions) w.u32(d);

    if (spec.primitive === 'string') {
      w.u32(m.elementSize - 1);
    } else if (spec.primitive === 'enum') {
      const values = spec.enumValues ?? [];
      w.u32(values.length);
      for (const v of values) w.str(v);
    } else if (spec.primitive === 'bitfield') {
      w.u32(spec.bitLength ?? 0);
    } else if (spec.primitive === 'compound' && m.nested) {
      const nested = encodeTypeDescriptor(m.nested);
      w.u32(nested.length);
      w.bytes(nested);
    }
  }

  return w.finish();
}

/**
 * FNV-1a 32-bit fingerprint of a layout's type descriptor.
 * Identical structure (names, primitives, offsets, dimensions) gives an
 * identical fingerprint; type variants do not participate.
 */
export function layoutFingerprint(layout: RecordLayout): number {
  return fnv1a32(encodeTypeDescriptor(layout));
}

/** Byte-wise equality of two encoded descriptors. */
export function descriptorsEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Member count recorded in an encoded descriptor's header. */
export function descriptorMemberCount(descriptor: Uint8Array): number {
  if (descriptor.length < 3) return 0;
  return new DataView(descriptor.buffer, descriptor.byteOffset, descriptor.byteLength).getUint16(1, true);
}
