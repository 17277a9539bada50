/**
 * @tessera/core — member codec
 *
 * Encodes and decodes one member of a compound record at its planned offset.
 * Rank dispatch (Scalar, FixedArray, Matrix, NDArray) lives here once; the
 * record's container type only enters through a ValueAccessor.
 *
 * Decoded values:
 *   Scalar      the element itself (number, bigint, boolean, string, record,
 *               Uint32Array bitfield; a Date for an int64 member tagged
 *               'timestamp-ms')
 *   FixedArray  typed array for numeric primitives, plain array otherwise
 *               (Date[] for 'timestamp-ms')
 *   Matrix      array of row views over one typed array
 *   NDArray     NDArray over a typed array
 */

import { NUMERIC_PRIMITIVES } from './constants';
import { objectStrategy, type AccessStrategy, type ValueAccessor } from './accessor';
import { readBitfield, writeBitfield } from './bitfield';
import { enumStorageWidth } from './layout';
import {
  DimensionMismatchError,
  NDArray,
  checkMatrixDimensions,
  checkNDArrayDimensions,
  reshapeRows,
} from './ndarray';
import {
  readEnum,
  readNumeric,
  readNumericArray,
  readString,
  toBool,
  writeEnum,
  writeNumeric,
  writeString,
  zeroFill,
} from './primitives';
import type { MemberLayout, NumericPrimitive, PrimitiveType } from './types';

function isNumeric(p: PrimitiveType): p is NumericPrimitive {
  return NUMERIC_PRIMITIVES.has(p);
}

function describeValue(v: unknown): string {
  if (v instanceof Map)   return 'a Map';
  if (Array.isArray(v))   return 'an array';
  return typeof v;
}

function isElementList(v: unknown): v is ArrayLike<unknown> {
  return Array.isArray(v) || (ArrayBuffer.isView(v) && !(v instanceof DataView));
}

export class MemberCodec {
  readonly layout: MemberLayout;
  private readonly records: AccessStrategy<unknown>;
  private readonly nested: ReadonlyArray<{
    readonly codec:    MemberCodec;
    readonly accessor: ValueAccessor<unknown>;
  }>;

  /** @param records how nested compound records are held */
  constructor(layout: MemberLayout, records: AccessStrategy<unknown> = objectStrategy()) {
    this.layout  = layout;
    this.records = records;
    this.nested  = (layout.nested?.members ?? []).map((m, i) => ({
      codec:    new MemberCodec(m, records),
      accessor: records.accessorFor(m, i),
    }));
  }

  get name(): string {
    return this.layout.spec.name;
  }

  // ─── Encode ─────────────────────────────────────────────────────────────────

  /**
   * Write `value` into `dv` at `base + layout.offset`.
   *
   * @throws DimensionMismatchError before any byte is written.
   * @throws TypeError / RangeError for element values of the wrong type.
   */
  encode(value: unknown, dv: DataView, base: number): void {
    const elements = this.elementsOf(value);
    const { offset, elementSize } = this.layout;
    for (let i = 0; i < elements.length; i++) {
      this.writeElement(dv, base + offset + i * elementSize, elements[i]);
    }
  }

  encodeFrom<C>(container: C, accessor: ValueAccessor<C>, dv: DataView, base: number): void {
    this.encode(accessor.get(container), dv, base);
  }

  /** Validate `value` against the declared kind and dimensions; return its flat elements. */
  private elementsOf(value: unknown): ArrayLike<unknown> {
    const { spec, elementCount } = this.layout;

    switch (spec.kind) {
      case 'Scalar':
        return [value];

      case 'FixedArray': {
        if (!isElementList(value)) {
          throw new TypeError(`Member '${spec.name}' (FixedArray) received ${typeof value}; expected an array.`);
        }
        if (value.length !== elementCount) {
          throw new DimensionMismatchError(
            `Member '${spec.name}': array has ${value.length} elements; declared ${elementCount}.`,
          );
        }
        return value;
      }

      case 'Matrix': {
        if (value instanceof NDArray) {
          checkNDArrayDimensions(spec.name, spec.dimensions, value);
          return value.data;
        }
        if (!Array.isArray(value)) {
          throw new TypeError(`Member '${spec.name}' (Matrix) received ${typeof value}; expected an array of rows.`);
        }
        const rows: ArrayLike<unknown>[] = [];
        for (const row of value) {
          if (!isElementList(row)) {
            throw new TypeError(`Member '${spec.name}' (Matrix) has a row of type ${typeof row}; expected an array.`);
          }
          rows.push(row);
        }
        checkMatrixDimensions(spec.name, spec.dimensions, rows);
        const flat: unknown[] = [];
        for (const row of rows) {
          for (let c = 0; c < row.length; c++) flat.push(row[c]);
        }
        return flat;
      }

      case 'NDArray': {
        if (!(value instanceof NDArray)) {
          throw new TypeError(`Member '${spec.name}' (NDArray) received ${typeof value}; expected an NDArray.`);
        }
        checkNDArrayDimensions(spec.name, spec.dimensions, value);
        return value.data;
      }
    }
  }

  private writeElement(dv: DataView, at: number, v: unknown): void {
    const { spec, elementSize } = this.layout;
    const p = spec.primitive;

    if (isNumeric(p)) {
      const raw = spec.typeVariant === 'timestamp-ms' && v instanceof Date ? v.getTime() : v;
      writeNumeric(p, dv, at, raw, spec.name);
      return;
    }

    switch (p) {
      case 'bool':
        dv.setUint8(at, toBool(v, spec.name) ? 1 : 0);
        return;
      case 'string':
        writeString(dv, at, elementSize, v, spec.name);
        return;
      case 'enum':
        writeEnum(dv, at, enumStorageWidth(spec.enumValues?.length ?? 0), spec.enumValues ?? [], v, spec.name);
        return;
      case 'bitfield':
        writeBitfield(dv, at, elementSize, spec.bitLength ?? 0, v, spec.name);
        return;
      case 'compound':
        if (v == null) {
          zeroFill(dv, at, elementSize);
          return;
        }
        if (!this.records.holds(v)) {
          throw new TypeError(
            `Member '${spec.name}' (compound) received ${describeValue(v)}; expected a ${this.records.kind} record.`,
          );
        }
        for (const { codec, accessor } of this.nested) codec.encodeFrom(v, accessor, dv, at);
        return;
    }
  }

  // ─── Decode ─────────────────────────────────────────────────────────────────

  /** Read the member stored at `base + layout.offset`. */
  decode(dv: DataView, base: number): unknown {
    const { spec, offset, elementSize, elementCount } = this.layout;
    const at = base + offset;
    const p  = spec.primitive;

    switch (spec.kind) {
      case 'Scalar':
        return this.readElement(dv, at);

      case 'FixedArray':
        if (isNumeric(p) && spec.typeVariant !== 'timestamp-ms') return readNumericArray(p, dv, at, elementCount);
        return Array.from({ length: elementCount }, (_, i) => this.readElement(dv, at + i * elementSize));

      case 'Matrix': {
        // Matrix and NDArray members are numeric; planLayout rejects anything else.
        if (!isNumeric(p)) throw new TypeError(`Member '${spec.name}': Matrix of ${p} is not decodable.`);
        const [rows = 0, cols = 0] = spec.dimensions;
        return reshapeRows(readNumericArray(p, dv, at, elementCount), rows, cols);
      }

      case 'NDArray': {
        if (!isNumeric(p)) throw new TypeError(`Member '${spec.name}': NDArray of ${p} is not decodable.`);
        return new NDArray(readNumericArray(p, dv, at, elementCount), spec.dimensions);
      }
    }
  }

  decodeInto<C>(container: C, accessor: ValueAccessor<C>, dv: DataView, base: number): void {
    accessor.set(container, this.decode(dv, base));
  }

  private readElement(dv: DataView, at: number): unknown {
    const { spec, elementSize } = this.layout;
    const p = spec.primitive;

    if (isNumeric(p)) {
      const raw = readNumeric(p, dv, at);
      return spec.typeVariant === 'timestamp-ms' ? new Date(Number(raw)) : raw;
    }

    switch (p) {
      case 'bool':
        return dv.getUint8(at) !== 0;
      case 'string':
        return readString(dv, at, elementSize);
      case 'enum':
        return readEnum(dv, at, enumStorageWidth(spec.enumValues?.length ?? 0), spec.enumValues ?? [], spec.name);
      case 'bitfield':
        return readBitfield(dv, at, spec.bitLength ?? 0);
      case 'compound': {
        const record = this.records.create(this.layout.nested ?? { members: [], byName: new Map(), size: 0 });
        for (const { codec, accessor } of this.nested) codec.decodeInto(record, accessor, dv, at);
        return record;
      }
    }
  }
}
