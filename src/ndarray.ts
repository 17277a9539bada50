/**
 * @tessera/core — N-dimensional array values
 *
 * NDArray pairs a flat, row-major backing store with its dimensions. Matrix
 * members use plain arrays of rows instead; the helpers below flatten and
 * reshape those and check them against declared dimensions.
 */

import { elementCountOf } from './layout';

// ─── Types ────────────────────────────────────────────────────────────────────

export type NumericArray =
  | Int8Array
  | Int16Array
  | Int32Array
  | BigInt64Array
  | Uint8Array
  | Uint16Array
  | Uint32Array
  | BigUint64Array
  | Float32Array
  | Float64Array;

/** Anything indexable that can back an NDArray: typed arrays, record arrays. */
export type FlatStore = ArrayLike<unknown>;

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Thrown when a value's shape disagrees with the dimensions its member
 * declares. Raised before any byte of the member is written.
 */
export class DimensionMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DimensionMismatchError';
  }
}

// ─── NDArray ──────────────────────────────────────────────────────────────────

export class NDArray<D extends FlatStore = NumericArray> {
  readonly dimensions: readonly number[];
  readonly data:       D;

  constructor(data: D, dimensions: readonly number[]) {
    const expected = elementCountOf(dimensions);
    if (data.length !== expected) {
      throw new DimensionMismatchError(
        `NDArray: backing store has ${data.length} elements; ` +
        `dimensions [${dimensions.join(', ')}] require ${expected}.`,
      );
    }
    this.data       = data;
    this.dimensions = Object.freeze([...dimensions]);
  }

  get rank(): number {
    return this.dimensions.length;
  }

  get size(): number {
    return this.data.length;
  }

  /** Row-major flat index of a multi-index. */
  flatIndex(index: readonly number[]): number {
    if (index.length !== this.dimensions.length) {
      throw new RangeError(
        `NDArray.flatIndex: index has rank ${index.length}; array has rank ${this.dimensions.length}.`,
      );
    }
    let flat = 0;
    for (let axis = 0; axis < index.length; axis++) {
      const i   = index[axis] ?? 0;
      const dim = this.dimensions[axis] ?? 0;
      if (i < 0 || i >= dim) {
        throw new RangeError(`NDArray.flatIndex: index ${i} out of range for axis ${axis} (size ${dim}).`);
      }
      flat = flat * dim + i;
    }
    return flat;
  }
}

// ─── Dimension checks ─────────────────────────────────────────────────────────

function sameDimensions(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** @throws DimensionMismatchError unless `array` has exactly `dimensions`. */
export function checkNDArrayDimensions(
  memberName: string,
  dimensions: readonly number[],
  array:      NDArray<FlatStore>,
): void {
  if (!sameDimensions(dimensions, array.dimensions)) {
    throw new DimensionMismatchError(
      `Member '${memberName}': array dimensions [${array.dimensions.join(', ')}] ` +
      `do not match declared dimensions [${dimensions.join(', ')}].`,
    );
  }
}

/**
 * @throws DimensionMismatchError unless `rows` has dimensions[0] rows of
 *         dimensions[1] columns each.
 */
export function checkMatrixDimensions(
  memberName: string,
  dimensions: readonly number[],
  rows:       ReadonlyArray<ArrayLike<unknown>>,
): void {
  const [rowCount = 0, colCount = 0] = dimensions;
  if (rows.length !== rowCount) {
    throw new DimensionMismatchError(
      `Member '${memberName}': matrix has ${rows.length} rows; declared ${rowCount}.`,
    );
  }
  rows.forEach((row, r) => {
    if (row.length !== colCount) {
      throw new DimensionMismatchError(
        `Member '${memberName}': matrix row ${r} has ${row.length} columns; declared ${colCount}.`,
      );
    }
  });
}

/** Split a flat row-major store into `rows` consecutive views of `cols` elements. */
export function reshapeRows(flat: NumericArray, rows: number, cols: number): NumericArray[] {
  const out: NumericArray[] = [];
  for (let r = 0; r < rows; r++) {
    out.push(flat.subarray(r * cols, (r + 1) * cols));
  }
  return out;
}
