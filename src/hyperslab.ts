/**
 * @tessera/core — hyperslab copy
 *
 * Moves a rectangular block between a dataset's flat row-major buffer and a
 * dense block buffer. Each innermost row of the block is one contiguous run
 * in both buffers, so the copy is one subarray().set() per row.
 */

import { BackendError, type Hyperslab } from './backend';
import { elementCountOf } from './layout';

/** @throws BackendError when the slab's rank or extent does not fit `dimensions`. */
export function validateHyperslab(dimensions: readonly number[], slab: Hyperslab): void {
  if (slab.offset.length !== dimensions.length || slab.shape.length !== dimensions.length) {
    throw new BackendError(
      `Hyperslab rank (${slab.offset.length}/${slab.shape.length}) does not match dataset rank ${dimensions.length}.`,
    );
  }
  dimensions.forEach((dim, axis) => {
    const off = slab.offset[axis] ?? 0;
    const len = slab.shape[axis] ?? 0;
    if (!Number.isSafeInteger(off) || !Number.isSafeInteger(len) || off < 0 || len < 0 || off + len > dim) {
      throw new BackendError(
        `Hyperslab axis ${axis}: [${off}, ${off + len}) is outside the dataset extent ${dim}.`,
      );
    }
  });
}

/**
 * Copy between `dataset` (extent `dimensions`) and `block` (extent
 * `slab.shape`). 'read' fills `block`; 'write' fills the slab of `dataset`.
 */
export function copyHyperslab(
  direction:   'read' | 'write',
  dataset:     Uint8Array,
  dimensions:  readonly number[],
  block:       Uint8Array,
  slab:        Hyperslab,
  elementSize: number,
): void {
  const rank = dimensions.length;
  if (rank === 0) {
    if (direction === 'read') block.set(dataset.subarray(0, elementSize));
    else                      dataset.set(block.subarray(0, elementSize));
    return;
  }
  if (elementCountOf(slab.shape) === 0) return;

  // Element strides of the dataset, last axis fastest.
  const strides = new Array<number>(rank).fill(1);
  for (let axis = rank - 2; axis >= 0; axis--) {
    strides[axis] = (strides[axis + 1] ?? 1) * (dimensions[axis + 1] ?? 0);
  }

  const rowBytes  = (slab.shape[rank - 1] ?? 0) * elementSize;
  const rowCount  = elementCountOf(slab.shape.slice(0, -1));
  const outer     = new Array<number>(rank - 1).fill(0);

  for (let row = 0; row < rowCount; row++) {
    let element = slab.offset[rank - 1] ?? 0;
    for (let axis = 0; axis < rank - 1; axis++) {
      element += ((slab.offset[axis] ?? 0) + (outer[axis] ?? 0)) * (strides[axis] ?? 0);
    }
    const datasetAt = element * elementSize;
    const blockAt   = row * rowBytes;

    if (direction === 'read') block.set(dataset.subarray(datasetAt, datasetAt + rowBytes), blockAt);
    else                      dataset.set(block.subarray(blockAt, blockAt + rowBytes), datasetAt);

    for (let axis = rank - 2; axis >= 0; axis--) {
      const next = (outer[axis] ?? 0) + 1;
      if (next < (slab.shape[axis] ?? 0)) {
        outer[axis] = next;
        break;
      }
      outer[axis] = 0;
    }
  }
}
