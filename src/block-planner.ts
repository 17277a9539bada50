/**
 * @tessera/core — block planner
 *
 * A dataset of extent `dimensions` is cut into blocks of `blockShape`
 * (the chunk shape by default, or the whole dataset when unchunked). Block
 * (b₀, b₁, …) starts at offset bᵢ·blockShape[i]; the last block on an axis is
 * clipped to what remains:
 *
 *   dimensions [10], blockShape [4]  →  [0, 4) [4, 8) [8, 10)
 *
 * Reads never extend past the extent. Writes keep the full block shape and
 * report the extent the dataset must grow to, provided the axis allows it.
 */

import { UNLIMITED } from './constants';
import type { BlockDescriptor, DatasetExtent } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/** Thrown for a selector outside a bounded axis. Raised before any backend call. */
export class OutOfBoundsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OutOfBoundsError';
  }
}

// ─── Types ────────────────────────────────────────────────────────────────────

export type BlockSelector =
  | { readonly blockNumber: readonly number[] }
  | { readonly offset: readonly number[] };

export type PlanMode = 'read' | 'write';

export interface BlockPlan extends BlockDescriptor {
  /** Set on write plans that reach past the current extent. */
  readonly requiredDimensions?: readonly number[];
}

// ─── Geometry ─────────────────────────────────────────────────────────────────

/** Chunk shape, or the whole dataset when it is not chunked. */
export function naturalBlockShape(extent: DatasetExtent): number[] {
  return [...(extent.chunkShape ?? extent.dimensions)];
}

function checkRank(extent: DatasetExtent, blockShape: readonly number[], what: string): void {
  if (blockShape.length !== extent.dimensions.length) {
    throw new OutOfBoundsError(
      `${what}: rank ${blockShape.length} does not match dataset rank ${extent.dimensions.length}.`,
    );
  }
}

function checkBlockShape(extent: DatasetExtent, blockShape: readonly number[]): void {
  checkRank(extent, blockShape, 'block shape');
  blockShape.forEach((b, axis) => {
    if (!Number.isSafeInteger(b) || b < 0 || (b === 0 && (extent.dimensions[axis] ?? 0) > 0)) {
      throw new OutOfBoundsError(`block shape [${blockShape.join(', ')}]: axis ${axis} must be a positive integer.`);
    }
  });
}

/** Blocks per axis: ceil(dimensions[i] / blockShape[i]). */
export function blockCounts(extent: DatasetExtent, blockShape: readonly number[]): number[] {
  checkBlockShape(extent, blockShape);
  return extent.dimensions.map((dim, axis) => {
    const b = blockShape[axis] ?? 0;
    return dim === 0 ? 0 : Math.ceil(dim / b);
  });
}

/** Total number of blocks; 0 when any axis is empty. */
export function totalBlocks(extent: DatasetExtent, blockShape: readonly number[]): number {
  return blockCounts(extent, blockShape).reduce((acc, n) => acc * n, 1);
}

// ─── Planning ─────────────────────────────────────────────────────────────────

/**
 * Plan one block.
 *
 * @param blockShape  defaults to naturalBlockShape(extent)
 * @throws OutOfBoundsError
 */
export function planBlock(
  extent:     DatasetExtent,
  blockShape: readonly number[] | undefined,
  selector:   BlockSelector,
  mode:       PlanMode = 'read',
): BlockPlan {
  const block = blockShape ?? naturalBlockShape(extent);
  checkBlockShape(extent, block);

  const byNumber = 'blockNumber' in selector;
  const given    = byNumber ? selector.blockNumber : selector.offset;
  checkRank(extent, given, byNumber ? 'block number' : 'offset');

  const dims     = extent.dimensions;
  const index:  number[] = [];
  const offset: number[] = [];
  const shape:  number[] = [];
  const required: number[] = [...dims];
  let grows = false;

  for (let axis = 0; axis < dims.length; axis++) {
    const dim = dims[axis] ?? 0;
    const b   = block[axis] ?? 0;
    const g   = given[axis] ?? 0;
    if (!Number.isSafeInteger(g) || g < 0) {
      throw new OutOfBoundsError(`${byNumber ? 'block number' : 'offset'} ${g} on axis ${axis} must be a non-negative integer.`);
    }

    const off = byNumber ? g * b : g;
    index.push(byNumber ? g : b === 0 ? 0 : Math.floor(g / b));
    offset.push(off);

    if (mode === 'read') {
      if (off >= dim) {
        throw new OutOfBoundsError(`axis ${axis}: block offset ${off} is outside the extent ${dim}.`);
      }
      const remainder = dim - off;
      shape.push(remainder < b ? remainder : b);
      continue;
    }

    shape.push(b);
    const end = off + b;
    if (end > dim) {
      const max = extent.maxDimensions?.[axis] ?? dim;
      if (max !== UNLIMITED && end > max) {
        throw new OutOfBoundsError(
          `axis ${axis}: block [${off}, ${end}) exceeds the maximum extent ${max}.`,
        );
      }
      required[axis] = end;
      grows = true;
    }
  }

  return grows ? { index, offset, shape, requiredDimensions: required } : { index, offset, shape };
}
