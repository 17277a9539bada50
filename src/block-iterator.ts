/**
 * @tessera/core — block iterator
 *
 * Walks every block of a dataset in row-major order (last axis fastest).
 * Single pass: a partially consumed iterator resumes where it stopped, and a
 * new iterator is needed to start over. A block whose materializer fails is
 * not retried.
 *
 *   for await (const block of iterator) {
 *     block.index; block.offset; block.shape; block.data;
 *   }
 */

import { blockCounts, planBlock } from './block-planner';
import type { BlockDescriptor, DataBlock, DatasetExtent } from './types';

/** Produces the value of one block, typically by reading it from storage. */
export type BlockMaterializer<T> = (block: BlockDescriptor) => Promise<T>;

type IteratorState =
  | { readonly kind: 'ready'; readonly index: number[] }
  | { readonly kind: 'exhausted' };

export class BlockIterator<T> implements AsyncIterableIterator<DataBlock<T>> {
  private readonly extent:      DatasetExtent;
  private readonly blockShape:  readonly number[];
  private readonly counts:      readonly number[];
  private readonly materialize: BlockMaterializer<T>;
  private state: IteratorState;

  constructor(extent: DatasetExtent, blockShape: readonly number[], materialize: BlockMaterializer<T>) {
    this.extent      = extent;
    this.blockShape  = [...blockShape];
    this.counts      = blockCounts(extent, blockShape);
    this.materialize = materialize;
    this.state       = this.counts.some(n => n === 0)
      ? { kind: 'exhausted' }
      : { kind: 'ready', index: this.counts.map(() => 0) };
  }

  /** Blocks per axis. */
  get blockCounts(): readonly number[] {
    return this.counts;
  }

  get exhausted(): boolean {
    return this.state.kind === 'exhausted';
  }

  async next(): Promise<IteratorResult<DataBlock<T>>> {
    if (this.state.kind === 'exhausted') return { done: true, value: undefined };

    // Claim the block before awaiting so overlapping next() calls get distinct blocks.
    const plan = planBlock(this.extent, this.blockShape, { blockNumber: [...this.state.index] });
    this.advance();
    const data = await this.materialize(plan);
    return {
      done:  false,
      value: { data, index: plan.index, offset: plan.offset, shape: plan.shape },
    };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  /** Increment the last axis; carry into the previous axis on overflow. */
  private advance(): void {
    if (this.state.kind === 'exhausted') return;
    const index = this.state.index;
    for (let axis = index.length - 1; axis >= 0; axis--) {
      const next = (index[axis] ?? 0) + 1;
      if (next < (this.counts[axis] ?? 0)) {
        index[axis] = next;
        return;
      }
      index[axis] = 0;
    }
    this.state = { kind: 'exhausted' };
  }
}
