/**
 * @tessera/core — Container
 *
 * Compound datasets and attributes on top of a StorageBackend:
 *
 *   const container = await Container.open(new MemoryBackend(), { logLevel: 'silent' });
 *   const sample    = await container.getType('sample', shape);
 *   await container.writeCompoundArray('/samples', sample, records);
 *   for await (const block of container.compoundArrayNaturalBlocks('/samples', sample)) { … }
 *   await container.close();
 *
 * Every record operation is all-or-nothing for its record or block: records
 * are fully encoded before the first backend write. Writes to an existing
 * dataset through writeCompound / writeCompoundArray / writeCompoundMDArray
 * replace it.
 */

import type { StorageBackend, DatasetInfo } from './backend';
import { BlockIterator } from './block-iterator';
import { naturalBlockShape, planBlock, type BlockSelector } from './block-planner';
import {
  resolveOptions,
  type ContainerOptions,
  type ContainerOptionsInput,
} from './config';
import { UNLIMITED } from './constants';
import { elementCountOf } from './layout';
import { componentLogger, createLogger, type Logger } from './logger';
import { NDArray } from './ndarray';
import type { RecordInspector } from './record-codec';
import {
  TypeConflictError,
  TypeRegistry,
  type CompoundTypeHandle,
  type GetTypeOptions,
} from './registry';
import { SyncMailbox } from './sync-mailbox';
import type { DatasetExtent, RecordShape, TypeVariant } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

export class ContainerClosedError extends Error {
  constructor(message = 'Container is closed.') {
    super(message);
    this.name = 'ContainerClosedError';
  }
}

// ─── Options ──────────────────────────────────────────────────────────────────

/** Called with a copy of every encoded buffer and the path it is written to. */
export type ContainerInspector = (bytes: Uint8Array, path: string) => void;

export interface OpenContainerOptions extends ContainerOptionsInput {
  /** Root logger; one is built from `logLevel` when omitted. */
  logger?:    Logger;
  inspector?: ContainerInspector;
}

/** The parts of a type handle that do not depend on its record container. */
type TypeGeometry = Pick<CompoundTypeHandle, 'name' | 'layout' | 'storageTypeId' | 'checkOpen'>;

function extentOf(info: DatasetInfo): DatasetExtent {
  return info.chunkShape === undefined
    ? { dimensions: info.dimensions, maxDimensions: info.maxDimensions }
    : { dimensions: info.dimensions, maxDimensions: info.maxDimensions, chunkShape: info.chunkShape };
}

// ─── Container ────────────────────────────────────────────────────────────────

export class Container {
  readonly options: ContainerOptions;

  private readonly backend:   StorageBackend;
  private readonly logger:    Logger;
  private readonly registry:  TypeRegistry;
  private readonly inspector: ContainerInspector | undefined;
  private readonly mailbox:   SyncMailbox;
  private closed = false;

  private constructor(backend: StorageBackend, options: OpenContainerOptions) {
    const { logger, inspector, ...input } = options;
    this.options   = resolveOptions(input);
    this.backend   = backend;
    this.inspector = inspector;

    const root     = logger ?? createLogger({ level: this.options.logLevel });
    this.logger    = componentLogger(root, 'container');
    this.registry  = new TypeRegistry(backend, {
      preferExistingTypes: this.options.preferExistingTypes,
      typeConflictPolicy:  this.options.typeConflictPolicy,
      logger:              componentLogger(root, 'registry'),
      checkOpen:           () => this.checkOpen(),
    });
    this.mailbox   = new SyncMailbox(() => backend.sync(), componentLogger(root, 'sync'));
  }

  /** @throws ConfigError for invalid options. */
  static async open(backend: StorageBackend, options: OpenContainerOptions = {}): Promise<Container> {
    return new Container(backend, options);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ─── Types ──────────────────────────────────────────────────────────────────

  async getType(name: string, shape: RecordShape, opts?: GetTypeOptions): Promise<CompoundTypeHandle> {
    this.checkOpen();
    return this.registry.getOrCreateType(name, shape, opts);
  }

  async getAnonymousType(shape: RecordShape): Promise<CompoundTypeHandle> {
    this.checkOpen();
    return this.registry.getAnonymousType(shape);
  }

  async readTypeVariants(name: string): Promise<TypeVariant[] | undefined> {
    this.checkOpen();
    return this.registry.readTypeVariants(name);
  }

  // ─── Single records ─────────────────────────────────────────────────────────

  async writeCompound<C>(path: string, type: CompoundTypeHandle<C>, record: C): Promise<void> {
    this.checkType(type);
    const bytes = type.codec(this.inspectorFor(path)).byteify(record);
    await this.replaceDataset(path, type, []);
    await this.backend.writeBlock(path, bytes);
  }

  async readCompound<C>(path: string, type: CompoundTypeHandle<C>): Promise<C> {
    this.checkType(type);
    const info = await this.datasetFor(path, type);
    if (info.dimensions.length !== 0) {
      throw new TypeConflictError(`'${path}' is a ${info.dimensions.length}-D dataset, not a single record.`);
    }
    return type.codec().unbyteify(await this.backend.readBlock(path));
  }

  // ─── 1-D record arrays ──────────────────────────────────────────────────────

  async writeCompoundArray<C>(path: string, type: CompoundTypeHandle<C>, records: readonly C[]): Promise<void> {
    this.checkType(type);
    const bytes = type.codec(this.inspectorFor(path)).byteifyArray(records);
    const chunk = this.options.defaultChunkSize;
    await this.replaceDataset(path, type, [records.length], chunk === undefined ? undefined : [chunk]);
    await this.backend.writeBlock(path, bytes);
  }

  async readCompoundArray<C>(path: string, type: CompoundTypeHandle<C>): Promise<C[]> {
    this.checkType(type);
    const info = await this.arrayFor(path, type, 1);
    return type.codec().unbyteifyArray(await this.backend.readBlock(path), info.dimensions[0] ?? 0);
  }

  /**
   * Create an empty record array of `size` records. With a chunk size
   * (argument or defaultChunkSize) the array is chunked and extendable
   * without bound; otherwise it is contiguous and fixed at `size`.
   */
  async createCompoundArray<C>(
    path:       string,
    type:       CompoundTypeHandle<C>,
    size:       number,
    chunkSize?: number,
  ): Promise<void> {
    this.checkType(type);
    const chunk = chunkSize ?? this.options.defaultChunkSize;
    if (!Number.isSafeInteger(size) || size < 0) {
      throw new RangeError(`createCompoundArray: size ${size} must be a non-negative integer.`);
    }
    if (chunk === undefined && size === 0) {
      throw new RangeError('createCompoundArray: an empty array needs a chunk size to be extendable.');
    }
    if (chunk !== undefined && (!Number.isSafeInteger(chunk) || chunk <= 0)) {
      throw new RangeError(`createCompoundArray: chunk size ${chunk} must be a positive integer.`);
    }
    await this.backend.createDataset(path, chunk === undefined
      ? { typeId: type.storageTypeId, dimensions: [size] }
      : { typeId: type.storageTypeId, dimensions: [size], maxDimensions: [UNLIMITED], chunkShape: [chunk] });
  }

  /** Write `records` as block `blockNumber` of size records.length, extending the array if needed. */
  async writeCompoundArrayBlock<C>(
    path:        string,
    type:        CompoundTypeHandle<C>,
    records:     readonly C[],
    blockNumber: number,
  ): Promise<void> {
    await this.writeArrayBlock(path, type, records, { blockNumber: [blockNumber] });
  }

  async writeCompoundArrayBlockWithOffset<C>(
    path:    string,
    type:    CompoundTypeHandle<C>,
    records: readonly C[],
    offset:  number,
  ): Promise<void> {
    await this.writeArrayBlock(path, type, records, { offset: [offset] });
  }

  /** Block `blockNumber` of `blockSize` records; the last block may be shorter. */
  async readCompoundArrayBlock<C>(
    path:        string,
    type:        CompoundTypeHandle<C>,
    blockSize:   number,
    blockNumber: number,
  ): Promise<C[]> {
    return this.readArrayBlock(path, type, blockSize, { blockNumber: [blockNumber] });
  }

  async readCompoundArrayBlockWithOffset<C>(
    path:      string,
    type:      CompoundTypeHandle<C>,
    blockSize: number,
    offset:    number,
  ): Promise<C[]> {
    return this.readArrayBlock(path, type, blockSize, { offset: [offset] });
  }

  // ─── N-D record arrays ──────────────────────────────────────────────────────

  async writeCompoundMDArray<C>(
    path:        string,
    type:        CompoundTypeHandle<C>,
    array:       NDArray<readonly C[]>,
    chunkShape?: readonly number[],
  ): Promise<void> {
    this.checkType(type);
    const bytes = type.codec(this.inspectorFor(path)).byteifyArray(array.data);
    await this.replaceDataset(path, type, array.dimensions, chunkShape);
    await this.backend.writeBlock(path, bytes);
  }

  async readCompoundMDArray<C>(path: string, type: CompoundTypeHandle<C>): Promise<NDArray<C[]>> {
    this.checkType(type);
    const info    = await this.datasetFor(path, type);
    const count   = elementCountOf(info.dimensions);
    const records = type.codec().unbyteifyArray(await this.backend.readBlock(path), count);
    return new NDArray(records, info.dimensions);
  }

  /** Block `blockNumber` (one index per axis) of `blockShape`, clipped at the extent. */
  async readCompoundMDArrayBlock<C>(
    path:        string,
    type:        CompoundTypeHandle<C>,
    blockShape:  readonly number[],
    blockNumber: readonly number[],
  ): Promise<NDArray<C[]>> {
    this.checkType(type);
    const info = await this.datasetFor(path, type);
    const plan = planBlock(extentOf(info), blockShape, { blockNumber }, 'read');
    const raw  = await this.backend.readBlock(path, { offset: plan.offset, shape: plan.shape });
    return new NDArray(type.codec().unbyteifyArray(raw, elementCountOf(plan.shape)), plan.shape);
  }

  // ─── Natural blocks ─────────────────────────────────────────────────────────

  /** Chunk-sized blocks of a 1-D record array, decoded. */
  async compoundArrayNaturalBlocks<C>(path: string, type: CompoundTypeHandle<C>): Promise<BlockIterator<C[]>> {
    this.checkType(type);
    const info   = await this.arrayFor(path, type, 1);
    const extent = extentOf(info);
    const codec  = type.codec();
    return new BlockIterator(extent, naturalBlockShape(extent), async block =>
      codec.unbyteifyArray(await this.readSlab(path, block.offset, block.shape), elementCountOf(block.shape)),
    );
  }

  /** Chunk-sized blocks of an N-D record array, decoded. */
  async compoundMDArrayNaturalBlocks<C>(
    path: string,
    type: CompoundTypeHandle<C>,
  ): Promise<BlockIterator<NDArray<C[]>>> {
    this.checkType(type);
    const info   = await this.datasetFor(path, type);
    const extent = extentOf(info);
    const codec  = type.codec();
    return new BlockIterator(extent, naturalBlockShape(extent), async block =>
      new NDArray(
        codec.unbyteifyArray(await this.readSlab(path, block.offset, block.shape), elementCountOf(block.shape)),
        block.shape,
      ),
    );
  }

  /** Chunk-sized blocks of any dataset as raw bytes. */
  async naturalBlocks(path: string): Promise<BlockIterator<Uint8Array>> {
    this.checkOpen();
    const extent = extentOf(await this.backend.getDatasetInfo(path));
    return new BlockIterator(extent, naturalBlockShape(extent), block =>
      this.readSlab(path, block.offset, block.shape),
    );
  }

  // ─── Attributes ─────────────────────────────────────────────────────────────

  async setCompoundAttribute<C>(
    objectPath: string,
    name:       string,
    type:       CompoundTypeHandle<C>,
    record:     C,
  ): Promise<void> {
    this.checkType(type);
    const bytes = type.codec(this.inspectorFor(`${objectPath}@${name}`)).byteify(record);
    await this.backend.writeAttribute(objectPath, name, { bytes, typeId: type.storageTypeId });
  }

  /** @throws TypeConflictError when the attribute is missing or of another size. */
  async getCompoundAttribute<C>(objectPath: string, name: string, type: CompoundTypeHandle<C>): Promise<C> {
    this.checkType(type);
    const attr = await this.backend.readAttribute(objectPath, name);
    if (attr === undefined) {
      throw new TypeConflictError(`'${objectPath}' has no attribute '${name}'.`);
    }
    if (attr.bytes.length !== type.layout.size) {
      throw new TypeConflictError(
        `Attribute '${name}' of '${objectPath}' holds ${attr.bytes.length} bytes; type expects ${type.layout.size}.`,
      );
    }
    return type.codec().unbyteify(attr.bytes);
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  /**
   * Flush the backend, then sync according to syncMode: inline for the
   * blocking modes, through the background mailbox for the others.
   * @throws the failure of an earlier background sync, if any.
   */
  async flush(): Promise<void> {
    this.checkOpen();
    this.mailbox.throwIfFailed();
    await this.backend.flush();
    switch (this.options.syncMode) {
      case 'sync':
      case 'sync-on-flush':
        this.mailbox.post('sync');
        break;
      case 'sync-block':
      case 'sync-on-flush-block':
        await this.backend.sync();
        break;
      case 'no-sync':
        break;
    }
  }

  /**
   * Flush, run the final sync syncMode asks for, wait for the mailbox to
   * drain, then close the backend. Later calls are no-ops.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      await this.backend.flush();
      switch (this.options.syncMode) {
        case 'sync':
          this.mailbox.post('close-sync');
          break;
        case 'sync-block':
          await this.backend.sync();
          this.mailbox.post('exit');
          break;
        case 'sync-on-flush':
        case 'sync-on-flush-block':
        case 'no-sync':
          this.mailbox.post('exit');
          break;
      }
    } finally {
      // Queued syncs run before the backend goes away, even when the flush failed.
      if (!this.mailbox.isStopped) this.mailbox.post('exit');
      try {
        await this.mailbox.drain();
      } finally {
        await this.backend.close();
        this.logger.debug({ syncMode: this.options.syncMode }, 'container closed');
      }
    }
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private checkOpen(): void {
    if (this.closed) throw new ContainerClosedError();
  }

  private checkType(type: TypeGeometry): void {
    this.checkOpen();
    type.checkOpen();
  }

  private inspectorFor(path: string): RecordInspector | undefined {
    const inspector = this.inspector;
    return inspector && (bytes => inspector(bytes, path));
  }

  private async readSlab(path: string, offset: readonly number[], shape: readonly number[]): Promise<Uint8Array> {
    return this.backend.readBlock(path, { offset, shape });
  }

  /** Dataset info, checked against the record size of `type`. */
  private async datasetFor(path: string, type: TypeGeometry): Promise<DatasetInfo> {
    const info = await this.backend.getDatasetInfo(path);
    if (info.elementSize !== type.layout.size) {
      throw new TypeConflictError(
        `'${path}' stores ${info.elementSize}-byte records; type '${type.name ?? '(anonymous)'}' ` +
        `has ${type.layout.size}-byte records.`,
      );
    }
    return info;
  }

  private async arrayFor(path: string, type: TypeGeometry, rank: number): Promise<DatasetInfo> {
    const info = await this.datasetFor(path, type);
    if (info.dimensions.length !== rank) {
      throw new TypeConflictError(`'${path}' has rank ${info.dimensions.length}; expected ${rank}.`);
    }
    return info;
  }

  private async replaceDataset(
    path:        string,
    type:        TypeGeometry,
    dimensions:  readonly number[],
    chunkShape?: readonly number[],
  ): Promise<void> {
    if (await this.backend.exists(path)) await this.backend.deleteObject(path);
    await this.backend.createDataset(path, chunkShape === undefined
      ? { typeId: type.storageTypeId, dimensions }
      : { typeId: type.storageTypeId, dimensions, maxDimensions: dimensions.map(() => UNLIMITED), chunkShape });
  }

  private async writeArrayBlock<C>(
    path:     string,
    type:     CompoundTypeHandle<C>,
    records:  readonly C[],
    selector: BlockSelector,
  ): Promise<void> {
    this.checkType(type);
    const bytes = type.codec(this.inspectorFor(path)).byteifyArray(records);
    if (records.length === 0) return;

    const info = await this.arrayFor(path, type, 1);
    const plan = planBlock(extentOf(info), [records.length], selector, 'write');
    if (plan.requiredDimensions) {
      await this.backend.extendDataset(path, plan.requiredDimensions);
      this.logger.debug({ path, dimensions: plan.requiredDimensions }, 'extended dataset');
    }
    await this.backend.writeBlock(path, bytes, { offset: plan.offset, shape: plan.shape });
  }

  private async readArrayBlock<C>(
    path:      string,
    type:      CompoundTypeHandle<C>,
    blockSize: number,
    selector:  BlockSelector,
  ): Promise<C[]> {
    this.checkType(type);
    const info = await this.arrayFor(path, type, 1);
    const plan = planBlock(extentOf(info), [blockSize], selector, 'read');
    const raw  = await this.backend.readBlock(path, { offset: plan.offset, shape: plan.shape });
    return type.codec().unbyteifyArray(raw, plan.shape[0] ?? 0);
  }
}
