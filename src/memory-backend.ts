/**
 * @tessera/core — in-process StorageBackend
 *
 * Holds committed types, datasets and attributes in Maps. Dataset contents
 * are one flat row-major buffer per dataset; extending a dataset re-lays the
 * existing elements into a larger zero-filled buffer. flush() and sync() only
 * count calls.
 */

import {
  BackendError,
  type CreateDatasetOptions,
  type DatasetInfo,
  type Hyperslab,
  type StorageBackend,
  type StoredAttribute,
  type TypeDescription,
  type TypeId,
} from './backend';
import { UNLIMITED } from './constants';
import { copyHyperslab, validateHyperslab } from './hyperslab';
import { descriptorsEqual, elementCountOf } from './layout';

interface StoredDataset {
  readonly typeId:        TypeId;
  readonly elementSize:   number;
  readonly maxDimensions: readonly number[];
  readonly chunkShape:    readonly number[] | undefined;
  dimensions: readonly number[];
  data:       Uint8Array;
}

const ROOT = '/';

export class MemoryBackend implements StorageBackend {
  private readonly types      = new Map<TypeId, TypeDescription>();
  private readonly committed  = new Map<string, TypeId>();
  private readonly datasets   = new Map<string, StoredDataset>();
  private readonly attributes = new Map<string, Map<string, StoredAttribute>>();

  private nextTypeId = 1;
  private closed     = false;

  private flushes = 0;
  private syncs   = 0;

  get flushCount(): number { return this.flushes; }
  get syncCount():  number { return this.syncs; }
  get isClosed():   boolean { return this.closed; }

  // ─── Objects ────────────────────────────────────────────────────────────────

  async exists(path: string): Promise<boolean> {
    this.checkOpen();
    return this.committed.has(path) || this.datasets.has(path);
  }

  async deleteObject(path: string): Promise<void> {
    this.checkOpen();
    if (!this.committed.delete(path) && !this.datasets.delete(path)) {
      throw new BackendError(`deleteObject: no object at '${path}'.`);
    }
    this.attributes.delete(path);
  }

  // ─── Types ──────────────────────────────────────────────────────────────────

  async createCompoundType(descriptor: Uint8Array, size: number): Promise<TypeId> {
    this.checkOpen();
    const id = this.nextTypeId++;
    this.types.set(id, { descriptor: descriptor.slice(), size });
    return id;
  }

  async openNamedType(path: string): Promise<TypeId | undefined> {
    this.checkOpen();
    return this.committed.get(path);
  }

  async commitType(path: string, typeId: TypeId): Promise<void> {
    this.checkOpen();
    if (this.committed.has(path) || this.datasets.has(path)) {
      throw new BackendError(`commitType: an object already exists at '${path}'.`);
    }
    this.typeOf(typeId);
    this.committed.set(path, typeId);
  }

  async typesEqual(a: TypeId, b: TypeId): Promise<boolean> {
    this.checkOpen();
    return a === b || descriptorsEqual(this.typeOf(a).descriptor, this.typeOf(b).descriptor);
  }

  async describeType(typeId: TypeId): Promise<TypeDescription> {
    this.checkOpen();
    const t = this.typeOf(typeId);
    return { descriptor: t.descriptor.slice(), size: t.size };
  }

  // ─── Datasets ───────────────────────────────────────────────────────────────

  async createDataset(path: string, options: CreateDatasetOptions): Promise<void> {
    this.checkOpen();
    if (this.committed.has(path) || this.datasets.has(path)) {
      throw new BackendError(`createDataset: an object already exists at '${path}'.`);
    }
    const { dimensions } = options;
    const elementSize    = this.typeOf(options.typeId).size;
    const maxDimensions  = options.maxDimensions ?? dimensions;
    const chunkShape     = options.chunkShape;

    checkExtent('createDataset', dimensions);
    if (maxDimensions.length !== dimensions.length) {
      throw new BackendError(`createDataset: maxDimensions rank ${maxDimensions.length} ≠ rank ${dimensions.length}.`);
    }
    maxDimensions.forEach((max, axis) => {
      if (max !== UNLIMITED && max < (dimensions[axis] ?? 0)) {
        throw new BackendError(`createDataset: maxDimensions[${axis}] = ${max} is below the extent.`);
      }
    });
    const extendable = maxDimensions.some((max, axis) => max !== (dimensions[axis] ?? 0));
    if (chunkShape !== undefined) {
      if (chunkShape.length !== dimensions.length || chunkShape.some(c => !Number.isSafeInteger(c) || c <= 0)) {
        throw new BackendError(`createDataset: chunkShape [${chunkShape.join(', ')}] is invalid for rank ${dimensions.length}.`);
      }
    } else if (extendable) {
      throw new BackendError(`createDataset: an extendable dataset at '${path}' requires a chunkShape.`);
    }

    this.datasets.set(path, {
      typeId:        options.typeId,
      elementSize,
      maxDimensions: [...maxDimensions],
      chunkShape:    chunkShape === undefined ? undefined : [...chunkShape],
      dimensions:    [...dimensions],
      data:          new Uint8Array(elementCountOf(dimensions) * elementSize),
    });
  }

  async getDatasetInfo(path: string): Promise<DatasetInfo> {
    this.checkOpen();
    const ds   = this.datasetAt(path);
    const info = {
      dimensions:    [...ds.dimensions],
      maxDimensions: [...ds.maxDimensions],
      elementSize:   ds.elementSize,
      typeId:        ds.typeId,
    };
    return ds.chunkShape === undefined ? info : { ...info, chunkShape: [...ds.chunkShape] };
  }

  async extendDataset(path: string, dimensions: readonly number[]): Promise<void> {
    this.checkOpen();
    const ds = this.datasetAt(path);
    checkExtent('extendDataset', dimensions);
    if (dimensions.length !== ds.dimensions.length) {
      throw new BackendError(`extendDataset: rank ${dimensions.length} ≠ dataset rank ${ds.dimensions.length}.`);
    }
    dimensions.forEach((dim, axis) => {
      const current = ds.dimensions[axis] ?? 0;
      const max     = ds.maxDimensions[axis] ?? current;
      if (dim < current) {
        throw new BackendError(`extendDataset: axis ${axis} cannot shrink from ${current} to ${dim}.`);
      }
      if (max !== UNLIMITED && dim > max) {
        throw new BackendError(`extendDataset: axis ${axis} extent ${dim} exceeds maximum ${max}.`);
      }
    });

    const data = new Uint8Array(elementCountOf(dimensions) * ds.elementSize);
    const old  = { offset: ds.dimensions.map(() => 0), shape: ds.dimensions };
    copyHyperslab('write', data, dimensions, ds.data, old, ds.elementSize);
    ds.data       = data;
    ds.dimensions = [...dimensions];
  }

  async readBlock(path: string, slab?: Hyperslab): Promise<Uint8Array> {
    this.checkOpen();
    const ds = this.datasetAt(path);
    if (slab === undefined) return ds.data.slice();

    validateHyperslab(ds.dimensions, slab);
    const block = new Uint8Array(elementCountOf(slab.shape) * ds.elementSize);
    copyHyperslab('read', ds.data, ds.dimensions, block, slab, ds.elementSize);
    return block;
  }

  async writeBlock(path: string, bytes: Uint8Array, slab?: Hyperslab): Promise<void> {
    this.checkOpen();
    const ds       = this.datasetAt(path);
    const region   = slab ?? { offset: ds.dimensions.map(() => 0), shape: ds.dimensions };
    validateHyperslab(ds.dimensions, region);

    const expected = elementCountOf(region.shape) * ds.elementSize;
    if (bytes.length !== expected) {
      throw new BackendError(
        `writeBlock: '${path}' selection needs ${expected} bytes; got ${bytes.length}.`,
      );
    }
    copyHyperslab('write', ds.data, ds.dimensions, bytes, region, ds.elementSize);
  }

  // ─── Attributes ─────────────────────────────────────────────────────────────

  async writeAttribute(objectPath: string, name: string, attribute: StoredAttribute): Promise<void> {
    this.checkOpen();
    this.checkObject(objectPath);
    let attrs = this.attributes.get(objectPath);
    if (!attrs) {
      attrs = new Map();
      this.attributes.set(objectPath, attrs);
    }
    attrs.set(name, { ...attribute, bytes: attribute.bytes.slice() });
  }

  async readAttribute(objectPath: string, name: string): Promise<StoredAttribute | undefined> {
    this.checkOpen();
    this.checkObject(objectPath);
    const attr = this.attributes.get(objectPath)?.get(name);
    return attr && { ...attr, bytes: attr.bytes.slice() };
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  async flush(): Promise<void> {
    this.checkOpen();
    this.flushes++;
  }

  async sync(): Promise<void> {
    this.checkOpen();
    this.syncs++;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private checkOpen(): void {
    if (this.closed) throw new BackendError('MemoryBackend: backend is closed.');
  }

  private checkObject(path: string): void {
    if (path !== ROOT && !this.committed.has(path) && !this.datasets.has(path)) {
      throw new BackendError(`No object at '${path}'.`);
    }
  }

  private typeOf(typeId: TypeId): TypeDescription {
    const t = this.types.get(typeId);
    if (!t) throw new BackendError(`Unknown type id ${typeId}.`);
    return t;
  }

  private datasetAt(path: string): StoredDataset {
    const ds = this.datasets.get(path);
    if (!ds) throw new BackendError(`No dataset at '${path}'.`);
    return ds;
  }
}

function checkExtent(op: string, dimensions: readonly number[]): void {
  for (const d of dimensions) {
    if (!Number.isSafeInteger(d) || d < 0) {
      throw new BackendError(`${op}: invalid extent [${dimensions.join(', ')}].`);
    }
  }
}
