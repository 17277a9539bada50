/**
 * @tessera/core — storage backend contract
 *
 * Everything the container needs from the underlying storage engine. Paths
 * are absolute, '/'-separated. Type ids are opaque handles issued by the
 * backend; a transient id becomes a named type through commitType().
 */

export type TypeId = number;

/** Region of a dataset addressed by one block read or write. */
export interface Hyperslab {
  readonly offset: readonly number[];
  readonly shape:  readonly number[];
}

export interface DatasetInfo {
  readonly dimensions:    readonly number[];
  /** UNLIMITED (-1) marks an axis without an upper bound. */
  readonly maxDimensions: readonly number[];
  /** Absent for a contiguous (unchunked) dataset. */
  readonly chunkShape?:   readonly number[];
  readonly elementSize:   number;
  readonly typeId:        TypeId;
}

export interface CreateDatasetOptions {
  readonly typeId:         TypeId;
  readonly dimensions:     readonly number[];
  readonly maxDimensions?: readonly number[];
  readonly chunkShape?:    readonly number[];
}

export interface TypeDescription {
  /** Canonical descriptor bytes, as produced by encodeTypeDescriptor(). */
  readonly descriptor: Uint8Array;
  readonly size:       number;
}

export interface StoredAttribute {
  readonly bytes:   Uint8Array;
  readonly typeId?: TypeId;
}

export interface StorageBackend {
  exists(path: string): Promise<boolean>;

  createCompoundType(descriptor: Uint8Array, size: number): Promise<TypeId>;
  /** Id of the type committed at `path`, or undefined. */
  openNamedType(path: string): Promise<TypeId | undefined>;
  commitType(path: string, typeId: TypeId): Promise<void>;
  typesEqual(a: TypeId, b: TypeId): Promise<boolean>;
  describeType(typeId: TypeId): Promise<TypeDescription>;

  /** Removes a committed type or dataset together with its attributes. */
  deleteObject(path: string): Promise<void>;

  createDataset(path: string, options: CreateDatasetOptions): Promise<void>;
  getDatasetInfo(path: string): Promise<DatasetInfo>;
  extendDataset(path: string, dimensions: readonly number[]): Promise<void>;
  /** Whole dataset when `slab` is omitted. */
  readBlock(path: string, slab?: Hyperslab): Promise<Uint8Array>;
  writeBlock(path: string, bytes: Uint8Array, slab?: Hyperslab): Promise<void>;

  writeAttribute(objectPath: string, name: string, attribute: StoredAttribute): Promise<void>;
  readAttribute(objectPath: string, name: string): Promise<StoredAttribute | undefined>;

  flush(): Promise<void>;
  /** Force written data to stable storage. */
  sync(): Promise<void>;
  close(): Promise<void>;
}

// ─── Errors ───────────────────────────────────────────────────────────────────

/** Raised by a backend for a missing object, a kind mismatch or a bad selection. */
export class BackendError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BackendError';
  }
}
