// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  PrimitiveType,
  NumericPrimitive,
  ElementKind,
  TypeVariant,
  MemberSpec,
  RecordShape,
  MemberLayout,
  RecordLayout,
  DatasetExtent,
  BlockDescriptor,
  DataBlock,
} from './types';

export { TYPE_VARIANTS } from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  PRIMITIVE_BYTE_WIDTHS,
  ENUM_BYTE_LIMIT,
  ENUM_SHORT_LIMIT,
  DESCRIPTOR_VERSION,
  DATATYPE_GROUP,
  COMPOUND_PREFIX,
  TYPE_VARIANT_MEMBERS_ATTRIBUTE,
  UNLIMITED,
  compoundTypePath,
} from './constants';

// ─── Layout ───────────────────────────────────────────────────────────────────
export {
  planLayout,
  encodeTypeDescriptor,
  layoutFingerprint,
  descriptorsEqual,
  enumStorageWidth,
  elementCountOf,
  fnv1a32,
  InvalidShapeError,
} from './layout';

export { RecordShapeBuilder, recordShape } from './shape';

// ─── Values ───────────────────────────────────────────────────────────────────
export { NDArray, DimensionMismatchError } from './ndarray';
export type { NumericArray, FlatStore } from './ndarray';
export { createBitfield, bitfieldOf, setBit, testBit, setBits } from './bitfield';

// ─── Codecs ───────────────────────────────────────────────────────────────────
export { fieldStrategy, objectStrategy, mapStrategy, listStrategy } from './accessor';
export type { ValueAccessor, AccessStrategy } from './accessor';

export { MemberCodec } from './member-codec';
export { RecordCodec, EncodingError } from './record-codec';
export type { RecordInspector } from './record-codec';

// ─── Storage ──────────────────────────────────────────────────────────────────
export { BackendError } from './backend';
export type {
  StorageBackend,
  TypeId,
  Hyperslab,
  DatasetInfo,
  CreateDatasetOptions,
  TypeDescription,
  StoredAttribute,
} from './backend';

export { MemoryBackend } from './memory-backend';
export { copyHyperslab, validateHyperslab } from './hyperslab';

export { TypeRegistry, TypeConflictError } from './registry';
export type { CompoundTypeHandle, GetTypeOptions, TypeRegistryOptions } from './registry';

// ─── Blocks ───────────────────────────────────────────────────────────────────
export {
  planBlock,
  naturalBlockShape,
  blockCounts,
  totalBlocks,
  OutOfBoundsError,
} from './block-planner';
export type { BlockSelector, BlockPlan, PlanMode } from './block-planner';

export { BlockIterator } from './block-iterator';
export type { BlockMaterializer } from './block-iterator';

// ─── Container ────────────────────────────────────────────────────────────────
export { Container, ContainerClosedError } from './container';
export type { OpenContainerOptions, ContainerInspector } from './container';

export { SyncMailbox } from './sync-mailbox';
export type { SyncCommand } from './sync-mailbox';

export {
  ContainerOptionsSchema,
  resolveOptions,
  loadOptionsFromEnv,
  ConfigError,
  SYNC_MODES,
  LOG_LEVELS,
} from './config';
export type { ContainerOptions, ContainerOptionsInput, SyncMode, LogLevel } from './config';

export { createLogger, componentLogger } from './logger';
export type { Logger, CreateLoggerOptions } from './logger';

export { KeyedMutex } from './mutex';
