/**
 * @tessera/core — compound type registry
 *
 * getOrCreateType() maps a type name and a RecordShape to a type committed
 * under /__DATA_TYPES__/Compound_<name>:
 *
 *   no committed type          commit the candidate
 *   committed, preferExisting  return the committed type as is
 *   committed, equal layout    reuse the committed id
 *   committed, other layout    delete it and commit the candidate
 *                              (typeConflictPolicy 'error' refuses instead)
 *
 * Replacement is delete-then-commit and not atomic: if the commit fails the
 * name is left unbound and TypeConflictError is thrown. Calls for the same
 * name are serialized.
 *
 * Per-member type variants ride along as a uint8-ordinal attribute on the
 * committed type.
 */

import { objectStrategy, type AccessStrategy } from './accessor';
import type { StorageBackend, TypeId } from './backend';
import { TYPE_VARIANT_MEMBERS_ATTRIBUTE, compoundTypePath } from './constants';
import {
  descriptorMemberCount,
  encodeTypeDescriptor,
  layoutFingerprint,
  planLayout,
} from './layout';
import type { Logger } from './logger';
import { KeyedMutex } from './mutex';
import { RecordCodec, type RecordInspector } from './record-codec';
import { TYPE_VARIANTS, type RecordLayout, type RecordShape, type TypeVariant } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

export class TypeConflictError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TypeConflictError';
  }
}

// ─── Handle ───────────────────────────────────────────────────────────────────

export interface CompoundTypeHandle<C = Record<string, unknown>> {
  /** Undefined for an anonymous type. */
  readonly name:          string | undefined;
  readonly path:          string | undefined;
  readonly shape:         RecordShape;
  readonly layout:        RecordLayout;
  readonly fingerprint:   number;
  readonly typeVariants:  readonly TypeVariant[];
  /** Type id datasets and attributes are created with. */
  readonly storageTypeId: TypeId;
  /** Type id planned from `shape` in this session. */
  readonly nativeTypeId:  TypeId;
  /** How records of this type are held in memory. */
  readonly strategy:      AccessStrategy<C>;
  codec(inspector?: RecordInspector): RecordCodec<C>;
  /** Same committed type, records held through `strategy`. */
  withStrategy<D>(strategy: AccessStrategy<D>): CompoundTypeHandle<D>;
  /** @throws ContainerClosedError once the owning container is closed. */
  checkOpen(): void;
}

type HandleBase = Omit<CompoundTypeHandle<unknown>, 'strategy' | 'codec' | 'withStrategy'>;

function bindHandle<C>(base: HandleBase, strategy: AccessStrategy<C>): CompoundTypeHandle<C> {
  return Object.freeze({
    ...base,
    strategy,
    codec(inspector?: RecordInspector): RecordCodec<C> {
      base.checkOpen();
      return new RecordCodec(base.layout, strategy, inspector);
    },
    withStrategy<D>(next: AccessStrategy<D>): CompoundTypeHandle<D> {
      return bindHandle(base, next);
    },
  });
}

// ─── Registry ─────────────────────────────────────────────────────────────────

export interface TypeRegistryOptions {
  readonly preferExistingTypes: boolean;
  readonly typeConflictPolicy:  'replace' | 'error';
  readonly logger:              Logger;
  /** Throws when the owning container is closed. */
  readonly checkOpen:           () => void;
}

export interface GetTypeOptions {
  readonly preferExisting?: boolean;
}

export function typeVariantsOf(shape: RecordShape): TypeVariant[] {
  return shape.map(m => m.typeVariant ?? 'none');
}

export class TypeRegistry {
  private readonly backend: StorageBackend;
  private readonly options: TypeRegistryOptions;
  private readonly mutex = new KeyedMutex();

  constructor(backend: StorageBackend, options: TypeRegistryOptions) {
    this.backend = backend;
    this.options = options;
  }

  /**
   * @throws InvalidShapeError before any backend call.
   * @throws TypeConflictError on a refused or half-completed replacement.
   */
  async getOrCreateType(name: string, shape: RecordShape, opts: GetTypeOptions = {}): Promise<CompoundTypeHandle> {
    const layout         = planLayout(shape);
    const descriptor     = encodeTypeDescriptor(layout);
    const preferExisting = opts.preferExisting ?? this.options.preferExistingTypes;
    const log            = this.options.logger;

    return this.mutex.withLock(name, async () => {
      const path      = compoundTypePath(name);
      const existing  = await this.backend.openNamedType(path);
      const candidate = await this.backend.createCompoundType(descriptor, layout.size);
      const variants  = typeVariantsOf(shape);

      if (existing === undefined) {
        await this.commit(path, candidate, variants);
        log.debug({ type: name, fingerprint: layoutFingerprint(layout) }, 'committed compound type');
        return this.handle(name, path, shape, layout, candidate, candidate, variants);
      }

      const equal = await this.backend.typesEqual(existing, candidate);

      if (preferExisting) {
        if (!equal) {
          log.warn(
            { type: name, fingerprint: layoutFingerprint(layout) },
            'reusing committed compound type whose layout differs from the requested shape',
          );
        }
        return this.handle(name, path, shape, layout, existing, candidate, variants);
      }

      if (equal) {
        await this.updateVariants(path, variants);
        log.debug({ type: name }, 'reusing committed compound type');
        return this.handle(name, path, shape, layout, existing, candidate, variants);
      }

      const previous = await this.backend.describeType(existing);
      if (this.options.typeConflictPolicy === 'error') {
        throw new TypeConflictError(
          `Compound type '${name}' is already committed with a different layout.`,
        );
      }

      log.warn(
        { type: name, replacedSize: previous.size, newSize: layout.size, fingerprint: layoutFingerprint(layout) },
        'replacing committed compound type with a different layout',
      );
      await this.backend.deleteObject(path);
      try {
        await this.commit(path, candidate, variants);
      } catch (err) {
        throw new TypeConflictError(
          `Compound type '${name}' was deleted but its replacement could not be committed.`,
          { cause: err },
        );
      }
      return this.handle(name, path, shape, layout, candidate, candidate, variants);
    });
  }

  /** A type that is never committed; it lives only as long as this session. */
  async getAnonymousType(shape: RecordShape): Promise<CompoundTypeHandle> {
    const layout = planLayout(shape);
    const id     = await this.backend.createCompoundType(encodeTypeDescriptor(layout), layout.size);
    return this.handle(undefined, undefined, shape, layout, id, id, typeVariantsOf(shape));
  }

  /**
   * Variants persisted for the committed type `name`, one per top-level
   * member; undefined when no such type is committed.
   */
  async readTypeVariants(name: string): Promise<TypeVariant[] | undefined> {
    const path     = compoundTypePath(name);
    const existing = await this.backend.openNamedType(path);
    if (existing === undefined) return undefined;

    const attr = await this.backend.readAttribute(path, TYPE_VARIANT_MEMBERS_ATTRIBUTE);
    if (attr === undefined) {
      const { descriptor } = await this.backend.describeType(existing);
      return new Array<TypeVariant>(descriptorMemberCount(descriptor)).fill('none');
    }
    return Array.from(attr.bytes, ordinal => {
      const variant = TYPE_VARIANTS[ordinal];
      if (variant === undefined) {
        throw new RangeError(`Type '${name}' stores unknown type-variant ordinal ${ordinal}.`);
      }
      return variant;
    });
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private async commit(path: string, typeId: TypeId, variants: readonly TypeVariant[]): Promise<void> {
    await this.backend.commitType(path, typeId);
    if (variants.some(v => v !== 'none')) await this.writeVariants(path, variants);
  }

  private async writeVariants(path: string, variants: readonly TypeVariant[]): Promise<void> {
    const bytes = Uint8Array.from(variants, v => TYPE_VARIANTS.indexOf(v));
    await this.backend.writeAttribute(path, TYPE_VARIANT_MEMBERS_ATTRIBUTE, { bytes });
  }

  /** Rewrite the variants attribute of a reused type when the tags changed. */
  private async updateVariants(path: string, variants: readonly TypeVariant[]): Promise<void> {
    const attr = await this.backend.readAttribute(path, TYPE_VARIANT_MEMBERS_ATTRIBUTE);
    const want = variants.some(v => v !== 'none');
    if (attr === undefined && !want) return;
    const same = attr !== undefined
      && attr.bytes.length === variants.length
      && variants.every((v, i) => TYPE_VARIANTS.indexOf(v) === attr.bytes[i]);
    if (!same) await this.writeVariants(path, variants);
  }

  private handle(
    name:          string | undefined,
    path:          string | undefined,
    shape:         RecordShape,
    layout:        RecordLayout,
    storageTypeId: TypeId,
    nativeTypeId:  TypeId,
    typeVariants:  readonly TypeVariant[],
  ): CompoundTypeHandle {
    const base: HandleBase = {
      name,
      path,
      shape,
      layout,
      fingerprint:  layoutFingerprint(layout),
      typeVariants: Object.freeze([...typeVariants]),
      storageTypeId,
      nativeTypeId,
      checkOpen:    this.options.checkOpen,
    };
    return bindHandle(base, objectStrategy());
  }
}
