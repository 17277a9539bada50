/**
 * @tessera/core — record codec
 *
 * byteify() runs every member codec against one buffer of layout.size bytes,
 * in declaration order; unbyteify() runs them in reverse direction into a
 * fresh container. Arrays of records are packed back to back with no gaps,
 * which is how compound datasets store them.
 *
 * A failed byteify() yields no bytes: the partially written buffer is dropped
 * and an EncodingError naming the member (and record index) is thrown.
 */

import type { AccessStrategy, ValueAccessor } from './accessor';
import { MemberCodec } from './member-codec';
import type { RecordLayout } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

export class EncodingError extends Error {
  readonly member:      string | undefined;
  readonly recordIndex: number | undefined;

  constructor(
    message: string,
    options: { member?: string; recordIndex?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name        = 'EncodingError';
    this.member      = options.member;
    this.recordIndex = options.recordIndex;
  }
}

/**
 * Called with a copy of each encoded buffer before it is handed to storage.
 * Diagnostic only; the copy may be kept or mutated freely.
 */
export type RecordInspector = (bytes: Uint8Array) => void;

// ─── RecordCodec ──────────────────────────────────────────────────────────────

interface BoundMember<C> {
  readonly codec:    MemberCodec;
  readonly accessor: ValueAccessor<C>;
}

export class RecordCodec<C> {
  readonly layout:   RecordLayout;
  readonly strategy: AccessStrategy<C>;
  private readonly members:   readonly BoundMember<C>[];
  private readonly inspector: RecordInspector | undefined;

  constructor(layout: RecordLayout, strategy: AccessStrategy<C>, inspector?: RecordInspector) {
    this.layout    = layout;
    this.strategy  = strategy;
    this.inspector = inspector;
    this.members   = layout.members.map((m, i) => ({
      codec:    new MemberCodec(m, strategy.nested()),
      accessor: strategy.accessorFor(m, i),
    }));
  }

  get recordSize(): number {
    return this.layout.size;
  }

  /**
   * Encode one record.
   * @throws EncodingError wrapping the failing member's error.
   */
  byteify(record: C): Uint8Array {
    const bytes = new Uint8Array(this.layout.size);
    this.encodeAt(record, new DataView(bytes.buffer), 0, undefined);
    this.inspect(bytes);
    return bytes;
  }

  /**
   * Decode the record starting at `byteOffset`.
   * @throws EncodingError if `bytes` is too short or a member fails.
   */
  unbyteify(bytes: Uint8Array, byteOffset = 0): C {
    if (byteOffset < 0 || bytes.length - byteOffset < this.layout.size) {
      throw new EncodingError(
        `unbyteify: need ${this.layout.size} bytes at offset ${byteOffset}; buffer has ${bytes.length}.`,
      );
    }
    const dv = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return this.decodeAt(dv, byteOffset, undefined);
  }

  /** Encode records back to back. */
  byteifyArray(records: readonly C[]): Uint8Array {
    const size  = this.layout.size;
    const bytes = new Uint8Array(size * records.length);
    const dv    = new DataView(bytes.buffer);
    records.forEach((record, i) => this.encodeAt(record, dv, i * size, i));
    this.inspect(bytes);
    return bytes;
  }

  /**
   * Decode `count` records packed back to back. Without `count`, decodes as
   * many whole records as `bytes` holds.
   */
  unbyteifyArray(bytes: Uint8Array, count?: number): C[] {
    const size = this.layout.size;
    const n    = count ?? (size === 0 ? 0 : Math.floor(bytes.length / size));
    if (bytes.length < n * size) {
      throw new EncodingError(
        `unbyteifyArray: ${n} records of ${size} bytes need ${n * size} bytes; buffer has ${bytes.length}.`,
      );
    }
    const dv  = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const out: C[] = [];
    for (let i = 0; i < n; i++) out.push(this.decodeAt(dv, i * size, i));
    return out;
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private encodeAt(record: C, dv: DataView, base: number, recordIndex: number | undefined): void {
    for (const { codec, accessor } of this.members) {
      try {
        codec.encodeFrom(record, accessor, dv, base);
      } catch (err) {
        throw this.wrap('byteify', codec.name, recordIndex, err);
      }
    }
  }

  private decodeAt(dv: DataView, base: number, recordIndex: number | undefined): C {
    const record = this.strategy.create(this.layout);
    for (const { codec, accessor } of this.members) {
      try {
        codec.decodeInto(record, accessor, dv, base);
      } catch (err) {
        throw this.wrap('unbyteify', codec.name, recordIndex, err);
      }
    }
    return record;
  }

  private wrap(op: string, member: string, recordIndex: number | undefined, err: unknown): EncodingError {
    const where  = recordIndex === undefined ? '' : ` of record ${recordIndex}`;
    const reason = err instanceof Error ? err.message : String(err);
    return new EncodingError(
      `${op}: member '${member}'${where} failed: ${reason}`,
      recordIndex === undefined ? { member, cause: err } : { member, recordIndex, cause: err },
    );
  }

  private inspect(bytes: Uint8Array): void {
    if (this.inspector) this.inspector(bytes.slice());
  }
}
