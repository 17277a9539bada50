/**
 * @tessera/core — record access strategies
 *
 * A record can be held three ways: as an object with named fields, as a
 * Map keyed by member name, or as a positional list in declaration order.
 * The member codec reads and writes values only through a ValueAccessor, so
 * the encode/decode logic is the same for all three.
 *
 * Nested compound members are held the same way as their enclosing record,
 * except that field records nest plain objects rather than factory instances.
 */

import type { MemberLayout, RecordLayout } from './types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Get/set of one member's value on a record container `C`. */
export interface ValueAccessor<C> {
  get(container: C): unknown;
  set(container: C, value: unknown): void;
}

export interface AccessStrategy<C> {
  readonly kind: 'field' | 'map' | 'list';
  /** Accessor for the member at declaration position `position`. */
  accessorFor(member: MemberLayout, position: number): ValueAccessor<C>;
  /** Fresh, empty container to decode into. */
  create(layout: RecordLayout): C;
  /** Whether `value` is a container of this strategy's kind. */
  holds(value: unknown): boolean;
  /** Strategy for records nested in compound members. */
  nested(): AccessStrategy<unknown>;
}

// ─── Strategies ───────────────────────────────────────────────────────────────

/**
 * Records as objects with one property per member.
 *
 * `factory` builds the instance decode fills in, e.g. `() => new Sample()`
 * for class-typed records.
 */
export function fieldStrategy<T extends object>(factory: () => T): AccessStrategy<T> {
  return {
    kind: 'field',
    accessorFor(member) {
      const key = member.spec.name;
      return {
        get: container => Reflect.get(container, key),
        set: (container, value) => { Reflect.set(container, key, value); },
      };
    },
    create: () => factory(),
    holds:  value => typeof value === 'object' && value !== null && !(value instanceof Map) && !Array.isArray(value),
    nested: () => objectStrategy(),
  };
}

/** Plain-object records. */
export function objectStrategy(): AccessStrategy<Record<string, unknown>> {
  return fieldStrategy((): Record<string, unknown> => ({}));
}

/** Records as `Map<memberName, value>`. */
export function mapStrategy(): AccessStrategy<Map<string, unknown>> {
  return {
    kind: 'map',
    accessorFor(member) {
      const key = member.spec.name;
      return {
        get: container => container.get(key),
        set: (container, value) => { container.set(key, value); },
      };
    },
    create: () => new Map<string, unknown>(),
    holds:  value => value instanceof Map,
    nested: () => mapStrategy(),
  };
}

/** Records as positional lists; element i holds the i-th declared member. */
export function listStrategy(): AccessStrategy<unknown[]> {
  return {
    kind: 'list',
    accessorFor(_member, position) {
      return {
        get: container => container[position],
        set: (container, value) => { container[position] = value; },
      };
    },
    create: layout => new Array<unknown>(layout.members.length).fill(undefined),
    holds:  value => Array.isArray(value),
    nested: () => listStrategy(),
  };
}
