/**
 * @tessera/core — RecordShapeBuilder
 *
 * Shapes are declared up front instead of being discovered from record
 * objects at run time:
 *
 *   const shape = recordShape()
 *     .scalar('id', 'uint32')
 *     .string('label', 16)
 *     .array('position', 'float64', 3)
 *     .timestamp('takenAt')
 *     .build();
 *
 * build() runs planLayout() so a malformed shape fails here with
 * InvalidShapeError rather than at first use.
 */

import { planLayout } from './layout';
import type { MemberSpec, NumericPrimitive, PrimitiveType, RecordShape, TypeVariant } from './types';

type ArrayPrimitive = Exclude<PrimitiveType, 'string' | 'enum' | 'compound' | 'bitfield'>;

export class RecordShapeBuilder {
  private readonly members: MemberSpec[] = [];

  private add(spec: MemberSpec): this {
    this.members.push(Object.freeze(spec));
    return this;
  }

  scalar(name: string, primitive: ArrayPrimitive, typeVariant?: TypeVariant): this {
    return this.add(
      typeVariant === undefined
        ? { name, kind: 'Scalar', primitive, dimensions: [] }
        : { name, kind: 'Scalar', primitive, dimensions: [], typeVariant },
    );
  }

  array(name: string, primitive: ArrayPrimitive, length: number, typeVariant?: TypeVariant): this {
    return this.add(
      typeVariant === undefined
        ? { name, kind: 'FixedArray', primitive, dimensions: [length] }
        : { name, kind: 'FixedArray', primitive, dimensions: [length], typeVariant },
    );
  }

  matrix(name: string, primitive: NumericPrimitive, rows: number, cols: number): this {
    return this.add({ name, kind: 'Matrix', primitive, dimensions: [rows, cols] });
  }

  ndarray(name: string, primitive: NumericPrimitive, dimensions: readonly number[]): this {
    return this.add({ name, kind: 'NDArray', primitive, dimensions: [...dimensions] });
  }

  /** Fixed-length UTF-8 string of at most `maxLength` bytes. */
  string(name: string, maxLength: number): this {
    return this.add({ name, kind: 'Scalar', primitive: 'string', dimensions: [], maxLength });
  }

  /** Enum member; with `length`, a fixed array of enum values. */
  enum(name: string, values: readonly string[], length?: number): this {
    return this.add(
      length === undefined
        ? { name, kind: 'Scalar', primitive: 'enum', dimensions: [], enumValues: [...values] }
        : { name, kind: 'FixedArray', primitive: 'enum', dimensions: [length], enumValues: [...values] },
    );
  }

  /** Nested record member; with `length`, a fixed array of nested records. */
  compound(name: string, members: RecordShape | RecordShapeBuilder, length?: number): this {
    const nested = members instanceof RecordShapeBuilder ? members.build() : members;
    return this.add(
      length === undefined
        ? { name, kind: 'Scalar', primitive: 'compound', dimensions: [], members: nested }
        : { name, kind: 'FixedArray', primitive: 'compound', dimensions: [length], members: nested },
    );
  }

  /** Bit set of `bitLength` bits, read back as a Uint32Array bitfield. */
  bitfield(name: string, bitLength: number): this {
    return this.add({ name, kind: 'Scalar', primitive: 'bitfield', dimensions: [], bitLength });
  }

  /** int64 milliseconds since the epoch, read back as a Date. */
  timestamp(name: string): this {
    return this.scalar(name, 'int64', 'timestamp-ms');
  }

  /** @throws InvalidShapeError */
  build(): RecordShape {
    const shape = Object.freeze([...this.members]);
    planLayout(shape);
    return shape;
  }
}

export function recordShape(): RecordShapeBuilder {
  return new RecordShapeBuilder();
}
