/**
 * @tessera/core — member and record codecs
 *
 * Round-trips every element kind over every primitive it allows, checks the
 * little-endian byte image, and checks that shape errors are raised before
 * any byte is written.
 */

import { describe, it, expect } from 'vitest';
import {
  planLayout,
  recordShape,
  MemberCodec,
  RecordCodec,
  NDArray,
  EncodingError,
  DimensionMismatchError,
  objectStrategy,
  mapStrategy,
  listStrategy,
  fieldStrategy,
  bitfieldOf,
  setBits,
} from '../src/index';
import type { MemberLayout, NumericArray, NumericPrimitive, RecordShape } from '../src/index';

function memberOf(shape: RecordShape, name: string): MemberLayout {
  const member = planLayout(shape).byName.get(name);
  if (!member) throw new Error(`no member ${name}`);
  return member;
}

// ─── Scalars ─────────────────────────────────────────────────────────────────

describe('record codec — scalars', () => {

  const shape = recordShape()
    .scalar('i8', 'int8')
    .scalar('i16', 'int16')
    .scalar('i32', 'int32')
    .scalar('i64', 'int64')
    .scalar('u8', 'uint8')
    .scalar('u16', 'uint16')
    .scalar('u32', 'uint32')
    .scalar('u64', 'uint64')
    .scalar('f32', 'float32')
    .scalar('f64', 'float64')
    .scalar('ok', 'bool')
    .string('name', 12)
    .enum('color', ['red', 'green', 'blue'])
    .compound('at', recordShape().scalar('x', 'int32').scalar('y', 'int32'))
    .timestamp('when')
    .build();

  const record = {
    i8:    -5,
    i16:   -300,
    i32:   -70000,
    i64:   -5n,
    u8:    250,
    u16:   65000,
    u32:   4_000_000_000,
    u64:   2n ** 63n,
    f32:   1.5,
    f64:   Math.PI,
    ok:    true,
    name:  'hello',
    color: 'green',
    at:    { x: 1, y: -2 },
    when:  new Date(1_700_000_000_000),
  };

  it('round-trips every scalar primitive', () => {
    const codec = new RecordCodec(planLayout(shape), objectStrategy());
    const bytes = codec.byteify(record);
    expect(bytes.length).toBe(codec.recordSize);
    expect(codec.unbyteify(bytes)).toEqual(record);
  });

  it('writes little-endian values at their planned offsets', () => {
    const small = recordShape().scalar('a', 'int32').scalar('b', 'uint16').scalar('c', 'bool').build();
    const codec = new RecordCodec(planLayout(small), objectStrategy());
    const bytes = codec.byteify({ a: -1, b: 0x1234, c: true });
    expect(Array.from(bytes)).toEqual([0xff, 0xff, 0xff, 0xff, 0x34, 0x12, 0x01]);
  });

  it('stores enum ordinals', () => {
    const codec = new RecordCodec(planLayout(recordShape().enum('e', ['a', 'b', 'c']).build()), objectStrategy());
    expect(Array.from(codec.byteify({ e: 'c' }))).toEqual([2]);
  });

  it('coerces numbers into 64-bit members and bigints into 32-bit members', () => {
    const small = recordShape().scalar('big', 'int64').scalar('small', 'int32').build();
    const codec = new RecordCodec(planLayout(small), objectStrategy());
    expect(codec.unbyteify(codec.byteify({ big: 42, small: 7n }))).toEqual({ big: 42n, small: 7 });
  });

  it('writes zero for missing members', () => {
    const codec = new RecordCodec(planLayout(shape), objectStrategy());
    const out   = codec.unbyteify(codec.byteify({}));
    expect(out['i32']).toBe(0);
    expect(out['name']).toBe('');
    expect(out['ok']).toBe(false);
    expect(out['at']).toEqual({ x: 0, y: 0 });
  });
});

// ─── Strings ─────────────────────────────────────────────────────────────────

describe('member codec — strings', () => {

  it('truncates on a code point boundary and NUL-pads the slot', () => {
    const member = memberOf([{ name: 's', kind: 'Scalar', primitive: 'string', dimensions: [], maxLength: 2 }], 's');
    const codec  = new MemberCodec(member);
    const bytes  = new Uint8Array(3).fill(0xee);
    const dv     = new DataView(bytes.buffer);

    // 'é' is two bytes; only 'h' fits before it.
    codec.encode('hé', dv, 0);
    expect(Array.from(bytes)).toEqual([0x68, 0, 0]);
    expect(codec.decode(dv, 0)).toBe('h');
  });

  it('keeps a multi-byte character that fits exactly', () => {
    const member = memberOf([{ name: 's', kind: 'Scalar', primitive: 'string', dimensions: [], maxLength: 4 }], 's');
    const codec  = new MemberCodec(member);
    const dv     = new DataView(new ArrayBuffer(5));
    codec.encode('héllo', dv, 0);
    expect(codec.decode(dv, 0)).toBe('hél');
  });
});

// ─── Arrays ──────────────────────────────────────────────────────────────────

describe('record codec — arrays', () => {

  const shape = recordShape()
    .array('ints', 'int32', 3)
    .array('longs', 'uint64', 2)
    .array('flags', 'bool', 3)
    .enum('modes', ['off', 'on', 'auto'], 2)
    .compound('pts', recordShape().scalar('x', 'int16'), 2)
    .matrix('m', 'float64', 2, 3)
    .ndarray('cube', 'int16', [2, 2, 2])
    .build();

  const codec = new RecordCodec(planLayout(shape), objectStrategy());

  const record = {
    ints:  [1, -2, 3],
    longs: new BigUint64Array([1n, 2n ** 64n - 1n]),
    flags: [true, false, true],
    modes: ['auto', 'off'],
    pts:   [{ x: 10 }, { x: -10 }],
    m:     [[1, 2, 3], [4, 5, 6]],
    cube:  new NDArray(Int16Array.from([0, 1, 2, 3, 4, 5, 6, 7]), [2, 2, 2]),
  };

  it('decodes numeric arrays to typed arrays and the rest to plain arrays', () => {
    const out = codec.unbyteify(codec.byteify(record));
    expect(out['ints']).toEqual(Int32Array.from([1, -2, 3]));
    expect(out['longs']).toEqual(new BigUint64Array([1n, 2n ** 64n - 1n]));
    expect(out['flags']).toEqual([true, false, true]);
    expect(out['modes']).toEqual(['auto', 'off']);
    expect(out['pts']).toEqual([{ x: 10 }, { x: -10 }]);
  });

  it('reshapes matrices into rows', () => {
    const out  = codec.unbyteify(codec.byteify(record));
    const rows = out['m'];
    expect(Array.isArray(rows)).toBe(true);
    if (!Array.isArray(rows)) return;
    expect(rows.map(r => Array.from(r))).toEqual([[1, 2, 3], [4, 5, 6]]);
  });

  it('reshapes NDArrays to their declared dimensions', () => {
    const cube = codec.unbyteify(codec.byteify(record))['cube'];
    expect(cube).toBeInstanceOf(NDArray);
    if (!(cube instanceof NDArray)) return;
    expect(cube.dimensions).toEqual([2, 2, 2]);
    expect(Array.from(cube.data)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(cube.flatIndex([1, 0, 1])).toBe(5);
  });

  it('accepts an NDArray for a matrix member', () => {
    const asNd = { ...record, m: new NDArray(Float64Array.from([1, 2, 3, 4, 5, 6]), [2, 3]) };
    expect(codec.byteify(asNd)).toEqual(codec.byteify(record));
  });

  it('encodes zero-length members to zero bytes and decodes empty values', () => {
    const empty = recordShape()
      .array('none', 'float32', 0)
      .matrix('noRows', 'int8', 0, 3)
      .ndarray('flat', 'uint32', [0, 2])
      .scalar('tail', 'uint8')
      .build();
    const c   = new RecordCodec(planLayout(empty), objectStrategy());
    const rec = { none: [], noRows: [], flat: new NDArray(new Uint32Array(0), [0, 2]), tail: 9 };

    const bytes = c.byteify(rec);
    expect(Array.from(bytes)).toEqual([9]);

    const out = c.unbyteify(bytes);
    expect(out['none']).toEqual(new Float32Array(0));
    expect(out['noRows']).toEqual([]);
    const flat = out['flat'];
    expect(flat).toBeInstanceOf(NDArray);
    if (flat instanceof NDArray) expect(flat.dimensions).toEqual([0, 2]);
  });
});

describe('record codec — numeric arrays per primitive', () => {

  const cases: Array<[NumericPrimitive, NumericArray]> = [
    ['int8',    Int8Array.from([-128, -1, 0, 1, 2, 127])],
    ['int16',   Int16Array.from([-32768, -1, 0, 1, 300, 32767])],
    ['int32',   Int32Array.from([-2147483648, -1, 0, 1, 70000, 2147483647])],
    ['int64',   BigInt64Array.from([-(2n ** 63n), -1n, 0n, 1n, 2n ** 40n, 2n ** 63n - 1n])],
    ['uint8',   Uint8Array.from([0, 1, 2, 127, 128, 255])],
    ['uint16',  Uint16Array.from([0, 1, 2, 32768, 40000, 65535])],
    ['uint32',  Uint32Array.from([0, 1, 2, 2147483648, 3000000000, 4294967295])],
    ['uint64',  BigUint64Array.from([0n, 1n, 2n, 2n ** 63n, 2n ** 40n, 2n ** 64n - 1n])],
    ['float32', Float32Array.from([-1.5, -0.25, 0, 0.5, 3.75, 65536.5])],
    ['float64', Float64Array.from([-Math.PI, -0.1, 0, 1e-300, Number.MAX_SAFE_INTEGER, 1e300])],
  ];

  for (const [primitive, values] of cases) {
    it(`round-trips ${primitive} fixed arrays, matrices and NDArrays`, () => {
      const shape = recordShape()
        .array('flat', primitive, 6)
        .matrix('rows', primitive, 2, 3)
        .ndarray('cube', primitive, [1, 2, 3])
        .build();
      const codec = new RecordCodec(planLayout(shape), objectStrategy());
      const out   = codec.unbyteify(codec.byteify({
        flat: values,
        rows: [values.subarray(0, 3), values.subarray(3, 6)],
        cube: new NDArray(values, [1, 2, 3]),
      }));

      expect(out['flat']).toEqual(values);
      expect(out['rows']).toEqual([values.subarray(0, 3), values.subarray(3, 6)]);
      const cube = out['cube'];
      expect(cube).toBeInstanceOf(NDArray);
      if (!(cube instanceof NDArray)) return;
      expect(cube.dimensions).toEqual([1, 2, 3]);
      expect(cube.data).toEqual(values);
    });
  }
});

describe('record codec — timestamp arrays', () => {

  const codec = new RecordCodec(
    planLayout(recordShape().array('stamps', 'int64', 2, 'timestamp-ms').array('raw', 'int64', 1).build()),
    objectStrategy(),
  );

  it('decodes a timestamp fixed array to dates', () => {
    const stamps = [new Date(0), new Date(1_700_000_000_000)];
    expect(codec.unbyteify(codec.byteify({ stamps, raw: [5n] }))).toEqual({
      stamps,
      raw: BigInt64Array.from([5n]),
    });
  });

  it('accepts epoch milliseconds for timestamp elements', () => {
    expect(codec.unbyteify(codec.byteify({ stamps: [1000, 2000n], raw: [0] }))['stamps'])
      .toEqual([new Date(1000), new Date(2000)]);
  });

  it('rejects a date for an untagged int64 member', () => {
    try {
      codec.byteify({ stamps: [0, 0], raw: [new Date(0)] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EncodingError);
      if (!(err instanceof EncodingError)) return;
      expect(err.member).toBe('raw');
      expect(err.cause).toBeInstanceOf(TypeError);
    }
  });
});

// ─── Bitfields ───────────────────────────────────────────────────────────────

describe('record codec — bitfields', () => {

  const codec = new RecordCodec(
    planLayout(recordShape().scalar('id', 'uint8').bitfield('flags', 70).build()),
    objectStrategy(),
  );

  const expectedBytes = [
    1,
    1, 0, 0, 0,   2, 0, 0, 0,
    32, 0, 0, 0,  0, 0, 0, 0,
  ];

  it('stores bits in little-endian 64-bit words', () => {
    expect(codec.recordSize).toBe(17);
    expect(Array.from(codec.byteify({ id: 1, flags: [0, 33, 69] }))).toEqual(expectedBytes);
  });

  it('accepts a bitset or a set of bit indices', () => {
    expect(Array.from(codec.byteify({ id: 1, flags: bitfieldOf(70, [69, 0, 33]) }))).toEqual(expectedBytes);
    expect(Array.from(codec.byteify({ id: 1, flags: new Set([33, 69, 0]) }))).toEqual(expectedBytes);
  });

  it('decodes to a bitset of ceil(bitLength / 32) words', () => {
    const flags = codec.unbyteify(Uint8Array.from(expectedBytes))['flags'];
    expect(flags).toEqual(Uint32Array.from([1, 2, 32]));
    expect(flags instanceof Uint32Array ? setBits(flags) : []).toEqual([0, 33, 69]);
  });

  it('writes no bits for a missing member', () => {
    expect(codec.unbyteify(codec.byteify({ id: 2 }))['flags']).toEqual(new Uint32Array(3));
  });

  it('rejects bits at or past the declared length', () => {
    const wide = bitfieldOf(96, [70]);
    for (const flags of [[70], wide]) {
      try {
        codec.byteify({ id: 1, flags });
        expect.unreachable();
      } catch (err) {
        expect(err instanceof EncodingError && err.cause instanceof RangeError).toBe(true);
      }
    }
  });
});

// ─── Dimension mismatch ──────────────────────────────────────────────────────

describe('dimension mismatch', () => {

  it('rejects a ragged matrix without writing any byte', () => {
    const member = memberOf(recordShape().matrix('m', 'int8', 2, 2).build(), 'm');
    const bytes  = new Uint8Array(4).fill(0xaa);
    expect(() => new MemberCodec(member).encode([[1, 2], [3]], new DataView(bytes.buffer), 0))
      .toThrow(DimensionMismatchError);
    expect(Array.from(bytes)).toEqual([0xaa, 0xaa, 0xaa, 0xaa]);
  });

  it('rejects an NDArray of other dimensions without writing any byte', () => {
    const member = memberOf(recordShape().ndarray('a', 'uint8', [2, 3]).build(), 'a');
    const bytes  = new Uint8Array(6).fill(0xaa);
    const value  = new NDArray(new Uint8Array(6), [3, 2]);
    expect(() => new MemberCodec(member).encode(value, new DataView(bytes.buffer), 0))
      .toThrow(DimensionMismatchError);
    expect(bytes.every(b => b === 0xaa)).toBe(true);
  });

  it('rejects a fixed array of the wrong length', () => {
    const member = memberOf(recordShape().array('a', 'int32', 3).build(), 'a');
    expect(() => new MemberCodec(member).encode([1, 2], new DataView(new ArrayBuffer(12)), 0))
      .toThrow(DimensionMismatchError);
  });

  it('NDArray construction checks its backing store', () => {
    expect(() => new NDArray(new Float32Array(5), [2, 3])).toThrow(DimensionMismatchError);
  });

  it('byteify wraps the member failure in EncodingError', () => {
    const codec = new RecordCodec(planLayout(recordShape().scalar('id', 'int8').matrix('m', 'int8', 2, 2).build()), objectStrategy());
    let caught: unknown;
    try {
      codec.byteify({ id: 1, m: [[1], [2, 3]] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(EncodingError);
    if (!(caught instanceof EncodingError)) return;
    expect(caught.member).toBe('m');
    expect(caught.cause).toBeInstanceOf(DimensionMismatchError);
  });
});

// ─── Value errors ────────────────────────────────────────────────────────────

describe('value errors', () => {

  it('a string for an int32 member is a TypeError cause', () => {
    const codec = new RecordCodec(planLayout(recordShape().scalar('n', 'int32').build()), objectStrategy());
    expect(() => codec.byteify({ n: 'seven' })).toThrow(EncodingError);
    try {
      codec.byteify({ n: 'seven' });
    } catch (err) {
      expect(err instanceof EncodingError && err.cause instanceof TypeError).toBe(true);
    }
  });

  it('an unknown enum value is a RangeError cause', () => {
    const codec = new RecordCodec(planLayout(recordShape().enum('e', ['a', 'b']).build()), objectStrategy());
    try {
      codec.byteify({ e: 'z' });
      expect.unreachable();
    } catch (err) {
      expect(err instanceof EncodingError && err.cause instanceof RangeError).toBe(true);
    }
  });

  it('an out-of-range stored enum ordinal fails to decode', () => {
    const codec = new RecordCodec(planLayout(recordShape().enum('e', ['a', 'b']).build()), objectStrategy());
    expect(() => codec.unbyteify(Uint8Array.from([5]))).toThrow(EncodingError);
  });

  it('unbyteify rejects a short buffer', () => {
    const codec = new RecordCodec(planLayout(recordShape().scalar('n', 'int32').build()), objectStrategy());
    expect(() => codec.unbyteify(new Uint8Array(3))).toThrow(EncodingError);
  });
});

// ─── Access strategies ───────────────────────────────────────────────────────

describe('access strategies', () => {

  const shape  = recordShape().scalar('id', 'uint16').string('tag', 4).array('v', 'float32', 2).build();
  const layout = planLayout(shape);

  const asObject = { id: 7, tag: 'ab', v: [0.5, -0.25] };
  const expected = new RecordCodec(layout, objectStrategy()).byteify(asObject);

  it('map records encode to the same bytes', () => {
    const codec = new RecordCodec(layout, mapStrategy());
    const rec   = new Map<string, unknown>([['id', 7], ['tag', 'ab'], ['v', [0.5, -0.25]]]);
    expect(codec.byteify(rec)).toEqual(expected);
    const out = codec.unbyteify(expected);
    expect(out.get('tag')).toBe('ab');
    expect(out.get('v')).toEqual(Float32Array.from([0.5, -0.25]));
  });

  it('list records encode to the same bytes', () => {
    const codec = new RecordCodec(layout, listStrategy());
    expect(codec.byteify([7, 'ab', [0.5, -0.25]])).toEqual(expected);
    const out = codec.unbyteify(expected);
    expect(out[0]).toBe(7);
    expect(out[1]).toBe('ab');
  });

  it('field records decode into instances from the factory', () => {
    class Sample {
      id  = 0;
      tag = '';
      v: ArrayLike<number> = [];
    }
    const codec = new RecordCodec(layout, fieldStrategy(() => new Sample()));
    const out   = codec.unbyteify(expected);
    expect(out).toBeInstanceOf(Sample);
    expect(out.id).toBe(7);
    expect(out.tag).toBe('ab');
  });
});

describe('access strategies — nested records', () => {

  const layout = planLayout(recordShape()
    .scalar('id', 'uint8')
    .compound('at', recordShape().scalar('x', 'int16').scalar('y', 'int16'))
    .compound('pts', recordShape().scalar('x', 'int16'), 2)
    .build());

  const expected = new RecordCodec(layout, objectStrategy())
    .byteify({ id: 1, at: { x: 2, y: -3 }, pts: [{ x: 4 }, { x: 5 }] });

  it('map records nest maps', () => {
    const codec = new RecordCodec(layout, mapStrategy());
    const rec   = new Map<string, unknown>([
      ['id',  1],
      ['at',  new Map<string, unknown>([['x', 2], ['y', -3]])],
      ['pts', [new Map<string, unknown>([['x', 4]]), new Map<string, unknown>([['x', 5]])]],
    ]);
    expect(codec.byteify(rec)).toEqual(expected);
    expect(codec.unbyteify(expected)).toEqual(rec);
  });

  it('list records nest lists', () => {
    const codec = new RecordCodec(layout, listStrategy());
    const rec   = [1, [2, -3], [[4], [5]]];
    expect(codec.byteify(rec)).toEqual(expected);
    expect(codec.unbyteify(expected)).toEqual(rec);
  });

  it('field records nest plain objects, not factory instances', () => {
    class Outer {
      id = 0;
      at: unknown = undefined;
    }
    const { at } = new RecordCodec(layout, fieldStrategy(() => new Outer())).unbyteify(expected);
    expect(at).toEqual({ x: 2, y: -3 });
    expect(at).not.toBeInstanceOf(Outer);
  });

  it('a nested value of another container kind is a TypeError cause', () => {
    const codec = new RecordCodec(layout, mapStrategy());
    try {
      codec.byteify(new Map<string, unknown>([['id', 1], ['at', { x: 2, y: -3 }]]));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EncodingError);
      if (!(err instanceof EncodingError)) return;
      expect(err.member).toBe('at');
      expect(err.cause).toBeInstanceOf(TypeError);
      expect(err.cause instanceof Error ? err.cause.message : '')
        .toBe(`Member 'at' (compound) received object; expected a map record.`);
    }
  });
});

// ─── Record arrays ───────────────────────────────────────────────────────────

describe('record arrays', () => {

  const codec = new RecordCodec(
    planLayout(recordShape().scalar('id', 'uint8').scalar('score', 'int16').build()),
    objectStrategy(),
  );

  it('packs records back to back', () => {
    const bytes = codec.byteifyArray([{ id: 1, score: 2 }, { id: 3, score: -1 }]);
    expect(Array.from(bytes)).toEqual([1, 2, 0, 3, 0xff, 0xff]);
    expect(codec.unbyteifyArray(bytes)).toEqual([{ id: 1, score: 2 }, { id: 3, score: -1 }]);
  });

  it('reports the failing record index', () => {
    try {
      codec.byteifyArray([{ id: 1, score: 2 }, { id: 'x', score: 0 }]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EncodingError);
      if (err instanceof EncodingError) {
        expect(err.recordIndex).toBe(1);
        expect(err.member).toBe('id');
      }
    }
  });

  it('rejects a buffer shorter than count records', () => {
    expect(() => codec.unbyteifyArray(new Uint8Array(5), 2)).toThrow(EncodingError);
  });

  it('passes the inspector a copy of the encoded bytes', () => {
    const seen: Uint8Array[] = [];
    const inspected = new RecordCodec(codec.layout, objectStrategy(), bytes => {
      seen.push(bytes);
      bytes.fill(0);
    });
    const bytes = inspected.byteify({ id: 5, score: 1 });
    expect(Array.from(seen[0] ?? [])).toEqual([0, 0, 0]);
    expect(Array.from(bytes)).toEqual([5, 1, 0]);
  });
});
