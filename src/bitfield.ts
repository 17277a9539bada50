/**
 * @tessera/core — bitfield members
 *
 * A bitfield member holds a set of bit indices. In memory it is a Uint32Array
 * bitset; on disk it is a run of little-endian 64-bit words.
 *
 * Bit layout:
 *   word  = j >>> 5        (Math.floor(j / 32))
 *   shift = j  &  31       (j % 32)
 *   set:   bs[word] |= (1 << shift)
 *   test:  bs[word] &  (1 << shift)
 *
 * Two little-endian 32-bit words are one little-endian 64-bit word, so the
 * in-memory words are written out unchanged and zero-padded to the slot.
 */

// ── Construction ──────────────────────────────────────────────────────────────

/**
 * Allocate a zeroed bitfield large enough to hold `bitLength` bits.
 * Bit j is at word (j >>> 5), shift (j & 31).
 */
export function createBitfield(bitLength: number): Uint32Array {
  return new Uint32Array(Math.ceil(bitLength / 32));
}

/** Bitfield of `bitLength` bits with exactly the bits in `indices` set. */
export function bitfieldOf(bitLength: number, indices: Iterable<number>): Uint32Array {
  const bs = createBitfield(bitLength);
  for (const j of indices) {
    if (!Number.isInteger(j) || j < 0 || j >= bitLength) {
      throw new RangeError(`Bit index ${j} out of range [0, ${bitLength}).`);
    }
    setBit(bs, j);
  }
  return bs;
}

// ── Bit access ────────────────────────────────────────────────────────────────

export function setBit(bs: Uint32Array, j: number): void {
  const word = j >>> 5;
  bs[word] = ((bs[word] ?? 0) | (1 << (j & 31))) >>> 0;
}

export function testBit(bs: Uint32Array, j: number): boolean {
  return (((bs[j >>> 5] ?? 0) >>> (j & 31)) & 1) === 1;
}

/** Indices of the set bits, ascending. */
export function setBits(bs: Uint32Array): number[] {
  const out: number[] = [];
  for (let w = 0; w < bs.length; w++) {
    let word = bs[w] ?? 0;
    while (word !== 0) {
      const low = word & -word;
      out.push(w * 32 + (31 - Math.clz32(low)));
      word = (word ^ low) >>> 0;
    }
  }
  return out;
}

// ── Storage ───────────────────────────────────────────────────────────────────

function toBitfield(v: unknown, bitLength: number, name: string): Uint32Array {
  if (v == null) return createBitfield(bitLength);
  if (v instanceof Uint32Array) {
    const high = setBits(v).find(j => j >= bitLength);
    if (high !== undefined) {
      throw new RangeError(`Member '${name}' (bitfield) has bit ${high} set; declared ${bitLength} bits.`);
    }
    return v;
  }
  if (Array.isArray(v) || v instanceof Set) {
    const bs = createBitfield(bitLength);
    for (const j of v) {
      if (typeof j !== 'number') {
        throw new TypeError(`Member '${name}' (bitfield) received a ${typeof j} bit index; expected number.`);
      }
      if (!Number.isInteger(j) || j < 0 || j >= bitLength) {
        throw new RangeError(`Member '${name}' (bitfield) bit index ${j} out of range [0, ${bitLength}).`);
      }
      setBit(bs, j);
    }
    return bs;
  }
  throw new TypeError(
    `Member '${name}' (bitfield) received ${typeof v}; expected a Uint32Array or a list of bit indices.`,
  );
}

/**
 * Write a bitfield slot of `width` bytes. Accepts a Uint32Array bitset or a
 * list or Set of bit indices; null and undefined write no bits.
 * @throws RangeError for a bit at or past `bitLength`.
 */
export function writeBitfield(
  dv:        DataView,
  at:        number,
  width:     number,
  bitLength: number,
  v:         unknown,
  name:      string,
): void {
  const bs = toBitfield(v, bitLength, name);
  for (let w = 0; w * 4 < width; w++) {
    dv.setUint32(at + w * 4, bs[w] ?? 0, /* le */ true);
  }
}

/** Read a bitfield slot back as a bitset of ceil(bitLength / 32) words. */
export function readBitfield(dv: DataView, at: number, bitLength: number): Uint32Array {
  const bs = createBitfield(bitLength);
  for (let w = 0; w < bs.length; w++) bs[w] = dv.getUint32(at + w * 4, true);
  return bs;
}
