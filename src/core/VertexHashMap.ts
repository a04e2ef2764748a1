/**
 * VertexHashMap - open-addressing hash map used to weld face vertices
 *
 * Linear probing, load factor kept at or below 0.5 by doubling and fully
 * rehashing whenever size reaches half the capacity.
 */

/**
 * Hashing and equality for a key type compared by value
 */
export interface KeyOps<K> {
  hash(key: K): number;
  equals(a: K, b: K): boolean;
}

export class OpenAddressingMap<K, V> {
  private keys: (K | undefined)[];
  private values: (V | undefined)[];
  private count = 0;

  constructor(
    private readonly ops: KeyOps<K>,
    initialCapacity = 32
  ) {
    // at least 2 so that a single insert never fills the table
    const capacity = Math.max(2, initialCapacity);
    this.keys = new Array<K | undefined>(capacity).fill(undefined);
    this.values = new Array<V | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.keys.length;
  }

  get(key: K): V | undefined {
    const slot = this.findSlot(this.keys, key);
    return this.keys[slot] === undefined ? undefined : this.values[slot];
  }

  /**
   * Returns the value stored for `key`, inserting `create()` first when absent
   */
  getOrAdd(key: K, create: () => V): V {
    const slot = this.findSlot(this.keys, key);
    const existing = this.values[slot];
    if (this.keys[slot] !== undefined && existing !== undefined) {
      return existing;
    }

    const value = create();
    this.keys[slot] = key;
    this.values[slot] = value;
    this.count++;

    if (this.count >= this.keys.length / 2) {
      this.rehash(this.keys.length * 2);
    }
    return value;
  }

  // first slot holding `key`, or the empty slot where it belongs
  private findSlot(keys: (K | undefined)[], key: K): number {
    let slot = this.ops.hash(key) % keys.length;
    for (;;) {
      const stored = keys[slot];
      if (stored === undefined || this.ops.equals(stored, key)) {
        return slot;
      }
      slot = (slot + 1) % keys.length;
    }
  }

  private rehash(capacity: number): void {
    const keys = new Array<K | undefined>(capacity).fill(undefined);
    const values = new Array<V | undefined>(capacity).fill(undefined);

    for (let i = 0; i < this.keys.length; i++) {
      const key = this.keys[i];
      if (key === undefined) {
        continue;
      }
      const slot = this.findSlot(keys, key);
      keys[slot] = key;
      values[slot] = this.values[i];
    }

    this.keys = keys;
    this.values = values;
  }
}

/**
 * A face vertex reference: 1-based indices into the raw attribute arrays,
 * 0 for a field the reference does not use
 */
export interface VertexRef {
  position: number;
  normal: number;
  texCoord: number;
}

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1aMix(hash: number, value: number): number {
  // one step per byte of the 32-bit field
  let h = hash;
  for (let shift = 0; shift < 32; shift += 8) {
    h ^= (value >>> shift) & 0xff;
    h = Math.imul(h, FNV_PRIME);
  }
  return h;
}

export const vertexRefKeyOps: KeyOps<VertexRef> = {
  hash(key) {
    let h = FNV_OFFSET_BASIS;
    h = fnv1aMix(h, key.position);
    h = fnv1aMix(h, key.normal);
    h = fnv1aMix(h, key.texCoord);
    return h >>> 0;
  },
  equals(a, b) {
    return a.position === b.position && a.normal === b.normal && a.texCoord === b.texCoord;
  },
};

/**
 * Map from resolved vertex references to output vertex indices within one mesh
 */
export type VertexHashMap = OpenAddressingMap<VertexRef, number>;

export function createVertexHashMap(initialCapacity?: number): VertexHashMap {
  return new OpenAddressingMap<VertexRef, number>(vertexRefKeyOps, initialCapacity);
}
