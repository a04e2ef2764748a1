/**
 * GrowableBuffer - typed-array buffer with amortized doubling
 *
 * Keeps `length < capacity` after every reserve; capacity doubles until the
 * requested room fits.
 */

import { LoaderError } from './LoaderError';

export type NumericArray = Float32Array | Uint32Array;

export interface GrowableBufferOptions {
  initialCapacity: number;
  /** growing past this many elements fails with out-of-memory */
  maxCapacity: number;
}

export class GrowableBuffer<T extends NumericArray> {
  private data: T;
  private size = 0;
  private readonly maxCapacity: number;

  /**
   * @param create allocates a zeroed array of the given length
   */
  constructor(
    private readonly create: (length: number) => T,
    options: GrowableBufferOptions
  ) {
    this.maxCapacity = options.maxCapacity;
    this.data = create(Math.min(options.initialCapacity, options.maxCapacity));
  }

  static float32(options: GrowableBufferOptions): GrowableBuffer<Float32Array> {
    return new GrowableBuffer((length) => new Float32Array(length), options);
  }

  static uint32(options: GrowableBufferOptions): GrowableBuffer<Uint32Array> {
    return new GrowableBuffer((length) => new Uint32Array(length), options);
  }

  get length(): number {
    return this.size;
  }

  get capacity(): number {
    return this.data.length;
  }

  /**
   * Makes room for `count` more elements
   * @throws LoaderError `out-of-memory` when the buffer would outgrow maxCapacity
   */
  reserve(count: number): void {
    const required = this.size + count;
    if (required < this.data.length) {
      return;
    }
    if (required > this.maxCapacity) {
      throw new LoaderError(
        'out-of-memory',
        `buffer cannot grow to ${required} elements (limit ${this.maxCapacity})`
      );
    }

    let capacity = Math.max(this.data.length, 1);
    while (capacity <= required) {
      capacity *= 2;
    }
    capacity = Math.min(capacity, this.maxCapacity);

    const grown = this.create(capacity);
    grown.set(this.data.subarray(0, this.size));
    this.data = grown;
  }

  push(value: number): void {
    this.reserve(1);
    this.data[this.size++] = value;
  }

  /**
   * Appends `count` zeroed elements and returns the index of the first
   */
  extend(count: number): number {
    this.reserve(count);
    const start = this.size;
    this.data.fill(0, start, start + count);
    this.size += count;
    return start;
  }

  get(index: number): number {
    return this.data[index];
  }

  set(index: number, value: number): void {
    this.data[index] = value;
  }

  /**
   * Copies the used part into an exactly-sized array
   */
  toArray(): T {
    const out = this.create(this.size);
    out.set(this.data.subarray(0, this.size));
    return out;
  }
}
