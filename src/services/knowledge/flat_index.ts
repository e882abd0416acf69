import { CorruptionError, DimensionMismatchError } from '../../errors';
import { IndexHit } from './types';

const MAGIC = 'KBFX';
const FORMAT_VERSION = 1;
const HEADER_BYTES = 16;
const FLOAT_BYTES = 4;

/**
 * FlatL2Index
 * -----------
 * Exhaustive nearest-neighbour index over fixed-dimension float32 vectors.
 *
 * Vectors live back to back in one growable Float32Array and are addressed by
 * insertion position. Queries scan every vector and rank by squared Euclidean
 * distance, lower position first on ties.
 *
 * Blob layout (little endian):
 *   magic "KBFX" | u32 version | u32 dimension | u32 count | count*dimension f32
 */
export class FlatL2Index {
  private data: Float32Array;
  private size = 0;

  private constructor(readonly dimension: number, initialCapacity = 16) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new RangeError(`Index dimension must be a positive integer, got ${dimension}`);
    }
    this.data = new Float32Array(dimension * Math.max(1, initialCapacity));
  }

  static create(dimension: number): FlatL2Index {
    return new FlatL2Index(dimension);
  }

  count(): number {
    return this.size;
  }

  insert(vector: ArrayLike<number>): void {
    this.assertDimension(vector);

    const needed = (this.size + 1) * this.dimension;
    if (needed > this.data.length) {
      const grown = new Float32Array(Math.max(needed, this.data.length * 2));
      grown.set(this.data);
      this.data = grown;
    }

    this.data.set(vector, this.size * this.dimension);
    this.size++;
  }

  /** Stored vector at `position`, as a copy. */
  vectorAt(position: number): Float32Array {
    if (!Number.isInteger(position) || position < 0 || position >= this.size) {
      throw new RangeError(`No vector at position ${position}`);
    }
    const start = position * this.dimension;
    return this.data.slice(start, start + this.dimension);
  }

  query(vector: ArrayLike<number>, k: number): IndexHit[] {
    this.assertDimension(vector);
    const limit = Math.min(Math.floor(k), this.size);
    if (limit <= 0) return [];

    const query = Float32Array.from(vector);
    const hits: IndexHit[] = new Array(this.size);
    for (let position = 0; position < this.size; position++) {
      hits[position] = { position, distance: this.squaredDistance(query, position) };
    }

    // Array.prototype.sort is stable, so equal distances keep insertion order
    hits.sort((a, b) => a.distance - b.distance);
    return hits.slice(0, limit);
  }

  serialize(): Buffer {
    const values = this.size * this.dimension;
    const buffer = Buffer.alloc(HEADER_BYTES + values * FLOAT_BYTES);

    buffer.write(MAGIC, 0, 'ascii');
    buffer.writeUInt32LE(FORMAT_VERSION, 4);
    buffer.writeUInt32LE(this.dimension, 8);
    buffer.writeUInt32LE(this.size, 12);

    for (let i = 0; i < values; i++) {
      buffer.writeFloatLE(this.data[i], HEADER_BYTES + i * FLOAT_BYTES);
    }
    return buffer;
  }

  static deserialize(bytes: Buffer): FlatL2Index {
    if (bytes.length < HEADER_BYTES || bytes.toString('ascii', 0, 4) !== MAGIC) {
      throw new CorruptionError('Index blob has an unrecognised header');
    }

    const version = bytes.readUInt32LE(4);
    if (version !== FORMAT_VERSION) {
      throw new CorruptionError(`Unsupported index format version ${version}`);
    }

    const dimension = bytes.readUInt32LE(8);
    const count = bytes.readUInt32LE(12);
    if (dimension === 0) {
      throw new CorruptionError('Index blob declares dimension 0');
    }

    const values = dimension * count;
    const expectedLength = HEADER_BYTES + values * FLOAT_BYTES;
    if (bytes.length !== expectedLength) {
      throw new CorruptionError(
        `Index blob is ${bytes.length} bytes, expected ${expectedLength} for ${count} vectors of dimension ${dimension}`
      );
    }

    const index = new FlatL2Index(dimension, count);
    for (let i = 0; i < values; i++) {
      index.data[i] = bytes.readFloatLE(HEADER_BYTES + i * FLOAT_BYTES);
    }
    index.size = count;
    return index;
  }

  private squaredDistance(query: Float32Array, position: number): number {
    const offset = position * this.dimension;
    let sum = 0;
    for (let i = 0; i < this.dimension; i++) {
      const diff = this.data[offset + i] - query[i];
      sum += diff * diff;
    }
    return sum;
  }

  private assertDimension(vector: ArrayLike<number>): void {
    if (vector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, vector.length);
    }
  }
}
