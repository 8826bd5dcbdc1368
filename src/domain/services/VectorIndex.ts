import { CorruptStateError } from '../errors';

const MAGIC = 'MTVX';
const FORMAT_VERSION = 1;
const HEADER_BYTES = 16;
const FLOAT_BYTES = 4;

export interface IndexHit {
  position: number;
  distance: number;
}

/**
 * Exact nearest-neighbour index over float32 vectors under squared Euclidean
 * distance. Position `i` is the i-th vector added and never moves.
 */
export class FlatL2Index {
  private data: Float32Array;
  private count = 0;
  private dim: number;

  constructor(dimension: number = 0) {
    this.dim = dimension;
    this.data = new Float32Array(0);
  }

  static fromVectors(vectors: readonly (readonly number[])[]): FlatL2Index {
    const index = new FlatL2Index(vectors[0]?.length ?? 0);
    index.add(vectors);
    return index;
  }

  get size(): number {
    return this.count;
  }

  get dimension(): number {
    return this.dim;
  }

  add(vectors: readonly (readonly number[])[]): void {
    if (vectors.length === 0) return;

    if (this.count === 0 && this.dim === 0) {
      this.dim = vectors[0].length;
    }
    if (this.dim === 0) {
      throw new CorruptStateError('Cannot add zero-length vectors to the index');
    }

    for (const vector of vectors) {
      if (vector.length !== this.dim) {
        throw new CorruptStateError(
          `Vector dimension ${vector.length} does not match index dimension ${this.dim}`
        );
      }
    }

    const grown = new Float32Array((this.count + vectors.length) * this.dim);
    grown.set(this.data.subarray(0, this.count * this.dim));
    vectors.forEach((vector, i) => grown.set(vector, (this.count + i) * this.dim));

    this.data = grown;
    this.count += vectors.length;
  }

  /** Returns up to `k` hits, closest first; equal distances keep position order. */
  search(query: readonly number[], k: number): IndexHit[] {
    if (this.count === 0 || k <= 0) {
      return [];
    }
    if (query.length !== this.dim) {
      throw new CorruptStateError(
        `Query dimension ${query.length} does not match index dimension ${this.dim}`
      );
    }

    // Round the query the same way stored vectors were rounded
    const q = Float32Array.from(query);
    const hits: IndexHit[] = [];

    for (let position = 0; position < this.count; position++) {
      const offset = position * this.dim;
      let distance = 0;
      for (let d = 0; d < this.dim; d++) {
        const diff = this.data[offset + d] - q[d];
        distance += diff * diff;
      }
      hits.push({ position, distance });
    }

    hits.sort((a, b) => a.distance - b.distance || a.position - b.position);
    return hits.slice(0, Math.min(k, this.count));
  }

  vectorAt(position: number): number[] {
    if (position < 0 || position >= this.count) {
      throw new RangeError(`Position ${position} is outside the index (size ${this.count})`);
    }
    const offset = position * this.dim;
    return Array.from(this.data.subarray(offset, offset + this.dim));
  }

  serialize(): Buffer {
    const buffer = Buffer.alloc(HEADER_BYTES + this.count * this.dim * FLOAT_BYTES);
    buffer.write(MAGIC, 0, 'ascii');
    buffer.writeUInt32LE(FORMAT_VERSION, 4);
    buffer.writeUInt32LE(this.dim, 8);
    buffer.writeUInt32LE(this.count, 12);

    for (let i = 0; i < this.count * this.dim; i++) {
      buffer.writeFloatLE(this.data[i], HEADER_BYTES + i * FLOAT_BYTES);
    }
    return buffer;
  }

  static deserialize(buffer: Buffer): FlatL2Index {
    if (buffer.length < HEADER_BYTES || buffer.toString('ascii', 0, 4) !== MAGIC) {
      throw new CorruptStateError('Vector index file has an unknown format');
    }

    const version = buffer.readUInt32LE(4);
    if (version !== FORMAT_VERSION) {
      throw new CorruptStateError(`Unsupported vector index version ${version}`);
    }

    const dimension = buffer.readUInt32LE(8);
    const count = buffer.readUInt32LE(12);
    const expectedBytes = HEADER_BYTES + count * dimension * FLOAT_BYTES;
    if (buffer.length !== expectedBytes) {
      throw new CorruptStateError(
        `Vector index file is ${buffer.length} bytes, expected ${expectedBytes}`
      );
    }

    const index = new FlatL2Index(dimension);
    const data = new Float32Array(count * dimension);
    for (let i = 0; i < data.length; i++) {
      data[i] = buffer.readFloatLE(HEADER_BYTES + i * FLOAT_BYTES);
    }
    index.data = data;
    index.count = count;
    return index;
  }
}
