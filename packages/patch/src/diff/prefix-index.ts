/**
 * Positions of fixed-width byte prefixes, bucketed by a polynomial hash.
 *
 * Only every `stride`-th position is indexed, so the tables hold at most
 * `data.length / stride` entries. Buckets are chained through typed arrays:
 * a head slot per masked hash and a link per indexed block, newest first.
 */

const BASE = 257;
const MIN_TABLE_SIZE = 1 << 8;

export function hashPrefix(data: Uint8Array, pos: number, width: number): number {
  let h = 0;
  for (let i = pos, end = pos + width; i < end; i++) {
    h = (Math.imul(h, BASE) + data[i]) >>> 0;
  }
  return h;
}

/**
 * Spacing between indexed positions that keeps `length` bytes within `limit` entries.
 */
export function strideFor(length: number, limit: number): number {
  return Math.max(1, Math.ceil(length / limit));
}

export class PrefixIndex {
  private readonly heads: Int32Array;
  private readonly links: Int32Array;
  private readonly keys: Uint32Array;
  private readonly mask: number;

  constructor(
    private readonly data: Uint8Array,
    readonly width: number,
    readonly stride: number,
  ) {
    const blocks = Math.floor(data.length / stride) + 1;
    let size = MIN_TABLE_SIZE;
    while (size < blocks) {
      size *= 2;
    }
    this.heads = new Int32Array(size).fill(-1);
    this.links = new Int32Array(blocks).fill(-1);
    this.keys = new Uint32Array(blocks);
    this.mask = size - 1;
  }

  /**
   * Index every aligned prefix of the data, in ascending order.
   */
  addAll(): this {
    for (let pos = 0; pos + this.width <= this.data.length; pos += this.stride) {
      this.add(pos);
    }
    return this;
  }

  /**
   * Index the prefix starting at `pos`. Unaligned positions and positions too
   * close to the end are ignored; aligned ones must arrive in ascending order.
   */
  add(pos: number): void {
    if (pos % this.stride !== 0 || pos + this.width > this.data.length) {
      return;
    }
    const block = pos / this.stride;
    const key = hashPrefix(this.data, pos, this.width);
    const bucket = key & this.mask;
    this.keys[block] = key;
    this.links[block] = this.heads[bucket];
    this.heads[bucket] = block;
  }

  /**
   * Yield indexed positions in [from, to] whose prefix hashes to `key`, highest
   * first. At most `limit` same-key entries are examined.
   */
  *window(key: number, from: number, to: number, limit: number): Generator<number> {
    let seen = 0;
    for (
      let block = this.heads[key & this.mask];
      block >= 0 && seen < limit;
      block = this.links[block]
    ) {
      if (this.keys[block] !== key) {
        continue;
      }
      seen++;
      const pos = block * this.stride;
      if (pos < from) {
        return;
      }
      if (pos <= to) {
        yield pos;
      }
    }
  }
}
