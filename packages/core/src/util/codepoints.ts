// packages/core/src/util/codepoints.ts

export function isHighSurrogate(unit: number): boolean {
  return unit >= 0xd800 && unit <= 0xdbff;
}

/**
 * Cut `input` into blocks of `size` UTF-16 units without splitting a
 * surrogate pair. What is left over (shorter than `size`, or a trailing
 * high surrogate that may pair with the next chunk) is returned as `rest`.
 */
export function takeBlocks(input: string, size: number): { blocks: string[]; rest: string } {
  const blocks: string[] = [];
  let offset = 0;
  while (input.length - offset >= size) {
    let end = offset + size;
    if (isHighSurrogate(input.charCodeAt(end - 1))) {
      if (end - 1 > offset) end -= 1;
      else if (end < input.length) end += 1;
      else break;
    }
    blocks.push(input.slice(offset, end));
    offset = end;
  }
  return { blocks, rest: input.slice(offset) };
}

/** Taken slots kept before the backing array is compacted. */
const COMPACT_AT = 1024;

/**
 * FIFO of code points fed by arbitrarily cut string chunks.
 * A high surrogate at the end of a chunk waits for its partner.
 */
export class CodePointQueue {
  private points: string[] = [];
  private head = 0;
  private pendingHigh = '';
  private taken = 0;

  append(chunk: string): void {
    let s = this.pendingHigh + chunk;
    this.pendingHigh = '';
    if (s.length && isHighSurrogate(s.charCodeAt(s.length - 1))) {
      this.pendingHigh = s.slice(-1);
      s = s.slice(0, -1);
    }
    for (const cp of s) this.points.push(cp);
  }

  /** Release a held-back surrogate; call once input has ended. */
  end(): void {
    if (this.pendingHigh) {
      this.points.push(this.pendingHigh);
      this.pendingHigh = '';
    }
  }

  get size(): number { return this.points.length - this.head; }

  /** Slots held in the backing array, taken ones included. */
  get retained(): number { return this.points.length; }

  /** Code points handed out so far. */
  get consumed(): number { return this.taken; }

  take(n: number): string {
    const count = Math.min(n, this.size);
    const out   = this.points.slice(this.head, this.head + count).join('');
    this.head  += count;
    this.taken += count;
    if (this.head === this.points.length) {
      this.points = [];
      this.head   = 0;
    } else if (this.head >= COMPACT_AT) {
      this.points = this.points.slice(this.head);
      this.head   = 0;
    }
    return out;
  }
}
