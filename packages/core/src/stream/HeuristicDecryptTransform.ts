// packages/core/src/stream/HeuristicDecryptTransform.ts
import { decodeHeuristic } from '../cipher/engine.js';
import type { ShiftKeys } from '../cipher/keys.js';
import { DEFAULT_CHUNK_SIZE } from '../config/defaults.js';
import { takeBlocks } from '../util/codepoints.js';
import { assertChunkWithinLimit } from './limits.js';

/** Ciphertext without metadata → best-effort plaintext, block by block. */
export class HeuristicDecryptTransform {
  private buffer = '';

  constructor(
    private readonly keys: ShiftKeys,
    private readonly chunkSize = DEFAULT_CHUNK_SIZE,
  ) {}

  toTransformStream(): TransformStream<string, string> {
    return new TransformStream<string, string>({
      transform: (chunk, ctl) => {
        assertChunkWithinLimit(chunk.length, this.chunkSize);
        const { blocks, rest } = takeBlocks(this.buffer + chunk, this.chunkSize);
        for (const block of blocks) ctl.enqueue(this.decode(block));
        this.buffer = rest;
      },
      flush: ctl => {
        if (this.buffer.length) ctl.enqueue(this.decode(this.buffer));
        this.buffer = '';
      },
    });
  }

  private decode(block: string): string {
    return decodeHeuristic(block, this.keys.shift1, this.keys.shift2);
  }
}
