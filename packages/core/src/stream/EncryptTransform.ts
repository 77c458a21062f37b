// packages/core/src/stream/EncryptTransform.ts
import { encodeWithMetadata } from '../cipher/engine.js';
import type { ShiftKeys } from '../cipher/keys.js';
import type { EncodedText } from '../types/index.js';
import { DEFAULT_CHUNK_SIZE } from '../config/defaults.js';
import { takeBlocks } from '../util/codepoints.js';
import { assertChunkWithinLimit } from './limits.js';

/**
 * TransformStream that:
 *   • collects plaintext into blocks of `chunkSize` units
 *   • never splits a surrogate pair across blocks
 *   • emits { text, metadata } per block
 */
export class EncryptTransform {
  private buffer = '';

  constructor(
    private readonly keys: ShiftKeys,
    private readonly chunkSize = DEFAULT_CHUNK_SIZE,
  ) {}

  toTransformStream(): TransformStream<string, EncodedText> {
    return new TransformStream<string, EncodedText>({
      transform: (chunk, ctl) => this.transform(chunk, ctl),
      flush: ctl => this.flush(ctl),
    });
  }

  private transform(chunk: string, ctl: TransformStreamDefaultController<EncodedText>) {
    assertChunkWithinLimit(chunk.length, this.chunkSize);
    const { blocks, rest } = takeBlocks(this.buffer + chunk, this.chunkSize);
    for (const block of blocks) ctl.enqueue(this.encode(block));
    this.buffer = rest;
  }

  private flush(ctl: TransformStreamDefaultController<EncodedText>) {
    if (!this.buffer.length) return;
    ctl.enqueue(this.encode(this.buffer));
    this.buffer = '';
  }

  private encode(block: string): EncodedText {
    return encodeWithMetadata(block, this.keys.shift1, this.keys.shift2);
  }
}
