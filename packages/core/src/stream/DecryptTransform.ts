// packages/core/src/stream/DecryptTransform.ts
import { decodeWithMetadata } from '../cipher/engine.js';
import type { ShiftKeys } from '../cipher/keys.js';
import type { EncodedText } from '../types/index.js';
import { LengthMismatchError } from '../errors/index.js';
import { DEFAULT_CHUNK_SIZE } from '../config/defaults.js';
import { CodePointQueue } from '../util/codepoints.js';
import { assertChunkWithinLimit } from './limits.js';

/**
 * Counterpart to EncryptTransform.
 * Streams { text, metadata } chunks → plaintext. The two halves of a chunk
 * need not be the same length; whatever is paired so far is decoded and the
 * remainder waits for the next chunk.
 */
export class DecryptTransform {
  private readonly text = new CodePointQueue();
  private readonly meta = new CodePointQueue();

  constructor(
    private readonly keys: ShiftKeys,
    private readonly chunkSize = DEFAULT_CHUNK_SIZE,
  ) {}

  toTransformStream(): TransformStream<EncodedText, string> {
    return new TransformStream<EncodedText, string>({
      transform: (chunk, ctl) => this.transform(chunk, ctl),
      flush: ctl => this.flush(ctl),
    });
  }

  private transform(chunk: EncodedText, ctl: TransformStreamDefaultController<string>) {
    assertChunkWithinLimit(Math.max(chunk.text.length, chunk.metadata.length), this.chunkSize);
    this.text.append(chunk.text);
    this.meta.append(chunk.metadata);
    this.drain(ctl);
  }

  private flush(ctl: TransformStreamDefaultController<string>) {
    this.text.end();
    this.meta.end();
    this.drain(ctl);
    if (this.text.size !== this.meta.size) {
      ctl.error(new LengthMismatchError(
        this.text.consumed + this.text.size,
        this.meta.consumed + this.meta.size,
      ));
    }
  }

  private drain(ctl: TransformStreamDefaultController<string>) {
    const n = Math.min(this.text.size, this.meta.size);
    if (n === 0) return;
    ctl.enqueue(decodeWithMetadata(
      this.text.take(n),
      this.meta.take(n),
      this.keys.shift1,
      this.keys.shift2,
    ));
  }
}
