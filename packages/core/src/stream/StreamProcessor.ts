// packages/core/src/stream/StreamProcessor.ts
import { EncryptTransform } from './EncryptTransform.js';
import { DecryptTransform } from './DecryptTransform.js';
import { HeuristicDecryptTransform } from './HeuristicDecryptTransform.js';
import type { ShiftKeys } from '../cipher/keys.js';
import type { EncodedText } from '../types/index.js';
import { DEFAULT_CHUNK_SIZE } from '../config/defaults.js';
import { collectEncoded, collectText } from '../util/stream.js';

export class StreamProcessor {
  private readonly keys: ShiftKeys;

  constructor(
    keys: ShiftKeys,
    private readonly chunkSize = DEFAULT_CHUNK_SIZE,
  ) {
    // snapshot; key changes on the owner apply to streams created afterwards
    this.keys = { shift1: keys.shift1, shift2: keys.shift2 };
  }

  encryptionStream(): TransformStream<string, EncodedText> {
    return new EncryptTransform(this.keys, this.chunkSize).toTransformStream();
  }

  decryptionStream(): TransformStream<EncodedText, string> {
    return new DecryptTransform(this.keys, this.chunkSize).toTransformStream();
  }

  heuristicDecryptionStream(): TransformStream<string, string> {
    return new HeuristicDecryptTransform(this.keys, this.chunkSize).toTransformStream();
  }

  async encrypt(readable: ReadableStream<string>): Promise<EncodedText> {
    return collectEncoded(readable.pipeThrough(this.encryptionStream()));
  }

  async decrypt(readable: ReadableStream<EncodedText>): Promise<string> {
    return collectText(readable.pipeThrough(this.decryptionStream()));
  }

  async decryptHeuristic(readable: ReadableStream<string>): Promise<string> {
    return collectText(readable.pipeThrough(this.heuristicDecryptionStream()));
  }
}
