import { MAX_INPUT_CHUNK } from '../config/defaults.js';

export function assertChunkWithinLimit(length: number, chunkSize: number): void {
  const limit = Math.min(chunkSize * 4, MAX_INPUT_CHUNK);
  if (length > limit) {
    throw new RangeError(
      `Input chunk (${length} units) exceeds maximum allowed ${limit} units`,
    );
  }
}
