/** Block size (UTF-16 code units) emitted by the streaming transforms. */
export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export const MAX_CHUNK_SIZE = 128 * 1024 * 1024;

/** Hard ceiling for a single incoming stream chunk, whatever the block size. */
export const MAX_INPUT_CHUNK = 64 * 1024 * 1024;
