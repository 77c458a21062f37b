import type { EncodedText } from '../types/index.js';

export async function collectStream<T>(rs: ReadableStream<T>): Promise<T[]> {
  const reader = rs.getReader();
  const chunks: T[] = [];
  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }
  return chunks;
}

export async function collectText(rs: ReadableStream<string>, prefix = ''): Promise<string> {
  return prefix + (await collectStream(rs)).join('');
}

export async function collectEncoded(rs: ReadableStream<EncodedText>): Promise<EncodedText> {
  let text = '';
  let metadata = '';
  for (const c of await collectStream(rs)) {
    text     += c.text;
    metadata += c.metadata;
  }
  return { text, metadata };
}

/** Readable over a fixed list of chunks. */
export function streamOf<T>(chunks: Iterable<T>): ReadableStream<T> {
  return new ReadableStream<T>({
    start(c) {
      for (const chunk of chunks) c.enqueue(chunk);
      c.close();
    },
  });
}
