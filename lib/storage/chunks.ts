import type { Readable } from "stream";

export interface StreamChunk {
  chunk: Buffer;
  /** True for the final chunk of the stream. */
  last: boolean;
}

/**
 * Re-slice a byte stream into fixed-size chunks (the final one may be
 * shorter). Holds at most one chunk plus one read-ahead chunk in memory, and
 * looks one chunk ahead so the caller knows which chunk is the last even when
 * the stream length is unknown.
 */
export async function* readChunks(stream: Readable, size: number): AsyncGenerator<StreamChunk> {
  let pending: Buffer[] = [];
  let pendingLength = 0;
  let ready: Buffer | null = null;

  for await (const data of stream) {
    const buf = Buffer.isBuffer(data) ? data : Buffer.from(data);
    pending.push(buf);
    pendingLength += buf.length;

    while (pendingLength >= size) {
      const joined = Buffer.concat(pending, pendingLength);
      const rest = joined.subarray(size);
      if (ready) yield { chunk: ready, last: false };
      ready = joined.subarray(0, size);
      pending = rest.length > 0 ? [rest] : [];
      pendingLength = rest.length;
    }
  }

  if (pendingLength > 0) {
    if (ready) yield { chunk: ready, last: false };
    ready = Buffer.concat(pending, pendingLength);
  }
  if (ready) yield { chunk: ready, last: true };
}
