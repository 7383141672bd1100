import { describe, it, expect } from "vitest";
import { Readable } from "stream";
import { readChunks } from "./chunks";

async function collect(stream: Readable, size: number): Promise<Array<[string, boolean]>> {
  const out: Array<[string, boolean]> = [];
  for await (const { chunk, last } of readChunks(stream, size)) {
    out.push([chunk.toString(), last]);
  }
  return out;
}

describe("readChunks", () => {
  it("re-slices uneven input into fixed-size chunks", async () => {
    const stream = Readable.from([Buffer.from("ab"), Buffer.from("cdef"), Buffer.from("g")]);
    expect(await collect(stream, 3)).toEqual([
      ["abc", false],
      ["def", false],
      ["g", true],
    ]);
  });

  it("marks the last chunk of an exact multiple", async () => {
    expect(await collect(Readable.from([Buffer.from("abcdef")]), 3)).toEqual([
      ["abc", false],
      ["def", true],
    ]);
  });

  it("yields nothing for an empty stream", async () => {
    expect(await collect(Readable.from([]), 3)).toEqual([]);
  });
});
