import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { Readable } from "stream";
import { LocalProvider } from "./local";
import { DestinationConflictError, DestinationNotFoundError } from "@/lib/errors";

function body(text: string): Readable {
  return Readable.from([Buffer.from(text)]);
}

describe("LocalProvider", () => {
  let root: string;
  let provider: LocalProvider;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "kobo-media-"));
    provider = new LocalProvider(path.join(root, "out"));
    await provider.connect();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("writes a file under missing folders and lists it", async () => {
    const result = await provider.uploadFile(body("hello"), "Run/Form/photo/a.txt", 5);

    expect(result).toEqual({ bytesWritten: 5, mode: "simple" });
    expect(await fs.readFile(path.join(root, "out/Run/Form/photo/a.txt"), "utf8")).toBe("hello");
    expect(await fs.readdir(path.join(root, "out/Run/Form/photo"))).toEqual(["a.txt"]);

    const items = await provider.listDirectory("Run/Form/photo");
    expect(items.map((i) => [i.name, i.size, i.isDirectory])).toEqual([["a.txt", 5, false]]);
  });

  it("refuses to replace an existing file", async () => {
    await provider.uploadFile(body("first"), "Run/a.txt");

    await expect(provider.uploadFile(body("second"), "Run/a.txt")).rejects.toBeInstanceOf(
      DestinationConflictError
    );
    expect(await fs.readFile(path.join(root, "out/Run/a.txt"), "utf8")).toBe("first");
    expect(await fs.readdir(path.join(root, "out/Run"))).toEqual(["a.txt"]);
  });

  it("lists folders and reports missing ones", async () => {
    await provider.createDirectory("Run/Form");
    await provider.createDirectory("Run/Form");

    const items = await provider.listDirectory("Run");
    expect(items.map((i) => [i.name, i.isDirectory])).toEqual([["Form", true]]);
    await expect(provider.listDirectory("Nope")).rejects.toBeInstanceOf(DestinationNotFoundError);
  });

  it("keeps paths inside the base directory", async () => {
    await expect(provider.uploadFile(body("x"), "../escape.txt")).rejects.toThrow("Path traversal detected");
  });
});
