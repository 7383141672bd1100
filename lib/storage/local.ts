import fs from "fs/promises";
import { createWriteStream, type Dirent } from "fs";
import { pipeline } from "stream/promises";
import { Transform, type Readable } from "stream";
import path from "path";
import type { DestinationProvider, DestinationItem, UploadResult } from "./interface";
import { DestinationConflictError, DestinationNotFoundError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

const log = createLogger("local");

function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

/**
 * Writes the transfer tree to a directory on disk.
 *
 * Uploads stream into a hidden temporary file which is then hard-linked to
 * its final name: the link fails with EEXIST when the name is taken, and a
 * failed upload never leaves a partial file where the next run's index would
 * mistake it for a completed transfer.
 */
export class LocalProvider implements DestinationProvider {
  readonly kind = "local";
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = basePath;
  }

  /**
   * Resolve a remote path against the basePath, preventing directory traversal.
   * Incoming paths are treated as relative to basePath regardless of leading slash.
   */
  private resolvePath(remotePath: string): string {
    const normalized = remotePath.replace(/^\/+/, "");
    const resolved = path.resolve(this.basePath, normalized);
    const normalizedBase = path.resolve(this.basePath);
    if (resolved !== normalizedBase && !resolved.startsWith(normalizedBase + path.sep)) {
      throw new Error(`Path traversal detected: ${remotePath}`);
    }
    return resolved;
  }

  async connect(): Promise<void> {
    log.info("Connecting", { basePath: this.basePath });
    await fs.mkdir(this.basePath, { recursive: true });
    const stat = await fs.stat(this.basePath);
    if (!stat.isDirectory()) {
      throw new Error(`Base path is not a directory: ${this.basePath}`);
    }
  }

  async disconnect(): Promise<void> {
    // Nothing to release
  }

  async listDirectory(remotePath: string): Promise<DestinationItem[]> {
    const fullPath = this.resolvePath(remotePath);
    log.debug("Listing directory", { fullPath });
    let entries: Dirent[];
    try {
      entries = await fs.readdir(fullPath, { withFileTypes: true });
    } catch (err) {
      if (errnoCode(err) === "ENOENT") throw new DestinationNotFoundError(remotePath);
      log.error("listDirectory failed", { fullPath, error: err });
      throw err;
    }

    return Promise.all(
      entries
        .filter((e) => (e.isFile() || e.isDirectory()) && !e.name.startsWith(".partial-"))
        .map(async (e) => {
          const stat = await fs.stat(path.join(fullPath, e.name));
          return {
            name: e.name,
            size: e.isDirectory() ? 0 : stat.size,
            modifiedAt: stat.mtime,
            isDirectory: e.isDirectory(),
          };
        })
    );
  }

  async createDirectory(remotePath: string): Promise<void> {
    const fullPath = this.resolvePath(remotePath);
    log.debug("Creating directory", { fullPath });
    await fs.mkdir(fullPath, { recursive: true });
  }

  async uploadFile(stream: Readable, remotePath: string, _sizeHint?: number): Promise<UploadResult> {
    const fullPath = this.resolvePath(remotePath);
    const dir = path.dirname(fullPath);
    const tempPath = path.join(dir, `.partial-${process.pid}-${path.basename(fullPath)}`);
    log.info("Uploading file (stream)", { fullPath });

    let bytesWritten = 0;
    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        bytesWritten += chunk.length;
        callback(null, chunk);
      },
    });

    await fs.mkdir(dir, { recursive: true });
    try {
      await pipeline(stream, counter, createWriteStream(tempPath, { flags: "w" }));
      await fs.link(tempPath, fullPath);
    } catch (err) {
      if (errnoCode(err) === "EEXIST") throw new DestinationConflictError(remotePath);
      log.error("uploadFile failed", { fullPath, error: err });
      throw err;
    } finally {
      await fs.rm(tempPath, { force: true });
    }

    return { bytesWritten, mode: "simple" };
  }
}
