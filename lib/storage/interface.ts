import type { Readable } from "stream";

export interface DestinationItem {
  name: string;
  size: number;
  modifiedAt: Date;
  isDirectory: boolean;
}

/** "simple" for a single request, "session" for a chunked upload session. */
export type UploadMode = "simple" | "session";

export interface UploadResult {
  /** Bytes the destination accepted; what the statistics count. */
  bytesWritten: number;
  mode: UploadMode;
}

/**
 * A writable file store addressed by POSIX-style paths relative to its root
 * ("KoboMedia_Direct_20250101_020000/Fuel Log/photo").
 *
 * Errors are reported through the classes in lib/errors:
 * - listDirectory throws DestinationNotFoundError for a missing folder
 * - uploadFile throws DestinationConflictError when the name already exists
 * - anything else is a DestinationRequestError (or the underlying I/O error)
 */
export interface DestinationProvider {
  readonly kind: string;
  /** Authenticate / verify the root is reachable. Failures are fatal for a run. */
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** Non-recursive listing of files and folders directly under `path`. */
  listDirectory(path: string): Promise<DestinationItem[]>;
  /** Create `path` and any missing parents; an existing folder is not an error. */
  createDirectory(path: string): Promise<void>;
  /**
   * @param sizeHint Declared content length when the source reports one.
   *   Providers use it to choose a single-request upload for small files and
   *   a chunked session for large or unknown-size streams.
   */
  uploadFile(stream: Readable, remotePath: string, sizeHint?: number): Promise<UploadResult>;
}

/** Join path segments with "/", dropping empty segments and stray slashes. */
export function joinRemotePath(...segments: string[]): string {
  return segments
    .flatMap((s) => s.split("/"))
    .filter(Boolean)
    .join("/");
}
