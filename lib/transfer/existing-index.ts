import path from "path";
import type { DestinationItem, DestinationProvider } from "@/lib/storage/interface";
import { joinRemotePath } from "@/lib/storage/interface";
import { DestinationNotFoundError } from "@/lib/errors";
import { rowKey } from "./naming";
import { createLogger } from "@/lib/logger";

const log = createLogger("existing-index");

export interface DestinationFileRecord {
  name: string;
  parentPath: string;
  size: number;
}

const FALLBACK_NAME = /^row(\d+)_/;
const CUSTOM_NAME = /_(\d+)(?:-\d+)?(\.[A-Za-z0-9]{1,10})?$/;

function extensionOf(name: string): string {
  const ext = path.posix.extname(name);
  return /^\.[A-Za-z0-9]{1,10}$/.test(ext) ? ext : "";
}

/**
 * Row+extension key of an existing file under either naming scheme, or null
 * when the name matches neither. The fallback form ("row12_…") is tried first
 * since fallback stems may themselves end in "_<digits>".
 */
export function rowKeyFromFilename(name: string): string | null {
  const fallback = FALLBACK_NAME.exec(name);
  if (fallback) return rowKey(Number(fallback[1]), extensionOf(name));

  const custom = CUSTOM_NAME.exec(name);
  if (custom) return rowKey(Number(custom[1]), custom[2] ?? "");

  return null;
}

/**
 * Walk a destination folder and every folder below it. Depth is not assumed:
 * manually reorganised trees are indexed as well. A missing folder is empty.
 */
export async function listFolderTree(
  destination: DestinationProvider,
  rootPath: string
): Promise<DestinationFileRecord[]> {
  const records: DestinationFileRecord[] = [];
  const pending = [rootPath];

  while (pending.length > 0) {
    const folder = pending.shift() ?? "";
    let items: DestinationItem[];
    try {
      items = await destination.listDirectory(folder);
    } catch (err) {
      if (err instanceof DestinationNotFoundError) continue;
      throw err;
    }
    for (const item of items) {
      if (item.isDirectory) {
        pending.push(joinRemotePath(folder, item.name));
      } else {
        records.push({ name: item.name, parentPath: folder, size: item.size });
      }
    }
  }

  return records;
}

/**
 * Answers "was this attachment already transferred?" from a listing of the
 * form's destination folder, by exact name or by row number + extension.
 *
 * The row+extension key makes the check survive a change of naming scheme
 * between runs. Known limitation: attachments of one row that share an
 * extension collapse to one key, so only the first of them is ever uploaded.
 */
export class ExistingFileIndex {
  private names = new Set<string>();
  private rowKeys = new Set<string>();

  static fromRecords(records: Iterable<DestinationFileRecord>): ExistingFileIndex {
    const index = new ExistingFileIndex();
    for (const record of records) index.add(record.name);
    return index;
  }

  static async build(destination: DestinationProvider, formFolder: string): Promise<ExistingFileIndex> {
    const records = await listFolderTree(destination, formFolder);
    const index = ExistingFileIndex.fromRecords(records);
    log.info("Existing files indexed", {
      formFolder,
      fileCount: index.size,
      rowKeyCount: index.rowKeys.size,
    });
    return index;
  }

  add(filename: string): void {
    this.names.add(filename);
    const key = rowKeyFromFilename(filename);
    if (key) this.rowKeys.add(key);
  }

  contains(candidateFilename: string, rowNumber: number, extension: string): boolean {
    return this.names.has(candidateFilename) || this.rowKeys.has(rowKey(rowNumber, extension));
  }

  get size(): number {
    return this.names.size;
  }
}
