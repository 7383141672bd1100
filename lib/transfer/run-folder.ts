import { differenceInCalendarDays, format, isValid, parse } from "date-fns";
import type { DestinationProvider } from "@/lib/storage/interface";
import { DestinationNotFoundError, errorMessage } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

const log = createLogger("run-folder");

const STAMP_FORMAT = "yyyyMMdd_HHmmss";
const STAMP_PATTERN = /^\d{8}_\d{6}$/;

export interface RunFolder {
  name: string;
  /** True when an earlier run's folder is continued. */
  reused: boolean;
  createdAt: Date;
}

/** Timestamp encoded in a run folder name, or null for any other folder. */
export function parseRunFolderName(name: string, prefix: string): Date | null {
  if (!name.startsWith(prefix)) return null;
  const stamp = name.slice(prefix.length);
  if (!STAMP_PATTERN.test(stamp)) return null;
  const date = parse(stamp, STAMP_FORMAT, new Date(0));
  return isValid(date) ? date : null;
}

export function runFolderName(prefix: string, at: Date): string {
  return `${prefix}${format(at, STAMP_FORMAT)}`;
}

export interface ResolveRunFolderOptions {
  prefix: string;
  maxAgeDays: number;
  now: Date;
  /** Pick or name the folder without creating it. */
  dryRun?: boolean;
}

/**
 * Continue the latest run folder at the destination root when it is younger
 * than `maxAgeDays`, otherwise start a new one stamped with `now`. Reusing the
 * folder keeps the existing-file index meaningful across weekly runs.
 */
export async function resolveRunFolder(
  destination: DestinationProvider,
  options: ResolveRunFolderOptions
): Promise<RunFolder> {
  const { prefix, maxAgeDays, now } = options;
  const items = await destination.listDirectory("");

  let latest: { name: string; createdAt: Date } | null = null;
  for (const item of items) {
    if (!item.isDirectory) continue;
    const createdAt = parseRunFolderName(item.name, prefix);
    if (!createdAt) continue;
    if (!latest || createdAt > latest.createdAt) latest = { name: item.name, createdAt };
  }

  if (latest && differenceInCalendarDays(now, latest.createdAt) < maxAgeDays) {
    log.info("Reusing run folder", { runFolder: latest.name });
    return { ...latest, reused: true };
  }

  const name = runFolderName(prefix, now);
  if (!options.dryRun) {
    await destination.createDirectory(name);
  }
  log.info("Starting new run folder", {
    runFolder: name,
    dryRun: !!options.dryRun,
    previous: latest?.name ?? null,
  });
  return { name, reused: false, createdAt: now };
}

export type RunVerification = { ok: true; formFolders: number } | { ok: false; error: string };

/** Re-list the run folder after a run and count the form folders in it. */
export async function verifyRunFolder(
  destination: DestinationProvider,
  runFolder: string
): Promise<RunVerification> {
  try {
    const items = await destination.listDirectory(runFolder);
    const formFolders = items.filter((item) => item.isDirectory).length;
    log.info("Run folder verified", { runFolder, formFolders });
    return { ok: true, formFolders };
  } catch (err) {
    if (err instanceof DestinationNotFoundError) return { ok: true, formFolders: 0 };
    log.warn("Could not verify run folder", { runFolder, error: err });
    return { ok: false, error: errorMessage(err) };
  }
}
