import path from "path";
import { format, isValid, parse } from "date-fns";
import type { AttachmentReference, Submission } from "@/lib/source/submissions";

export type NamingScheme = "custom" | "fallback";

export interface NamingColumns {
  dateColumn: string;
  typeColumn: string;
}

/** Everything the resolver needs to know about a form, fixed before its first submission. */
export interface FormNaming extends NamingColumns {
  scheme: NamingScheme;
}

export interface ResolvedName {
  filename: string;
  rowNumber: number;
  /** Leading dot included; "" when it could not be determined. */
  extension: string;
  extensionKnown: boolean;
  rowKey: string;
}

const DATE_FORMATS = [
  "yyyy-MM-dd",
  "MM/dd/yyyy",
  "dd/MM/yyyy",
  "yyyy-MM-dd HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm:ss.SSS",
];

const MIME_EXTENSIONS: Record<string, string> = {
  "image/jpeg": ".jpg",
  "image/jpg": ".jpg",
  "image/png": ".png",
  "image/gif": ".gif",
  "image/heic": ".heic",
  "image/webp": ".webp",
  "video/mp4": ".mp4",
  "video/quicktime": ".mov",
  "video/3gpp": ".3gp",
  "audio/mpeg": ".mp3",
  "audio/mp4": ".m4a",
  "audio/aac": ".aac",
  "audio/amr": ".amr",
  "audio/ogg": ".ogg",
  "audio/wav": ".wav",
  "audio/webm": ".webm",
  "application/pdf": ".pdf",
  "text/csv": ".csv",
  "application/json": ".json",
};

const FALLBACK_STEM_MAX = 95;
const UUID_CANONICAL = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// Dates are formatted as calendar dates; the reference only fills in missing fields.
const REFERENCE_DATE = new Date(2000, 0, 1);

/** Normalise a free-form date cell to yyyy-MM-dd, or "" when it is not a date. */
export function formatDateValue(value: unknown): string {
  if (typeof value !== "string" || !value.trim()) return "";
  const text = value.trim();

  for (const fmt of DATE_FORMATS) {
    const parsed = parse(text, fmt, REFERENCE_DATE);
    if (isValid(parsed)) return format(parsed, "yyyy-MM-dd");
  }

  // ISO timestamps with offsets and other decorated values: keep the written date
  const match = /(\d{4})-(\d{2})-(\d{2})/.exec(text);
  if (match && isValid(parse(match[0], "yyyy-MM-dd", REFERENCE_DATE))) {
    return match[0];
  }
  return "";
}

/** Receipt/category text to a filename token: spaces and slashes become "_". */
export function cleanTypeValue(value: unknown): string {
  if (typeof value !== "string" && typeof value !== "number") return "";
  return String(value)
    .trim()
    .replace(/[ /\\]/g, "_")
    .replace(/[^\p{L}\p{N}_-]/gu, "");
}

/**
 * Look a column up by exact key, or by the last segment of a group-qualified
 * key ("group_receipt/Date" answers "date"), case-insensitively.
 */
export function findColumnValue(values: Record<string, unknown>, column: string): unknown {
  if (column in values) return values[column];
  const wanted = column.toLowerCase();
  for (const [key, value] of Object.entries(values)) {
    const leaf = key.split("/").pop() ?? key;
    if (leaf.toLowerCase() === wanted) return value;
  }
  return undefined;
}

/**
 * Decide the naming scheme for a whole form from its first submission:
 * "custom" when that submission has a parseable date and a non-empty type,
 * otherwise "fallback". Every submission of the form then uses the result.
 */
export function classifyForm(submissions: Submission[], columns: NamingColumns): FormNaming {
  const first = submissions[0];
  let scheme: NamingScheme = "fallback";
  if (first) {
    const date = formatDateValue(findColumnValue(first.values, columns.dateColumn));
    const type = cleanTypeValue(findColumnValue(first.values, columns.typeColumn));
    if (date && type) scheme = "custom";
  }
  return { scheme, ...columns };
}

export function rowKey(rowNumber: number, extension: string): string {
  return `${rowNumber}|${extension.toLowerCase()}`;
}

/** First `max` code points, so a surrogate pair is never split. */
function truncate(text: string, max: number): string {
  return Array.from(text).slice(0, max).join("");
}

function sourceBasename(fileName: string): string {
  return path.posix.basename(fileName.replace(/\\/g, "/"));
}

/** Extension of the source name, else from the MIME type, else "". */
export function attachmentExtension(attachment: AttachmentReference): string {
  const ext = path.posix.extname(sourceBasename(attachment.fileName));
  if (/^\.[A-Za-z0-9]{1,10}$/.test(ext)) return ext;
  const mime = attachment.mimeType?.split(";")[0]?.trim().toLowerCase();
  return (mime && MIME_EXTENSIONS[mime]) || "";
}

/** Source-internal ids: canonical UUIDs, or hex runs of 16+ digits (hyphens allowed). */
export function isUuidLike(segment: string): boolean {
  if (UUID_CANONICAL.test(segment)) return true;
  if (!/^[0-9a-f-]+$/i.test(segment)) return false;
  const hex = segment.replace(/-/g, "");
  return hex.length >= 16 && /\d/.test(hex);
}

/**
 * The reusable part of a source file name: basename without extension,
 * unsafe characters replaced, UUID-like segments dropped.
 */
export function fallbackStem(fileName: string): string {
  const base = sourceBasename(fileName);
  const ext = path.posix.extname(base);
  const stem = ext ? base.slice(0, -ext.length) : base;

  const kept = truncate(
    stem
      .replace(/[^\p{L}\p{N}._-]+/gu, "_")
      .split("_")
      .filter((segment) => segment && !isUuidLike(segment))
      .join("_")
      .replace(/^[._-]+|[._-]+$/g, ""),
    FALLBACK_STEM_MAX
  );

  return kept || "media";
}

/**
 * Destination filename for the attachment at `index` (0-based) of a submission.
 *
 *   custom:   {yyyy-MM-dd}_{type}_{row}{ext}, or {…}_{row}-{n}{ext} when the
 *             submission carries more than one attachment
 *   fallback: row{row}_{stem}{ext}
 *
 * A pure function of its arguments: duplicate detection depends on it.
 */
export function resolveFilename(
  naming: FormNaming,
  submission: Submission,
  attachment: AttachmentReference,
  index: number
): ResolvedName {
  const extension = attachmentExtension(attachment);
  const row = submission.rowNumber;
  let filename: string;

  if (naming.scheme === "custom") {
    const date =
      formatDateValue(findColumnValue(submission.values, naming.dateColumn)) || "undated";
    const type = cleanTypeValue(findColumnValue(submission.values, naming.typeColumn)) || "untyped";
    const suffix = submission.attachments.length > 1 ? `-${index + 1}` : "";
    filename = `${date}_${type}_${row}${suffix}${extension}`;
  } else {
    filename = `row${row}_${fallbackStem(attachment.fileName)}${extension}`;
  }

  return {
    filename,
    rowNumber: row,
    extension,
    extensionKnown: extension !== "",
    rowKey: rowKey(row, extension),
  };
}

/**
 * Folder name for a form or column: characters SharePoint rejects become "_",
 * whitespace runs collapse to one space. Deterministic per input.
 */
export function sanitizeFolderName(name: string, maxLength = 100): string {
  const collapsed = name
    .replace(/[^\p{L}\p{N}\s_-]/gu, "_")
    .replace(/\s+/g, " ")
    .trim();
  const cleaned = truncate(collapsed, maxLength).trim();
  return cleaned || "_";
}

/** Column folders: group paths flattened ("group_a/photo" → "group_a_photo"), no spaces. */
export function sanitizeColumnFolder(column: string): string {
  return sanitizeFolderName(column.replace(/\s+/g, "_"), 50);
}
