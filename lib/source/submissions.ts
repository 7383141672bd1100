import path from "path";
import { z } from "zod";

export const OTHER_COLUMNS = "other_columns";

export interface SurveyForm {
  uid: string;
  name: string;
  dateCreated: string;
  submissionCount?: number;
}

export interface AttachmentReference {
  /** Question the file answers; OTHER_COLUMNS when it cannot be determined. */
  column: string;
  /** Source-provided name, e.g. "jdoe/attachments/<hex>/<uuid>/photo.jpg". */
  fileName: string;
  downloadUrl?: string;
  attachmentId?: string;
  mimeType?: string;
  /** "attachments" from the structured field, "column" when parsed out of a value. */
  origin: "attachments" | "column";
}

export interface Submission {
  id: string;
  /** 1-based position in the form's full submission list. */
  rowNumber: number;
  values: Record<string, unknown>;
  attachments: AttachmentReference[];
}

const koboAttachmentSchema = z
  .object({
    id: z.union([z.number(), z.string()]).optional(),
    uid: z.string().optional(),
    filename: z.string().optional(),
    media_file_basename: z.string().optional(),
    mimetype: z.string().optional(),
    question_xpath: z.string().optional(),
    download_url: z.string().optional(),
    download_large_url: z.string().optional(),
    download_medium_url: z.string().optional(),
    is_deleted: z.boolean().optional(),
  })
  .passthrough();

type KoboAttachment = z.infer<typeof koboAttachmentSchema>;

const MEDIA_URL_PATTERN = /https?:\/\/[^\s,'"}\]]+(?:\.[^\s,'"}\]]+)+/g;
const MEDIA_URL_EXTENSIONS = [".jpg", ".jpeg", ".png", ".gif", ".pdf", ".mp4"];
const MEDIA_HINTS = ["http", "attachment", ".jpg", ".jpeg", ".png", ".pdf"];

/** Prefer the largest rendition: large, then original, then medium. */
function bestDownloadUrl(att: KoboAttachment): string | undefined {
  return att.download_large_url || att.download_url || att.download_medium_url || undefined;
}

function basename(fileName: string): string {
  return path.posix.basename(fileName.replace(/\\/g, "/"));
}

/**
 * Work out which question an attachment answers: question_xpath when the
 * server provides it, otherwise the column whose value is the file's basename.
 */
function owningColumn(att: KoboAttachment, values: Record<string, unknown>): string {
  if (att.question_xpath) return att.question_xpath;
  const candidates = [att.media_file_basename, att.filename && basename(att.filename)].filter(
    (c): c is string => !!c
  );
  for (const [column, value] of Object.entries(values)) {
    if (typeof value === "string" && candidates.includes(value)) return column;
  }
  return OTHER_COLUMNS;
}

function fromStructuredAttachments(
  raw: unknown,
  values: Record<string, unknown>
): AttachmentReference[] {
  if (!Array.isArray(raw)) return [];
  const refs: AttachmentReference[] = [];
  for (const item of raw) {
    const parsed = koboAttachmentSchema.safeParse(item);
    if (!parsed.success || parsed.data.is_deleted) continue;
    const att = parsed.data;
    const downloadUrl = bestDownloadUrl(att);
    const attachmentId = att.uid ?? (att.id !== undefined ? String(att.id) : undefined);
    if (!downloadUrl && !attachmentId) continue;

    refs.push({
      column: owningColumn(att, values),
      fileName: att.filename ?? att.media_file_basename ?? "",
      downloadUrl,
      attachmentId,
      mimeType: att.mimetype,
      origin: "attachments",
    });
  }
  return refs;
}

function urlFileName(url: string): string {
  return url.split("/").pop()?.split("?")[0] ?? "";
}

function extractMediaUrls(text: string): string[] {
  const found = text.match(MEDIA_URL_PATTERN) ?? [];
  return found
    .map((url) => url.replace(/[\\"']+$/, ""))
    .filter((url) => MEDIA_URL_EXTENSIONS.some((ext) => url.toLowerCase().includes(ext)));
}

/**
 * Parse a column value that embeds attachment JSON: an array or object,
 * possibly wrapped in quotes, with escaped or single quotes. Returns null when
 * the value cannot be read as JSON.
 */
export function parseAttachmentJson(value: string): KoboAttachment[] | null {
  let cleaned = value.trim();
  if (cleaned.startsWith('"') && cleaned.endsWith('"')) {
    cleaned = cleaned.slice(1, -1);
  }
  cleaned = cleaned.replace(/\\"/g, '"').replace(/\\\//g, "/");

  for (const candidate of [cleaned, cleaned.replace(/'/g, '"')]) {
    let data: unknown;
    try {
      data = JSON.parse(candidate);
    } catch {
      continue;
    }
    const list = Array.isArray(data) ? data : [data];
    return list.flatMap((item) => {
      const parsed = koboAttachmentSchema.safeParse(item);
      return parsed.success ? [parsed.data] : [];
    });
  }
  return null;
}

/**
 * Recover attachment references from column values, for exports that carry
 * media as JSON blobs or bare URLs instead of a structured _attachments field.
 */
export function attachmentsFromColumns(values: Record<string, unknown>): AttachmentReference[] {
  const refs: AttachmentReference[] = [];

  for (const [column, value] of Object.entries(values)) {
    if (value === null || value === undefined || value === "") continue;
    const text = typeof value === "string" ? value : JSON.stringify(value);
    const lower = text.toLowerCase();
    if (!MEDIA_HINTS.some((hint) => lower.includes(hint))) continue;

    const found: AttachmentReference[] = [];
    if (text.includes("[") || text.includes("{")) {
      for (const att of parseAttachmentJson(text) ?? []) {
        const url = bestDownloadUrl(att);
        if (!url) continue;
        found.push({
          column,
          fileName: att.filename ?? urlFileName(url),
          downloadUrl: url,
          mimeType: att.mimetype,
          origin: "column",
        });
      }
    }
    if (found.length === 0 && text.includes("http")) {
      for (const url of extractMediaUrls(text)) {
        found.push({ column, fileName: urlFileName(url), downloadUrl: url, origin: "column" });
      }
    }
    refs.push(...found);
  }

  return refs;
}

/**
 * Project one raw submission record into the transfer model. Metadata columns
 * stay in `values`; only the `_attachments` array is lifted out.
 */
export function normalizeSubmission(raw: Record<string, unknown>, rowNumber: number): Submission {
  const { _attachments: rawAttachments, ...values } = raw;
  const id = values._id ?? values._uuid ?? rowNumber;

  let attachments = fromStructuredAttachments(rawAttachments, values);
  if (attachments.length === 0) {
    attachments = attachmentsFromColumns(values);
  }

  return { id: String(id), rowNumber, values, attachments };
}
