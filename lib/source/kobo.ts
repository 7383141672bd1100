import axios, { type AxiosInstance, type CreateAxiosDefaults } from "axios";
import { parse as parseCsv } from "csv-parse/sync";
import type { Readable } from "stream";
import { z } from "zod";
import { normalizeSubmission, type Submission, type SurveyForm } from "./submissions";
import { SourceRequestError, errorMessage } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

const log = createLogger("kobo");

export interface MediaStream {
  stream: Readable;
  contentLength?: number;
  contentType?: string;
}

/** Read-only view of the survey platform used by the transfer engine. */
export interface SurveySource {
  listForms(): Promise<SurveyForm[]>;
  /** Every submission of the form, pagination followed to the end, in server order. */
  listSubmissions(formUid: string): Promise<Submission[]>;
  openMedia(url: string): Promise<MediaStream>;
  /** Attachment endpoint built from identifiers, for when the direct URL is missing or stale. */
  attachmentUrl(formUid: string, submissionId: string, attachmentId: string): string;
}

export interface KoboClientOptions {
  apiUrl: string;
  token: string;
  pageSize: number;
  timeoutMs: number;
  http?: Pick<CreateAxiosDefaults, "adapter">;
}

type RawRow = Record<string, unknown>;

const rowsSchema = z.array(z.record(z.unknown()));

const pageSchema = z.object({
  next: z.string().nullish(),
  results: rowsSchema,
});

/** One way of reading a form's submissions; listSubmissions tries them in order. */
interface SubmissionEndpoint {
  name: string;
  fetch(formUid: string): Promise<RawRow[]>;
}

const assetSchema = z
  .object({
    uid: z.string(),
    name: z.string().default(""),
    asset_type: z.string().optional(),
    date_created: z.string().default(""),
    deployment__submission_count: z.number().optional(),
  })
  .passthrough();

function headerNumber(value: unknown): number | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) && n >= 0 ? n : undefined;
}

function originOf(url: string | undefined, base: string | undefined): string | null {
  try {
    return new URL(url ?? "", base).origin;
  } catch {
    return null;
  }
}

/** Exports use ";" or ","; whichever the header row has more of wins. */
function csvDelimiter(text: string): string {
  const header = text.split(/\r?\n/, 1)[0] ?? "";
  const count = (ch: string) => header.split(ch).length - 1;
  return count(";") > count(",") ? ";" : ",";
}

export class KoboClient implements SurveySource {
  private http: AxiosInstance;
  private options: KoboClientOptions;
  private apiOrigin: string;
  private submissionEndpoints: SubmissionEndpoint[];

  constructor(options: KoboClientOptions) {
    this.options = options;
    this.apiOrigin = new URL(options.apiUrl).origin;
    this.http = axios.create({
      baseURL: options.apiUrl,
      timeout: options.timeoutMs,
      headers: { "User-Agent": "kobo-media-transfer/1.0" },
      ...options.http,
    });
    // Media URLs can come from free-text answers; the token only goes to the API server.
    this.http.interceptors.request.use((config) => {
      if (originOf(config.url, config.baseURL) === this.apiOrigin) {
        config.headers.set("Authorization", `Token ${options.token}`);
      }
      return config;
    });

    const asset = (uid: string) => `/api/v2/assets/${encodeURIComponent(uid)}`;
    this.submissionEndpoints = [
      {
        name: "data",
        fetch: (uid) => this.collectPages(`${asset(uid)}/data/`, { format: "json", limit: options.pageSize }),
      },
      {
        name: "data.json",
        fetch: (uid) => this.collectPages(`${asset(uid)}/data.json`, { limit: options.pageSize }),
      },
      { name: "data.csv", fetch: (uid) => this.fetchCsv(`${asset(uid)}/data.csv`) },
    ];
  }

  async listForms(): Promise<SurveyForm[]> {
    const rows = await this.collectPages("/api/v2/assets/", { format: "json" });
    const forms: SurveyForm[] = [];
    for (const row of rows) {
      const parsed = assetSchema.safeParse(row);
      if (!parsed.success) continue;
      const asset = parsed.data;
      if (asset.asset_type && asset.asset_type !== "survey") continue;
      forms.push({
        uid: asset.uid,
        name: asset.name || asset.uid,
        dateCreated: asset.date_created,
        submissionCount: asset.deployment__submission_count,
      });
    }
    log.info("Forms listed", { formCount: forms.length });
    return forms;
  }

  /**
   * Tries the paged data endpoint, then data.json, then the CSV export. A
   * failed endpoint is logged and the next one is tried; the form fails only
   * when none answers.
   */
  async listSubmissions(formUid: string): Promise<Submission[]> {
    const failures: string[] = [];
    let lastStatus: number | undefined;

    for (const endpoint of this.submissionEndpoints) {
      try {
        const rows = await endpoint.fetch(formUid);
        log.info("Submissions fetched", { formUid, endpoint: endpoint.name, submissionCount: rows.length });
        return rows.map((row, i) => normalizeSubmission(row, i + 1));
      } catch (err) {
        lastStatus = err instanceof SourceRequestError ? err.status : undefined;
        failures.push(`${endpoint.name}: ${errorMessage(err)}`);
        log.warn("Submission endpoint failed", { formUid, endpoint: endpoint.name, error: err });
      }
    }

    throw new SourceRequestError(
      `${this.options.apiUrl}/api/v2/assets/${encodeURIComponent(formUid)}/`,
      lastStatus,
      `No submission endpoint answered for form ${formUid} (${failures.join("; ")})`
    );
  }

  async openMedia(url: string): Promise<MediaStream> {
    try {
      const res = await this.http.get<Readable>(url, { responseType: "stream" });
      const contentType = res.headers["content-type"];
      return {
        stream: res.data,
        contentLength: headerNumber(res.headers["content-length"]),
        contentType: typeof contentType === "string" ? contentType : undefined,
      };
    } catch (err) {
      throw this.requestError(err, url);
    }
  }

  attachmentUrl(formUid: string, submissionId: string, attachmentId: string): string {
    return (
      `${this.options.apiUrl}/api/v2/assets/${encodeURIComponent(formUid)}` +
      `/data/${encodeURIComponent(submissionId)}/attachments/${encodeURIComponent(attachmentId)}/`
    );
  }

  /** Follow `next` links until the listing is exhausted. A bare array is a single page. */
  private async collectPages(path: string, params: Record<string, string | number>): Promise<RawRow[]> {
    const rows: RawRow[] = [];
    let url: string | null | undefined = path;
    let first = true;

    while (url) {
      let body: unknown;
      try {
        // `next` links already carry the query string
        const res = await this.http.get<unknown>(url, first ? { params } : undefined);
        body = res.data;
      } catch (err) {
        throw this.requestError(err, url);
      }
      first = false;

      const page = pageSchema.safeParse(body);
      if (page.success) {
        rows.push(...page.data.results);
        url = page.data.next;
        continue;
      }
      const list = rowsSchema.safeParse(body);
      if (!list.success) {
        throw new SourceRequestError(url, undefined, `Unexpected response shape from ${url}`);
      }
      rows.push(...list.data);
      url = null;
    }

    return rows;
  }

  private async fetchCsv(path: string): Promise<RawRow[]> {
    let text: unknown;
    try {
      const res = await this.http.get<unknown>(path, { responseType: "text" });
      text = res.data;
    } catch (err) {
      throw this.requestError(err, path);
    }
    if (typeof text !== "string") {
      throw new SourceRequestError(path, undefined, `Unexpected response shape from ${path}`);
    }

    let records: unknown;
    try {
      records = parseCsv(text, {
        columns: true,
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
        delimiter: csvDelimiter(text),
      });
    } catch (err) {
      throw new SourceRequestError(path, undefined, `Unreadable CSV export from ${path}: ${errorMessage(err)}`);
    }
    const rows = rowsSchema.safeParse(records);
    if (!rows.success) {
      throw new SourceRequestError(path, undefined, `Unexpected response shape from ${path}`);
    }
    return rows.data;
  }

  private requestError(err: unknown, url: string): SourceRequestError {
    const status = axios.isAxiosError(err) ? err.response?.status : undefined;
    const reason = err instanceof Error ? err.message : "Unknown error";
    log.warn("Source request failed", { url, status, error: reason });
    return new SourceRequestError(url, status, `Source request failed (${status ?? reason}): ${url}`);
  }
}
