import axios, { type AxiosInstance, type CreateAxiosDefaults } from "axios";
import type { Readable } from "stream";
import type { DestinationProvider, DestinationItem, UploadResult } from "./interface";
import { readChunks } from "./chunks";
import type { SharePointSettings } from "@/lib/env";
import {
  DestinationConflictError,
  DestinationNotFoundError,
  DestinationRequestError,
  SetupError,
  errorMessage,
} from "@/lib/errors";
import { createLogger } from "@/lib/logger";

const log = createLogger("sharepoint");

const GRAPH_URL = "https://graph.microsoft.com/v1.0";
const GRAPH_SCOPE = "https://graph.microsoft.com/.default";
// Refresh the token this long before it expires so a chunked upload never
// starts with a token that lapses mid-session.
const TOKEN_REFRESH_MARGIN_MS = 5 * 60 * 1000;

interface TokenResponse {
  access_token: string;
  expires_in: number;
}

interface DriveItem {
  name: string;
  size?: number;
  lastModifiedDateTime?: string;
  folder?: { childCount?: number };
}

interface DriveItemPage {
  value: DriveItem[];
  "@odata.nextLink"?: string;
}

interface UploadSession {
  uploadUrl: string;
}

export interface SharePointOptions {
  timeoutMs: number;
  /** Bytes per upload-session request; a multiple of 320 KiB. */
  chunkSize: number;
  /** Known-size files up to this many bytes go up in a single PUT. */
  simpleUploadMaxBytes: number;
  /** Extra axios defaults (tests inject an in-process adapter here). */
  http?: Pick<CreateAxiosDefaults, "adapter">;
}

function statusOf(err: unknown): number | undefined {
  return axios.isAxiosError(err) ? err.response?.status : undefined;
}

/** Percent-encode each segment of a drive-relative path. */
function encodePath(remotePath: string): string {
  return remotePath
    .split("/")
    .filter(Boolean)
    .map(encodeURIComponent)
    .join("/");
}

/**
 * SharePoint document library accessed through Microsoft Graph.
 *
 * connect() acquires an app-only token (client credentials) and resolves the
 * drive: SHAREPOINT_DRIVE_NAME when set, otherwise the site's first library.
 *
 * Uploads use conflictBehavior "fail" so an existing name surfaces as a 409
 * (DestinationConflictError) rather than being silently replaced.
 */
export class SharePointProvider implements DestinationProvider {
  readonly kind = "sharepoint";
  private http: AxiosInstance;
  private settings: SharePointSettings;
  private options: SharePointOptions;
  private accessToken: string | null = null;
  private tokenExpiresAt = 0;
  private driveId: string | null = null;
  private knownFolders = new Set<string>();

  constructor(settings: SharePointSettings, options: SharePointOptions) {
    this.settings = settings;
    this.options = options;
    this.http = axios.create({
      baseURL: GRAPH_URL,
      timeout: options.timeoutMs,
      headers: { "User-Agent": "kobo-media-transfer/1.0" },
      ...options.http,
    });
  }

  async connect(): Promise<void> {
    log.info("Connecting", { siteId: this.settings.siteId, tenantId: this.settings.tenantId });
    try {
      await this.refreshToken();
    } catch (err) {
      throw new SetupError(`SharePoint authentication failed: ${errorMessage(err)}`, { cause: err });
    }

    let drives: Array<{ id: string; name: string }>;
    try {
      const res = await this.http.get<{ value: Array<{ id: string; name: string }> }>(
        `/sites/${encodeURIComponent(this.settings.siteId)}/drives`,
        { headers: await this.authHeaders() }
      );
      drives = res.data.value;
    } catch (err) {
      throw new SetupError(`Could not list SharePoint document libraries: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const wanted = this.settings.driveName;
    const drive = wanted ? drives.find((d) => d.name === wanted) : drives[0];
    if (!drive) {
      throw new SetupError(
        wanted
          ? `SharePoint document library "${wanted}" not found on site`
          : "No document libraries found in SharePoint site"
      );
    }
    this.driveId = drive.id;
    log.info("Using SharePoint library", { driveName: drive.name, driveId: drive.id });
  }

  async disconnect(): Promise<void> {
    this.accessToken = null;
    this.knownFolders.clear();
  }

  async listDirectory(remotePath: string): Promise<DestinationItem[]> {
    const encoded = encodePath(remotePath);
    let url: string | undefined = encoded
      ? `${this.drivePath()}/root:/${encoded}:/children`
      : `${this.drivePath()}/root/children`;
    const results: DestinationItem[] = [];

    while (url) {
      let page: DriveItemPage;
      try {
        const res = await this.http.get<DriveItemPage>(url, { headers: await this.authHeaders() });
        page = res.data;
      } catch (err) {
        if (statusOf(err) === 404) throw new DestinationNotFoundError(remotePath);
        log.error("listDirectory failed", { remotePath, error: err });
        throw new DestinationRequestError(
          `Listing "${remotePath}" failed: ${errorMessage(err)}`,
          statusOf(err)
        );
      }

      for (const item of page.value) {
        results.push({
          name: item.name,
          size: item.size ?? 0,
          modifiedAt: new Date(item.lastModifiedDateTime ?? 0),
          isDirectory: item.folder !== undefined,
        });
      }
      // nextLink is absolute; axios ignores baseURL for absolute URLs
      url = page["@odata.nextLink"];
    }

    log.debug("Directory listed", { remotePath, entryCount: results.length });
    return results;
  }

  async createDirectory(remotePath: string): Promise<void> {
    const parts = remotePath.split("/").filter(Boolean);
    for (let i = 0; i < parts.length; i++) {
      const current = parts.slice(0, i + 1).join("/");
      if (this.knownFolders.has(current)) continue;

      const parent = encodePath(parts.slice(0, i).join("/"));
      const url = parent
        ? `${this.drivePath()}/root:/${parent}:/children`
        : `${this.drivePath()}/root/children`;
      try {
        await this.http.post(
          url,
          { name: parts[i], folder: {}, "@microsoft.graph.conflictBehavior": "fail" },
          { headers: await this.authHeaders() }
        );
        log.info("Folder created", { path: current });
      } catch (err) {
        if (statusOf(err) !== 409) {
          log.error("createDirectory failed", { path: current, error: err });
          throw new DestinationRequestError(
            `Creating folder "${current}" failed: ${errorMessage(err)}`,
            statusOf(err)
          );
        }
      }
      this.knownFolders.add(current);
    }
  }

  async uploadFile(stream: Readable, remotePath: string, sizeHint?: number): Promise<UploadResult> {
    if (sizeHint !== undefined && sizeHint <= this.options.simpleUploadMaxBytes) {
      return this.simpleUpload(stream, remotePath, sizeHint);
    }
    return this.sessionUpload(stream, remotePath, sizeHint);
  }

  // ── internals ──────────────────────────────────────────────────────────

  private drivePath(): string {
    if (!this.driveId) {
      throw new Error("SharePointProvider used before connect()");
    }
    return `/drives/${this.driveId}`;
  }

  private async refreshToken(): Promise<void> {
    const { tenantId, clientId, clientSecret } = this.settings;
    const body = new URLSearchParams({
      grant_type: "client_credentials",
      client_id: clientId,
      client_secret: clientSecret,
      scope: GRAPH_SCOPE,
    });
    const res = await this.http.post<TokenResponse>(
      `https://login.microsoftonline.com/${encodeURIComponent(tenantId)}/oauth2/v2.0/token`,
      body.toString(),
      { headers: { "Content-Type": "application/x-www-form-urlencoded" } }
    );
    this.accessToken = res.data.access_token;
    this.tokenExpiresAt = Date.now() + res.data.expires_in * 1000;
    log.debug("Access token acquired", { expiresIn: res.data.expires_in });
  }

  private async authHeaders(): Promise<Record<string, string>> {
    if (!this.accessToken || Date.now() > this.tokenExpiresAt - TOKEN_REFRESH_MARGIN_MS) {
      await this.refreshToken();
    }
    return { Authorization: `Bearer ${this.accessToken}` };
  }

  private itemUrl(remotePath: string): string {
    return `${this.drivePath()}/root:/${encodePath(remotePath)}:`;
  }

  private async simpleUpload(
    body: Readable | Buffer,
    remotePath: string,
    size: number
  ): Promise<UploadResult> {
    log.info("Uploading (single request)", { remotePath, size });
    try {
      await this.http.put(
        `${this.itemUrl(remotePath)}/content?@microsoft.graph.conflictBehavior=fail`,
        body,
        {
          headers: {
            ...(await this.authHeaders()),
            "Content-Type": "application/octet-stream",
            "Content-Length": String(size),
          },
          maxBodyLength: Infinity,
        }
      );
    } catch (err) {
      throw this.uploadError(err, remotePath);
    }
    return { bytesWritten: size, mode: "simple" };
  }

  private async sessionUpload(
    stream: Readable,
    remotePath: string,
    sizeHint?: number
  ): Promise<UploadResult> {
    let uploadUrl: string;
    try {
      const res = await this.http.post<UploadSession>(
        `${this.itemUrl(remotePath)}/createUploadSession`,
        { item: { "@microsoft.graph.conflictBehavior": "fail" } },
        { headers: await this.authHeaders() }
      );
      uploadUrl = res.data.uploadUrl;
    } catch (err) {
      throw this.uploadError(err, remotePath);
    }
    log.info("Upload session created", { remotePath, sizeHint: sizeHint ?? null });
    if (sizeHint === undefined) {
      log.warn("Source sent no content length; chunk ranges declare the total only on the last chunk", {
        remotePath,
      });
    }

    let offset = 0;
    let finalStatus: number | undefined;
    try {
      for await (const { chunk, last } of readChunks(stream, this.options.chunkSize)) {
        const end = offset + chunk.length - 1;
        const total = sizeHint ?? (last ? String(end + 1) : "*");
        // The pre-authenticated uploadUrl must not carry the Authorization header.
        const res = await this.http.put(uploadUrl, chunk, {
          headers: {
            "Content-Length": String(chunk.length),
            "Content-Range": `bytes ${offset}-${end}/${total}`,
          },
          maxBodyLength: Infinity,
        });
        finalStatus = res.status;
        offset = end + 1;
      }
    } catch (err) {
      await this.cancelSession(uploadUrl, remotePath);
      throw this.uploadError(err, remotePath);
    }

    if (sizeHint !== undefined && offset !== sizeHint) {
      await this.cancelSession(uploadUrl, remotePath);
      throw new DestinationRequestError(
        `Upload of "${remotePath}" incomplete: source sent ${offset} of ${sizeHint} bytes`
      );
    }

    if (offset === 0) {
      // Upload sessions cannot finalise an empty file
      await this.cancelSession(uploadUrl, remotePath);
      return this.simpleUpload(Buffer.alloc(0), remotePath, 0);
    }

    // 202 means the session still expects bytes; only 200/201 commit the file.
    if (finalStatus !== 200 && finalStatus !== 201) {
      await this.cancelSession(uploadUrl, remotePath);
      throw new DestinationRequestError(
        `Upload of "${remotePath}" was not committed (HTTP ${finalStatus ?? "none"} on the last chunk)`,
        finalStatus
      );
    }

    return { bytesWritten: offset, mode: "session" };
  }

  private async cancelSession(uploadUrl: string, remotePath: string): Promise<void> {
    try {
      await this.http.delete(uploadUrl);
    } catch (err) {
      log.warn("Could not cancel upload session", { remotePath, error: err });
    }
  }

  private uploadError(err: unknown, remotePath: string): Error {
    const status = statusOf(err);
    if (status === 409) return new DestinationConflictError(remotePath);
    log.error("Upload failed", { remotePath, status, error: err });
    return new DestinationRequestError(`Upload of "${remotePath}" failed: ${errorMessage(err)}`, status);
  }
}
