import { describe, it, expect } from "vitest";
import { Readable } from "stream";
import { SharePointProvider } from "./sharepoint";
import { stubHttp, type StubRequest, type StubResponse } from "@/lib/testing/http-stub";
import type { SharePointSettings } from "@/lib/env";
import {
  DestinationConflictError,
  DestinationNotFoundError,
  DestinationRequestError,
  SetupError,
} from "@/lib/errors";

const GRAPH = "https://graph.microsoft.com/v1.0";
const TOKEN_URL = "https://login.microsoftonline.com/tenant-1/oauth2/v2.0/token";
const UPLOAD_URL = "https://upload.test/session-1";

const settings: SharePointSettings = {
  kind: "sharepoint",
  tenantId: "tenant-1",
  clientId: "client-1",
  clientSecret: "test-secret",
  siteId: "site-1",
  driveName: "Documents",
};

type Route = (request: StubRequest) => StubResponse | undefined;

/** Token and drive endpoints answered, everything else by `route` (404 when it returns nothing). */
function provider(route: Route = () => undefined, overrides: Partial<SharePointSettings> = {}) {
  const stub = stubHttp((request) => {
    if (request.url === TOKEN_URL) return { data: { access_token: "test-access", expires_in: 3600 } };
    if (request.url === `${GRAPH}/sites/site-1/drives`) {
      return { data: { value: [{ id: "d0", name: "Other" }, { id: "d1", name: "Documents" }] } };
    }
    return route(request) ?? { status: 404, data: {} };
  });
  const sharepoint = new SharePointProvider(
    { ...settings, ...overrides },
    { timeoutMs: 1000, chunkSize: 4, simpleUploadMaxBytes: 2, http: { adapter: stub.adapter } }
  );
  return { sharepoint, requests: stub.requests };
}

function body(text: string): Readable {
  return Readable.from([Buffer.from(text)]);
}

function bodyText(request: StubRequest): string {
  return Buffer.isBuffer(request.data) ? request.data.toString() : String(request.data);
}

describe("SharePointProvider.connect", () => {
  it("authenticates with client credentials and picks the named library", async () => {
    const { sharepoint, requests } = provider((req) =>
      req.url === `${GRAPH}/drives/d1/root/children` ? { data: { value: [] } } : undefined
    );

    await sharepoint.connect();
    await sharepoint.listDirectory("");

    const tokenBody = new URLSearchParams(bodyText(requests[0]));
    expect(tokenBody.get("grant_type")).toBe("client_credentials");
    expect(tokenBody.get("client_secret")).toBe("test-secret");
    expect(tokenBody.get("scope")).toBe("https://graph.microsoft.com/.default");
    expect(requests[2]?.url).toBe(`${GRAPH}/drives/d1/root/children`);
    expect(requests[2]?.headers.Authorization).toBe("Bearer test-access");
  });

  it("uses the first library when none is named", async () => {
    const { sharepoint, requests } = provider(
      (req) => (req.url === `${GRAPH}/drives/d0/root/children` ? { data: { value: [] } } : undefined),
      { driveName: undefined }
    );

    await sharepoint.connect();
    await sharepoint.listDirectory("");
    expect(requests[2]?.url).toBe(`${GRAPH}/drives/d0/root/children`);
  });

  it("fails setup for an unknown library", async () => {
    const { sharepoint } = provider(undefined, { driveName: "Missing" });
    await expect(sharepoint.connect()).rejects.toThrow('SharePoint document library "Missing" not found on site');
  });

  it("fails setup when the token is refused", async () => {
    const stub = stubHttp(() => ({ status: 401, data: { error: "invalid_client" } }));
    const sharepoint = new SharePointProvider(settings, {
      timeoutMs: 1000,
      chunkSize: 4,
      simpleUploadMaxBytes: 2,
      http: { adapter: stub.adapter },
    });

    const error = await sharepoint.connect().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(SetupError);
    expect(String(error)).toContain("SharePoint authentication failed");
  });
});

describe("SharePointProvider folders", () => {
  it("follows nextLink pages", async () => {
    const { sharepoint } = provider((req) => {
      if (req.url === `${GRAPH}/drives/d1/root:/Run%201/Form:/children`) {
        return {
          data: {
            value: [{ name: "photo", folder: { childCount: 1 } }],
            "@odata.nextLink": `${GRAPH}/drives/d1/next-page`,
          },
        };
      }
      if (req.url === `${GRAPH}/drives/d1/next-page`) {
        return { data: { value: [{ name: "a.jpg", size: 12, lastModifiedDateTime: "2025-01-15T00:00:00Z" }] } };
      }
      return undefined;
    });
    await sharepoint.connect();

    const items = await sharepoint.listDirectory("Run 1/Form");
    expect(items).toEqual([
      { name: "photo", size: 0, modifiedAt: new Date(0), isDirectory: true },
      { name: "a.jpg", size: 12, modifiedAt: new Date("2025-01-15T00:00:00Z"), isDirectory: false },
    ]);
  });

  it("maps a missing folder to DestinationNotFoundError", async () => {
    const { sharepoint } = provider();
    await sharepoint.connect();
    await expect(sharepoint.listDirectory("Nope")).rejects.toBeInstanceOf(DestinationNotFoundError);
  });

  it("creates each level once and accepts existing folders", async () => {
    const { sharepoint, requests } = provider((req) => {
      if (req.method !== "POST") return undefined;
      if (req.url === `${GRAPH}/drives/d1/root/children`) return { status: 409, data: {} };
      return { status: 201, data: {} };
    });
    await sharepoint.connect();

    await sharepoint.createDirectory("Run/Form");
    await sharepoint.createDirectory("Run/Form");

    const posts = requests.filter((r) => r.method === "POST" && r.url !== TOKEN_URL);
    expect(posts.map((r) => [r.url, JSON.parse(bodyText(r)).name])).toEqual([
      [`${GRAPH}/drives/d1/root/children`, "Run"],
      [`${GRAPH}/drives/d1/root:/Run:/children`, "Form"],
    ]);
    expect(JSON.parse(bodyText(posts[0]))).toMatchObject({
      folder: {},
      "@microsoft.graph.conflictBehavior": "fail",
    });
  });
});

describe("SharePointProvider.uploadFile", () => {
  it("sends small files in one request", async () => {
    const { sharepoint, requests } = provider((req) => (req.method === "PUT" ? { status: 201, data: {} } : undefined));
    await sharepoint.connect();

    const result = await sharepoint.uploadFile(body("hi"), "Run/a.jpg", 2);

    expect(result).toEqual({ bytesWritten: 2, mode: "simple" });
    const put = requests.find((r) => r.method === "PUT");
    expect(put?.url).toBe(`${GRAPH}/drives/d1/root:/Run/a.jpg:/content?@microsoft.graph.conflictBehavior=fail`);
    expect(put?.headers["Content-Length"]).toBe("2");
  });

  it("maps a simple-upload conflict to DestinationConflictError", async () => {
    const { sharepoint } = provider((req) => (req.method === "PUT" ? { status: 409, data: {} } : undefined));
    await sharepoint.connect();

    await expect(sharepoint.uploadFile(body("hi"), "Run/a.jpg", 2)).rejects.toBeInstanceOf(
      DestinationConflictError
    );
  });

  /** Graph's answer to a chunk: 201 once the declared total is reached, 202 before. */
  function commitOnLastRange(range: string): number {
    const match = /^bytes \d+-(\d+)\/(\d+|\*)$/.exec(range);
    if (!match || match[2] === "*") return 202;
    return Number(match[1]) + 1 === Number(match[2]) ? 201 : 202;
  }

  function sessionRoutes(chunkStatus: (range: string) => number = commitOnLastRange): {
    route: Route;
    chunks: StubRequest[];
  } {
    const chunks: StubRequest[] = [];
    const route: Route = (req) => {
      if (req.method === "POST" && req.url === `${GRAPH}/drives/d1/root:/Run/big.bin:/createUploadSession`) {
        return { data: { uploadUrl: UPLOAD_URL } };
      }
      if (req.method === "PUT" && req.url === UPLOAD_URL) {
        chunks.push(req);
        return { status: chunkStatus(String(req.headers["Content-Range"])), data: {} };
      }
      if (req.method === "DELETE" && req.url === UPLOAD_URL) return { status: 204 };
      return undefined;
    };
    return { route, chunks };
  }

  it("uploads larger files in ranged chunks without the bearer token", async () => {
    const { route, chunks } = sessionRoutes();
    const { sharepoint } = provider(route);
    await sharepoint.connect();

    const result = await sharepoint.uploadFile(body("abcdefghij"), "Run/big.bin", 10);

    expect(result).toEqual({ bytesWritten: 10, mode: "session" });
    expect(chunks.map((c) => [c.headers["Content-Range"], bodyText(c)])).toEqual([
      ["bytes 0-3/10", "abcd"],
      ["bytes 4-7/10", "efgh"],
      ["bytes 8-9/10", "ij"],
    ]);
    expect(chunks.every((c) => c.headers.Authorization === undefined)).toBe(true);
  });

  it("declares the total only on the last chunk when the size is unknown", async () => {
    const { route, chunks } = sessionRoutes();
    const { sharepoint } = provider(route);
    await sharepoint.connect();

    await sharepoint.uploadFile(body("abcdefghij"), "Run/big.bin");

    expect(chunks.map((c) => c.headers["Content-Range"])).toEqual([
      "bytes 0-3/*",
      "bytes 4-7/*",
      "bytes 8-9/10",
    ]);
  });

  it("cancels the session when a chunk fails", async () => {
    const { route } = sessionRoutes(() => 500);
    const { sharepoint, requests } = provider(route);
    await sharepoint.connect();

    await expect(sharepoint.uploadFile(body("abcdefghij"), "Run/big.bin", 10)).rejects.toBeInstanceOf(
      DestinationRequestError
    );
    expect(requests.at(-1)).toMatchObject({ method: "DELETE", url: UPLOAD_URL });
  });

  it("rejects a stream that ends before the declared size", async () => {
    const { route, chunks } = sessionRoutes();
    const { sharepoint, requests } = provider(route);
    await sharepoint.connect();

    const error = await sharepoint.uploadFile(body("abcdef"), "Run/big.bin", 10).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DestinationRequestError);
    expect(String(error)).toContain('Upload of "Run/big.bin" incomplete: source sent 6 of 10 bytes');
    expect(chunks.map((c) => c.headers["Content-Range"])).toEqual(["bytes 0-3/10", "bytes 4-5/10"]);
    expect(requests.at(-1)).toMatchObject({ method: "DELETE", url: UPLOAD_URL });
  });

  it("rejects a session the last chunk did not commit", async () => {
    const { route } = sessionRoutes(() => 202);
    const { sharepoint, requests } = provider(route);
    await sharepoint.connect();

    await expect(sharepoint.uploadFile(body("abcdefghij"), "Run/big.bin", 10)).rejects.toThrow(
      'Upload of "Run/big.bin" was not committed (HTTP 202 on the last chunk)'
    );
    expect(requests.at(-1)).toMatchObject({ method: "DELETE", url: UPLOAD_URL });
  });

  it("maps a conflict on the final chunk to DestinationConflictError", async () => {
    const { route, chunks } = sessionRoutes((range) => (range === "bytes 8-9/10" ? 409 : 202));
    const { sharepoint, requests } = provider(route);
    await sharepoint.connect();

    await expect(sharepoint.uploadFile(body("abcdefghij"), "Run/big.bin", 10)).rejects.toBeInstanceOf(
      DestinationConflictError
    );
    expect(chunks).toHaveLength(3);
    expect(requests.at(-1)).toMatchObject({ method: "DELETE", url: UPLOAD_URL });
  });
});
