import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { closeSession, fetchForms, openSession } from "./session";
import { loadConfig } from "@/lib/env";
import { SetupError, SourceRequestError } from "@/lib/errors";
import { KoboClient } from "@/lib/source/kobo";
import { SharePointProvider } from "@/lib/storage/sharepoint";
import { createDestinationProvider } from "@/lib/storage/registry";
import { FakeSource } from "@/lib/testing/fakes";

function localConfig(basePath: string) {
  return loadConfig({ API_TOKEN: "test-token", DESTINATION: "local", LOCAL_DESTINATION_PATH: basePath });
}

describe("openSession", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "kobo-session-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("connects the configured destination and builds the source", async () => {
    const session = await openSession(localConfig(path.join(root, "out")));

    expect(session.destination.kind).toBe("local");
    expect(session.source).toBeInstanceOf(KoboClient);
    expect((await fs.stat(path.join(root, "out"))).isDirectory()).toBe(true);
    await closeSession(session);
  });

  it("reports a destination that cannot be opened as a setup failure", async () => {
    const blocker = path.join(root, "not-a-folder");
    await fs.writeFile(blocker, "x");

    const error = await openSession(localConfig(blocker)).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SetupError);
    expect(String(error)).toContain("Could not connect to destination:");
  });
});

describe("createDestinationProvider", () => {
  it("builds a SharePoint provider from its settings", () => {
    const config = loadConfig({
      API_TOKEN: "test-token",
      TENANT_ID: "tenant-1",
      CLIENT_ID: "client-1",
      CLIENT_SECRET: "test-secret",
      SITE_ID: "site-1",
    });
    expect(createDestinationProvider(config)).toBeInstanceOf(SharePointProvider);
  });
});

describe("fetchForms", () => {
  it("returns the listed forms", async () => {
    const source = new FakeSource();
    source.forms.push({ uid: "aFuel", name: "Fuel Log", dateCreated: "2024-01-01T00:00:00Z" });
    expect((await fetchForms(source)).map((f) => f.uid)).toEqual(["aFuel"]);
  });

  it("wraps listing failures", async () => {
    class DownSource extends FakeSource {
      override async listForms(): Promise<never> {
        throw new SourceRequestError("https://kobo.test/api/v2/assets/", 503);
      }
    }

    await expect(fetchForms(new DownSource())).rejects.toThrow(
      "Could not list forms: Source request failed (HTTP 503): https://kobo.test/api/v2/assets/"
    );
  });
});
