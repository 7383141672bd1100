import type { TransferConfig } from "@/lib/env";
import { KoboClient, type SurveySource } from "@/lib/source/kobo";
import type { SurveyForm } from "@/lib/source/submissions";
import type { DestinationProvider } from "@/lib/storage/interface";
import { createDestinationProvider } from "@/lib/storage/registry";
import { SetupError, errorMessage } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

const log = createLogger("session");

/** Connected source and destination for one run, built from configuration. */
export interface TransferSession {
  config: TransferConfig;
  source: SurveySource;
  destination: DestinationProvider;
}

export function createSource(config: TransferConfig): KoboClient {
  return new KoboClient({
    apiUrl: config.kobo.apiUrl,
    token: config.kobo.token,
    pageSize: config.kobo.pageSize,
    timeoutMs: config.httpTimeoutMs,
  });
}

/** Any failure here is a SetupError: nothing has been transferred yet. */
export async function openSession(config: TransferConfig): Promise<TransferSession> {
  const destination = createDestinationProvider(config);
  log.info("Connecting to destination", { kind: destination.kind });
  try {
    await destination.connect();
  } catch (err) {
    if (err instanceof SetupError) throw err;
    throw new SetupError(`Could not connect to destination: ${errorMessage(err)}`, { cause: err });
  }
  log.info("Destination connected", { kind: destination.kind });
  return { config, source: createSource(config), destination };
}

export async function closeSession(session: TransferSession): Promise<void> {
  await session.destination.disconnect();
}

export async function fetchForms(source: SurveySource): Promise<SurveyForm[]> {
  try {
    return await source.listForms();
  } catch (err) {
    throw new SetupError(`Could not list forms: ${errorMessage(err)}`, { cause: err });
  }
}
