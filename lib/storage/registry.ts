import type { DestinationProvider } from "./interface";
import { SharePointProvider } from "./sharepoint";
import { LocalProvider } from "./local";
import type { TransferConfig } from "@/lib/env";

export function createDestinationProvider(config: TransferConfig): DestinationProvider {
  const destination = config.destination;
  switch (destination.kind) {
    case "sharepoint":
      return new SharePointProvider(destination, {
        timeoutMs: config.httpTimeoutMs,
        chunkSize: config.uploadChunkSize,
        simpleUploadMaxBytes: config.simpleUploadMaxBytes,
      });
    case "local":
      return new LocalProvider(destination.basePath);
  }
}
