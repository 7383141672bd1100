import { Transform } from "stream";
import type { DestinationProvider, UploadMode, UploadResult } from "@/lib/storage/interface";
import type { SurveySource } from "@/lib/source/kobo";
import { DestinationConflictError, errorMessage } from "@/lib/errors";
import {
  DEFAULT_URL_STRATEGIES,
  openFirstReachable,
  type AttachmentLocation,
  type SourceUrlStrategy,
} from "./url-strategies";
import type { TransferOutcome, TransferStats } from "./stats";
import { createLogger } from "@/lib/logger";

const log = createLogger("executor");

export interface TransferRequest extends AttachmentLocation {
  /** Full destination path of the file, folders included. */
  destinationPath: string;
}

export interface TransferResult {
  outcome: TransferOutcome;
  bytesTransferred: number;
  durationMs: number;
  strategy?: string;
  /** How the provider stored the file, for transferred attachments. */
  mode?: UploadMode;
  error?: string;
}

/**
 * Streams one attachment from the survey platform into the destination.
 * Bytes flow through a counting transform straight into the provider's
 * upload; nothing is buffered beyond the provider's chunk size.
 */
export class TransferExecutor {
  private source: SurveySource;
  private destination: DestinationProvider;
  private strategies: readonly SourceUrlStrategy[];

  constructor(
    source: SurveySource,
    destination: DestinationProvider,
    strategies: readonly SourceUrlStrategy[] = DEFAULT_URL_STRATEGIES
  ) {
    this.source = source;
    this.destination = destination;
    this.strategies = strategies;
  }

  /** Records exactly one outcome in `stats`, whatever happens. */
  async transfer(request: TransferRequest, stats: TransferStats): Promise<TransferResult> {
    const started = Date.now();
    const result = await this.attempt(request, started);
    stats.recordOutcome(result.outcome, result.bytesTransferred);
    return result;
  }

  private async attempt(request: TransferRequest, started: number): Promise<TransferResult> {
    const { destinationPath } = request;
    const elapsed = () => Date.now() - started;

    const opened = await openFirstReachable(request, this.source, this.strategies);
    if (!opened.ok) {
      log.error("Source unreachable", { destinationPath, reason: opened.reason });
      return { outcome: "SOURCE_UNREACHABLE", bytesTransferred: 0, durationMs: elapsed(), error: opened.reason };
    }

    const { media, strategy } = opened;
    log.info("Streaming attachment", {
      destinationPath,
      strategy,
      expectedSize: media.contentLength ?? null,
    });

    // Transform counts bytes as the upload pulls them; it stays paused until
    // the provider starts consuming, so no data is lost.
    let currentBytes = 0;
    const tracker = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        currentBytes += chunk.length;
        callback(null, chunk);
      },
    });
    media.stream.pipe(tracker);
    // Propagate errors bidirectionally
    media.stream.on("error", (err) => tracker.destroy(err));
    tracker.on("error", () => {
      if (!media.stream.destroyed) media.stream.destroy();
    });

    let upload: UploadResult;
    try {
      upload = await this.destination.uploadFile(tracker, destinationPath, media.contentLength);
    } catch (err) {
      if (!media.stream.destroyed) media.stream.destroy();
      if (err instanceof DestinationConflictError) {
        log.info("Destination already has file — treating as transferred", { destinationPath });
        return { outcome: "SKIP_EXISTING_RACE", bytesTransferred: 0, durationMs: elapsed(), strategy };
      }
      log.error("Upload failed", { destinationPath, error: err });
      return {
        outcome: "UPLOAD_FAILED",
        bytesTransferred: 0,
        durationMs: elapsed(),
        strategy,
        error: errorMessage(err),
      };
    }

    if (media.contentLength !== undefined && currentBytes !== media.contentLength) {
      log.warn("Stream byte count differs from declared length", {
        destinationPath,
        expectedSize: media.contentLength,
        actualSize: currentBytes,
      });
    }

    if (upload.bytesWritten !== currentBytes) {
      log.warn("Destination byte count differs from bytes read", {
        destinationPath,
        bytesRead: currentBytes,
        bytesWritten: upload.bytesWritten,
      });
    }

    const durationMs = elapsed();
    log.info("Attachment transferred", {
      destinationPath,
      bytes: upload.bytesWritten,
      mode: upload.mode,
      durationMs,
    });
    return {
      outcome: "TRANSFERRED",
      bytesTransferred: upload.bytesWritten,
      durationMs,
      strategy,
      mode: upload.mode,
    };
  }
}
