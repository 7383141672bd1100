import type { MediaStream, SurveySource } from "@/lib/source/kobo";
import type { AttachmentReference, Submission } from "@/lib/source/submissions";
import { SourceRequestError, errorMessage } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

const log = createLogger("url-strategies");

export interface AttachmentLocation {
  formUid: string;
  submission: Submission;
  attachment: AttachmentReference;
}

/** One way of finding a download URL; returns null when it does not apply. */
export interface SourceUrlStrategy {
  name: string;
  resolve(location: AttachmentLocation, source: SurveySource): string | null;
}

export const directDownloadUrl: SourceUrlStrategy = {
  name: "direct-download-url",
  resolve: ({ attachment }) => attachment.downloadUrl ?? null,
};

export const reconstructedAttachmentUrl: SourceUrlStrategy = {
  name: "reconstructed-attachment-url",
  resolve: ({ formUid, submission, attachment }, source) =>
    attachment.attachmentId
      ? source.attachmentUrl(formUid, submission.id, attachment.attachmentId)
      : null,
};

export const DEFAULT_URL_STRATEGIES: readonly SourceUrlStrategy[] = [
  directDownloadUrl,
  reconstructedAttachmentUrl,
];

export type OpenedMedia =
  | { ok: true; media: MediaStream; strategy: string; url: string }
  | { ok: false; reason: string };

/**
 * Try each strategy in order. A strategy without a URL is passed over; a
 * client error (4xx) moves on to the next strategy; any other failure ends
 * the chain, as does running out of strategies.
 */
export async function openFirstReachable(
  location: AttachmentLocation,
  source: SurveySource,
  strategies: readonly SourceUrlStrategy[] = DEFAULT_URL_STRATEGIES
): Promise<OpenedMedia> {
  const tried = new Set<string>();
  let reason = "no download URL available";

  for (const strategy of strategies) {
    const url = strategy.resolve(location, source);
    if (!url || tried.has(url)) continue;
    tried.add(url);

    try {
      const media = await source.openMedia(url);
      return { ok: true, media, strategy: strategy.name, url };
    } catch (err) {
      reason = `${strategy.name}: ${errorMessage(err)}`;
      if (err instanceof SourceRequestError && err.isClientError) {
        log.warn("Download URL rejected — trying next strategy", {
          strategy: strategy.name,
          status: err.status,
        });
        continue;
      }
      return { ok: false, reason };
    }
  }

  return { ok: false, reason };
}
