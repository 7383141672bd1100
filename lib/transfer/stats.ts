import type { TransferDecision } from "./decision";

export type TransferOutcome =
  | "TRANSFERRED"
  | "SKIP_EXISTING_RACE"
  | "UPLOAD_FAILED"
  | "SOURCE_UNREACHABLE";

export interface TransferCounters {
  /** Attachments seen. */
  found: number;
  transferred: number;
  skippedExisting: number;
  skippedDuplicate: number;
  /** Destination reported the name as taken at upload time. */
  skippedRace: number;
  uploadFailed: number;
  sourceUnreachable: number;
  /** TRANSFER decisions taken during a dry run. */
  wouldTransfer: number;
  extensionUnknown: number;
  bytesTransferred: number;
}

const COUNTER_KEYS: Array<keyof TransferCounters> = [
  "found",
  "transferred",
  "skippedExisting",
  "skippedDuplicate",
  "skippedRace",
  "uploadFailed",
  "sourceUnreachable",
  "wouldTransfer",
  "extensionUnknown",
  "bytesTransferred",
];

export function emptyCounters(): TransferCounters {
  return {
    found: 0,
    transferred: 0,
    skippedExisting: 0,
    skippedDuplicate: 0,
    skippedRace: 0,
    uploadFailed: 0,
    sourceUnreachable: 0,
    wouldTransfer: 0,
    extensionUnknown: 0,
    bytesTransferred: 0,
  };
}

/**
 * Accumulator passed explicitly through the pipeline; one per form, summed
 * into the run totals by the orchestrator.
 */
export class TransferStats {
  readonly counters: TransferCounters = emptyCounters();

  recordFound(extensionKnown: boolean): void {
    this.counters.found++;
    if (!extensionKnown) this.counters.extensionUnknown++;
  }

  recordDecision(decision: TransferDecision): void {
    if (decision === "SKIP_EXISTING") this.counters.skippedExisting++;
    else if (decision === "SKIP_DUPLICATE_IN_RUN") this.counters.skippedDuplicate++;
  }

  recordWouldTransfer(): void {
    this.counters.wouldTransfer++;
  }

  recordOutcome(outcome: TransferOutcome, bytes: number): void {
    switch (outcome) {
      case "TRANSFERRED":
        this.counters.transferred++;
        break;
      case "SKIP_EXISTING_RACE":
        this.counters.skippedRace++;
        break;
      case "UPLOAD_FAILED":
        this.counters.uploadFailed++;
        break;
      case "SOURCE_UNREACHABLE":
        this.counters.sourceUnreachable++;
        break;
    }
    this.counters.bytesTransferred += bytes;
  }
}

export function sumCounters(all: TransferCounters[]): TransferCounters {
  const total = emptyCounters();
  for (const counters of all) {
    for (const key of COUNTER_KEYS) {
      total[key] += counters[key];
    }
  }
  return total;
}

export function failedCount(counters: TransferCounters): number {
  return counters.uploadFailed + counters.sourceUnreachable;
}
