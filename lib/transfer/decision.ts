import type { ExistingFileIndex } from "./existing-index";
import type { ResolvedName } from "./naming";

export type TransferDecision = "TRANSFER" | "SKIP_EXISTING" | "SKIP_DUPLICATE_IN_RUN";

/**
 * Names and row+extension keys claimed by a TRANSFER decision during the
 * current run. Keys are scoped by form because row numbers restart per form.
 */
export class ProcessedSet {
  private claimed = new Set<string>();

  has(scope: string, key: string): boolean {
    return this.claimed.has(`${scope}\u0000${key}`);
  }

  add(scope: string, key: string): void {
    this.claimed.add(`${scope}\u0000${key}`);
  }

  get size(): number {
    return this.claimed.size;
  }
}

/**
 * Classify one resolved attachment. A TRANSFER claims the name and its
 * row+extension key before returning, so the claim exists before any upload
 * starts and a slow or failed upload cannot be decided TRANSFER twice.
 */
export function decide(
  scope: string,
  resolved: ResolvedName,
  index: ExistingFileIndex,
  processed: ProcessedSet
): TransferDecision {
  if (processed.has(scope, resolved.filename) || processed.has(scope, resolved.rowKey)) {
    return "SKIP_DUPLICATE_IN_RUN";
  }
  if (index.contains(resolved.filename, resolved.rowNumber, resolved.extension)) {
    return "SKIP_EXISTING";
  }
  processed.add(scope, resolved.filename);
  processed.add(scope, resolved.rowKey);
  return "TRANSFER";
}
