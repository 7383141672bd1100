import { randomUUID } from "crypto";
import type { SurveySource } from "@/lib/source/kobo";
import type { SurveyForm, Submission } from "@/lib/source/submissions";
import type { DestinationProvider } from "@/lib/storage/interface";
import { joinRemotePath } from "@/lib/storage/interface";
import type { TransferConfig } from "@/lib/env";
import { SetupError, errorMessage } from "@/lib/errors";
import { createLogger, withFormContext, withRunContext } from "@/lib/logger";
import {
  classifyForm,
  resolveFilename,
  sanitizeColumnFolder,
  sanitizeFolderName,
  type NamingScheme,
} from "./naming";
import { ExistingFileIndex } from "./existing-index";
import { ProcessedSet, decide } from "./decision";
import { TransferExecutor } from "./executor";
import type { SourceUrlStrategy } from "./url-strategies";
import { resolveRunFolder, verifyRunFolder, type RunFolder, type RunVerification } from "./run-folder";
import { TransferStats, emptyCounters, sumCounters, type TransferCounters } from "./stats";

const log = createLogger("engine");

export type EngineSettings = Pick<
  TransferConfig,
  "runFolderPrefix" | "runFolderMaxAgeDays" | "dateColumn" | "typeColumn" | "transferDelayMs"
>;

export interface RunDependencies {
  source: SurveySource;
  /** Must already be connected. */
  destination: DestinationProvider;
  settings: EngineSettings;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  strategies?: readonly SourceUrlStrategy[];
}

export interface RunOptions {
  /** Read, classify and decide, but create no folders and upload nothing. */
  dryRun?: boolean;
}

export type FormStatus = "completed" | "failed";

export interface FormReport {
  uid: string;
  name: string;
  folder: string;
  /** Null when the form failed before its submissions could be classified. */
  scheme: NamingScheme | null;
  submissionCount: number;
  status: FormStatus;
  error?: string;
  counters: TransferCounters;
}

export interface RunReport {
  runId: string;
  runFolder: string;
  reused: boolean;
  dryRun: boolean;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  forms: FormReport[];
  totals: TransferCounters;
  /** Form folders found in the run folder once every form was processed. */
  verification: RunVerification;
}

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

interface RunState {
  deps: RunDependencies;
  executor: TransferExecutor;
  processed: ProcessedSet;
  runFolder: string;
  dryRun: boolean;
}

/**
 * Transfer every attachment of `forms`, one form at a time and one attachment
 * at a time. A form whose submissions or destination folder cannot be read is
 * recorded as failed and the run moves on; only failing to pick the run
 * folder aborts the run.
 */
export async function runTransfer(
  deps: RunDependencies,
  forms: SurveyForm[],
  options: RunOptions = {}
): Promise<RunReport> {
  const now = deps.now ?? (() => new Date());
  const dryRun = options.dryRun ?? false;
  const runId = randomUUID();

  return withRunContext(runId, async () => {
    const startedAt = now();
    log.info("Starting run", { formCount: forms.length, dryRun });

    let runFolder: RunFolder;
    try {
      runFolder = await resolveRunFolder(deps.destination, {
        prefix: deps.settings.runFolderPrefix,
        maxAgeDays: deps.settings.runFolderMaxAgeDays,
        now: startedAt,
        dryRun,
      });
    } catch (err) {
      throw new SetupError(`Could not prepare the run folder: ${errorMessage(err)}`, { cause: err });
    }

    const state: RunState = {
      deps,
      executor: new TransferExecutor(deps.source, deps.destination, deps.strategies),
      processed: new ProcessedSet(),
      runFolder: runFolder.name,
      dryRun,
    };

    const reports: FormReport[] = [];
    for (const form of forms) {
      reports.push(await withFormContext(form.uid, () => processForm(state, form)));
    }

    const verification = await verifyRunFolder(deps.destination, runFolder.name);

    const completedAt = now();
    const totals = sumCounters(reports.map((r) => r.counters));
    const durationMs = completedAt.getTime() - startedAt.getTime();
    log.info("Run completed", {
      runFolder: runFolder.name,
      formsFailed: reports.filter((r) => r.status === "failed").length,
      transferred: totals.transferred,
      bytesTransferred: totals.bytesTransferred,
      durationMs,
    });

    return {
      runId,
      runFolder: runFolder.name,
      reused: runFolder.reused,
      dryRun,
      startedAt,
      completedAt,
      durationMs,
      forms: reports,
      totals,
      verification,
    };
  });
}

async function processForm(state: RunState, form: SurveyForm): Promise<FormReport> {
  const { source, destination, settings } = state.deps;
  const folder = joinRemotePath(state.runFolder, sanitizeFolderName(form.name));
  const report: FormReport = {
    uid: form.uid,
    name: form.name,
    folder,
    scheme: null,
    submissionCount: 0,
    status: "completed",
    counters: emptyCounters(),
  };
  const fail = (stage: string, err: unknown): FormReport => {
    log.error(`Form skipped — ${stage} failed`, { formName: form.name, error: err });
    return { ...report, status: "failed", error: `${stage}: ${errorMessage(err)}` };
  };

  log.info("Processing form", { formName: form.name, folder });

  let submissions: Submission[];
  try {
    submissions = await source.listSubmissions(form.uid);
  } catch (err) {
    return fail("fetching submissions", err);
  }
  report.submissionCount = submissions.length;

  const naming = classifyForm(submissions, {
    dateColumn: settings.dateColumn,
    typeColumn: settings.typeColumn,
  });
  report.scheme = naming.scheme;
  log.info("Naming scheme chosen", { scheme: naming.scheme, submissionCount: submissions.length });

  let index: ExistingFileIndex;
  try {
    if (!state.dryRun) await destination.createDirectory(folder);
    index = await ExistingFileIndex.build(destination, folder);
  } catch (err) {
    return fail("reading destination folder", err);
  }

  const stats = new TransferStats();
  report.counters = stats.counters;
  const createdFolders = new Set<string>();

  for (const submission of submissions) {
    for (const [i, attachment] of submission.attachments.entries()) {
      const resolved = resolveFilename(naming, submission, attachment, i);
      stats.recordFound(resolved.extensionKnown);
      if (!resolved.extensionKnown) {
        log.warn("Attachment extension unknown", { row: submission.rowNumber, fileName: attachment.fileName });
      }

      const decision = decide(form.uid, resolved, index, state.processed);
      stats.recordDecision(decision);
      if (decision !== "TRANSFER") {
        log.debug("Skipping attachment", { filename: resolved.filename, decision });
        continue;
      }

      const columnFolder = joinRemotePath(folder, sanitizeColumnFolder(attachment.column));
      const destinationPath = joinRemotePath(columnFolder, resolved.filename);
      if (state.dryRun) {
        stats.recordWouldTransfer();
        log.info("Would transfer", { destinationPath });
        continue;
      }

      if (!createdFolders.has(columnFolder)) {
        try {
          await destination.createDirectory(columnFolder);
          createdFolders.add(columnFolder);
        } catch (err) {
          log.error("Column folder could not be created", { columnFolder, error: err });
          stats.recordOutcome("UPLOAD_FAILED", 0);
          continue;
        }
      }

      await state.executor.transfer(
        { formUid: form.uid, submission, attachment, destinationPath },
        stats
      );

      if (settings.transferDelayMs > 0) {
        await (state.deps.sleep ?? defaultSleep)(settings.transferDelayMs);
      }
    }
  }

  log.info("Form completed", { formName: form.name, ...stats.counters });
  return report;
}
