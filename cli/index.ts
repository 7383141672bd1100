#!/usr/bin/env -S npx tsx
import "dotenv/config";
import { Command } from "commander";
import { loadConfig, type TransferConfig } from "@/lib/env";
import { ConfigError, SetupError } from "@/lib/errors";
import { runTransfer } from "@/lib/transfer/engine";
import { formatRunReport } from "@/lib/transfer/report";
import {
  closeSession,
  createSource,
  fetchForms,
  openSession,
  type TransferSession,
} from "@/lib/transfer/session";
import type { SurveyForm } from "@/lib/source/submissions";
import { isRunInProgress, startScheduler, stopScheduler, triggerRun } from "@/lib/scheduler";
import { formatFormList, promptForForms, selectByUid } from "./select-forms";

interface RunCommandOptions {
  all?: boolean;
  form?: string[];
  dryRun?: boolean;
}

async function withSession<T>(
  config: TransferConfig,
  fn: (session: TransferSession) => Promise<T>
): Promise<T> {
  const session = await openSession(config);
  try {
    return await fn(session);
  } finally {
    await closeSession(session);
  }
}

async function transferForms(
  session: TransferSession,
  forms: SurveyForm[],
  dryRun: boolean
): Promise<void> {
  const report = await runTransfer(
    { source: session.source, destination: session.destination, settings: session.config },
    forms,
    { dryRun }
  );
  console.log(`\n${formatRunReport(report)}`);
}

async function actionRun(options: RunCommandOptions): Promise<void> {
  const config = loadConfig();
  await withSession(config, async (session) => {
    const forms = await fetchForms(session.source);
    if (forms.length === 0) {
      console.log("No forms found.");
      return;
    }

    let selected: SurveyForm[] | null;
    if (options.form && options.form.length > 0) {
      const { selected: matched, missing } = selectByUid(forms, options.form);
      if (missing.length > 0) {
        throw new SetupError(`Unknown form uid(s): ${missing.join(", ")}`);
      }
      selected = matched;
    } else if (options.all) {
      selected = forms;
    } else {
      selected = await promptForForms(forms);
    }
    if (!selected) return;

    await transferForms(session, selected, !!options.dryRun);
  });
}

async function actionForms(): Promise<void> {
  const config = loadConfig();
  const forms = await fetchForms(createSource(config));
  console.log(forms.length === 0 ? "No forms found." : formatFormList(forms));
}

async function actionCheck(): Promise<void> {
  const config = loadConfig();
  console.log(`Configuration OK (destination: ${config.destination.kind})`);
  await withSession(config, async (session) => {
    console.log(`Destination reachable (${session.destination.kind})`);
    const forms = await fetchForms(session.source);
    console.log(`Source reachable: ${forms.length} form(s) at ${config.kobo.apiUrl}`);
  });
}

async function actionSchedule(options: { runNow?: boolean; dryRun?: boolean }): Promise<void> {
  const config = loadConfig();
  const job = () =>
    withSession(config, async (session) => {
      const forms = await fetchForms(session.source);
      await transferForms(session, forms, !!options.dryRun);
    });

  startScheduler(config.schedule.cron, config.schedule.timezone, job);
  console.log(`Scheduled "${config.schedule.cron}" (${config.schedule.timezone}). Press Ctrl+C to stop.`);

  // A run in progress is allowed to finish; a second Ctrl+C aborts it.
  const shutdown = () => {
    stopScheduler();
    if (!isRunInProgress()) process.exit(0);
    console.log("Schedule stopped. Waiting for the current run to finish (Ctrl+C again to abort).");
    process.once("SIGINT", () => process.exit(1));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  if (options.runNow) {
    await triggerRun(job, "startup");
  }
}

const program = new Command()
  .name("kobo-media-transfer")
  .description("Copy KoboToolbox submission media into a SharePoint document library")
  .version("1.0.0");

program
  .command("run", { isDefault: true })
  .description("Transfer the attachments of the selected forms")
  .option("-a, --all", "process every form without prompting")
  .option("-f, --form <uid...>", "process the forms with these uids")
  .option("--dry-run", "list what would be transferred without uploading")
  .action(actionRun);

program.command("forms").description("List the forms available to the API token").action(actionForms);

program
  .command("check")
  .description("Verify configuration, destination credentials and source access")
  .action(actionCheck);

program
  .command("schedule")
  .description("Run every form on the configured cron schedule")
  .option("--run-now", "also start a run immediately")
  .option("--dry-run", "scheduled runs upload nothing")
  .action(actionSchedule);

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof ConfigError || err instanceof SetupError) {
    console.error(`\nError: ${err.message}`);
  } else {
    console.error("\nUnexpected error:", err);
  }
  process.exitCode = 1;
});
