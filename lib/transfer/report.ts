import type { FormReport, RunReport } from "./engine";
import { failedCount } from "./stats";

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms} ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)} s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes} min ${Math.round(seconds - minutes * 60)} s`;
}

function line(label: string, value: string | number): string {
  return `  ${`${label}:`.padEnd(25)}${value}`;
}

function formLine(form: FormReport, dryRun: boolean): string {
  const scheme = form.scheme ?? "-";
  if (form.status === "failed") {
    return `  ${form.name} [${scheme}] FAILED: ${form.error ?? "unknown error"}`;
  }
  const c = form.counters;
  const skipped = c.skippedExisting + c.skippedDuplicate + c.skippedRace;
  const moved = dryRun ? `${c.wouldTransfer} would transfer` : `${c.transferred} transferred`;
  return (
    `  ${form.name} [${scheme}]: ${form.submissionCount} submissions, ` +
    `${c.found} attachments, ${moved}, ${skipped} skipped, ${failedCount(c)} failed`
  );
}

/** Plain-text end-of-run summary printed by the CLI. */
export function formatRunReport(report: RunReport): string {
  const t = report.totals;
  const failedForms = report.forms.filter((f) => f.status === "failed").length;
  const lines = [
    report.dryRun ? "Dry run summary (nothing was uploaded)" : "Transfer summary",
    line("Run folder", `${report.runFolder}${report.reused ? " (reused)" : " (new)"}`),
    line(
      "Form folders",
      report.verification.ok ? report.verification.formFolders : `unavailable (${report.verification.error})`
    ),
    line("Forms", failedForms > 0 ? `${report.forms.length} (${failedForms} failed)` : report.forms.length),
    line("Attachments found", t.found),
  ];

  if (report.dryRun) {
    lines.push(line("Would transfer", t.wouldTransfer));
  } else {
    lines.push(line("Transferred", `${t.transferred} (${formatBytes(t.bytesTransferred)})`));
  }
  lines.push(
    line("Already at destination", t.skippedExisting),
    line("Duplicate in run", t.skippedDuplicate),
    line("Appeared during run", t.skippedRace),
    line("Upload failed", t.uploadFailed),
    line("Source unreachable", t.sourceUnreachable)
  );
  if (t.extensionUnknown > 0) {
    lines.push(line("Unknown extension", t.extensionUnknown));
  }
  lines.push(line("Duration", formatDuration(report.durationMs)));

  if (report.forms.length > 0) {
    lines.push("", "Forms:", ...report.forms.map((f) => formLine(f, report.dryRun)));
  }
  return lines.join("\n");
}
