import pc from "picocolors";

import type { CheckSummary, DigestComparison, TrackedService, UpdateSummary } from "./types.js";

export type UpdaterEvent =
  | { type: "check_started"; service: TrackedService }
  | { type: "check_finished"; comparison: DigestComparison }
  | { type: "update_started"; service: TrackedService }
  | { type: "dry_run"; service: TrackedService; reference: string }
  | { type: "pull_started"; service: TrackedService; reference: string }
  | { type: "pull_finished"; service: TrackedService; reference: string; error: string | null }
  | { type: "restart_started"; service: TrackedService }
  | { type: "restart_finished"; service: TrackedService; error: string | null }
  | { type: "no_update_needed"; service: TrackedService }
  | { type: "check_summary"; summary: CheckSummary }
  | { type: "update_summary"; summary: UpdateSummary };

export interface UpdateReporter {
  report(event: UpdaterEvent): void;
}

export type ReportTone = "info" | "success" | "warn" | "error" | "muted";

export interface ReportLine {
  tone: ReportTone;
  text: string;
}

export const silentReporter: UpdateReporter = {
  report: () => undefined
};

function line(tone: ReportTone, text: string): ReportLine {
  return { tone, text };
}

function describeComparison(comparison: DigestComparison, verbose: boolean): ReportLine[] {
  switch (comparison.outcome) {
    case "up_to_date":
      return [line("success", "  ✅ Up to date")];
    case "update_available": {
      const lines = [line("warn", "  🆕 Update available")];
      if (verbose) {
        lines.push(line("muted", `     Local:  ${comparison.localDigest ?? "-"}`));
        lines.push(line("muted", `     Remote: ${comparison.remoteDigest ?? "-"}`));
      }
      return lines;
    }
    case "not_found_locally":
      return [line("warn", "  📥 Image not found locally - will be pulled")];
    case "network_error":
      return [line("error", "  ⚠️  Network error - could not reach the registry")];
    case "parse_error":
      return [line("error", "  ⚠️  Could not parse the registry response")];
  }
}

export function describeEvent(event: UpdaterEvent, verbose = false): ReportLine[] {
  switch (event.type) {
    case "check_started":
      return [line("info", `🔍 Checking ${event.service.serviceName} (${event.service.imageRef})...`)];
    case "check_finished":
      return describeComparison(event.comparison, verbose);
    case "update_started":
      return [line("info", `🔄 Updating ${event.service.serviceName}...`)];
    case "dry_run":
      return [
        line("warn", `  [DRY RUN] Would pull ${event.reference}`),
        line("warn", `  [DRY RUN] Would restart service: ${event.service.serviceName}`)
      ];
    case "pull_started":
      return [line("info", "  📥 Pulling latest image...")];
    case "pull_finished":
      return event.error === null
        ? [line("success", "  ✅ Image pulled successfully")]
        : [line("error", "  ❌ Failed to pull image"), ...(verbose ? [line("muted", `     ${event.error}`)] : [])];
    case "restart_started":
      return [line("info", "  🔄 Restarting service...")];
    case "restart_finished":
      return event.error === null
        ? [line("success", "  ✅ Service restarted successfully")]
        : [line("error", "  ❌ Failed to restart service"), ...(verbose ? [line("muted", `     ${event.error}`)] : [])];
    case "no_update_needed":
      return [line("success", `No update needed for ${event.service.serviceName}`)];
    case "check_summary": {
      const { summary } = event;
      const lines = [
        line("info", "📊 Summary:"),
        line("info", `   Updates available: ${summary.updatesAvailable}`),
        line("info", `   Up to date: ${summary.upToDate}`),
        line("info", `   Errors: ${summary.errors}`)
      ];
      if (summary.updatesAvailable > 0) {
        lines.push(line("warn", `Services with updates: ${summary.servicesToUpdate.join(" ")}`));
        lines.push(line("info", "Run with --update-all to update all services"));
      }
      return lines;
    }
    case "update_summary":
      return [
        line("info", "📊 Update Summary:"),
        line("info", `   Updated: ${event.summary.updated}`),
        line("info", `   Failed: ${event.summary.failed}`)
      ];
  }
}

const tonePainters: Record<ReportTone, (text: string) => string> = {
  info: pc.blue,
  success: pc.green,
  warn: pc.yellow,
  error: pc.red,
  muted: pc.dim
};

export class ConsoleReporter implements UpdateReporter {
  constructor(
    private readonly verbose = false,
    private readonly write: (text: string) => void = (text) => console.log(text)
  ) {}

  report(event: UpdaterEvent): void {
    for (const entry of describeEvent(event, this.verbose)) {
      this.write(tonePainters[entry.tone](entry.text));
    }
    if (event.type === "check_finished") {
      this.write("");
    }
  }
}
