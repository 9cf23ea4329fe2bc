import type { ContainerRuntimeClient } from "./containerRuntime.js";
import { RegistryLookupError, UpdaterError, toErrorMessage } from "./errors.js";
import type { OperationLogSink } from "./operationLog.js";
import type { RegistryClient } from "./registry.js";
import { silentReporter, type UpdateReporter, type UpdaterEvent } from "./reporter.js";
import type {
  CheckOutcome,
  CheckSummary,
  DigestComparison,
  TrackedService,
  UpdateAllResult,
  UpdateResult,
  UpdateSummary
} from "./types.js";

export interface RegistryUpdateOrchestratorOptions {
  services: readonly TrackedService[];
  tag?: string;
  registry: RegistryClient;
  runtime: ContainerRuntimeClient;
  log: OperationLogSink;
  reporter?: UpdateReporter;
  /** Upper bound on parallel checks. Updates always run one at a time. */
  concurrency?: number;
}

export interface CheckRunResult {
  comparisons: DigestComparison[];
  summary: CheckSummary;
}

const defaultTag = "latest";

export function needsUpdate(outcome: CheckOutcome): boolean {
  return outcome === "update_available" || outcome === "not_found_locally";
}

export function summarizeComparisons(comparisons: readonly DigestComparison[]): CheckSummary {
  const summary: CheckSummary = { updatesAvailable: 0, upToDate: 0, errors: 0, servicesToUpdate: [] };
  for (const comparison of comparisons) {
    if (needsUpdate(comparison.outcome)) {
      summary.updatesAvailable += 1;
      summary.servicesToUpdate.push(comparison.service.serviceName);
    } else if (comparison.outcome === "up_to_date") {
      summary.upToDate += 1;
    } else {
      summary.errors += 1;
    }
  }
  return summary;
}

export function summarizeResults(results: readonly UpdateResult[]): UpdateSummary {
  const summary: UpdateSummary = { updated: 0, failed: 0, skipped: 0 };
  for (const result of results) {
    if (result.skipped) {
      summary.skipped += 1;
    } else if (result.error === null) {
      summary.updated += 1;
    } else {
      summary.failed += 1;
    }
  }
  return summary;
}

async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let nextIndex = 0;

  const runWorker = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex;
      nextIndex += 1;
      const item = items[index];
      if (item !== undefined) {
        results[index] = await worker(item);
      }
    }
  };

  const workerCount = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => runWorker()));
  return results;
}

function skippedResult(comparison: DigestComparison): UpdateResult {
  return {
    service: comparison.service,
    outcome: comparison.outcome,
    pulled: false,
    restarted: false,
    skipped: true,
    dryRun: false,
    error: comparison.outcome === "up_to_date" ? null : comparison.error ?? null
  };
}

export class RegistryUpdateOrchestrator {
  private readonly tag: string;
  private readonly reporter: UpdateReporter;
  private readonly concurrency: number;

  constructor(private readonly options: RegistryUpdateOrchestratorOptions) {
    this.tag = options.tag?.trim() || defaultTag;
    this.reporter = options.reporter ?? silentReporter;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  }

  private emit(event: UpdaterEvent): void {
    this.reporter.report(event);
  }

  private log(message: string): Promise<void> {
    return this.options.log.append(message);
  }

  private reference(service: TrackedService): string {
    return `${service.imageRef}:${this.tag}`;
  }

  findService(serviceName: string): TrackedService {
    const match = this.options.services.find((service) => service.serviceName === serviceName.trim());
    if (!match) {
      const available = this.options.services.map((service) => service.serviceName).join(", ");
      throw new UpdaterError("unknown_service", `Service '${serviceName}' not found. Available services: ${available}`);
    }
    return match;
  }

  private assertTracked(service: TrackedService): void {
    const tracked = this.findService(service.serviceName);
    if (tracked.imageRef !== service.imageRef) {
      throw new UpdaterError(
        "unknown_service",
        `Service '${service.serviceName}' is tracked with image ${tracked.imageRef}, not ${service.imageRef}.`
      );
    }
  }

  async checkService(service: TrackedService): Promise<DigestComparison> {
    // Parallel checks finish out of order; keep each heading next to its outcome.
    const reportTogether = this.concurrency > 1;
    if (!reportTogether) {
      this.emit({ type: "check_started", service });
    }
    const comparison = await this.compare(service);
    if (reportTogether) {
      this.emit({ type: "check_started", service });
    }
    this.emit({ type: "check_finished", comparison });
    return comparison;
  }

  private async compare(service: TrackedService): Promise<DigestComparison> {
    const { imageRef } = service;
    await this.log(`Checking registry for ${this.reference(service)}`);

    let remoteDigest: string;
    try {
      remoteDigest = await this.options.registry.fetchRemoteDigest(imageRef, this.tag);
    } catch (error) {
      const message = toErrorMessage(error);
      const outcome: CheckOutcome =
        error instanceof RegistryLookupError && error.kind === "parse" ? "parse_error" : "network_error";
      const label = outcome === "parse_error" ? "Parse error" : "Network error";
      await this.log(`ERROR: ${label} checking ${imageRef}: ${message}`);
      return { service, remoteDigest: null, localDigest: null, outcome, error: message };
    }

    let localDigest: string | null;
    let inspectError: string | undefined;
    try {
      localDigest = await this.options.runtime.inspectLocalDigest(imageRef, this.tag);
    } catch (error) {
      localDigest = null;
      inspectError = toErrorMessage(error);
      await this.log(`WARN: Could not inspect local image ${this.reference(service)}: ${inspectError}`);
    }

    if (localDigest === null) {
      await this.log(`INFO: ${imageRef} not found locally`);
      return {
        service,
        remoteDigest,
        localDigest: null,
        outcome: "not_found_locally",
        ...(inspectError ? { error: inspectError } : {})
      };
    }

    if (remoteDigest === localDigest) {
      await this.log(`INFO: ${imageRef} is up to date`);
      return { service, remoteDigest, localDigest, outcome: "up_to_date" };
    }

    await this.log(`INFO: Update available for ${imageRef}`);
    return { service, remoteDigest, localDigest, outcome: "update_available" };
  }

  checkAll(): Promise<DigestComparison[]> {
    return mapWithConcurrency(this.options.services, this.concurrency, (service) => this.checkService(service));
  }

  async runCheck(): Promise<CheckRunResult> {
    const comparisons = await this.checkAll();
    const summary = summarizeComparisons(comparisons);
    this.emit({ type: "check_summary", summary });
    await this.log(
      `SUMMARY: ${summary.updatesAvailable} updates, ${summary.upToDate} up-to-date, ${summary.errors} errors`
    );
    return { comparisons, summary };
  }

  async updateService(service: TrackedService, dryRun: boolean): Promise<UpdateResult> {
    this.assertTracked(service);
    return this.applyUpdate(service, dryRun, "update_available");
  }

  private async applyUpdate(service: TrackedService, dryRun: boolean, outcome: CheckOutcome): Promise<UpdateResult> {
    const reference = this.reference(service);
    const result: UpdateResult = {
      service,
      outcome,
      pulled: false,
      restarted: false,
      skipped: false,
      dryRun,
      error: null
    };

    this.emit({ type: "update_started", service });

    if (dryRun) {
      this.emit({ type: "dry_run", service, reference });
      await this.log(`DRY RUN: Would pull ${reference}`);
      await this.log(`DRY RUN: Would restart service ${service.serviceName}`);
      return result;
    }

    this.emit({ type: "pull_started", service, reference });
    await this.log(`INFO: Pulling ${reference}`);
    try {
      await this.options.runtime.pullImage(service.imageRef, this.tag);
    } catch (error) {
      result.error = toErrorMessage(error);
      this.emit({ type: "pull_finished", service, reference, error: result.error });
      await this.log(`ERROR: Failed to pull ${reference}: ${result.error}`);
      return result;
    }
    result.pulled = true;
    this.emit({ type: "pull_finished", service, reference, error: null });
    await this.log(`SUCCESS: Pulled ${reference}`);

    this.emit({ type: "restart_started", service });
    await this.log(`INFO: Restarting service ${service.serviceName}`);
    try {
      await this.options.runtime.restartService(service.serviceName);
    } catch (error) {
      result.error = toErrorMessage(error);
      this.emit({ type: "restart_finished", service, error: result.error });
      await this.log(`ERROR: Failed to restart service ${service.serviceName}: ${result.error}`);
      return result;
    }
    result.restarted = true;
    this.emit({ type: "restart_finished", service, error: null });
    await this.log(`SUCCESS: Restarted service ${service.serviceName}`);

    return result;
  }

  async updateAll(dryRun: boolean): Promise<UpdateAllResult> {
    const comparisons = await this.checkAll();
    const results: UpdateResult[] = [];

    for (const comparison of comparisons) {
      results.push(
        needsUpdate(comparison.outcome)
          ? await this.applyUpdate(comparison.service, dryRun, comparison.outcome)
          : skippedResult(comparison)
      );
    }

    const summary = summarizeResults(results);
    this.emit({ type: "update_summary", summary });
    await this.log(`UPDATE_SUMMARY: ${summary.updated} updated, ${summary.failed} failed`);
    return { results, summary };
  }

  async updateOne(serviceName: string, dryRun: boolean): Promise<UpdateResult> {
    const service = this.findService(serviceName);
    const comparison = await this.checkService(service);

    if (needsUpdate(comparison.outcome)) {
      return this.applyUpdate(service, dryRun, comparison.outcome);
    }

    if (comparison.outcome === "up_to_date") {
      this.emit({ type: "no_update_needed", service });
      await this.log(`INFO: No update needed for ${service.serviceName}`);
    }
    return skippedResult(comparison);
  }
}
