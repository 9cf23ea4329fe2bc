import { Command, CommanderError } from "commander";
import { nanoid } from "nanoid";
import pc from "picocolors";

import { createUpdaterApp } from "./app.js";
import { assertServeConfig, resolveUpdaterRuntimeConfig, type UpdaterRuntimeConfig } from "./config.js";
import { detectContainerRuntime, type ContainerRuntimeClient } from "./containerRuntime.js";
import { isUpdaterError, toErrorMessage } from "./errors.js";
import { OperationLog } from "./operationLog.js";
import { RegistryUpdateOrchestrator } from "./orchestrator.js";
import { DockerHubRegistryClient, type RegistryClient } from "./registry.js";
import { ConsoleReporter } from "./reporter.js";

export type CliAction = "check" | "update-all" | "update-service" | "serve";

export interface CliOptions {
  action: CliAction;
  targetService?: string;
  dryRun: boolean;
  verbose: boolean;
  configPath?: string;
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  detectRuntime?: (config: UpdaterRuntimeConfig) => Promise<ContainerRuntimeClient>;
  createRegistry?: (config: UpdaterRuntimeConfig) => RegistryClient;
  serve?: (config: UpdaterRuntimeConfig, orchestrator: RegistryUpdateOrchestrator) => Promise<void>;
}

const examples = `
Examples:
  $ hubwatch --check                 Check for updates
  $ hubwatch --update-all            Update all services
  $ hubwatch --update backend        Update only the backend service
  $ hubwatch --dry-run --verbose     Dry run with detailed output`;

function createDockerHubRegistry(config: UpdaterRuntimeConfig): RegistryClient {
  return new DockerHubRegistryClient({
    baseUrl: config.registryBaseUrl,
    connectTimeoutMs: config.connectTimeoutMs,
    requestTimeoutMs: config.requestTimeoutMs,
    platform: config.platform,
    digestSource: config.digestSource
  });
}

function defaultServe(config: UpdaterRuntimeConfig, orchestrator: RegistryUpdateOrchestrator): Promise<void> {
  const app = createUpdaterApp(config, orchestrator);
  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, () => {
      console.info(`[serve] Update API listening on http://localhost:${config.port}`);
      resolve();
    });
    server.once("error", reject);
  });
}

/**
 * Parses argv into a single action. When several action flags are given, the last
 * action flag on the command line wins.
 */
export function parseCliOptions(
  argv: string[],
  output: { stdout: (text: string) => void; stderr: (text: string) => void }
): CliOptions {
  let action: CliAction = "check";
  let targetService: string | undefined;

  const program = new Command();
  program
    .name("hubwatch")
    .description("Check Docker Hub for newer images of tracked services and optionally update them")
    .option("--check", "check for updates only (default)")
    .option("--update-all", "update all services that have updates")
    .option("--update <service>", "update a specific service")
    .option("--serve", "serve the update API over HTTP")
    .option("--dry-run", "show what would be updated without making changes")
    .option("--verbose", "show detailed logging")
    .option("--config <file>", "path to the tracked services file")
    .helpOption("-h, --help", "show this help message")
    .allowExcessArguments(false)
    .showHelpAfterError()
    .addHelpText("after", examples)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => output.stdout(text.replace(/\n$/, "")),
      writeErr: (text) => output.stderr(text.replace(/\n$/, ""))
    });

  program.on("option:check", () => {
    action = "check";
  });
  program.on("option:update-all", () => {
    action = "update-all";
  });
  program.on("option:serve", () => {
    action = "serve";
  });
  program.on("option:update", (value: string) => {
    action = "update-service";
    targetService = value;
  });

  program.parse(argv, { from: "user" });
  const opts = program.opts<{ dryRun?: boolean; verbose?: boolean; config?: string }>();

  return {
    action,
    targetService,
    dryRun: opts.dryRun === true,
    verbose: opts.verbose === true,
    configPath: opts.config
  };
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const stdout = deps.stdout ?? ((text: string) => console.log(text));
  const stderr = deps.stderr ?? ((text: string) => console.error(text));
  const fail = (message: string): number => {
    stderr(pc.red(`❌ ${message}`));
    return 1;
  };

  let options: CliOptions;
  try {
    options = parseCliOptions(argv, { stdout, stderr });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.code === "commander.helpDisplayed" || error.code === "commander.help" ? 0 : 1;
    }
    throw error;
  }

  if (options.action === "update-service" && !options.targetService?.trim()) {
    return fail("Service name required with --update");
  }

  let config: UpdaterRuntimeConfig;
  try {
    config = resolveUpdaterRuntimeConfig(env, { servicesFilePath: options.configPath, cwd: deps.cwd });
  } catch (error) {
    return fail(toErrorMessage(error));
  }

  const verbose = options.verbose || config.verbose;
  const runId = nanoid(10);
  const log = new OperationLog(config.logFilePath, {
    onMessage: verbose ? (message) => stdout(`${pc.blue("[LOG]")} ${message}`) : undefined
  });

  await log.append(`=== Update checker started (run ${runId}) ===`);

  try {
    const runtime = await (deps.detectRuntime ?? detectContainerRuntime)(config);
    const registry = (deps.createRegistry ?? createDockerHubRegistry)(config);

    const orchestrator = new RegistryUpdateOrchestrator({
      services: config.services,
      tag: config.tag,
      registry,
      runtime,
      log,
      reporter: new ConsoleReporter(verbose, stdout),
      concurrency: config.checkConcurrency
    });

    switch (options.action) {
      case "check":
        stdout(pc.blue("🔍 Checking for Docker Hub updates..."));
        stdout("");
        await orchestrator.runCheck();
        break;
      case "update-all":
        stdout(pc.blue("🔄 Checking and updating all services..."));
        stdout("");
        await orchestrator.updateAll(options.dryRun);
        break;
      case "update-service": {
        const serviceName = options.targetService?.trim() ?? "";
        stdout(pc.blue(`🔄 Checking and updating ${serviceName}...`));
        stdout("");
        await orchestrator.updateOne(serviceName, options.dryRun);
        break;
      }
      case "serve":
        assertServeConfig(config);
        await (deps.serve ?? defaultServe)(config, orchestrator);
        await log.append(`=== Update API started (run ${runId}) ===`);
        return 0;
    }
  } catch (error) {
    if (!isUpdaterError(error)) {
      throw error;
    }
    await log.append(`ERROR: ${error.message}`);
    if (error.code === "missing_dependency") {
      stderr(pc.red(`❌ ${error.message}`));
      stderr("Please install missing dependencies and try again.");
      return 1;
    }
    return fail(error.message);
  } finally {
    await log.flush();
  }

  await log.append(`=== Update checker finished (run ${runId}) ===`);
  return 0;
}
