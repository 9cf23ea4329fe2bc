import { isCommandAvailable, runCommand, type CommandRunner } from "./commandUtils.js";
import { ContainerCommandError, UpdaterError, toErrorMessage } from "./errors.js";

export interface ContainerRuntimeClient {
  readonly description: string;
  /** Resolves to null when no image with a recorded digest exists locally. */
  inspectLocalDigest(imageRef: string, tag: string): Promise<string | null>;
  pullImage(imageRef: string, tag: string): Promise<void>;
  restartService(serviceName: string): Promise<void>;
}

export interface ComposeInvocation {
  command: string;
  baseArgs: string[];
}

export interface DockerCliRuntimeConfig {
  dockerBinary: string;
  compose: ComposeInvocation;
  composeFilePath?: string;
  commandTimeoutMs: number;
}

export interface RuntimeProbeConfig {
  dockerBinary: string;
  composeFilePath?: string;
  commandTimeoutMs: number;
}

export interface RuntimeProbe {
  isCommandAvailable(command: string): Promise<boolean>;
  run: CommandRunner;
}

const defaultProbe: RuntimeProbe = {
  isCommandAvailable,
  run: runCommand
};

const probeTimeoutMs = 10_000;
const legacyComposeBinary = "docker-compose";

export class DockerCliRuntime implements ContainerRuntimeClient {
  constructor(
    private readonly config: DockerCliRuntimeConfig,
    private readonly run: CommandRunner = runCommand
  ) {}

  get description(): string {
    return [this.config.compose.command, ...this.config.compose.baseArgs].join(" ");
  }

  private async exec(command: string, args: string[], label: string): Promise<string> {
    try {
      const { stdout } = await this.run(command, args, this.config.commandTimeoutMs);
      return stdout;
    } catch (error) {
      throw new ContainerCommandError(label, toErrorMessage(error));
    }
  }

  async inspectLocalDigest(imageRef: string, tag: string): Promise<string | null> {
    const reference = `${imageRef}:${tag}`;
    const stdout = await this.exec(
      this.config.dockerBinary,
      ["images", "--digests", "--format", "{{.Digest}}", reference],
      `docker images ${reference}`
    );

    const firstLine = stdout.split(/\r?\n/).map((line) => line.trim())[0] ?? "";
    if (firstLine.length === 0 || firstLine === "<none>") {
      return null;
    }
    return firstLine;
  }

  async pullImage(imageRef: string, tag: string): Promise<void> {
    const reference = `${imageRef}:${tag}`;
    await this.exec(this.config.dockerBinary, ["pull", reference], `docker pull ${reference}`);
  }

  async restartService(serviceName: string): Promise<void> {
    const { command, baseArgs } = this.config.compose;
    const fileArgs = this.config.composeFilePath ? ["-f", this.config.composeFilePath] : [];
    const commandArgs = ["up", "-d", serviceName];
    await this.exec(command, [...baseArgs, ...fileArgs, ...commandArgs], `${this.description} ${commandArgs.join(" ")}`);
  }
}

async function detectComposeInvocation(dockerBinary: string, probe: RuntimeProbe): Promise<ComposeInvocation | null> {
  try {
    await probe.run(dockerBinary, ["compose", "version"], probeTimeoutMs);
    return { command: dockerBinary, baseArgs: ["compose"] };
  } catch {
    // Compose plugin missing; fall through to the standalone binary.
  }

  if (await probe.isCommandAvailable(legacyComposeBinary)) {
    return { command: legacyComposeBinary, baseArgs: [] };
  }

  return null;
}

/**
 * Picks the docker and compose invocations once at startup so call sites never
 * branch on which tooling is installed.
 */
export async function detectContainerRuntime(
  config: RuntimeProbeConfig,
  probe: RuntimeProbe = defaultProbe
): Promise<DockerCliRuntime> {
  if (!(await probe.isCommandAvailable(config.dockerBinary))) {
    throw new UpdaterError("missing_dependency", `Missing dependencies: ${config.dockerBinary}`);
  }

  const compose = await detectComposeInvocation(config.dockerBinary, probe);
  if (!compose) {
    throw new UpdaterError(
      "missing_dependency",
      `Missing dependencies: docker compose plugin or ${legacyComposeBinary}`
    );
  }

  return new DockerCliRuntime(
    {
      dockerBinary: config.dockerBinary,
      compose,
      composeFilePath: config.composeFilePath,
      commandTimeoutMs: config.commandTimeoutMs
    },
    probe.run
  );
}
