import fs from "node:fs";
import path from "node:path";
import { ZodError, z } from "zod";

import { UpdaterError } from "./errors.js";
import type { DigestSource, TrackedService } from "./types.js";

export interface UpdaterRuntimeConfig {
  services: readonly TrackedService[];
  tag: string;
  registryBaseUrl: string;
  connectTimeoutMs: number;
  requestTimeoutMs: number;
  commandTimeoutMs: number;
  checkConcurrency: number;
  platform?: string;
  digestSource: DigestSource;
  dockerBinary: string;
  composeFilePath?: string;
  logFilePath: string;
  verbose: boolean;
  port: number;
  authToken: string;
  corsOrigins: string[];
  allowAnyCorsOrigin: boolean;
}

export interface ResolveConfigOptions {
  servicesFilePath?: string;
  cwd?: string;
}

const defaultPort = 8788;
const defaultTag = "latest";
const defaultServicesFile = "hubwatch.services.json";
const defaultLogFile = "check-updates.log";
const defaultRegistryBaseUrl = "https://hub.docker.com";
const truthyEnvValues = new Set(["1", "true", "yes", "on"]);
const falsyEnvValues = new Set(["0", "false", "no", "off"]);

// Docker Hub repository path, optionally namespaced; no registry host, tag or digest.
const imageRefPattern = /^[a-z0-9]+(?:[._-][a-z0-9]+)*(?:\/[a-z0-9]+(?:[._-][a-z0-9]+)*)?$/;
const platformPattern = /^[a-z0-9]+\/[a-z0-9_]+(?:\/[a-z0-9]+)?$/;

const servicesFileSchema = z.object({
  tag: z.string().trim().min(1).optional(),
  services: z
    .array(
      z.object({
        image: z.string().trim().min(1),
        service: z.string().trim().min(1)
      })
    )
    .min(1)
});

type ServicesFile = z.infer<typeof servicesFileSchema>;

function parsePort(raw: string | undefined): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed) || parsed < 1 || parsed > 65535) {
    return defaultPort;
  }
  return parsed;
}

function parseIntEnv(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.max(min, Math.min(max, parsed));
}

export function parseBooleanEnv(raw: string | undefined, fallback: boolean): boolean {
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (truthyEnvValues.has(normalized)) {
    return true;
  }
  if (falsyEnvValues.has(normalized)) {
    return false;
  }

  return fallback;
}

function parseCorsOrigins(raw: string | undefined): {
  corsOrigins: string[];
  allowAnyCorsOrigin: boolean;
} {
  const configured = (raw ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  const corsOrigins = configured.length > 0 ? configured : ["http://localhost:5173", "http://127.0.0.1:5173"];

  return {
    corsOrigins,
    allowAnyCorsOrigin: corsOrigins.includes("*")
  };
}

function normalizeDigestSource(raw: string | undefined): DigestSource {
  return raw?.trim().toLowerCase() === "index" ? "index" : "first-image";
}

function normalizePlatform(raw: string | undefined): string | undefined {
  const trimmed = (raw ?? "").trim().toLowerCase();
  if (trimmed.length === 0) {
    return undefined;
  }
  if (!platformPattern.test(trimmed)) {
    throw new UpdaterError("invalid_config", `UPDATER_PLATFORM "${raw}" must look like os/arch or os/arch/variant.`);
  }
  return trimmed;
}

function normalizeBaseUrl(raw: string | undefined): string {
  const trimmed = (raw ?? "").trim();
  if (trimmed.length === 0) {
    return defaultRegistryBaseUrl;
  }

  try {
    return new URL(trimmed).toString().replace(/\/+$/, "");
  } catch {
    throw new UpdaterError("invalid_config", `UPDATER_REGISTRY_URL "${trimmed}" is not a valid URL.`);
  }
}

export function parseInlineServices(raw: string): Array<{ image: string; service: string }> {
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const separator = entry.indexOf("=");
      if (separator <= 0 || separator === entry.length - 1) {
        throw new UpdaterError("invalid_config", `UPDATER_SERVICES entry "${entry}" must be written as image=service.`);
      }
      return {
        image: entry.slice(0, separator).trim(),
        service: entry.slice(separator + 1).trim()
      };
    });
}

function readServicesFile(filePath: string): ServicesFile | null {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch {
    return null;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw) as unknown;
  } catch {
    throw new UpdaterError("invalid_config", `Services file ${filePath} is not valid JSON.`);
  }

  try {
    return servicesFileSchema.parse(payload);
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
      throw new UpdaterError("invalid_config", `Services file ${filePath} is invalid: ${details}`);
    }
    throw error;
  }
}

/**
 * Validates and freezes the tracked list. Both the image reference and the
 * service name must be unique so that either one identifies the pair.
 */
export function buildTrackedServices(entries: Array<{ image: string; service: string }>): readonly TrackedService[] {
  const seenImages = new Set<string>();
  const seenServices = new Set<string>();
  const services: TrackedService[] = [];

  for (const entry of entries) {
    const imageRef = entry.image.trim().toLowerCase();
    const serviceName = entry.service.trim();

    if (!imageRefPattern.test(imageRef)) {
      throw new UpdaterError(
        "invalid_config",
        `Image "${entry.image}" must be a Docker Hub repository such as "namespace/name", without tag or digest.`
      );
    }
    if (serviceName.length === 0) {
      throw new UpdaterError("invalid_config", `Image "${imageRef}" has an empty service name.`);
    }
    if (seenImages.has(imageRef)) {
      throw new UpdaterError("invalid_config", `Image "${imageRef}" is tracked more than once.`);
    }
    if (seenServices.has(serviceName)) {
      throw new UpdaterError("invalid_config", `Service "${serviceName}" is tracked more than once.`);
    }

    seenImages.add(imageRef);
    seenServices.add(serviceName);
    services.push(Object.freeze({ imageRef, serviceName }));
  }

  if (services.length === 0) {
    throw new UpdaterError("invalid_config", "No tracked services configured.");
  }

  return Object.freeze(services);
}

export function resolveUpdaterRuntimeConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: ResolveConfigOptions = {}
): UpdaterRuntimeConfig {
  const cwd = options.cwd ?? process.cwd();
  const { corsOrigins, allowAnyCorsOrigin } = parseCorsOrigins(env.UPDATER_CORS_ORIGINS);

  const servicesFilePath = path.resolve(
    cwd,
    (options.servicesFilePath ?? env.UPDATER_SERVICES_FILE ?? defaultServicesFile).trim() || defaultServicesFile
  );
  const inlineServices = (env.UPDATER_SERVICES ?? "").trim();
  const servicesFile = inlineServices.length > 0 && !options.servicesFilePath ? null : readServicesFile(servicesFilePath);
  if (options.servicesFilePath && !servicesFile) {
    throw new UpdaterError("invalid_config", `Services file ${servicesFilePath} could not be read.`);
  }

  let entries: Array<{ image: string; service: string }>;
  if (servicesFile) {
    entries = servicesFile.services;
  } else if (inlineServices.length > 0) {
    entries = parseInlineServices(inlineServices);
  } else {
    throw new UpdaterError(
      "invalid_config",
      `No tracked services configured: create ${servicesFilePath} or set UPDATER_SERVICES.`
    );
  }

  const composeFile = (env.UPDATER_COMPOSE_FILE ?? "").trim();

  return {
    services: buildTrackedServices(entries),
    tag: (env.UPDATER_TAG ?? "").trim() || servicesFile?.tag || defaultTag,
    registryBaseUrl: normalizeBaseUrl(env.UPDATER_REGISTRY_URL),
    connectTimeoutMs: parseIntEnv(env.UPDATER_CONNECT_TIMEOUT_MS, 5_000, 1_000, 60_000),
    requestTimeoutMs: parseIntEnv(env.UPDATER_REQUEST_TIMEOUT_MS, 10_000, 1_000, 120_000),
    commandTimeoutMs: parseIntEnv(env.UPDATER_COMMAND_TIMEOUT_MS, 300_000, 5_000, 3_600_000),
    checkConcurrency: parseIntEnv(env.UPDATER_CHECK_CONCURRENCY, 1, 1, 16),
    platform: normalizePlatform(env.UPDATER_PLATFORM),
    digestSource: normalizeDigestSource(env.UPDATER_DIGEST_SOURCE),
    dockerBinary: (env.UPDATER_DOCKER_BINARY ?? "docker").trim() || "docker",
    composeFilePath: composeFile.length > 0 ? path.resolve(cwd, composeFile) : undefined,
    logFilePath: path.resolve(cwd, (env.UPDATER_LOG_FILE ?? defaultLogFile).trim() || defaultLogFile),
    verbose: parseBooleanEnv(env.UPDATER_VERBOSE, false),
    port: parsePort(env.UPDATER_PORT),
    authToken: (env.UPDATER_AUTH_TOKEN ?? "").trim(),
    corsOrigins,
    allowAnyCorsOrigin
  };
}

export function assertServeConfig(config: UpdaterRuntimeConfig): void {
  if (config.authToken.length === 0) {
    throw new UpdaterError("invalid_config", "UPDATER_AUTH_TOKEN is required to serve the update API.");
  }
}
