import { z } from "zod";

import { RegistryLookupError, toErrorMessage } from "./errors.js";
import type { DigestSource } from "./types.js";

export interface RegistryClient {
  fetchRemoteDigest(imageRef: string, tag: string): Promise<string>;
}

export interface DockerHubRegistryConfig {
  baseUrl: string;
  connectTimeoutMs: number;
  requestTimeoutMs: number;
  platform?: string;
  digestSource?: DigestSource;
}

const digestPattern = /^[a-z0-9]+(?:[+._-][a-z0-9]+)*:[a-zA-Z0-9=_-]+$/;

const tagImageSchema = z.object({
  digest: z.string().nullish(),
  os: z.string().nullish(),
  architecture: z.string().nullish(),
  variant: z.string().nullish()
});

const tagMetadataSchema = z.object({
  digest: z.string().nullish(),
  images: z.array(tagImageSchema).nullish()
});

type TagMetadata = z.infer<typeof tagMetadataSchema>;
type TagImage = z.infer<typeof tagImageSchema>;

function isTransientStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

export function buildTagMetadataUrl(baseUrl: string, imageRef: string, tag: string): string {
  const segments = imageRef.trim().split("/");
  const [namespace, repository] = segments.length === 1 ? ["library", segments[0] ?? ""] : segments;
  return `${baseUrl.replace(/\/+$/, "")}/v2/repositories/${encodeURIComponent(namespace ?? "")}/${encodeURIComponent(
    repository ?? ""
  )}/tags/${encodeURIComponent(tag)}/`;
}

function platformOf(image: TagImage): string {
  return [image.os, image.architecture, image.variant]
    .filter((part): part is string => typeof part === "string" && part.trim().length > 0)
    .map((part) => part.trim().toLowerCase())
    .join("/");
}

function normalizeDigest(raw: string | null | undefined): string | null {
  const trimmed = (raw ?? "").trim();
  return digestPattern.test(trimmed) ? trimmed : null;
}

/**
 * Picks the digest to compare against the local image. Without a platform or
 * digest source this is the first architecture entry, which is what a
 * single-arch image reports locally but not necessarily what a multi-arch
 * pull records.
 */
export function selectDigest(
  metadata: TagMetadata,
  options: Pick<DockerHubRegistryConfig, "platform" | "digestSource"> = {}
): string | null {
  if (options.digestSource === "index") {
    return normalizeDigest(metadata.digest);
  }

  const images = metadata.images ?? [];
  if (options.platform) {
    const wanted = options.platform.toLowerCase();
    const exact = images.find((image) => platformOf(image) === wanted);
    // "linux/arm64" also matches an entry that reports variant "v8".
    const loose = exact ?? images.find((image) => platformOf(image).startsWith(`${wanted}/`));
    return normalizeDigest(loose?.digest);
  }

  return normalizeDigest(images[0]?.digest);
}

export class DockerHubRegistryClient implements RegistryClient {
  constructor(private readonly config: DockerHubRegistryConfig) {}

  async fetchRemoteDigest(imageRef: string, tag: string): Promise<string> {
    const url = buildTagMetadataUrl(this.config.baseUrl, imageRef, tag);
    const payload = await this.fetchJson(url, `${imageRef}:${tag}`);

    const parsed = tagMetadataSchema.safeParse(payload);
    if (!parsed.success) {
      throw new RegistryLookupError("parse", `Unexpected tag metadata shape for ${imageRef}:${tag}.`);
    }

    const digest = selectDigest(parsed.data, this.config);
    if (!digest) {
      const scope = this.config.platform ? ` for platform ${this.config.platform}` : "";
      throw new RegistryLookupError("parse", `No digest found${scope} in tag metadata for ${imageRef}:${tag}.`);
    }

    return digest;
  }

  private async fetchJson(url: string, reference: string): Promise<unknown> {
    const { connectTimeoutMs, requestTimeoutMs } = this.config;
    const controller = new AbortController();
    const totalTimeout = setTimeout(() => {
      controller.abort(`Registry lookup timed out after ${requestTimeoutMs}ms`);
    }, requestTimeoutMs);
    const connectTimeout = setTimeout(() => {
      controller.abort(`Registry did not respond within ${connectTimeoutMs}ms`);
    }, connectTimeoutMs);

    let body: string;
    try {
      const response = await fetch(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: controller.signal
      });
      clearTimeout(connectTimeout);

      if (!response.ok) {
        const kind = isTransientStatus(response.status) ? "network" : "parse";
        throw new RegistryLookupError(kind, `Registry lookup for ${reference} failed with ${response.status}.`);
      }

      body = await response.text();
    } catch (error) {
      if (error instanceof RegistryLookupError) {
        throw error;
      }
      const reason = controller.signal.aborted ? String(controller.signal.reason) : toErrorMessage(error);
      throw new RegistryLookupError("network", `Could not reach registry for ${reference}: ${reason}`);
    } finally {
      clearTimeout(connectTimeout);
      clearTimeout(totalTimeout);
    }

    if (body.trim().length === 0) {
      throw new RegistryLookupError("network", `Registry returned an empty response for ${reference}.`);
    }

    try {
      return JSON.parse(body) as unknown;
    } catch {
      throw new RegistryLookupError("parse", `Registry returned invalid JSON for ${reference}.`);
    }
  }
}
