import { afterEach, describe, expect, it, vi } from "vitest";

import { RegistryLookupError } from "../../server/updater/errors.js";
import { DockerHubRegistryClient, buildTagMetadataUrl, selectDigest } from "../../server/updater/registry.js";
import { digestA, digestB, digestC } from "../helpers/updaterFakes.js";

function jsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json" }
  });
}

function createClient(overrides: Partial<ConstructorParameters<typeof DockerHubRegistryClient>[0]> = {}) {
  return new DockerHubRegistryClient({
    baseUrl: "https://hub.docker.com",
    connectTimeoutMs: 5_000,
    requestTimeoutMs: 10_000,
    ...overrides
  });
}

async function captureLookupError(promise: Promise<unknown>): Promise<RegistryLookupError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RegistryLookupError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected the registry lookup to fail.");
}

const multiArchPayload = {
  name: "latest",
  digest: digestC,
  images: [
    { architecture: "amd64", os: "linux", digest: digestA },
    { architecture: "arm64", os: "linux", variant: "v8", digest: digestB }
  ]
};

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("buildTagMetadataUrl", () => {
  it("maps official images to the library namespace", () => {
    expect(buildTagMetadataUrl("https://hub.docker.com", "nginx", "latest")).toBe(
      "https://hub.docker.com/v2/repositories/library/nginx/tags/latest/"
    );
  });

  it("keeps namespaced images and trims trailing slashes", () => {
    expect(buildTagMetadataUrl("http://127.0.0.1:9000/", "example/shop-backend", "1.2")).toBe(
      "http://127.0.0.1:9000/v2/repositories/example/shop-backend/tags/1.2/"
    );
  });
});

describe("selectDigest", () => {
  it("uses the first image entry by default", () => {
    expect(selectDigest(multiArchPayload)).toBe(digestA);
  });

  it("selects by platform, tolerating an omitted variant", () => {
    expect(selectDigest(multiArchPayload, { platform: "linux/arm64" })).toBe(digestB);
    expect(selectDigest(multiArchPayload, { platform: "linux/arm64/v8" })).toBe(digestB);
    expect(selectDigest(multiArchPayload, { platform: "linux/s390x" })).toBeNull();
  });

  it("uses the index digest when asked", () => {
    expect(selectDigest(multiArchPayload, { digestSource: "index" })).toBe(digestC);
  });

  it("ignores values that are not digests", () => {
    expect(selectDigest({ images: [{ digest: "null" }] })).toBeNull();
    expect(selectDigest({ images: [] })).toBeNull();
  });
});

describe("DockerHubRegistryClient", () => {
  it("fetches the digest for a tag", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse(multiArchPayload));
    vi.stubGlobal("fetch", fetchMock);

    await expect(createClient().fetchRemoteDigest("example/shop-backend", "latest")).resolves.toBe(digestA);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      "https://hub.docker.com/v2/repositories/example/shop-backend/tags/latest/"
    );
  });

  it("reports malformed JSON as a parse error", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("{ images: [", { status: 200 })));

    const error = await captureLookupError(createClient().fetchRemoteDigest("example/api", "latest"));
    expect(error.kind).toBe("parse");
    expect(error.message).toBe("Registry returned invalid JSON for example/api:latest.");
  });

  it("reports a payload without digest as a parse error", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ name: "latest", images: [] })));

    const error = await captureLookupError(createClient().fetchRemoteDigest("example/api", "latest"));
    expect(error.kind).toBe("parse");
    expect(error.message).toBe("No digest found in tag metadata for example/api:latest.");
  });

  it("reports an unexpected payload shape as a parse error", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ images: "none" })));

    const error = await captureLookupError(createClient().fetchRemoteDigest("example/api", "latest"));
    expect(error.kind).toBe("parse");
  });

  it("treats a missing tag as a parse error and server failures as network errors", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ message: "tag not found" }, 404)));
    const notFound = await captureLookupError(createClient().fetchRemoteDigest("example/api", "nope"));
    expect(notFound.kind).toBe("parse");
    expect(notFound.message).toBe("Registry lookup for example/api:nope failed with 404.");

    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ message: "unavailable" }, 503)));
    const unavailable = await captureLookupError(createClient().fetchRemoteDigest("example/api", "latest"));
    expect(unavailable.kind).toBe("network");
  });

  it("reports connection failures and empty bodies as network errors", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));
    const refused = await captureLookupError(createClient().fetchRemoteDigest("example/api", "latest"));
    expect(refused.kind).toBe("network");
    expect(refused.message).toBe("Could not reach registry for example/api:latest: fetch failed");

    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("", { status: 200 })));
    const empty = await captureLookupError(createClient().fetchRemoteDigest("example/api", "latest"));
    expect(empty.kind).toBe("network");
  });

  it("aborts a registry that never answers within the connect timeout", async () => {
    vi.stubGlobal("fetch", vi.fn().mockImplementation((_input: unknown, init?: RequestInit) => {
      return new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          reject(new DOMException("This operation was aborted", "AbortError"));
        });
      });
    }));

    const startedAt = Date.now();
    const error = await captureLookupError(
      createClient({ connectTimeoutMs: 30, requestTimeoutMs: 200 }).fetchRemoteDigest("example/api", "latest")
    );

    expect(error.kind).toBe("network");
    expect(error.message).toBe(
      "Could not reach registry for example/api:latest: Registry did not respond within 30ms"
    );
    expect(Date.now() - startedAt).toBeLessThan(2_000);
  });

  it("bounds the total time spent reading a slow body", async () => {
    vi.stubGlobal("fetch", vi.fn().mockImplementation(async (_input: unknown, init?: RequestInit) => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          init?.signal?.addEventListener("abort", () => {
            controller.error(new DOMException("This operation was aborted", "AbortError"));
          });
        }
      });
      return new Response(body, { status: 200 });
    }));

    const error = await captureLookupError(
      createClient({ connectTimeoutMs: 1_000, requestTimeoutMs: 40 }).fetchRemoteDigest("example/api", "latest")
    );

    expect(error.kind).toBe("network");
    expect(error.message).toBe(
      "Could not reach registry for example/api:latest: Registry lookup timed out after 40ms"
    );
  });
});
