import type { Server } from "node:http";
import { tmpdir } from "node:os";

import { afterEach, describe, expect, it } from "vitest";

import { createUpdaterApp } from "../../server/updater/app.js";
import { resolveUpdaterRuntimeConfig } from "../../server/updater/config.js";
import { RegistryUpdateOrchestrator } from "../../server/updater/orchestrator.js";
import { FakeRegistry, FakeRuntime, MemoryLog, digestA } from "../helpers/updaterFakes.js";

const servers: Server[] = [];

async function startApp(): Promise<string> {
  const config = resolveUpdaterRuntimeConfig(
    { UPDATER_SERVICES: "example/shop-backend=backend", UPDATER_AUTH_TOKEN: "test-secret" },
    { cwd: tmpdir() }
  );
  const orchestrator = new RegistryUpdateOrchestrator({
    services: config.services,
    registry: new FakeRegistry({ "example/shop-backend": digestA }),
    runtime: new FakeRuntime({ localDigests: { "example/shop-backend": digestA } }),
    log: new MemoryLog()
  });
  const app = createUpdaterApp(config, orchestrator);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    listening.once("error", reject);
  });
  servers.push(server);

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Expected the update API to listen on a TCP port.");
  }
  return `http://127.0.0.1:${address.port}`;
}

afterEach(async () => {
  await Promise.all(
    servers.splice(0).map(
      (server) =>
        new Promise<void>((resolve, reject) => {
          server.close((error) => (error ? reject(error) : resolve()));
        })
    )
  );
});

describe("createUpdaterApp", () => {
  it("answers health checks without a token", async () => {
    const baseUrl = await startApp();
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ ok: true });
  });

  it("requires the token for update routes", async () => {
    const baseUrl = await startApp();

    const anonymous = await fetch(`${baseUrl}/api/updates/status`);
    expect(anonymous.status).toBe(401);
    expect(await anonymous.json()).toEqual({ error: "Unauthorized" });

    const wrong = await fetch(`${baseUrl}/api/updates/status`, { headers: { authorization: "Bearer nope" } });
    expect(wrong.status).toBe(401);
    expect(await wrong.json()).toEqual({ error: "Unauthorized" });

    const authorized = await fetch(`${baseUrl}/api/updates/status`, {
      headers: { authorization: "Bearer test-secret" }
    });
    expect(authorized.status).toBe(200);
    expect(await authorized.json()).toMatchObject({
      summary: { updatesAvailable: 0, upToDate: 1, errors: 0, servicesToUpdate: [] }
    });
  });

  it("returns JSON 404 for unknown routes", async () => {
    const baseUrl = await startApp();
    const response = await fetch(`${baseUrl}/api/unknown`, { headers: { "x-api-token": "test-secret" } });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: "Not found" });
  });

  it("answers malformed JSON bodies with a JSON 400", async () => {
    const baseUrl = await startApp();
    const response = await fetch(`${baseUrl}/api/updates/apply`, {
      method: "POST",
      headers: { authorization: "Bearer test-secret", "content-type": "application/json" },
      body: "{bad"
    });

    expect(response.status).toBe(400);
    expect(response.headers.get("content-type")).toMatch(/^application\/json/);
    expect(await response.json()).toEqual({ error: "Request body is not valid JSON." });
  });

  it("applies a dry run through the HTTP surface", async () => {
    const baseUrl = await startApp();
    const response = await fetch(`${baseUrl}/api/updates/apply`, {
      method: "POST",
      headers: { authorization: "Bearer test-secret", "content-type": "application/json" },
      body: JSON.stringify({ dryRun: true })
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ summary: { updated: 0, failed: 0, skipped: 1 } });
  });
});
