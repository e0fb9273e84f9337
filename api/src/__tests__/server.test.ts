import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { WebSocket as WSClient } from "ws";
import { createApp } from "../app.js";
import type { SnapshotStore } from "../db.js";
import { createPipeline } from "../pipeline.js";
import { createTicketingClient, ticketingRetryPolicy } from "../ticketing.js";
import type { PrefixResult } from "../types.js";
import {
  fakeTicketingApi,
  logger,
  manualClock,
  memoryStore,
  prefixResult,
  scriptedFetcher,
  type ManualClock,
} from "./helpers.js";

let clock: ManualClock;
let store: SnapshotStore;
let app: FastifyInstance;

async function build(script: Record<string, PrefixResult[]>): Promise<FastifyInstance> {
  const fetcher = scriptedFetcher(script);
  const ticketing = createTicketingClient({
    baseUrl: "https://tickets.test",
    apiToken: "test-secret",
    timeoutMs: 1000,
    retry: { ...ticketingRetryPolicy(1), initialDelayMs: 0, maxDelayMs: 0 },
    logger,
    fetchImpl: fakeTicketingApi().fetchImpl,
  });
  const pipeline = createPipeline({ store, fetcher, ticketing, logger, lookbackSeconds: 3600, clock: clock.read });
  app = await createApp({ store, fetcher, pipeline, heartbeatIntervalMs: 0, version: "9.9.9" });
  return app;
}

beforeEach(() => {
  clock = manualClock(1000);
  store = memoryStore(clock);
});

afterEach(async () => {
  await app.close();
  store.close();
});

describe("api server", () => {
  it("reports health with the active strategy", async () => {
    await build({});

    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "healthy", version: "9.9.9", strategy: "irr" });
  });

  it("looks up prefixes for a posted target", async () => {
    await build({ AS64500: [prefixResult(["198.51.100.0/24", "192.0.2.0/24"], ["2001:db8::/32"])] });

    const response = await app.inject({ method: "POST", url: "/api/v1/fetch", payload: { target: "as64500" } });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      target: "AS64500",
      ipv4_prefixes: ["192.0.2.0/24", "198.51.100.0/24"],
      ipv6_prefixes: ["2001:db8::/32"],
      ipv4_count: 2,
      ipv6_count: 1,
      sources_queried: ["RADB"],
      errors: [],
    });
  });

  it("serves the same lookup by path", async () => {
    await build({ "AS-EXAMPLE": [prefixResult(["192.0.2.0/24"])] });

    const response = await app.inject({ method: "GET", url: "/api/v1/prefixes/as-example" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ target: "AS-EXAMPLE", ipv4_prefixes: ["192.0.2.0/24"] });
  });

  it("rejects a malformed target", async () => {
    await build({});

    const response = await app.inject({ method: "POST", url: "/api/v1/fetch", payload: { target: "64500" } });

    expect(response.statusCode).toBe(422);
    expect(response.json()).toEqual({
      error: "validation error",
      detail: "target: target must be an ASN (e.g. AS15169) or AS-SET (e.g. AS-EXAMPLE)",
    });
  });

  it("answers 502 when every source failed", async () => {
    await build({ AS64501: [prefixResult([], [], ["failed to query RADB: timed out"])] });

    const response = await app.inject({ method: "POST", url: "/api/v1/fetch", payload: { target: "AS64501" } });

    expect(response.statusCode).toBe(502);
    expect(response.json()).toEqual({
      error: "prefix lookup failed",
      detail: "no prefixes could be retrieved",
      errors: ["failed to query RADB: timed out"],
    });
  });

  it("answers 404 for a diff before any snapshot exists", async () => {
    await build({});

    const response = await app.inject({ method: "GET", url: "/api/v1/targets/AS64500/diff" });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: "not found", detail: "no snapshot found for AS64500" });
  });

  it("runs the pipeline and exposes the recorded history", async () => {
    await build({ AS64500: [prefixResult(["192.0.2.0/24"])] });

    const run = await app.inject({
      method: "POST",
      url: "/api/v1/targets/AS64500/run",
      payload: { dry_run: true },
    });
    expect(run.statusCode).toBe(200);
    expect(run.json()).toMatchObject({
      target: "AS64500",
      stage: "submit",
      status: "dry_run",
      snapshot: { target: "AS64500", target_type: "asn", ipv4_count: 1, ipv6_count: 0 },
      diff: { has_changes: true, added_v4: ["192.0.2.0/24"], old_snapshot_id: null },
      ticket: { status: "dry_run", external_ticket_id: null },
      errors: [],
    });

    const history = await app.inject({ method: "GET", url: "/api/v1/targets/AS64500/snapshots?limit=5" });
    expect(history.statusCode).toBe(200);
    expect(history.json()).toMatchObject({
      target: "AS64500",
      snapshots: [{ target: "AS64500", observed_at: "1970-01-01T00:16:40.000Z", ipv4_count: 1 }],
    });

    const diff = await app.inject({ method: "GET", url: "/api/v1/targets/AS64500/diff" });
    expect(diff.statusCode).toBe(200);
    expect(diff.json()).toMatchObject({
      target: "AS64500",
      added_v4: ["192.0.2.0/24"],
      observed_at: "1970-01-01T00:16:40.000Z",
      baseline_observed_at: null,
    });
  });

  it("rejects an out-of-range history limit", async () => {
    await build({});

    const response = await app.inject({ method: "GET", url: "/api/v1/targets/AS64500/snapshots?limit=0" });

    expect(response.statusCode).toBe(422);
  });

  it("broadcasts run results to websocket clients", async () => {
    await build({ AS64500: [prefixResult(["192.0.2.0/24"])] });

    await app.listen({ host: "127.0.0.1", port: 0 });
    const address = app.server.address();
    if (typeof address !== "object" || address === null) {
      throw new Error("unexpected address type");
    }

    const ws = new WSClient(`ws://127.0.0.1:${address.port}/ws`);
    await new Promise<void>((resolve) => {
      ws.on("open", () => resolve());
    });

    const nextMessage = new Promise<unknown>((resolve) => {
      ws.once("message", (data) => resolve(JSON.parse(data.toString())));
    });

    await app.inject({ method: "POST", url: "/api/v1/targets/AS64500/run", payload: { dry_run: true } });

    expect(await nextMessage).toMatchObject({
      type: "run",
      target: "AS64500",
      stage: "submit",
      status: "dry_run",
      ticket_id: null,
    });

    ws.close();
  });
});
