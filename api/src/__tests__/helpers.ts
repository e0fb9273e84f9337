import { openStore, type SnapshotStore } from "../db.js";
import type { FetchImpl, PrefixFetcher } from "../fetcher.js";
import { silentLogger } from "../logger.js";
import { retryPolicy, type RetryPolicy } from "../retry.js";
import type { PrefixResult } from "../types.js";

export const logger = silentLogger();

export const instantRetry = (overrides: Partial<RetryPolicy> = {}): RetryPolicy =>
  retryPolicy({ initialDelayMs: 0, maxDelayMs: 0, ...overrides });

export type ManualClock = {
  now: number;
  read: () => number;
};

export function manualClock(start = 1_000): ManualClock {
  const clock: ManualClock = {
    now: start,
    read: () => clock.now,
  };
  return clock;
}

export function memoryStore(clock: ManualClock): SnapshotStore {
  const store = openStore({ path: ":memory:", clock: clock.read });
  store.init();
  return store;
}

export function prefixResult(ipv4: string[], ipv6: string[] = [], errors: string[] = []): PrefixResult {
  return { ipv4: new Set(ipv4), ipv6: new Set(ipv6), sourcesQueried: ["RADB"], errors };
}

/** Serves queued results per target; the last queued result repeats. */
export function scriptedFetcher(script: Record<string, PrefixResult[]>): PrefixFetcher & { calls: string[] } {
  const calls: string[] = [];
  return {
    strategy: "irr",
    calls,
    async fetch(target) {
      calls.push(target);
      const queue = script[target] ?? [];
      const next = queue.length > 1 ? queue.shift() : queue[0];
      return next ?? prefixResult([], [], [`no script for ${target}`]);
    },
  };
}

export type RecordedRequest = {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
};

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

export type Responder = (request: RecordedRequest) => Response | Promise<Response>;

/** In-process stand-in for `fetch` that records every request. */
export function fakeFetch(responder: Responder): { fetchImpl: FetchImpl; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchImpl: FetchImpl = async (input, init) => {
    const body = init?.body;
    const request: RecordedRequest = {
      url: requestUrl(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof body === "string" ? JSON.parse(body) : undefined,
    };
    requests.push(request);
    return responder(request);
  };
  return { fetchImpl, requests };
}

export function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * A ticketing API that honours `X-Idempotency-Key`: the first request for a key
 * creates TICKET-n, later ones answer 409 with the existing id. Statuses queued
 * in `failures` are answered first, one per request.
 */
export function fakeTicketingApi(failures: number[] = []) {
  const byKey = new Map<string, string>();
  const queue = [...failures];
  const api = fakeFetch((request) => {
    const forced = queue.shift();
    if (forced !== undefined) {
      return json(forced, { error: `forced ${forced}` });
    }
    const key = request.headers.get("X-Idempotency-Key") ?? "";
    const existing = byKey.get(key);
    if (existing) {
      return json(409, { existing_ticket_id: existing });
    }
    const id = `TICKET-${byKey.size + 1}`;
    byKey.set(key, id);
    return json(201, { ticket_id: id });
  });
  return { ...api, created: byKey };
}
