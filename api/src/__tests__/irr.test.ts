import { describe, expect, it } from "vitest";
import { FetcherError } from "../errors.js";
import { createIrrFetcher, parseRipeResponse, parseWhoisResponse, type WhoisQuery } from "../irr.js";
import { fetcherRetryPolicy } from "../strategy.js";
import { fakeFetch, json, logger, type Responder } from "./helpers.js";

const retry = { ...fetcherRetryPolicy(3), initialDelayMs: 0, maxDelayMs: 0 };

const ripeObjects = (type: "route" | "route6", prefixes: string[]) => ({
  objects: {
    object: prefixes.map((prefix) => ({
      type,
      attributes: {
        attribute: [
          { name: type, value: prefix },
          { name: "origin", value: "AS64500" },
        ],
      },
    })),
  },
});

function recordingWhois(response: string | Error): { whois: WhoisQuery; calls: string[][] } {
  const calls: string[][] = [];
  const whois: WhoisQuery = async (host, query) => {
    calls.push([host, query]);
    if (response instanceof Error) throw response;
    return response;
  };
  return { whois, calls };
}

function fetcherFor(sources: string[], responder: Responder, whois: WhoisQuery) {
  const api = fakeFetch(responder);
  const fetcher = createIrrFetcher({
    sources,
    ripeRestUrl: "https://rest.db.ripe.net",
    timeoutMs: 1000,
    retry,
    logger,
    fetchImpl: api.fetchImpl,
    whois,
  });
  return { fetcher, requests: api.requests };
}

describe("parseWhoisResponse", () => {
  it("collects route and route6 attributes", () => {
    const text = [
      "route:          192.0.2.0/24",
      "descr:          route: 10.0.0.0/8",
      "origin:         AS64500",
      "",
      "ROUTE6:         2001:db8::/48",
      "route:          not-a-prefix",
    ].join("\n");
    const parsed = parseWhoisResponse(text);
    expect([...parsed.ipv4]).toEqual(["192.0.2.0/24"]);
    expect([...parsed.ipv6]).toEqual(["2001:db8::/48"]);
  });

  it("returns empty sets for an empty answer", () => {
    const parsed = parseWhoisResponse("%  No entries found for the selected source(s).\n");
    expect(parsed.ipv4.size).toBe(0);
    expect(parsed.ipv6.size).toBe(0);
  });
});

describe("parseRipeResponse", () => {
  it("keeps only objects of the requested type", () => {
    const data = {
      objects: {
        object: [...ripeObjects("route", ["192.0.2.0/24"]).objects.object, ...ripeObjects("route6", ["2001:db8::/32"]).objects.object],
      },
    };
    expect([...parseRipeResponse(data, "route")]).toEqual(["192.0.2.0/24"]);
    expect([...parseRipeResponse(data, "route6")]).toEqual(["2001:db8::/32"]);
  });

  it("accepts a response without objects", () => {
    expect(parseRipeResponse({}, "route").size).toBe(0);
  });

  it("rejects an unexpected shape without retrying", () => {
    try {
      parseRipeResponse({ objects: "nope" }, "route");
      throw new Error("expected parseRipeResponse to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(FetcherError);
      expect(error instanceof FetcherError && error.retryable).toBe(false);
    }
  });
});

describe("createIrrFetcher", () => {
  it("merges RIPE REST and WHOIS results and records unknown sources", async () => {
    const { whois, calls } = recordingWhois("route: 192.0.2.0/24\norigin: AS64500\n\nroute6: 2001:db8::/32\n");
    const { fetcher, requests } = fetcherFor(
      ["RIPE", "RADB", "EXAMPLE"],
      (request) =>
        request.url.includes("type-filter=route6")
          ? json(404, {})
          : json(200, ripeObjects("route", ["198.51.100.0/24"])),
      whois,
    );

    const result = await fetcher.fetch("AS64500");

    expect([...result.ipv4].sort()).toEqual(["192.0.2.0/24", "198.51.100.0/24"]);
    expect([...result.ipv6]).toEqual(["2001:db8::/32"]);
    expect(result.sourcesQueried).toEqual(["RIPE", "RADB"]);
    expect(result.errors).toEqual(["failed to query EXAMPLE: no query method known for IRR source EXAMPLE"]);
    expect(calls).toEqual([["whois.radb.net", "-i origin AS64500\r\n"]]);
    expect(requests.map((request) => request.url)).toEqual([
      "https://rest.db.ripe.net/search.json?source=ripe&query-string=AS64500&inverse-attribute=origin&type-filter=route",
      "https://rest.db.ripe.net/search.json?source=ripe&query-string=AS64500&inverse-attribute=origin&type-filter=route6",
    ]);
  });

  it("treats a RIPE 'no entries' error as an empty answer", async () => {
    const { whois } = recordingWhois("");
    const { fetcher } = fetcherFor(
      ["RIPE"],
      () => json(400, { errormessages: { errormessage: [{ text: "ERROR:101: no entries found" }] } }),
      whois,
    );

    const result = await fetcher.fetch("AS64500");

    expect(result.errors).toEqual([]);
    expect(result.sourcesQueried).toEqual(["RIPE"]);
    expect(result.ipv4.size).toBe(0);
  });

  it("retries a failing source and then reports it", async () => {
    const { whois, calls } = recordingWhois(new FetcherError("WHOIS connection to whois.radb.net failed: refused"));
    const { fetcher, requests } = fetcherFor(["RIPE", "RADB"], () => new Response("oops", { status: 500 }), whois);

    const result = await fetcher.fetch("AS64500");

    expect(result.errors).toEqual([
      "failed to query RIPE: API returned status 500: oops",
      "failed to query RADB: WHOIS connection to whois.radb.net failed: refused",
    ]);
    expect(result.sourcesQueried).toEqual([]);
    expect(requests).toHaveLength(3);
    expect(calls).toHaveLength(3);
  });

  it("surfaces RIPE error messages", async () => {
    const { whois } = recordingWhois("");
    const { fetcher } = fetcherFor(
      ["RIPE"],
      () => json(400, { errormessages: { errormessage: [{ text: "invalid query" }] } }),
      whois,
    );

    const result = await fetcher.fetch("AS64500");

    expect(result.errors).toEqual(["failed to query RIPE: API error: invalid query"]);
  });
});
