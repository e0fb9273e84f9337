import { createConnection } from "node:net";
import type { Logger } from "pino";
import { z } from "zod";
import { FetcherError, errorMessage } from "./errors.js";
import { emptyResult, type FetchImpl, type PrefixFetcher } from "./fetcher.js";
import { withRetry, type RetryPolicy } from "./retry.js";

export const WHOIS_SERVERS: Readonly<Record<string, string>> = {
  RADB: "whois.radb.net",
  ARIN: "rr.arin.net",
  APNIC: "whois.apnic.net",
  LACNIC: "irr.lacnic.net",
  AFRINIC: "whois.afrinic.net",
  NTTCOM: "rr.ntt.net",
};

type FamilyPrefixes = { ipv4: Set<string>; ipv6: Set<string> };

export type WhoisQuery = (host: string, query: string, timeoutMs: number) => Promise<string>;

export type IrrFetcherOptions = {
  sources: string[];
  ripeRestUrl: string;
  timeoutMs: number;
  retry: RetryPolicy;
  logger: Logger;
  fetchImpl?: FetchImpl;
  whois?: WhoisQuery;
};

const ripeSearchSchema = z.object({
  objects: z
    .object({
      object: z
        .array(
          z.object({
            type: z.string().optional(),
            attributes: z
              .object({
                attribute: z.array(z.object({ name: z.string(), value: z.string().optional() })).default([]),
              })
              .default({}),
          }),
        )
        .default([]),
    })
    .default({}),
});

const ripeErrorSchema = z.object({
  errormessages: z
    .object({
      errormessage: z.array(z.object({ text: z.string().optional() })).default([]),
    })
    .optional(),
});

/** Plain TCP/43 exchange: send the query, read until the server closes. */
export const whoisQuery: WhoisQuery = (host, query, timeoutMs) =>
  new Promise((resolve, reject) => {
    const socket = createConnection({ host, port: 43 });
    const chunks: Buffer[] = [];
    socket.setTimeout(timeoutMs);
    socket.on("connect", () => {
      socket.write(query);
    });
    socket.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });
    socket.on("timeout", () => {
      socket.destroy();
      reject(new FetcherError(`WHOIS query to ${host} timed out after ${timeoutMs}ms`));
    });
    socket.on("error", (error) => {
      reject(new FetcherError(`WHOIS connection to ${host} failed: ${error.message}`));
    });
    socket.on("close", () => {
      resolve(Buffer.concat(chunks).toString("utf8"));
    });
  });

export function parseWhoisResponse(response: string): FamilyPrefixes {
  const collect = (pattern: RegExp) =>
    new Set(
      [...response.matchAll(pattern)]
        .map((match) => match[1]?.trim() ?? "")
        .filter((prefix) => prefix.includes("/")),
    );
  return {
    ipv4: collect(/^route:\s+(\S+)/gim),
    ipv6: collect(/^route6:\s+(\S+)/gim),
  };
}

export function parseRipeResponse(data: unknown, objectType: "route" | "route6"): Set<string> {
  const parsed = ripeSearchSchema.safeParse(data);
  if (!parsed.success) {
    throw new FetcherError("unexpected RIPE REST response shape", false);
  }
  const prefixes = new Set<string>();
  for (const object of parsed.data.objects.object) {
    if (object.type !== objectType) continue;
    const attribute = object.attributes.attribute.find((attr) => attr.name === objectType);
    if (attribute?.value) prefixes.add(attribute.value);
  }
  return prefixes;
}

function ripeErrorText(body: string): string | undefined {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return undefined;
  }
  const parsed = ripeErrorSchema.safeParse(data);
  return parsed.success ? parsed.data.errormessages?.errormessage[0]?.text : undefined;
}

async function readJson(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch (error) {
    throw new FetcherError(`invalid JSON response: ${errorMessage(error)}`);
  }
}

export function createIrrFetcher(options: IrrFetcherOptions): PrefixFetcher {
  const fetchImpl = options.fetchImpl ?? fetch;
  const whois = options.whois ?? whoisQuery;

  async function queryRipeType(target: string, objectType: "route" | "route6"): Promise<Set<string>> {
    const url = new URL("/search.json", options.ripeRestUrl);
    url.searchParams.set("source", "ripe");
    url.searchParams.set("query-string", target);
    url.searchParams.set("inverse-attribute", "origin");
    url.searchParams.set("type-filter", objectType);

    options.logger.debug({ url: url.toString() }, "querying RIPE REST API");
    const response = await fetchImpl(url, {
      headers: { Accept: "application/json", "User-Agent": "irr-watch/0.1" },
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    if (response.status === 404) return new Set();
    if (response.status !== 200) {
      const text = await response.text();
      const detail = ripeErrorText(text);
      if (detail && detail.toLowerCase().includes("no entries")) return new Set();
      throw new FetcherError(detail ? `API error: ${detail}` : `API returned status ${response.status}: ${text.slice(0, 200)}`);
    }
    return parseRipeResponse(await readJson(response), objectType);
  }

  async function querySource(target: string, source: string): Promise<FamilyPrefixes> {
    if (source === "RIPE") {
      return {
        ipv4: await queryRipeType(target, "route"),
        ipv6: await queryRipeType(target, "route6"),
      };
    }
    const server = WHOIS_SERVERS[source];
    if (!server) {
      throw new FetcherError(`no query method known for IRR source ${source}`, false);
    }
    options.logger.debug({ server, source }, "querying WHOIS server");
    return parseWhoisResponse(await whois(server, `-i origin ${target}\r\n`, options.timeoutMs));
  }

  return {
    strategy: "irr",

    async fetch(target) {
      const result = emptyResult();
      for (const source of options.sources) {
        const log = options.logger.child({ target, source });
        try {
          const prefixes = await withRetry(options.retry, () => querySource(target, source), {
            logger: log,
            label: `${source} query`,
          });
          prefixes.ipv4.forEach((prefix) => result.ipv4.add(prefix));
          prefixes.ipv6.forEach((prefix) => result.ipv6.add(prefix));
          result.sourcesQueried.push(source);
          log.info({ ipv4: prefixes.ipv4.size, ipv6: prefixes.ipv6.size }, "fetched prefixes");
        } catch (error) {
          const message = `failed to query ${source}: ${errorMessage(error)}`;
          result.errors.push(message);
          log.warn(message);
        }
      }
      options.logger.info(
        { target, ipv4: result.ipv4.size, ipv6: result.ipv6.size, sources: result.sourcesQueried },
        "lookup complete",
      );
      return result;
    },
  };
}
