import type { Logger } from "pino";
import { FetcherError, errorMessage } from "./errors.js";
import { emptyResult, type FetchImpl, type PrefixFetcher } from "./fetcher.js";
import { withRetry, type RetryPolicy } from "./retry.js";
import { formatIssues, prefixResponseSchema } from "./schemas.js";

export type ProxyFetcherOptions = {
  apiUrl: string;
  sources: string[];
  timeoutMs: number;
  retry: RetryPolicy;
  logger: Logger;
  fetchImpl?: FetchImpl;
};

async function detailOf(response: Response): Promise<string> {
  const text = await response.text();
  return text.slice(0, 200);
}

/**
 * Delegates lookups to a deployed irr-watch HTTP service, for hosts that
 * cannot reach WHOIS servers themselves.
 */
export function createProxyFetcher(options: ProxyFetcherOptions): PrefixFetcher {
  const fetchImpl = options.fetchImpl ?? fetch;
  const url = `${options.apiUrl}/api/v1/fetch`;

  const request = async (target: string) => {
    const response = await fetchImpl(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", "User-Agent": "irr-watch/0.1 (proxy)" },
      body: JSON.stringify({ target, irr_sources: options.sources }),
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    if (response.status === 422) {
      throw new FetcherError(`API validation error: ${await detailOf(response)}`, false);
    }
    if (response.status === 502) {
      throw new FetcherError(`all IRR sources failed via API: ${await detailOf(response)}`);
    }
    if (response.status !== 200) {
      throw new FetcherError(`API returned status ${response.status}: ${await detailOf(response)}`);
    }

    const parsed = prefixResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new FetcherError(`unexpected API response: ${formatIssues(parsed.error)}`, false);
    }
    return parsed.data;
  };

  return {
    strategy: "proxy",

    async fetch(target) {
      const log = options.logger.child({ target });
      log.info({ url, sources: options.sources }, "calling lookup API");
      try {
        const data = await withRetry(options.retry, () => request(target), { logger: log, label: "lookup API call" });
        const result = {
          ipv4: new Set(data.ipv4_prefixes),
          ipv6: new Set(data.ipv6_prefixes),
          sourcesQueried: data.sources_queried,
          errors: data.errors,
        };
        log.info({ ipv4: result.ipv4.size, ipv6: result.ipv6.size, sources: result.sourcesQueried }, "lookup API returned");
        return result;
      } catch (error) {
        const result = emptyResult();
        result.errors.push(`lookup API request failed: ${errorMessage(error)}`);
        log.warn({ err: errorMessage(error) }, "lookup API request failed");
        return result;
      }
    },
  };
}
