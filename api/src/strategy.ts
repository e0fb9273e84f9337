import type { Logger } from "pino";
import { createBgpq4Fetcher } from "./bgpq4.js";
import type { AppConfig } from "./config.js";
import { FetcherError } from "./errors.js";
import type { FetchImpl, PrefixFetcher } from "./fetcher.js";
import { createIrrFetcher } from "./irr.js";
import { createProxyFetcher } from "./proxy.js";
import { retryPolicy, type RetryPolicy } from "./retry.js";

export function fetcherRetryPolicy(maxRetries: number): RetryPolicy {
  return retryPolicy({
    maxAttempts: Math.max(1, maxRetries),
    isRetryable: (error) => !(error instanceof FetcherError) || error.retryable,
  });
}

export function createFetcher(config: AppConfig, logger: Logger, fetchImpl: FetchImpl = fetch): PrefixFetcher {
  const { fetcher } = config;
  const retry = fetcherRetryPolicy(fetcher.maxRetries);
  const timeoutMs = fetcher.timeoutSeconds * 1000;

  switch (fetcher.strategy) {
    case "bgpq4":
      return createBgpq4Fetcher({
        command: fetcher.bgpq4.command,
        source: fetcher.bgpq4.source,
        aggregate: fetcher.bgpq4.aggregate,
        timeoutMs,
        retry,
        logger,
      });
    case "proxy":
      if (!fetcher.apiUrl) {
        throw new FetcherError("proxy strategy needs api_url", false);
      }
      return createProxyFetcher({
        apiUrl: fetcher.apiUrl,
        sources: config.irrSources,
        timeoutMs,
        retry,
        logger,
        fetchImpl,
      });
    case "irr":
      return createIrrFetcher({
        sources: config.irrSources,
        ripeRestUrl: fetcher.ripeRestUrl,
        timeoutMs,
        retry,
        logger,
        fetchImpl,
      });
  }
}
