import type { Logger } from "pino";
import type { AppConfig } from "./config.js";
import { openStore, type Clock, type SnapshotStore } from "./db.js";
import type { FetchImpl, PrefixFetcher } from "./fetcher.js";
import { createPipeline, type Pipeline } from "./pipeline.js";
import { createFetcher } from "./strategy.js";
import { createTicketingClient, ticketingRetryPolicy, type TicketingClient } from "./ticketing.js";

export type Services = {
  store: SnapshotStore;
  fetcher: PrefixFetcher;
  ticketing: TicketingClient;
  pipeline: Pipeline;
};

export type ServiceOverrides = {
  fetchImpl?: FetchImpl;
  clock?: Clock;
};

/** Opens the store and wires the fetcher, ticketing client and pipeline from configuration. */
export function createServices(config: AppConfig, logger: Logger, overrides: ServiceOverrides = {}): Services {
  const fetchImpl = overrides.fetchImpl ?? fetch;
  const store = openStore({ path: config.database.path, clock: overrides.clock });
  store.init();

  const fetcher = createFetcher(config, logger.child({ component: "fetcher" }), fetchImpl);
  const ticketing = createTicketingClient({
    baseUrl: config.ticketing.baseUrl,
    apiToken: config.ticketing.apiToken,
    timeoutMs: config.ticketing.timeoutSeconds * 1000,
    retry: ticketingRetryPolicy(config.ticketing.maxRetries),
    logger: logger.child({ component: "ticketing" }),
    fetchImpl,
  });
  const pipeline = createPipeline({
    store,
    fetcher,
    ticketing,
    logger: logger.child({ component: "pipeline" }),
    lookbackSeconds: config.diff.lookbackHours * 3600,
    clock: overrides.clock,
  });

  return { store, fetcher, ticketing, pipeline };
}
