import Fastify, { type FastifyBaseLogger, type FastifyInstance, type FastifyReply } from "fastify";
import websocket from "@fastify/websocket";
import type { WebSocket } from "ws";
import type { SnapshotStore } from "./db.js";
import { formatDiffJson } from "./diff.js";
import { NotFoundError, StorageFailure } from "./errors.js";
import { isTotalFailure, type PrefixFetcher } from "./fetcher.js";
import { silentLogger } from "./logger.js";
import type { Pipeline } from "./pipeline.js";
import { isoSeconds, liveRun, serializeOutcome, serializeSnapshot } from "./report.js";
import {
  fetchRequestSchema,
  formatIssues,
  historyQuerySchema,
  runRequestSchema,
  targetSchema,
} from "./schemas.js";
import type { Heartbeat, LiveMessage } from "./types.js";
import { VERSION } from "./version.js";

export type AppDependencies = {
  store: SnapshotStore;
  fetcher: PrefixFetcher;
  pipeline: Pipeline;
  logger: FastifyBaseLogger;
  heartbeatIntervalMs: number;
  version: string;
};

type RequiredDependencies = Pick<AppDependencies, "store" | "fetcher" | "pipeline">;

const defaultDependencies = (): Omit<AppDependencies, keyof RequiredDependencies> => ({
  logger: silentLogger(),
  heartbeatIntervalMs: Number.parseInt(process.env.WS_HEARTBEAT_MS ?? "0", 10),
  version: VERSION,
});

type TargetParams = { Params: { target: string } };

type Broadcast = (message: LiveMessage) => void;

function invalid(reply: FastifyReply, detail: string) {
  return reply.code(422).send({ error: "validation error", detail });
}

function setupApp(app: FastifyInstance, deps: AppDependencies): void {
  const clients = new Set<WebSocket>();

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof NotFoundError) {
      return reply.code(404).send({ error: "not found", detail: error.message });
    }
    if (error instanceof StorageFailure) {
      request.log.error({ err: error }, "storage failure");
      return reply.code(500).send({ error: "storage failure", detail: error.message });
    }
    return reply.send(error);
  });

  const broadcast: Broadcast = (message) => {
    const payload = JSON.stringify(message);
    for (const client of clients) {
      if (client.readyState !== client.OPEN) continue;
      client.send(payload, (error) => {
        if (error) app.log.warn({ err: error }, "failed to deliver websocket message");
      });
    }
  };

  const lookup = async (target: string, reply: FastifyReply) => {
    const started = performance.now();
    const result = await deps.fetcher.fetch(target);
    const elapsed = Math.round(performance.now() - started);

    if (isTotalFailure(result)) {
      return reply.code(502).send({
        error: "prefix lookup failed",
        detail: "no prefixes could be retrieved",
        errors: result.errors,
      });
    }
    return {
      target,
      ipv4_prefixes: [...result.ipv4].sort(),
      ipv6_prefixes: [...result.ipv6].sort(),
      ipv4_count: result.ipv4.size,
      ipv6_count: result.ipv6.size,
      sources_queried: result.sourcesQueried,
      errors: result.errors,
      query_time_ms: elapsed,
    };
  };

  app.get("/health", async () => ({
    status: "healthy",
    version: deps.version,
    strategy: deps.fetcher.strategy,
  }));

  app.post("/api/v1/fetch", async (request, reply) => {
    const body = fetchRequestSchema.safeParse(request.body ?? {});
    if (!body.success) return invalid(reply, formatIssues(body.error));
    return lookup(body.data.target, reply);
  });

  app.get<TargetParams>("/api/v1/prefixes/:target", async (request, reply) => {
    const target = targetSchema.safeParse(request.params.target);
    if (!target.success) return invalid(reply, formatIssues(target.error));
    return lookup(target.data, reply);
  });

  app.get<TargetParams>("/api/v1/targets/:target/snapshots", async (request, reply) => {
    const target = targetSchema.safeParse(request.params.target);
    if (!target.success) return invalid(reply, formatIssues(target.error));
    const query = historyQuerySchema.safeParse(request.query ?? {});
    if (!query.success) return invalid(reply, formatIssues(query.error));

    const snapshots = deps.store.getSnapshotHistory(target.data, query.data.limit);
    return { target: target.data, snapshots: snapshots.map(serializeSnapshot) };
  });

  app.get<TargetParams>("/api/v1/targets/:target/diff", async (request, reply) => {
    const target = targetSchema.safeParse(request.params.target);
    if (!target.success) return invalid(reply, formatIssues(target.error));

    const { current, baseline, diff } = deps.pipeline.diffAgainstBaseline(target.data);
    return {
      ...formatDiffJson(diff),
      observed_at: isoSeconds(current.observedAt),
      baseline_observed_at: baseline ? isoSeconds(baseline.observedAt) : null,
    };
  });

  app.post<TargetParams>("/api/v1/targets/:target/run", async (request, reply) => {
    const target = targetSchema.safeParse(request.params.target);
    if (!target.success) return invalid(reply, formatIssues(target.error));
    const body = runRequestSchema.safeParse(request.body ?? {});
    if (!body.success) return invalid(reply, formatIssues(body.error));

    const outcome = await deps.pipeline.runPipeline(target.data, { dryRun: body.data.dry_run });
    broadcast(liveRun(outcome));
    return serializeOutcome(outcome);
  });

  app.get("/ws", { websocket: true }, (socket) => {
    clients.add(socket);
    socket.on("close", () => {
      clients.delete(socket);
    });
  });

  if (deps.heartbeatIntervalMs > 0) {
    const timer = setInterval(() => {
      const msg: Heartbeat = { type: "heartbeat", ts: Date.now() };
      broadcast(msg);
    }, deps.heartbeatIntervalMs);
    timer.unref?.();
    app.addHook("onClose", () => clearInterval(timer));
  }
}

export async function createApp(
  overrides: RequiredDependencies & Partial<AppDependencies>,
): Promise<FastifyInstance> {
  const deps: AppDependencies = { ...defaultDependencies(), ...overrides };

  const app = Fastify({ loggerInstance: deps.logger });
  await app.register(websocket);

  setupApp(app, deps);

  return app;
}
