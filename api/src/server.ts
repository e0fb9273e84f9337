import type { FastifyInstance } from "fastify";
import type { Logger } from "pino";
import { createApp } from "./app.js";
import type { AppConfig } from "./config.js";
import { createServices } from "./services.js";

/** Builds the HTTP service from configuration and starts listening. */
export async function startServer(config: AppConfig, logger: Logger): Promise<FastifyInstance> {
  const services = createServices(config, logger);
  const app = await createApp({
    ...services,
    logger,
    heartbeatIntervalMs: config.server.heartbeatMs,
  });
  app.addHook("onClose", () => services.store.close());
  await app.listen({ host: config.server.host, port: config.server.port });
  app.log.info({ port: config.server.port, strategy: services.fetcher.strategy }, "API listening");
  return app;
}
