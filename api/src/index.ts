import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { startServer } from "./server.js";

try {
  const config = loadConfig(process.env.IRR_CONFIG);
  await startServer(config, createLogger(config.logging));
} catch (error) {
  console.error(error);
  process.exit(1);
}
