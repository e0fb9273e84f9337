import { existsSync, readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { LOG_LEVELS, type LoggingConfig } from "./logger.js";
import { targetSchema } from "./schemas.js";

export const KNOWN_IRR_SOURCES = ["RIPE", "RADB", "ARIN", "APNIC", "LACNIC", "AFRINIC", "NTTCOM"] as const;

export const FETCH_STRATEGIES = ["irr", "bgpq4", "proxy"] as const;
export type FetchStrategy = (typeof FETCH_STRATEGIES)[number];

export const DEFAULT_CONFIG_PATH = "./config.yaml";

export type FetcherConfig = {
  strategy: FetchStrategy;
  timeoutSeconds: number;
  maxRetries: number;
  ripeRestUrl: string;
  apiUrl: string | null;
  bgpq4: {
    command: string[];
    source: string;
    aggregate: boolean;
  };
};

export type TicketingConfig = {
  baseUrl: string;
  apiToken: string;
  timeoutSeconds: number;
  maxRetries: number;
};

export type ServerConfig = {
  host: string;
  port: number;
  heartbeatMs: number;
};

export type AppConfig = {
  irrSources: string[];
  targets: string[];
  fetcher: FetcherConfig;
  database: { path: string };
  ticketing: TicketingConfig;
  logging: LoggingConfig;
  diff: { lookbackHours: number };
  server: ServerConfig;
};

const positiveInt = (field: string) =>
  z.coerce.number({ invalid_type_error: `${field} must be a number` }).int().positive(`${field} must be positive`);

const nonNegativeInt = (field: string) =>
  z.coerce.number({ invalid_type_error: `${field} must be a number` }).int().nonnegative(`${field} must be non-negative`);

const upperList = z.array(z.string().trim().toUpperCase());

const rawConfigSchema = z.object({
  irr_sources: upperList.default(["RADB", "RIPE", "NTTCOM"]),
  targets: z
    .array(targetSchema)
    .default([])
    .transform((list) => [...new Set(list)]),
  api_url: z.string().nullish(),
  fetcher: z
    .object({
      strategy: z.enum(FETCH_STRATEGIES).default("irr"),
      timeout_seconds: positiveInt("fetcher.timeout_seconds").default(60),
      max_retries: nonNegativeInt("fetcher.max_retries").default(3),
      ripe_rest_url: z.string().url().default("https://rest.db.ripe.net"),
      bgpq4: z
        .object({
          command: z.union([z.string(), z.array(z.string())]).default(["bgpq4"]),
          source: z.string().trim().toUpperCase().default("RADB"),
          aggregate: z.boolean().default(true),
        })
        .default({}),
    })
    .default({}),
  database: z
    .object({
      path: z.string().min(1).default("./data/irr.sqlite"),
    })
    .default({}),
  ticketing: z
    .object({
      base_url: z.string().default(""),
      api_token: z.string().default(""),
      timeout_seconds: positiveInt("ticketing.timeout_seconds").default(30),
      max_retries: nonNegativeInt("ticketing.max_retries").default(3),
    })
    .default({}),
  logging: z
    .object({
      level: z
        .string()
        .toLowerCase()
        .pipe(z.enum(LOG_LEVELS, { message: `logging.level must be one of: ${LOG_LEVELS.join(", ")}` }))
        .default("info"),
      format: z
        .string()
        .toLowerCase()
        .pipe(z.enum(["json", "text"], { message: "logging.format must be one of: json, text" }))
        .default("json"),
      file: z.string().nullish(),
    })
    .default({}),
  diff: z
    .object({
      lookback_hours: positiveInt("diff.lookback_hours").default(24),
    })
    .default({}),
  server: z
    .object({
      host: z.string().default("0.0.0.0"),
      port: nonNegativeInt("server.port").default(8080),
      heartbeat_ms: nonNegativeInt("server.heartbeat_ms").default(0),
    })
    .default({}),
});

type Env = Record<string, string | undefined>;

/** Replaces `${NAME}` with the environment value, or an empty string. */
export function expandEnvVars(value: unknown, env: Env = process.env): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([^}]+)\}/g, (_, name: string) => env[name] ?? "");
  }
  if (Array.isArray(value)) {
    return value.map((item) => expandEnvVars(item, env));
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, expandEnvVars(item, env)]));
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const current = raw[key];
  const copy = isRecord(current) ? { ...current } : {};
  raw[key] = copy;
  return copy;
}

function applyEnvOverrides(raw: Record<string, unknown>, env: Env): void {
  if (env.IRR_DB_PATH) section(raw, "database").path = env.IRR_DB_PATH;
  if (env.IRR_API_URL) raw.api_url = env.IRR_API_URL;
  if (env.TICKETING_BASE_URL) section(raw, "ticketing").base_url = env.TICKETING_BASE_URL;
  if (env.TICKETING_TOKEN) section(raw, "ticketing").api_token = env.TICKETING_TOKEN;
  if (env.IRR_LOG_LEVEL) section(raw, "logging").level = env.IRR_LOG_LEVEL;
  if (env.IRR_LOG_FORMAT) section(raw, "logging").format = env.IRR_LOG_FORMAT;
  if (env.HOST) section(raw, "server").host = env.HOST;
  if (env.PORT) section(raw, "server").port = env.PORT;
}

function toAppConfig(parsed: z.output<typeof rawConfigSchema>): AppConfig {
  const apiUrl = parsed.api_url ? parsed.api_url : null;
  const command = parsed.fetcher.bgpq4.command;
  return {
    irrSources: parsed.irr_sources,
    targets: parsed.targets,
    fetcher: {
      // A configured proxy URL routes every lookup through the remote service.
      strategy: apiUrl ? "proxy" : parsed.fetcher.strategy,
      timeoutSeconds: parsed.fetcher.timeout_seconds,
      maxRetries: parsed.fetcher.max_retries,
      ripeRestUrl: parsed.fetcher.ripe_rest_url.replace(/\/+$/, ""),
      apiUrl: apiUrl ? apiUrl.replace(/\/+$/, "") : null,
      bgpq4: {
        command: typeof command === "string" ? command.split(/\s+/).filter(Boolean) : command,
        source: parsed.fetcher.bgpq4.source,
        aggregate: parsed.fetcher.bgpq4.aggregate,
      },
    },
    database: { path: parsed.database.path },
    ticketing: {
      baseUrl: parsed.ticketing.base_url.replace(/\/+$/, ""),
      apiToken: parsed.ticketing.api_token,
      timeoutSeconds: parsed.ticketing.timeout_seconds,
      maxRetries: parsed.ticketing.max_retries,
    },
    logging: {
      level: parsed.logging.level,
      format: parsed.logging.format,
      file: parsed.logging.file ?? null,
    },
    diff: { lookbackHours: parsed.diff.lookback_hours },
    server: {
      host: parsed.server.host,
      port: parsed.server.port,
      heartbeatMs: parsed.server.heartbeat_ms,
    },
  };
}

function semanticProblems(config: AppConfig): string[] {
  const problems: string[] = [];
  const known = new Set<string>(KNOWN_IRR_SOURCES);
  if (config.irrSources.length === 0) {
    problems.push("at least one IRR source must be configured");
  }
  const unknown = config.irrSources.filter((source) => !known.has(source));
  if (unknown.length > 0) {
    problems.push(`unknown IRR sources: ${unknown.join(", ")} (known: ${KNOWN_IRR_SOURCES.join(", ")})`);
  }
  if (config.fetcher.strategy === "bgpq4" && config.fetcher.bgpq4.command.length === 0) {
    problems.push("fetcher.bgpq4.command must not be empty");
  }
  if (config.fetcher.strategy === "proxy" && !config.fetcher.apiUrl) {
    problems.push("api_url is required when fetcher.strategy is proxy");
  }
  return problems;
}

export function parseConfig(document: unknown, env: Env = process.env): AppConfig {
  const expanded = expandEnvVars(document ?? {}, env);
  if (!isRecord(expanded)) {
    throw new ConfigError(["configuration root must be a mapping"]);
  }
  const raw: Record<string, unknown> = { ...expanded };
  applyEnvOverrides(raw, env);

  const result = rawConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 && !issue.message.startsWith(String(issue.path[0]))
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      ),
    );
  }

  const config = toAppConfig(result.data);
  const problems = semanticProblems(config);
  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return config;
}

/**
 * Loads the YAML configuration at `path`. Without a path the defaults apply,
 * still subject to environment overrides.
 */
export function loadConfig(path?: string, env: Env = process.env): AppConfig {
  if (path === undefined) {
    return parseConfig({}, env);
  }
  if (!existsSync(path)) {
    throw new ConfigError([`configuration file not found: ${path}`]);
  }
  let document: unknown;
  try {
    document = parseYaml(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError([`invalid YAML in ${path}: ${errorMessage(error)}`]);
  }
  return parseConfig(document, env);
}

export function defaultConfig(): AppConfig {
  return parseConfig({}, {});
}
