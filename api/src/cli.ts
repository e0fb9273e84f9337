#!/usr/bin/env node
import { existsSync, realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { DEFAULT_CONFIG_PATH, loadConfig, type AppConfig } from "./config.js";
import { openStore, type Clock } from "./db.js";
import { formatDiffJson, formatDiffText } from "./diff.js";
import { errorMessage } from "./errors.js";
import type { FetchImpl } from "./fetcher.js";
import { createLogger, type Logger } from "./logger.js";
import { isFailedOutcome } from "./pipeline.js";
import { serializeOutcome, serializeSnapshot } from "./report.js";
import { targetSchema } from "./schemas.js";
import { startServer } from "./server.js";
import { createServices, type Services } from "./services.js";
import type { RunOutcome } from "./types.js";
import { VERSION } from "./version.js";

type GlobalOptions = {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  json?: boolean;
};

type TargetOptions = { target: string };
type DryRunOptions = TargetOptions & { dryRun?: boolean };
type RunAllOptions = { dryRun?: boolean; concurrency: number };
type HistoryOptions = TargetOptions & { limit: number };

type Writer = { write(chunk: string): unknown };

export type CliEnvironment = {
  stdout?: Writer;
  stderr?: Writer;
  env?: Record<string, string | undefined>;
  /** Replaces the configured logger, mainly for tests. */
  logger?: Logger;
  fetchImpl?: FetchImpl;
  clock?: Clock;
};

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function localTimestamp(date = new Date()): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function localTime(unixSeconds: number): string {
  return localTimestamp(new Date(unixSeconds * 1000));
}

function parseTarget(value: string): string {
  const parsed = targetSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(parsed.error.issues[0]?.message ?? "invalid target");
  }
  return parsed.data;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return parsed;
}

class Output {
  constructor(
    private readonly options: GlobalOptions,
    private readonly stdout: Writer,
    private readonly stderr: Writer,
  ) {}

  /** A progress line, prefixed with the local time; silent under --quiet or --json. */
  line(message: string): void {
    if (this.options.quiet || this.options.json) return;
    this.stdout.write(`[${localTimestamp()}] ${message}\n`);
  }

  /** Unprefixed text block; silent under --quiet or --json. */
  text(block: string): void {
    if (this.options.quiet || this.options.json) return;
    this.stdout.write(`${block}\n`);
  }

  json(document: unknown): void {
    if (this.options.json) this.stdout.write(`${JSON.stringify(document)}\n`);
  }

  error(message: string): void {
    if (this.options.json) {
      this.stdout.write(`${JSON.stringify({ error: message })}\n`);
    }
    this.stderr.write(`ERROR: ${message}\n`);
  }
}

function describeOutcome(out: Output, outcome: RunOutcome): void {
  if (outcome.status === "fetch_failed") {
    out.line(`ERROR: failed to fetch prefixes for ${outcome.target}: ${outcome.errors.join("; ")}`);
    return;
  }
  if (outcome.status === "storage_failed") {
    out.line(`ERROR: storage failure during ${outcome.stage}: ${outcome.errors.join("; ")}`);
    return;
  }
  const { snapshot, changeSet, ticket } = outcome;
  if (snapshot) {
    out.line(
      `Found ${snapshot.ipv4Prefixes.length.toLocaleString("en-US")} IPv4, ` +
        `${snapshot.ipv6Prefixes.length.toLocaleString("en-US")} IPv6 prefixes`,
    );
    out.line(`Snapshot saved (id: ${snapshot.id}, hash: ${snapshot.contentHash.slice(0, 12)}...)`);
  }
  if (changeSet) {
    out.line(changeSet.oldSnapshotId === null ? "No previous snapshot found (first run)" : "Compared with baseline snapshot");
    out.text(formatDiffText(changeSet));
  }
  switch (outcome.status) {
    case "dry_run":
      out.line(`[DRY-RUN] Would create ticket for ${outcome.target}`);
      break;
    case "created":
      out.line(`Ticket created: ${ticket?.externalTicketId ?? "(no id returned)"}`);
      break;
    case "duplicate":
    case "already_submitted":
      out.line(`Ticket already exists: ${ticket?.externalTicketId ?? "(no id returned)"}`);
      break;
    case "failed":
      out.line(`ERROR: failed to create ticket: ${ticket?.responsePayload?.error_message ?? "unknown error"}`);
      break;
    case "no_changes":
      break;
  }
}

/**
 * Builds the `irr-watch` program. Commands record their exit status through
 * `setExitCode` instead of exiting the process.
 */
export function buildProgram(io: CliEnvironment, setExitCode: (code: number) => void): Command {
  const stdout = io.stdout ?? process.stdout;
  const stderr = io.stderr ?? process.stderr;
  const env = io.env ?? process.env;

  const program = new Command("irr-watch")
    .description("IRR prefix change detection and ticket automation")
    .version(VERSION)
    .option("-c, --config <path>", `configuration file (default: ${DEFAULT_CONFIG_PATH} when present)`)
    .option("-v, --verbose", "enable debug logging")
    .option("-q, --quiet", "suppress non-error output")
    .option("--json", "print results as JSON")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stdout.write(text),
      writeErr: (text) => stderr.write(text),
    });

  const setup = () => {
    const globals = program.opts<GlobalOptions>();
    const out = new Output(globals, stdout, stderr);
    const path = globals.config ?? (existsSync(DEFAULT_CONFIG_PATH) ? DEFAULT_CONFIG_PATH : undefined);
    const config: AppConfig = loadConfig(path, env);
    if (globals.verbose) config.logging.level = "debug";
    const logger = io.logger ?? createLogger(config.logging);
    return { out, config, logger };
  };

  // Runs a command body with opened services, mapping any failure to exit code 1.
  const withServices = async (
    body: (services: Services, out: Output, config: AppConfig) => Promise<number> | number,
  ): Promise<void> => {
    let out = new Output(program.opts<GlobalOptions>(), stdout, stderr);
    let services: Services | undefined;
    try {
      const context = setup();
      out = context.out;
      services = createServices(context.config, context.logger, { fetchImpl: io.fetchImpl, clock: io.clock });
      setExitCode(await body(services, out, context.config));
    } catch (error) {
      out.error(errorMessage(error));
      setExitCode(1);
    } finally {
      services?.store.close();
    }
  };

  program
    .command("init-db")
    .description("create the database schema")
    .action(async () => {
      let out = new Output(program.opts<GlobalOptions>(), stdout, stderr);
      try {
        const context = setup();
        out = context.out;
        out.line("Initializing database...");
        const store = openStore({ path: context.config.database.path });
        try {
          store.init();
        } finally {
          store.close();
        }
        out.line(`Database initialized at ${context.config.database.path}`);
        out.json({ status: "success", database_path: context.config.database.path });
        setExitCode(0);
      } catch (error) {
        out.error(errorMessage(error));
        setExitCode(1);
      }
    });

  program
    .command("fetch")
    .description("fetch prefixes and store a snapshot")
    .requiredOption("-t, --target <target>", "ASN or AS-SET, e.g. AS15169", parseTarget)
    .action((options: TargetOptions) =>
      withServices(async ({ pipeline }, out) => {
        out.line(`Fetching prefixes for ${options.target}...`);
        const snapshot = await pipeline.fetchAndSnapshot(options.target);
        out.line(
          `Found ${snapshot.ipv4Prefixes.length.toLocaleString("en-US")} IPv4 prefixes, ` +
            `${snapshot.ipv6Prefixes.length.toLocaleString("en-US")} IPv6 prefixes`,
        );
        out.line(`Snapshot saved (id: ${snapshot.id}, hash: ${snapshot.contentHash.slice(0, 12)}...)`);
        out.json({ target: options.target, snapshot: serializeSnapshot(snapshot) });
        return 0;
      }),
    );

  program
    .command("diff")
    .description("diff the latest snapshot against the lookback baseline")
    .requiredOption("-t, --target <target>", "ASN or AS-SET", parseTarget)
    .action((options: TargetOptions) =>
      withServices(({ pipeline }, out) => {
        const { baseline, diff } = pipeline.diffAgainstBaseline(options.target);
        out.line(
          baseline
            ? `Comparing with previous snapshot (${localTime(baseline.observedAt)})`
            : "No previous snapshot found (first run)",
        );
        out.text(formatDiffText(diff));
        out.json(formatDiffJson(diff));
        return 0;
      }),
    );

  program
    .command("submit")
    .description("submit a ticket for the latest recorded change-set")
    .requiredOption("-t, --target <target>", "ASN or AS-SET", parseTarget)
    .option("--dry-run", "record the ticket without calling the ticketing API")
    .action((options: DryRunOptions) =>
      withServices(async ({ pipeline }, out) => {
        const dryRun = options.dryRun ?? false;
        const outcome = await pipeline.submitIfChanged(options.target, dryRun);
        const ticketId = outcome.ticket?.externalTicketId ?? null;
        const failure = outcome.ticket?.responsePayload?.error_message ?? null;
        switch (outcome.status) {
          case "no_changes":
            out.line(`No changes to submit for ${options.target}`);
            break;
          case "already_submitted":
            out.line(`Ticket already exists for this change-set: ${ticketId ?? "(no id returned)"}`);
            break;
          case "dry_run":
            out.line(`[DRY-RUN] Would create ticket for ${options.target}`);
            break;
          case "created":
            out.line(`Ticket created: ${ticketId ?? "(no id returned)"}`);
            break;
          case "duplicate":
            out.line(`Ticket already exists: ${ticketId ?? "(no id returned)"}`);
            break;
          case "failed":
            out.line(`ERROR: failed to create ticket: ${failure ?? "unknown error"}`);
            break;
        }
        out.json({
          target: options.target,
          status: outcome.status,
          ticket_id: ticketId,
          error_message: failure,
          dry_run: dryRun,
        });
        return outcome.status === "failed" ? 1 : 0;
      }),
    );

  program
    .command("run")
    .description("fetch, diff and submit a ticket when prefixes changed")
    .requiredOption("-t, --target <target>", "ASN or AS-SET", parseTarget)
    .option("--dry-run", "record the ticket without calling the ticketing API")
    .action((options: DryRunOptions) =>
      withServices(async ({ pipeline }, out) => {
        out.line(`Processing ${options.target}...`);
        const outcome = await pipeline.runPipeline(options.target, { dryRun: options.dryRun ?? false });
        describeOutcome(out, outcome);
        out.json(serializeOutcome(outcome));
        return isFailedOutcome(outcome) ? 1 : 0;
      }),
    );

  program
    .command("run-all")
    .description("run the pipeline for every configured target")
    .option("--dry-run", "record tickets without calling the ticketing API")
    .option("--concurrency <n>", "targets processed in parallel", parsePositiveInt, 1)
    .action((options: RunAllOptions) =>
      withServices(async ({ pipeline }, out, config) => {
        if (config.targets.length === 0) {
          out.error("no targets configured");
          return 1;
        }
        out.line(`Processing ${config.targets.length} targets...`);
        const summary = await pipeline.runAll(config.targets, {
          dryRun: options.dryRun ?? false,
          concurrency: options.concurrency,
        });
        for (const outcome of summary.results) {
          out.line(`${outcome.target}: ${outcome.status} (stage: ${outcome.stage})`);
        }
        out.line(`Completed: ${summary.succeeded} succeeded, ${summary.failed} failed`);
        out.json({ ...summary, results: summary.results.map(serializeOutcome) });
        return summary.failed > 0 ? 1 : 0;
      }),
    );

  program
    .command("history")
    .description("show recent snapshots for a target")
    .requiredOption("-t, --target <target>", "ASN or AS-SET", parseTarget)
    .option("-l, --limit <n>", "maximum snapshots to show", parsePositiveInt, 10)
    .action((options: HistoryOptions) =>
      withServices(({ store }, out) => {
        const snapshots = store.getSnapshotHistory(options.target, options.limit);
        out.json({ target: options.target, snapshots: snapshots.map(serializeSnapshot) });
        if (snapshots.length === 0) {
          out.line(`No snapshots found for ${options.target}`);
          return 0;
        }
        out.text(`Snapshot history for ${options.target}:`);
        out.text("-".repeat(80));
        for (const snapshot of snapshots) {
          out.text(
            [
              `  [${snapshot.id}] ${localTime(snapshot.observedAt)}`,
              `       IPv4: ${snapshot.ipv4Prefixes.length.toLocaleString("en-US")} | IPv6: ${snapshot.ipv6Prefixes.length.toLocaleString("en-US")}`,
              `       Hash: ${snapshot.contentHash.slice(0, 12)}... | Sources: ${snapshot.sources.join(", ")}`,
              "",
            ].join("\n"),
          );
        }
        return 0;
      }),
    );

  program
    .command("serve")
    .description("start the HTTP lookup and pipeline service")
    .action(async () => {
      let out = new Output(program.opts<GlobalOptions>(), stdout, stderr);
      try {
        const context = setup();
        out = context.out;
        await startServer(context.config, context.logger);
        setExitCode(0);
      } catch (error) {
        out.error(errorMessage(error));
        setExitCode(1);
      }
    });

  return program;
}

/** Parses `argv` (without the node and script entries) and resolves with the exit code. */
export async function runCli(argv: string[], io: CliEnvironment = {}): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(io, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  process.exitCode = await runCli(process.argv.slice(2));
}
