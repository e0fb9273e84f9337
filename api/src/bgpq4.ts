import { spawn } from "node:child_process";
import type { Logger } from "pino";
import { z } from "zod";
import { FetcherError, errorMessage } from "./errors.js";
import { emptyResult, type PrefixFetcher } from "./fetcher.js";
import { withRetry, type RetryPolicy } from "./retry.js";

export type Bgpq4Options = {
  command: string[];
  source: string;
  aggregate: boolean;
  timeoutMs: number;
  retry: RetryPolicy;
  logger: Logger;
};

type Family = "ipv4" | "ipv6";

const prefixListSchema = z.object({
  pl: z.array(z.object({ prefix: z.string().optional() }).passthrough()).default([]),
});

export function bgpq4Args(options: Pick<Bgpq4Options, "source" | "aggregate">, target: string, family: Family) {
  const args = [family === "ipv6" ? "-6" : "-4", "-j"];
  if (options.aggregate) args.push("-A");
  args.push("-S", options.source, "-l", "pl", target);
  return args;
}

/** Parses `bgpq4 -j -l pl` output: `{ "pl": [{ "prefix": "192.0.2.0/24", "exact": true }] }`. */
export function parseBgpq4Output(output: string): Set<string> {
  if (!output.trim()) return new Set();
  let data: unknown;
  try {
    data = JSON.parse(output);
  } catch (error) {
    throw new FetcherError(`failed to parse bgpq4 JSON output: ${errorMessage(error)}`, false);
  }
  const parsed = prefixListSchema.safeParse(data);
  if (!parsed.success) {
    throw new FetcherError("unexpected bgpq4 JSON output", false);
  }
  const prefixes = new Set<string>();
  for (const entry of parsed.data.pl) {
    if (entry.prefix) prefixes.add(entry.prefix);
  }
  return prefixes;
}

function runBgpq4(command: string[], args: string[], timeoutMs: number): Promise<string> {
  const [bin, ...baseArgs] = command;
  return new Promise((resolve, reject) => {
    if (!bin) {
      reject(new FetcherError("bgpq4 command is empty", false));
      return;
    }
    const proc = spawn(bin, [...baseArgs, ...args], { stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";
    proc.stdout.on("data", (chunk) => {
      stdout += chunk.toString();
    });
    proc.stderr.on("data", (chunk) => {
      stderr += chunk.toString();
    });

    const timer = setTimeout(() => {
      proc.kill();
      reject(new FetcherError(`bgpq4 timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    timer.unref?.();

    proc.on("error", (error: Error) => {
      clearTimeout(timer);
      if ("code" in error && error.code === "ENOENT") {
        reject(new FetcherError(`command not found: ${bin}; install bgpq4 or set fetcher.bgpq4.command`, false));
        return;
      }
      reject(new FetcherError(`failed to start bgpq4: ${error.message}`));
    });

    proc.on("close", (code: number | null) => {
      clearTimeout(timer);
      if (code !== 0) {
        reject(new FetcherError(`bgpq4 exited with code ${code}: ${stderr.trim()}`));
        return;
      }
      resolve(stdout);
    });
  });
}

/** Runs the bgpq4 CLI once per address family against a single IRR source. */
export function createBgpq4Fetcher(options: Bgpq4Options): PrefixFetcher {
  const query = async (target: string, family: Family) => {
    const args = bgpq4Args(options, target, family);
    options.logger.debug({ command: [...options.command, ...args].join(" ") }, "running bgpq4");
    const output = await withRetry(options.retry, () => runBgpq4(options.command, args, options.timeoutMs), {
      logger: options.logger,
      label: `bgpq4 ${family}`,
    });
    return parseBgpq4Output(output);
  };

  return {
    strategy: "bgpq4",

    async fetch(rawTarget) {
      const target = rawTarget.trim().toUpperCase();
      const result = emptyResult();
      result.sourcesQueried.push(options.source);

      for (const family of ["ipv4", "ipv6"] as const) {
        try {
          result[family] = await query(target, family);
        } catch (error) {
          result.errors.push(`${family === "ipv4" ? "IPv4" : "IPv6"} query failed: ${errorMessage(error)}`);
        }
      }

      options.logger.info(
        { target, source: options.source, ipv4: result.ipv4.size, ipv6: result.ipv6.size },
        "bgpq4 lookup complete",
      );
      return result;
    },
  };
}
