import type { FetchStrategy } from "./config.js";
import type { PrefixResult } from "./types.js";

/**
 * Looks up the prefixes a target has registered. Implementations never
 * reject for partial failures; they report them in `errors`.
 */
export type PrefixFetcher = {
  readonly strategy: FetchStrategy;
  fetch(target: string): Promise<PrefixResult>;
};

export type FetchImpl = typeof fetch;

export function emptyResult(): PrefixResult {
  return { ipv4: new Set(), ipv6: new Set(), sourcesQueried: [], errors: [] };
}

/** No data at all plus reported errors: a failed lookup, not an empty registry. */
export function isTotalFailure(result: PrefixResult): boolean {
  return result.ipv4.size === 0 && result.ipv6.size === 0 && result.errors.length > 0;
}
