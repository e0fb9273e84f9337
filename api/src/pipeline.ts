import type { Logger } from "pino";
import { systemClock, type Clock, type SnapshotStore } from "./db.js";
import { computeDiff } from "./diff.js";
import { FetchFailure, NotFoundError, StorageFailure, errorMessage } from "./errors.js";
import { isTotalFailure, type PrefixFetcher } from "./fetcher.js";
import { inferTargetType } from "./schemas.js";
import type { TicketingClient } from "./ticketing.js";
import {
  SUCCESSFUL_TICKET_STATUSES,
  type BatchSummary,
  type ChangeSet,
  type ChangeSetResult,
  type PipelineStage,
  type PrefixResult,
  type RunOutcome,
  type RunStatus,
  type Snapshot,
  type Ticket,
  type TicketPayload,
} from "./types.js";

export type PipelineDependencies = {
  store: SnapshotStore;
  fetcher: PrefixFetcher;
  ticketing: TicketingClient;
  logger: Logger;
  lookbackSeconds: number;
  clock?: Clock;
};

export type BaselineDiff = {
  current: Snapshot;
  baseline: Snapshot | null;
  diff: ChangeSetResult;
};

export type SubmitOutcome = {
  status: Extract<RunStatus, "no_changes" | "already_submitted" | "created" | "duplicate" | "failed" | "dry_run">;
  changeSet: ChangeSet;
  ticket: Ticket | null;
};

export type RunOptions = {
  lookbackSeconds?: number;
  dryRun?: boolean;
};

export type BatchOptions = {
  dryRun?: boolean;
  concurrency?: number;
};

export type Pipeline = {
  fetchAndSnapshot(target: string): Promise<Snapshot>;
  diffAgainstBaseline(target: string, lookbackSeconds?: number): BaselineDiff;
  submitIfChanged(target: string, dryRun?: boolean): Promise<SubmitOutcome>;
  /** Resolves with a failed outcome instead of rejecting. */
  runPipeline(target: string, options?: RunOptions): Promise<RunOutcome>;
  runAll(targets: string[], options?: BatchOptions): Promise<BatchSummary>;
};

/** Either an earlier successful ticket, or the row claimed for this attempt. */
type Claim =
  | { kind: "existing"; ticket: Ticket }
  | { kind: "claimed"; ticket: Ticket; payload: TicketPayload };

const FAILED_STATUSES: ReadonlySet<RunStatus> = new Set(["fetch_failed", "storage_failed", "failed"]);

export function isFailedOutcome(outcome: RunOutcome): boolean {
  return FAILED_STATUSES.has(outcome.status);
}

function required<T>(value: T | null, what: string): T {
  if (value === null) {
    throw new StorageFailure("read back", `${what} missing after insert`);
  }
  return value;
}

export function createPipeline(deps: PipelineDependencies): Pipeline {
  const { store, fetcher, ticketing } = deps;
  const clock = deps.clock ?? systemClock;

  // Must run inside the caller's transaction so the check and the insert are atomic.
  const claimTicket = (changeSet: ChangeSet, sources: string[], dryRun: boolean): Claim => {
    const forDiff = store.getTicketForDiff(changeSet.id);
    if (forDiff && SUCCESSFUL_TICKET_STATUSES.includes(forDiff.status)) {
      return { kind: "existing", ticket: forDiff };
    }
    const forHash = store.getSuccessfulTicketForHash(changeSet.diffHash);
    if (forHash) {
      return { kind: "existing", ticket: forHash };
    }
    const payload = ticketing.buildPayload(changeSet.target, changeSet, sources);
    const ticketId = store.saveTicket(changeSet.id, changeSet.target, dryRun ? "dry_run" : "pending", payload);
    return { kind: "claimed", ticket: required(store.getTicketById(ticketId), "ticket"), payload };
  };

  const settleClaim = async (claim: Claim, changeSet: ChangeSet, log: Logger): Promise<SubmitOutcome> => {
    if (claim.kind === "existing") {
      log.info(
        { ticketId: claim.ticket.externalTicketId, status: claim.ticket.status },
        "change-set already submitted",
      );
      return { status: "already_submitted", changeSet, ticket: claim.ticket };
    }
    if (claim.ticket.status === "dry_run") {
      log.info({ diffHash: changeSet.diffHash, payload: claim.payload }, "dry run, ticket not submitted");
      return { status: "dry_run", changeSet, ticket: claim.ticket };
    }

    const result = await ticketing.submit(claim.payload, changeSet.diffHash);
    store.updateTicketStatus(
      claim.ticket.id,
      result.status,
      { ticket_id: result.externalTicketId, error_message: result.errorMessage },
      result.externalTicketId,
    );
    return { status: result.status, changeSet, ticket: required(store.getTicketById(claim.ticket.id), "ticket") };
  };

  const fetchPrefixes = async (target: string, log: Logger): Promise<PrefixResult> => {
    log.info({ strategy: fetcher.strategy }, "fetching prefixes");
    const result = await fetcher.fetch(target);
    if (isTotalFailure(result)) {
      throw new FetchFailure(target, result.errors);
    }
    return result;
  };

  const pipeline: Pipeline = {
    async fetchAndSnapshot(target) {
      const log = deps.logger.child({ target });
      const result = await fetchPrefixes(target, log);
      const id = store.saveSnapshot(target, inferTargetType(target), result.sourcesQueried, result.ipv4, result.ipv6);
      const snapshot = required(store.getSnapshotById(id), "snapshot");
      log.info({ snapshotId: id, ipv4: result.ipv4.size, ipv6: result.ipv6.size }, "snapshot saved");
      return snapshot;
    },

    diffAgainstBaseline(target, lookbackSeconds = deps.lookbackSeconds) {
      const current = store.getLatestSnapshot(target);
      if (!current) {
        throw new NotFoundError(`no snapshot found for ${target}`);
      }
      const baseline = store.getSnapshotBefore(target, current.observedAt - lookbackSeconds);
      return { current, baseline, diff: computeDiff(current, baseline) };
    },

    async submitIfChanged(target, dryRun = false) {
      const log = deps.logger.child({ target });
      const changeSet = store.getLatestDiff(target);
      if (!changeSet) {
        throw new NotFoundError(`no diff found for ${target}; run the pipeline first`);
      }
      if (!changeSet.hasChanges) {
        log.info("no changes to submit");
        return { status: "no_changes", changeSet, ticket: null };
      }
      const sources = store.getSnapshotById(changeSet.newSnapshotId)?.sources ?? [];
      const claim = store.transaction(() => claimTicket(changeSet, sources, dryRun));
      return settleClaim(claim, changeSet, log);
    },

    async runPipeline(target, options = {}) {
      const lookbackSeconds = options.lookbackSeconds ?? deps.lookbackSeconds;
      const dryRun = options.dryRun ?? false;
      const log = deps.logger.child({ target });
      let stage: PipelineStage = "fetch";

      let fetched: PrefixResult;
      try {
        fetched = await fetchPrefixes(target, log);
      } catch (error) {
        const errors = error instanceof FetchFailure ? error.errors : [errorMessage(error)];
        log.error({ errors }, "fetch failed, no snapshot written");
        return { target, stage, status: "fetch_failed", errors };
      }

      let snapshot: Snapshot | undefined;
      let changeSet: ChangeSet | undefined;
      try {
        stage = "snapshot";
        const recorded = store.transaction(() => {
          // The baseline is read before the new snapshot exists.
          const baseline = store.getSnapshotBefore(target, clock() - lookbackSeconds);
          const snapshotId = store.saveSnapshot(
            target,
            inferTargetType(target),
            fetched.sourcesQueried,
            fetched.ipv4,
            fetched.ipv6,
          );
          const current = required(store.getSnapshotById(snapshotId), "snapshot");

          stage = "diff";
          const diffId = store.saveDiff(computeDiff(current, baseline));
          const diff = required(store.getDiffById(diffId), "diff");

          if (!diff.hasChanges) {
            return { snapshot: current, changeSet: diff, baseline, claim: null };
          }
          stage = "submit";
          return { snapshot: current, changeSet: diff, baseline, claim: claimTicket(diff, fetched.sourcesQueried, dryRun) };
        });
        snapshot = recorded.snapshot;
        changeSet = recorded.changeSet;

        log.info(
          {
            snapshotId: snapshot.id,
            baselineId: recorded.baseline?.id ?? null,
            ipv4: snapshot.ipv4Prefixes.length,
            ipv6: snapshot.ipv6Prefixes.length,
            hasChanges: changeSet.hasChanges,
            diffHash: changeSet.diffHash,
          },
          "snapshot and diff recorded",
        );

        if (!recorded.claim) {
          return { target, stage, status: "no_changes", snapshot, changeSet, errors: fetched.errors };
        }

        const outcome = await settleClaim(recorded.claim, changeSet, log);
        return {
          target,
          stage,
          status: outcome.status,
          snapshot,
          changeSet,
          ticket: outcome.ticket ?? undefined,
          errors: outcome.ticket?.responsePayload?.error_message
            ? [...fetched.errors, outcome.ticket.responsePayload.error_message]
            : fetched.errors,
        };
      } catch (error) {
        const failure = error instanceof StorageFailure ? error : new StorageFailure(stage, error);
        log.error({ stage, err: failure.message }, "storage failure");
        return { target, stage, status: "storage_failed", snapshot, changeSet, errors: [failure.message] };
      }
    },

    async runAll(targets, options = {}) {
      const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
      const results: RunOutcome[] = [];
      let next = 0;

      // Each worker takes the next target; a target's own steps never overlap.
      const worker = async () => {
        while (next < targets.length) {
          const index = next;
          next += 1;
          const target = targets[index];
          if (target === undefined) break;
          try {
            results[index] = await pipeline.runPipeline(target, { dryRun: options.dryRun });
          } catch (error) {
            deps.logger.error({ target, err: errorMessage(error) }, "pipeline run failed");
            results[index] = { target, stage: "fetch", status: "fetch_failed", errors: [errorMessage(error)] };
          }
        }
      };
      await Promise.all(Array.from({ length: Math.min(concurrency, targets.length) }, worker));

      const failed = results.filter(isFailedOutcome).length;
      deps.logger.info({ total: targets.length, succeeded: targets.length - failed, failed }, "batch complete");
      return { total: targets.length, succeeded: targets.length - failed, failed, results };
    },
  };

  return pipeline;
}
