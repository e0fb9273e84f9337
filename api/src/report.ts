import { formatDiffJson } from "./diff.js";
import type { LiveRun, RunOutcome, Snapshot, Ticket } from "./types.js";

// JSON shapes shared by the CLI `--json` output and the HTTP API.

export function isoSeconds(unixSeconds: number): string {
  return new Date(unixSeconds * 1000).toISOString();
}

export function serializeSnapshot(snapshot: Snapshot) {
  return {
    id: snapshot.id,
    target: snapshot.target,
    target_type: snapshot.targetType,
    observed_at: isoSeconds(snapshot.observedAt),
    ipv4_count: snapshot.ipv4Prefixes.length,
    ipv6_count: snapshot.ipv6Prefixes.length,
    content_hash: snapshot.contentHash,
    sources: snapshot.sources,
  };
}

export function serializeTicket(ticket: Ticket) {
  return {
    id: ticket.id,
    diff_id: ticket.diffId,
    status: ticket.status,
    external_ticket_id: ticket.externalTicketId,
    error_message: ticket.responsePayload?.error_message ?? null,
    created_at: isoSeconds(ticket.createdAt),
  };
}

export function serializeOutcome(outcome: RunOutcome) {
  return {
    target: outcome.target,
    stage: outcome.stage,
    status: outcome.status,
    snapshot: outcome.snapshot ? serializeSnapshot(outcome.snapshot) : null,
    diff: outcome.changeSet ? formatDiffJson(outcome.changeSet) : null,
    ticket: outcome.ticket ? serializeTicket(outcome.ticket) : null,
    errors: outcome.errors,
  };
}

export function liveRun(outcome: RunOutcome, ts = Date.now()): LiveRun {
  return {
    type: "run",
    ts,
    target: outcome.target,
    stage: outcome.stage,
    status: outcome.status,
    diff_hash: outcome.changeSet?.diffHash ?? null,
    ticket_id: outcome.ticket?.externalTicketId ?? null,
  };
}
