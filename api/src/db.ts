import { mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { fileURLToPath } from "node:url";
import Database from "better-sqlite3";
import { computeContentHash } from "./diff.js";
import { StorageFailure } from "./errors.js";
import {
  stringListSchema,
  ticketPayloadSchema,
  ticketResponsePayloadSchema,
} from "./schemas.js";
import type {
  ChangeSet,
  ChangeSetResult,
  Snapshot,
  TargetType,
  Ticket,
  TicketPayload,
  TicketResponsePayload,
  TicketStatus,
} from "./types.js";

type SnapshotRow = {
  id: number;
  target: string;
  target_type: TargetType;
  observed_at: number;
  sources: string;
  ipv4_prefixes: string;
  ipv6_prefixes: string;
  content_hash: string;
};

type DiffRow = {
  id: number;
  new_snapshot_id: number;
  old_snapshot_id: number | null;
  target: string;
  added_v4: string;
  removed_v4: string;
  added_v6: string;
  removed_v6: string;
  diff_hash: string;
  has_changes: number;
  created_at: number;
};

type TicketRow = {
  id: number;
  diff_id: number;
  target: string;
  external_ticket_id: string | null;
  status: TicketStatus;
  request_payload: string;
  response_payload: string | null;
  created_at: number;
};

export type Clock = () => number;

export type StoreOptions = {
  path?: string;
  /** Unix seconds. */
  clock?: Clock;
};

export type SnapshotStore = {
  readonly path: string;
  init(): void;
  transaction<T>(fn: () => T): T;
  saveSnapshot(
    target: string,
    targetType: TargetType,
    sources: string[],
    ipv4: Iterable<string>,
    ipv6: Iterable<string>,
  ): number;
  getSnapshotById(id: number): Snapshot | null;
  getLatestSnapshot(target: string): Snapshot | null;
  getSnapshotBefore(target: string, cutoff: number): Snapshot | null;
  getSnapshotHistory(target: string, limit?: number): Snapshot[];
  saveDiff(diff: ChangeSetResult): number;
  getDiffById(id: number): ChangeSet | null;
  getDiffByHash(diffHash: string): ChangeSet | null;
  getLatestDiff(target: string): ChangeSet | null;
  saveTicket(
    diffId: number,
    target: string,
    status: TicketStatus,
    requestPayload: TicketPayload,
    externalTicketId?: string | null,
  ): number;
  updateTicketStatus(
    ticketId: number,
    status: TicketStatus,
    responsePayload: TicketResponsePayload | null,
    externalTicketId: string | null,
  ): void;
  getTicketById(id: number): Ticket | null;
  getTicketForDiff(diffId: number): Ticket | null;
  getSuccessfulTicketForHash(diffHash: string): Ticket | null;
  clearAll(): void;
  close(): void;
};

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

function parseList(raw: string): string[] {
  return stringListSchema.parse(JSON.parse(raw));
}

function toSnapshot(row: SnapshotRow): Snapshot {
  return {
    id: row.id,
    target: row.target,
    targetType: row.target_type,
    observedAt: row.observed_at,
    sources: parseList(row.sources),
    ipv4Prefixes: parseList(row.ipv4_prefixes),
    ipv6Prefixes: parseList(row.ipv6_prefixes),
    contentHash: row.content_hash,
  };
}

function toChangeSet(row: DiffRow): ChangeSet {
  return {
    id: row.id,
    target: row.target,
    newSnapshotId: row.new_snapshot_id,
    oldSnapshotId: row.old_snapshot_id,
    addedV4: parseList(row.added_v4),
    removedV4: parseList(row.removed_v4),
    addedV6: parseList(row.added_v6),
    removedV6: parseList(row.removed_v6),
    diffHash: row.diff_hash,
    hasChanges: row.has_changes === 1,
    createdAt: row.created_at,
  };
}

function toTicket(row: TicketRow): Ticket {
  return {
    id: row.id,
    diffId: row.diff_id,
    target: row.target,
    status: row.status,
    externalTicketId: row.external_ticket_id,
    requestPayload: ticketPayloadSchema.parse(JSON.parse(row.request_payload)),
    responsePayload:
      row.response_payload === null
        ? null
        : ticketResponsePayloadSchema.parse(JSON.parse(row.response_payload)),
    createdAt: row.created_at,
  };
}

function sortedJson(values: Iterable<string>): string {
  return JSON.stringify([...new Set(values)].sort());
}

function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof StorageFailure) throw error;
    throw new StorageFailure(operation, error);
  }
}

/**
 * Opens the SQLite-backed log of snapshots, change-sets and tickets.
 * Rows are only ever inserted, apart from the ticket status transition.
 */
export function openStore(options: StoreOptions = {}): SnapshotStore {
  const path = options.path ?? process.env.IRR_DB_PATH ?? "./data/irr.sqlite";
  const clock = options.clock ?? systemClock;

  const db = guard("open", () => {
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    const handle = new Database(path);
    handle.pragma("journal_mode = WAL");
    handle.pragma("foreign_keys = ON");
    return handle;
  });

  const selectSnapshot = (where: string, params: unknown[]): Snapshot | null =>
    guard("select snapshot", () => {
      const row = db
        .prepare<unknown[], SnapshotRow>(`SELECT * FROM snapshots WHERE ${where} LIMIT 1`)
        .get(...params);
      return row ? toSnapshot(row) : null;
    });

  const selectDiff = (where: string, params: unknown[]): ChangeSet | null =>
    guard("select diff", () => {
      const row = db.prepare<unknown[], DiffRow>(`SELECT * FROM diffs WHERE ${where} LIMIT 1`).get(...params);
      return row ? toChangeSet(row) : null;
    });

  const selectTicket = (sql: string, params: unknown[]): Ticket | null =>
    guard("select ticket", () => {
      const row = db.prepare<unknown[], TicketRow>(sql).get(...params);
      return row ? toTicket(row) : null;
    });

  return {
    path,

    init() {
      guard("init", () => {
        const schemaPath = fileURLToPath(new URL("./schema.sql", import.meta.url));
        db.exec(readFileSync(schemaPath, "utf-8"));
      });
    },

    transaction(fn) {
      // Nested calls become savepoints inside the outer transaction.
      return guard("transaction", () => db.transaction(fn)());
    },

    saveSnapshot(target, targetType, sources, ipv4, ipv6) {
      const v4 = [...ipv4];
      const v6 = [...ipv6];
      return guard("save snapshot", () => {
        const result = db
          .prepare(
            `INSERT INTO snapshots
               (target, target_type, observed_at, sources, ipv4_prefixes, ipv6_prefixes, content_hash)
             VALUES (@target, @target_type, @observed_at, @sources, @ipv4, @ipv6, @content_hash)`,
          )
          .run({
            target,
            target_type: targetType,
            observed_at: clock(),
            sources: JSON.stringify(sources),
            ipv4: sortedJson(v4),
            ipv6: sortedJson(v6),
            content_hash: computeContentHash(v4, v6),
          });
        return Number(result.lastInsertRowid);
      });
    },

    getSnapshotById(id) {
      return selectSnapshot("id = ?", [id]);
    },

    getLatestSnapshot(target) {
      return selectSnapshot("target = ? ORDER BY observed_at DESC, id DESC", [target]);
    },

    getSnapshotBefore(target, cutoff) {
      return selectSnapshot("target = ? AND observed_at < ? ORDER BY observed_at DESC, id DESC", [
        target,
        cutoff,
      ]);
    },

    getSnapshotHistory(target, limit = 10) {
      return guard("snapshot history", () =>
        db
          .prepare<unknown[], SnapshotRow>(
            `SELECT * FROM snapshots WHERE target = ? ORDER BY observed_at DESC, id DESC LIMIT ?`,
          )
          .all(target, limit)
          .map(toSnapshot),
      );
    },

    saveDiff(diff) {
      return guard("save diff", () => {
        const result = db
          .prepare(
            `INSERT INTO diffs
               (new_snapshot_id, old_snapshot_id, target, added_v4, removed_v4, added_v6, removed_v6,
                diff_hash, has_changes, created_at)
             VALUES (@new_snapshot_id, @old_snapshot_id, @target, @added_v4, @removed_v4, @added_v6,
                @removed_v6, @diff_hash, @has_changes, @created_at)`,
          )
          .run({
            new_snapshot_id: diff.newSnapshotId,
            old_snapshot_id: diff.oldSnapshotId,
            target: diff.target,
            added_v4: sortedJson(diff.addedV4),
            removed_v4: sortedJson(diff.removedV4),
            added_v6: sortedJson(diff.addedV6),
            removed_v6: sortedJson(diff.removedV6),
            diff_hash: diff.diffHash,
            has_changes:
              diff.addedV4.length + diff.removedV4.length + diff.addedV6.length + diff.removedV6.length > 0
                ? 1
                : 0,
            created_at: clock(),
          });
        return Number(result.lastInsertRowid);
      });
    },

    getDiffById(id) {
      return selectDiff("id = ?", [id]);
    },

    getDiffByHash(diffHash) {
      return selectDiff("diff_hash = ? ORDER BY id DESC", [diffHash]);
    },

    getLatestDiff(target) {
      return selectDiff("target = ? ORDER BY created_at DESC, id DESC", [target]);
    },

    saveTicket(diffId, target, status, requestPayload, externalTicketId = null) {
      return guard("save ticket", () => {
        const result = db
          .prepare(
            `INSERT INTO tickets
               (diff_id, target, external_ticket_id, status, request_payload, response_payload, created_at)
             VALUES (@diff_id, @target, @external_ticket_id, @status, @request_payload, NULL, @created_at)`,
          )
          .run({
            diff_id: diffId,
            target,
            external_ticket_id: externalTicketId,
            status,
            request_payload: JSON.stringify(requestPayload),
            created_at: clock(),
          });
        return Number(result.lastInsertRowid);
      });
    },

    updateTicketStatus(ticketId, status, responsePayload, externalTicketId) {
      guard("update ticket", () => {
        db.prepare(
          `UPDATE tickets
             SET status = @status,
                 response_payload = @response_payload,
                 external_ticket_id = COALESCE(@external_ticket_id, external_ticket_id)
           WHERE id = @id`,
        ).run({
          id: ticketId,
          status,
          response_payload: responsePayload === null ? null : JSON.stringify(responsePayload),
          external_ticket_id: externalTicketId,
        });
      });
    },

    getTicketById(id) {
      return selectTicket(`SELECT * FROM tickets WHERE id = ?`, [id]);
    },

    getTicketForDiff(diffId) {
      return selectTicket(`SELECT * FROM tickets WHERE diff_id = ? ORDER BY created_at DESC, id DESC LIMIT 1`, [
        diffId,
      ]);
    },

    getSuccessfulTicketForHash(diffHash) {
      return selectTicket(
        `SELECT t.* FROM tickets t
           JOIN diffs d ON d.id = t.diff_id
          WHERE d.diff_hash = ? AND t.status IN ('created', 'duplicate')
          ORDER BY t.id DESC
          LIMIT 1`,
        [diffHash],
      );
    },

    clearAll() {
      guard("clear", () => {
        db.exec(`
          DELETE FROM tickets;
          DELETE FROM diffs;
          DELETE FROM snapshots;
        `);
      });
    },

    close() {
      db.close();
    },
  };
}
