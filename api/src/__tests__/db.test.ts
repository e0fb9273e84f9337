import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { SnapshotStore } from "../db.js";
import { computeDiff } from "../diff.js";
import { StorageFailure } from "../errors.js";
import type { TicketPayload } from "../types.js";
import { manualClock, memoryStore, type ManualClock } from "./helpers.js";

let clock: ManualClock;
let store: SnapshotStore;

beforeEach(() => {
  clock = manualClock(100);
  store = memoryStore(clock);
});

afterEach(() => {
  store.close();
});

const payload = (diffHash: string): TicketPayload => ({
  type: "irr_prefix_change",
  target: "AS64500",
  timestamp: "2024-01-01T00:00:00.000Z",
  changes: { added_ipv4: ["192.0.2.0/24"], removed_ipv4: [], added_ipv6: [], removed_ipv6: [] },
  summary: "Detected 1 added IPv4 prefixes for AS64500",
  irr_sources: ["RADB"],
  diff_hash: diffHash,
});

function saveChangedDiff(): { diffId: number; diffHash: string } {
  const id = store.saveSnapshot("AS64500", "asn", ["RADB"], ["192.0.2.0/24"], []);
  const snapshot = store.getSnapshotById(id);
  if (!snapshot) throw new Error("snapshot missing");
  const diff = computeDiff(snapshot, null);
  return { diffId: store.saveDiff(diff), diffHash: diff.diffHash };
}

describe("snapshots", () => {
  it("stores prefixes sorted and deduplicated", () => {
    const id = store.saveSnapshot(
      "AS64500",
      "asn",
      ["RADB", "RIPE"],
      ["198.51.100.0/24", "192.0.2.0/24", "192.0.2.0/24"],
      ["2001:db8::/32"],
    );
    const snapshot = store.getSnapshotById(id);
    expect(snapshot).toMatchObject({
      id,
      target: "AS64500",
      targetType: "asn",
      observedAt: 100,
      sources: ["RADB", "RIPE"],
      ipv4Prefixes: ["192.0.2.0/24", "198.51.100.0/24"],
      ipv6Prefixes: ["2001:db8::/32"],
    });
    expect(snapshot?.contentHash).toHaveLength(64);
  });

  it("returns null for unknown ids and targets", () => {
    expect(store.getSnapshotById(42)).toBeNull();
    expect(store.getLatestSnapshot("AS64500")).toBeNull();
  });

  it("finds the newest snapshot strictly before a cutoff", () => {
    for (const ts of [100, 200, 300]) {
      clock.now = ts;
      store.saveSnapshot("AS64500", "asn", ["RADB"], [`10.0.${ts / 100}.0/24`], []);
    }
    expect(store.getSnapshotBefore("AS64500", 250)?.observedAt).toBe(200);
    expect(store.getSnapshotBefore("AS64500", 200)?.observedAt).toBe(100);
    expect(store.getSnapshotBefore("AS64500", 100)).toBeNull();
    expect(store.getLatestSnapshot("AS64500")?.observedAt).toBe(300);
  });

  it("breaks timestamp ties by insertion order", () => {
    const first = store.saveSnapshot("AS64500", "asn", [], ["192.0.2.0/24"], []);
    const second = store.saveSnapshot("AS64500", "asn", [], ["192.0.2.0/24"], []);
    expect(second).toBeGreaterThan(first);
    expect(store.getLatestSnapshot("AS64500")?.id).toBe(second);
  });

  it("lists history newest first and honours the limit", () => {
    for (const ts of [100, 200, 300]) {
      clock.now = ts;
      store.saveSnapshot("AS64500", "asn", [], [], []);
    }
    store.saveSnapshot("AS64501", "asn", [], [], []);
    const history = store.getSnapshotHistory("AS64500", 2);
    expect(history.map((snapshot) => snapshot.observedAt)).toEqual([300, 200]);
    expect(store.getSnapshotHistory("AS64500")).toHaveLength(3);
  });
});

describe("diffs", () => {
  it("derives hasChanges from the stored lists", () => {
    const { diffId, diffHash } = saveChangedDiff();
    const diff = store.getDiffById(diffId);
    expect(diff).toMatchObject({ id: diffId, hasChanges: true, addedV4: ["192.0.2.0/24"], createdAt: 100 });
    expect(store.getDiffByHash(diffHash)?.id).toBe(diffId);
    expect(store.getLatestDiff("AS64500")?.id).toBe(diffId);
  });

  it("returns the newest diff for a repeated hash", () => {
    const first = saveChangedDiff();
    const second = saveChangedDiff();
    expect(second.diffHash).toBe(first.diffHash);
    expect(store.getDiffByHash(first.diffHash)?.id).toBe(second.diffId);
  });

  it("rejects a diff that references a missing snapshot", () => {
    const diff = {
      target: "AS64500",
      newSnapshotId: 999,
      oldSnapshotId: null,
      addedV4: [],
      removedV4: [],
      addedV6: [],
      removedV6: [],
      hasChanges: false,
      diffHash: "0".repeat(64),
    };
    expect(() => store.saveDiff(diff)).toThrow(StorageFailure);
  });
});

describe("tickets", () => {
  it("keeps the external id once one has been recorded", () => {
    const { diffId, diffHash } = saveChangedDiff();
    const ticketId = store.saveTicket(diffId, "AS64500", "pending", payload(diffHash));
    expect(store.getTicketById(ticketId)).toMatchObject({ status: "pending", externalTicketId: null, responsePayload: null });

    store.updateTicketStatus(ticketId, "created", { ticket_id: "TICKET-9", error_message: null }, "TICKET-9");
    store.updateTicketStatus(ticketId, "failed", { ticket_id: null, error_message: "later failure" }, null);

    const ticket = store.getTicketById(ticketId);
    expect(ticket).toMatchObject({
      status: "failed",
      externalTicketId: "TICKET-9",
      responsePayload: { ticket_id: null, error_message: "later failure" },
    });
    expect(ticket?.requestPayload.diff_hash).toBe(diffHash);
  });

  it("returns the newest ticket for a diff", () => {
    const { diffId, diffHash } = saveChangedDiff();
    store.saveTicket(diffId, "AS64500", "failed", payload(diffHash));
    const latest = store.saveTicket(diffId, "AS64500", "pending", payload(diffHash));
    expect(store.getTicketForDiff(diffId)?.id).toBe(latest);
  });

  it("finds successful tickets across diffs with the same hash", () => {
    const first = saveChangedDiff();
    const second = saveChangedDiff();
    store.saveTicket(first.diffId, "AS64500", "failed", payload(first.diffHash));
    expect(store.getSuccessfulTicketForHash(first.diffHash)).toBeNull();

    const created = store.saveTicket(first.diffId, "AS64500", "created", payload(first.diffHash), "TICKET-1");
    const found = store.getSuccessfulTicketForHash(second.diffHash);
    expect(found?.id).toBe(created);
    expect(found?.externalTicketId).toBe("TICKET-1");
  });
});

describe("transactions", () => {
  it("rolls back every write when the body throws", () => {
    expect(() =>
      store.transaction(() => {
        store.saveSnapshot("AS64500", "asn", [], ["192.0.2.0/24"], []);
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(store.getSnapshotHistory("AS64500")).toEqual([]);
  });

  it("reports driver errors as storage failures", () => {
    let caught: unknown;
    try {
      store.transaction(() => {
        store.saveSnapshot("AS64500", "asn", [], ["192.0.2.0/24"], []);
        throw Object.assign(new Error("database is locked"), { code: "SQLITE_BUSY" });
      });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(StorageFailure);
    expect(caught).toHaveProperty("message", "storage operation transaction failed: database is locked");
    expect(store.getLatestSnapshot("AS64500")).toBeNull();
  });

  it("passes storage failures from the body through unchanged", () => {
    const failure = new StorageFailure("save diff", new Error("disk full"));
    expect(() =>
      store.transaction(() => {
        throw failure;
      }),
    ).toThrow(failure);
  });

  it("returns the body's value on commit", () => {
    const id = store.transaction(() => store.saveSnapshot("AS64500", "asn", [], [], []));
    expect(store.getSnapshotById(id)?.id).toBe(id);
  });

  it("clears every table", () => {
    saveChangedDiff();
    store.clearAll();
    expect(store.getLatestSnapshot("AS64500")).toBeNull();
    expect(store.getLatestDiff("AS64500")).toBeNull();
  });
});
