import { createHash } from "node:crypto";
import type { ChangeSetResult, PrefixDelta, Snapshot } from "./types.js";

type PrefixSource = Pick<Snapshot, "id" | "target" | "ipv4Prefixes" | "ipv6Prefixes">;

function sha256(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex");
}

function sorted(values: Iterable<string> | undefined): string[] {
  return values ? [...new Set(values)].sort() : [];
}

function minus(left: Set<string>, right: Set<string>): string[] {
  return [...left].filter((value) => !right.has(value)).sort();
}

// Keys in lexical order for a stable serialization.
export function computeContentHash(
  ipv4: Iterable<string> | undefined,
  ipv6: Iterable<string> | undefined,
): string {
  return sha256(JSON.stringify({ v4: sorted(ipv4), v6: sorted(ipv6) }));
}

export function computeDiffHash(target: string, delta: PrefixDelta): string {
  return sha256(
    JSON.stringify({
      added_v4: sorted(delta.addedV4),
      added_v6: sorted(delta.addedV6),
      removed_v4: sorted(delta.removedV4),
      removed_v6: sorted(delta.removedV6),
      target,
    }),
  );
}

/**
 * Content-based delta between `current` and `baseline`. A missing baseline
 * means first observation: everything in `current` counts as added.
 */
export function computeDiff(current: PrefixSource, baseline: PrefixSource | null): ChangeSetResult {
  const currentV4 = new Set(current.ipv4Prefixes ?? []);
  const currentV6 = new Set(current.ipv6Prefixes ?? []);

  let delta: PrefixDelta;
  if (baseline === null) {
    delta = {
      addedV4: sorted(currentV4),
      removedV4: [],
      addedV6: sorted(currentV6),
      removedV6: [],
    };
  } else {
    const baselineV4 = new Set(baseline.ipv4Prefixes ?? []);
    const baselineV6 = new Set(baseline.ipv6Prefixes ?? []);
    delta = {
      addedV4: minus(currentV4, baselineV4),
      removedV4: minus(baselineV4, currentV4),
      addedV6: minus(currentV6, baselineV6),
      removedV6: minus(baselineV6, currentV6),
    };
  }

  const hasChanges =
    delta.addedV4.length > 0 ||
    delta.removedV4.length > 0 ||
    delta.addedV6.length > 0 ||
    delta.removedV6.length > 0;

  return {
    target: current.target,
    newSnapshotId: current.id,
    oldSnapshotId: baseline?.id ?? null,
    ...delta,
    hasChanges,
    diffHash: computeDiffHash(current.target, delta),
  };
}

export function summarizeDiff(diff: Pick<ChangeSetResult, "target"> & PrefixDelta): string {
  const parts: string[] = [];
  if (diff.addedV4.length > 0) parts.push(`${diff.addedV4.length} added IPv4`);
  if (diff.removedV4.length > 0) parts.push(`${diff.removedV4.length} removed IPv4`);
  if (diff.addedV6.length > 0) parts.push(`${diff.addedV6.length} added IPv6`);
  if (diff.removedV6.length > 0) parts.push(`${diff.removedV6.length} removed IPv6`);
  if (parts.length === 0) return `No changes detected for ${diff.target}`;
  return `Detected ${parts.join(", ")} prefixes for ${diff.target}`;
}

function renderSection(
  lines: string[],
  title: string,
  marker: "+" | "-",
  prefixes: string[],
  maxLines: number,
): void {
  if (prefixes.length === 0) return;
  lines.push(`  ${title} (${prefixes.length}):`);
  for (const prefix of prefixes.slice(0, maxLines)) {
    lines.push(`    ${marker} ${prefix}`);
  }
  if (prefixes.length > maxLines) {
    lines.push(`    ... and ${prefixes.length - maxLines} more`);
  }
}

export function formatDiffText(diff: ChangeSetResult, maxLines = 10): string {
  const lines = [`Changes for ${diff.target}:`];
  if (!diff.hasChanges) {
    lines.push("  No changes detected");
    return lines.join("\n");
  }
  renderSection(lines, "Added IPv4", "+", diff.addedV4, maxLines);
  renderSection(lines, "Removed IPv4", "-", diff.removedV4, maxLines);
  renderSection(lines, "Added IPv6", "+", diff.addedV6, maxLines);
  renderSection(lines, "Removed IPv6", "-", diff.removedV6, maxLines);
  return lines.join("\n");
}

export function formatDiffJson(diff: ChangeSetResult) {
  return {
    target: diff.target,
    has_changes: diff.hasChanges,
    added_v4: diff.addedV4,
    removed_v4: diff.removedV4,
    added_v6: diff.addedV6,
    removed_v6: diff.removedV6,
    diff_hash: diff.diffHash,
    new_snapshot_id: diff.newSnapshotId,
    old_snapshot_id: diff.oldSnapshotId,
    summary: summarizeDiff(diff),
  };
}
