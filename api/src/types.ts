export type TargetType = "asn" | "as-set";

export type Snapshot = {
  id: number;
  target: string;
  targetType: TargetType;
  observedAt: number;
  sources: string[];
  ipv4Prefixes: string[];
  ipv6Prefixes: string[];
  contentHash: string;
};

export type PrefixDelta = {
  addedV4: string[];
  removedV4: string[];
  addedV6: string[];
  removedV6: string[];
};

/** A computed diff that has not been persisted yet. */
export type ChangeSetResult = PrefixDelta & {
  target: string;
  newSnapshotId: number;
  oldSnapshotId: number | null;
  hasChanges: boolean;
  diffHash: string;
};

export type ChangeSet = ChangeSetResult & {
  id: number;
  createdAt: number;
};

export type TicketStatus = "pending" | "created" | "duplicate" | "failed" | "dry_run";

export const SUCCESSFUL_TICKET_STATUSES: readonly TicketStatus[] = ["created", "duplicate"];

export type TicketPayload = {
  type: "irr_prefix_change";
  target: string;
  timestamp: string;
  changes: {
    added_ipv4: string[];
    removed_ipv4: string[];
    added_ipv6: string[];
    removed_ipv6: string[];
  };
  summary: string;
  irr_sources: string[];
  diff_hash: string;
};

export type TicketResponsePayload = {
  ticket_id: string | null;
  error_message: string | null;
};

export type Ticket = {
  id: number;
  diffId: number;
  target: string;
  status: TicketStatus;
  externalTicketId: string | null;
  requestPayload: TicketPayload;
  responsePayload: TicketResponsePayload | null;
  createdAt: number;
};

export type PrefixResult = {
  ipv4: Set<string>;
  ipv6: Set<string>;
  sourcesQueried: string[];
  errors: string[];
};

export type PipelineStage = "fetch" | "snapshot" | "diff" | "submit";

export type RunStatus =
  | "fetch_failed"
  | "storage_failed"
  | "no_changes"
  | "already_submitted"
  | Exclude<TicketStatus, "pending">;

export type RunOutcome = {
  target: string;
  stage: PipelineStage;
  status: RunStatus;
  snapshot?: Snapshot;
  changeSet?: ChangeSet;
  ticket?: Ticket;
  errors: string[];
};

export type BatchSummary = {
  total: number;
  succeeded: number;
  failed: number;
  results: RunOutcome[];
};

export type LiveRun = {
  type: "run";
  ts: number;
  target: string;
  stage: PipelineStage;
  status: RunStatus;
  diff_hash: string | null;
  ticket_id: string | null;
};

export type Heartbeat = {
  type: "heartbeat";
  ts: number;
};

export type LiveMessage = LiveRun | Heartbeat;
