import { z } from "zod";
import type { TargetType } from "./types.js";

const TARGET_PATTERN = /^AS[-\w:]+$/;
const ASN_PATTERN = /^AS\d+$/;

export const targetSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(TARGET_PATTERN, "target must be an ASN (e.g. AS15169) or AS-SET (e.g. AS-EXAMPLE)");

export function inferTargetType(target: string): TargetType {
  return ASN_PATTERN.test(target) ? "asn" : "as-set";
}

export const fetchRequestSchema = z.object({
  target: targetSchema,
});

export const runRequestSchema = z
  .object({
    dry_run: z.boolean().default(false),
  })
  .default({});

export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(10),
});

const prefixList = z.array(z.string());

export const ticketPayloadSchema = z.object({
  type: z.literal("irr_prefix_change"),
  target: z.string(),
  timestamp: z.string(),
  changes: z.object({
    added_ipv4: prefixList,
    removed_ipv4: prefixList,
    added_ipv6: prefixList,
    removed_ipv6: prefixList,
  }),
  summary: z.string(),
  irr_sources: z.array(z.string()),
  diff_hash: z.string(),
});

export const ticketResponsePayloadSchema = z.object({
  ticket_id: z.string().nullable(),
  error_message: z.string().nullable(),
});

export const stringListSchema = prefixList;

/** Body returned by the remote lookup service, consumed by the proxy fetcher. */
export const prefixResponseSchema = z.object({
  target: z.string(),
  ipv4_prefixes: prefixList,
  ipv6_prefixes: prefixList,
  sources_queried: z.array(z.string()).default([]),
  errors: z.array(z.string()).default([]),
});

export const createdTicketSchema = z.object({
  ticket_id: z.string().nullable().default(null),
});

export const duplicateTicketSchema = z.object({
  existing_ticket_id: z.string().nullable().default(null),
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
