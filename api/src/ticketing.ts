import type { Logger } from "pino";
import { summarizeDiff } from "./diff.js";
import { SubmissionFailure, errorMessage } from "./errors.js";
import type { FetchImpl } from "./fetcher.js";
import { retryPolicy, withRetry, type RetryPolicy } from "./retry.js";
import { createdTicketSchema, duplicateTicketSchema } from "./schemas.js";
import type { ChangeSetResult, TicketPayload } from "./types.js";

export type SubmitStatus = "created" | "duplicate" | "failed";

export type SubmitResult = {
  status: SubmitStatus;
  externalTicketId: string | null;
  errorMessage: string | null;
  /** HTTP status of the last response, null when no response arrived. */
  responseStatus: number | null;
};

export type TicketingClient = {
  buildPayload(target: string, diff: ChangeSetResult, sources: string[], now?: Date): TicketPayload;
  /** Files the ticket. Resolves with `failed` rather than rejecting. */
  submit(payload: TicketPayload, idempotencyKey: string): Promise<SubmitResult>;
};

export type TicketingClientOptions = {
  baseUrl: string;
  apiToken: string;
  timeoutMs: number;
  retry: RetryPolicy;
  logger: Logger;
  fetchImpl?: FetchImpl;
};

/** Server errors and transport failures are retried; other client errors are final. */
export function ticketingRetryPolicy(maxRetries: number): RetryPolicy {
  return retryPolicy({
    maxAttempts: Math.max(1, maxRetries),
    isRetryable: (error) =>
      !(error instanceof SubmissionFailure) || error.statusCode === null || error.statusCode >= 500,
  });
}

async function readBody(response: Response): Promise<{ text: string; json: unknown }> {
  const text = await response.text();
  try {
    return { text, json: JSON.parse(text) };
  } catch {
    return { text, json: undefined };
  }
}

export function createTicketingClient(options: TicketingClientOptions): TicketingClient {
  const fetchImpl = options.fetchImpl ?? fetch;
  const url = `${options.baseUrl}/tickets`;

  const post = async (payload: TicketPayload, idempotencyKey: string): Promise<SubmitResult> => {
    options.logger.debug({ url, diffHash: idempotencyKey }, "submitting ticket");
    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: "POST",
        headers: {
          Accept: "application/json",
          "Content-Type": "application/json",
          "User-Agent": "irr-watch/0.1",
          Authorization: `Bearer ${options.apiToken}`,
          "X-Idempotency-Key": idempotencyKey,
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(options.timeoutMs),
      });
    } catch (error) {
      throw new SubmissionFailure(`request to ${url} failed: ${errorMessage(error)}`);
    }

    const body = await readBody(response);
    if (response.status === 201) {
      const created = createdTicketSchema.safeParse(body.json);
      if (created.success) {
        return { status: "created", externalTicketId: created.data.ticket_id, errorMessage: null, responseStatus: 201 };
      }
    }
    if (response.status === 409) {
      const duplicate = duplicateTicketSchema.safeParse(body.json);
      if (duplicate.success) {
        return {
          status: "duplicate",
          externalTicketId: duplicate.data.existing_ticket_id,
          errorMessage: null,
          responseStatus: 409,
        };
      }
    }
    throw new SubmissionFailure(
      `API returned status ${response.status}: ${body.text.slice(0, 200)}`,
      response.status,
    );
  };

  return {
    buildPayload(target, diff, sources, now = new Date()) {
      return {
        type: "irr_prefix_change",
        target,
        timestamp: now.toISOString(),
        changes: {
          added_ipv4: diff.addedV4,
          removed_ipv4: diff.removedV4,
          added_ipv6: diff.addedV6,
          removed_ipv6: diff.removedV6,
        },
        summary: summarizeDiff(diff),
        irr_sources: sources,
        diff_hash: diff.diffHash,
      };
    },

    async submit(payload, idempotencyKey) {
      const log = options.logger.child({ target: payload.target, diffHash: idempotencyKey });
      try {
        const result = await withRetry(options.retry, () => post(payload, idempotencyKey), {
          logger: log,
          label: "ticket submission",
        });
        if (result.status === "created") {
          log.info({ ticketId: result.externalTicketId }, "ticket created");
        } else {
          log.info({ ticketId: result.externalTicketId }, "ticket already exists");
        }
        return result;
      } catch (error) {
        const statusCode = error instanceof SubmissionFailure ? error.statusCode : null;
        log.error({ statusCode, err: errorMessage(error) }, "ticket submission failed");
        return { status: "failed", externalTicketId: null, errorMessage: errorMessage(error), responseStatus: statusCode };
      }
    },
  };
}
