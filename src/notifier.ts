import { DeliveryError, errorMessage } from "./errors.js";
import { sleep } from "./humanDelay.js";
import { formatEmptyRunMessage, formatListingMessage } from "./messages.js";
import type { DeliveryOutcome, ListingRecord } from "./types.js";

/** Outbound message delivery. Throws DeliveryError on failure. */
export interface NotificationTransport {
  readonly name: string;
  send(recipient: string, text: string): Promise<void>;
}

export interface NotifierOptions {
  recipient: string;
  /** Area name used in message headers. */
  area: string;
  /** Attempts per message before it is skipped. */
  maxAttempts?: number;
  /** First retry waits this long; each further retry doubles it. */
  backoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/** Logs messages instead of sending them (--test). */
export function createDryRunTransport(): NotificationTransport & { sent: { recipient: string; text: string }[] } {
  const sent: { recipient: string; text: string }[] = [];
  return {
    name: "dry-run",
    sent,
    async send(recipient, text) {
      sent.push({ recipient, text });
      console.log(`[notify] (test mode) message for ${recipient}:\n${text}\n`);
    },
  };
}

/**
 * One message per new listing, each retried with backoff and skipped after the
 * last attempt so a single failure never stops the batch.
 */
export class Notifier {
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(
    private readonly transport: NotificationTransport,
    private readonly options: NotifierOptions
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.backoffMs = options.backoffMs ?? 2000;
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
    this.now = options.now ?? (() => new Date());
  }

  async notify(newRecords: readonly ListingRecord[], emptyRunPolicy: boolean): Promise<DeliveryOutcome[]> {
    if (newRecords.length === 0) {
      if (!emptyRunPolicy) return [];
      console.log("[notify] No new listings; sending summary.");
      return [await this.deliver(null, formatEmptyRunMessage(this.options.area, this.now()))];
    }

    const outcomes: DeliveryOutcome[] = [];
    for (const record of newRecords) {
      outcomes.push(await this.deliver(record.id, formatListingMessage(record, this.options.area, this.now())));
    }
    const sent = outcomes.filter((o) => o.kind === "sent").length;
    console.log(`[notify] Sent ${sent}/${outcomes.length} notification(s) via ${this.transport.name}.`);
    return outcomes;
  }

  private async deliver(listingId: string | null, text: string): Promise<DeliveryOutcome> {
    const label = listingId ?? "summary";
    let lastError = "";
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        await this.transport.send(this.options.recipient, text);
        return { kind: "sent", listingId, attempts: attempt };
      } catch (e) {
        const err = e instanceof DeliveryError ? e : new DeliveryError(errorMessage(e), { cause: e });
        lastError = err.message;
        if (attempt < this.maxAttempts) {
          const wait = this.backoffMs * 2 ** (attempt - 1);
          console.warn(`[notify] ${label}: attempt ${attempt} failed (${lastError}); retrying in ${wait} ms.`);
          await this.sleep(wait);
        }
      }
    }
    console.warn(`[notify] ${label}: giving up after ${this.maxAttempts} attempt(s): ${lastError}`);
    return { kind: "skipped", listingId, attempts: this.maxAttempts, error: lastError };
  }
}
