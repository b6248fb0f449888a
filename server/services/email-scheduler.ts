import { ScheduledEmailStatus } from "@shared/schema";
import { toDateString } from "@shared/utils";
import { getErrorMessage } from "../errors";
import type { IStorage } from "../storage";
import type { EmailDelivery } from "./email-delivery";
import type { SendPipeline } from "./send-pipeline";

const MAX_ERROR_LENGTH = 1000;

export interface EmailSchedulerOptions {
  storage: IStorage;
  pipeline: SendPipeline;
  delivery: EmailDelivery;
  intervalMs?: number;
  now?: () => Date;
}

export interface TickSummary {
  processed: number;
  sent: number;
  failed: number;
}

export function truncateError(message: string): string {
  return message.length > MAX_ERROR_LENGTH ? `${message.slice(0, MAX_ERROR_LENGTH - 3)}...` : message;
}

export function msUntilNextMinute(now: Date): number {
  return 60_000 - (now.getTime() % 60_000);
}

/**
 * Polls for due scheduled emails once a minute, on the minute. Ticks never
 * overlap: one that is still running when the next is due makes it skip.
 */
export class EmailScheduler {
  private readonly storage: IStorage;
  private readonly pipeline: SendPipeline;
  private readonly delivery: EmailDelivery;
  private readonly intervalMs: number;
  private readonly now: () => Date;

  private alignTimer: NodeJS.Timeout | null = null;
  private interval: NodeJS.Timeout | null = null;
  private ticking = false;

  constructor(options: EmailSchedulerOptions) {
    this.storage = options.storage;
    this.pipeline = options.pipeline;
    this.delivery = options.delivery;
    this.intervalMs = options.intervalMs ?? 60_000;
    this.now = options.now ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.alignTimer !== null || this.interval !== null;
  }

  start(): void {
    if (this.isRunning) {
      return;
    }

    const delay = msUntilNextMinute(this.now());
    console.log(`[SCHEDULER] Starting email scheduler, first run in ${Math.round(delay / 1000)}s`);

    this.alignTimer = setTimeout(() => {
      this.alignTimer = null;
      this.interval = setInterval(() => this.trigger(), this.intervalMs);
      this.trigger();
    }, delay);
  }

  stop(): void {
    if (this.alignTimer) {
      clearTimeout(this.alignTimer);
      this.alignTimer = null;
    }
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      console.log("[SCHEDULER] Email scheduler stopped");
    }
  }

  private trigger(): void {
    if (this.ticking) {
      console.warn("[SCHEDULER] Previous run still in progress, skipping this tick");
      return;
    }

    this.ticking = true;
    this.runTick()
      .catch((error) => {
        console.error("[SCHEDULER] Error in scheduler tick, changes rolled back:", error);
      })
      .finally(() => {
        this.ticking = false;
      });
  }

  /**
   * Processes every row due at `now` inside one transaction.
   */
  async runTick(now: Date = this.now()): Promise<TickSummary> {
    const mailConfigured = this.delivery.isConfigured();
    if (!mailConfigured) {
      console.warn(`[SCHEDULER] Email not configured. Missing: ${this.delivery.missingSettings().join(", ")}`);
    }

    return this.storage.transaction(async (tx) => {
      const due = await tx.getDueScheduledEmails(now, toDateString(now));
      const summary: TickSummary = { processed: 0, sent: 0, failed: 0 };

      if (due.length === 0) {
        return summary;
      }
      console.log(`[SCHEDULER] Found ${due.length} scheduled email(s) to process at ${now.toISOString()}`);

      for (const row of due) {
        summary.processed++;
        try {
          // Savepoint per row
          const outcome = await tx.transaction((rowTx) => this.pipeline.process(row, rowTx, { now, mailConfigured }));
          if (outcome.row.status === ScheduledEmailStatus.SENT) {
            summary.sent++;
          } else {
            summary.failed++;
          }
        } catch (error) {
          console.error(`[SCHEDULER] Error processing scheduled email ${row.id}:`, error);
          await tx.updateScheduledEmail(row.id, {
            status: ScheduledEmailStatus.FAILED,
            errorMessage: truncateError(getErrorMessage(error)),
          });
          summary.failed++;
        }
      }

      console.log(
        `[SCHEDULER] Run complete: ${summary.sent} sent, ${summary.failed} failed of ${summary.processed}`,
      );
      return summary;
    });
  }
}
