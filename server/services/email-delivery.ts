import { getMissingMailSettings, type MailSettings } from "../config";
import { getErrorMessage } from "../errors";
import type { MailTransport, OutgoingEmail } from "./mail-transport";

export interface DeliveryResult {
  success: boolean;
  error?: string;
}

export const EMAIL_NOT_CONFIGURED = "Email service not configured";

const RETRYABLE_MARKERS = [
  "timeout",
  "timed out",
  "connection",
  "network",
  "temporary",
  "econnreset",
  "econnrefused",
  "etimedout",
];

export function isRetryableError(message: string): boolean {
  const lower = message.toLowerCase();
  return RETRYABLE_MARKERS.some((marker) => lower.includes(marker));
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Sends through a MailTransport with bounded retries. Transient failures
 * back off `attempt * 2` seconds; anything else is returned immediately.
 */
export class EmailDelivery {
  constructor(
    private readonly transport: MailTransport,
    private readonly settings: MailSettings,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  isConfigured(): boolean {
    return getMissingMailSettings(this.settings).length === 0;
  }

  missingSettings(): string[] {
    return getMissingMailSettings(this.settings);
  }

  get emailDelayMs(): number {
    return this.settings.emailDelaySeconds * 1000;
  }

  pause(ms: number): Promise<void> {
    return this.sleep(ms);
  }

  async deliver(email: OutgoingEmail): Promise<DeliveryResult> {
    const missing = this.missingSettings();
    if (missing.length > 0) {
      console.warn(`[EMAIL] Email not configured. Skipping send to ${email.to}. Missing: ${missing.join(", ")}`);
      return { success: false, error: EMAIL_NOT_CONFIGURED };
    }

    const attempts = this.settings.retryAttempts;
    let lastError = "Unknown error";

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        await this.transport.send(email);
        console.log(`[EMAIL] Sent to ${email.to} (attempt ${attempt}/${attempts})`);
        return { success: true };
      } catch (error) {
        lastError = getErrorMessage(error);

        if (!isRetryableError(lastError)) {
          console.error(`[EMAIL] Failed to send to ${email.to}: ${lastError}`);
          return { success: false, error: lastError };
        }

        if (attempt < attempts) {
          const backoffMs = attempt * 2000;
          console.warn(`[EMAIL] Attempt ${attempt}/${attempts} to ${email.to} failed: ${lastError}. Retrying in ${backoffMs / 1000}s`);
          await this.sleep(backoffMs);
        }
      }
    }

    console.error(`[EMAIL] Giving up on ${email.to} after ${attempts} attempts: ${lastError}`);
    return { success: false, error: lastError };
  }
}
