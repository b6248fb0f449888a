import { ScheduledEmailStatus, type ScheduledEmail } from "@shared/schema";
import { buildLoginUrl } from "../config";
import type { CredentialCipher } from "../credentials";
import { getErrorMessage } from "../errors";
import type { IStorage } from "../storage";
import { EMAIL_NOT_CONFIGURED, type EmailDelivery } from "./email-delivery";
import { nextOccurrence } from "./recurrence";
import { buildTemplateContext, renderTemplate, type RenderedEmail } from "./template-renderer";

export interface SendPipelineDeps {
  delivery: EmailDelivery;
  cipher: CredentialCipher;
  frontendUrl?: string;
}

export interface PipelineRunOptions {
  now: Date;
  /** Result of the once-per-tick configuration check. */
  mailConfigured: boolean;
}

export interface PipelineOutcome {
  row: ScheduledEmail;
  continuation: ScheduledEmail | null;
}

/**
 * Sends one due scheduled email and records the outcome on its row.
 */
export class SendPipeline {
  constructor(private readonly deps: SendPipelineDeps) {}

  async process(row: ScheduledEmail, storage: IStorage, options: PipelineRunOptions): Promise<PipelineOutcome> {
    const fail = async (message: string): Promise<PipelineOutcome> => {
      console.error(`[SCHEDULER] Scheduled email ${row.id} failed: ${message}`);
      const updated = await storage.updateScheduledEmail(row.id, {
        status: ScheduledEmailStatus.FAILED,
        errorMessage: message,
      });
      return { row: updated, continuation: null };
    };

    const client = await storage.getClient(row.clientId);
    if (!client) {
      return fail("Client not found");
    }

    const template = row.templateId !== null ? await storage.getEmailTemplate(row.templateId) : undefined;
    if (row.templateId !== null && !template) {
      return fail("Template not found");
    }

    const organization = await storage.getOrganization(client.orgId);
    if (!organization) {
      return fail("Organization not found");
    }

    if (!template) {
      return fail("Template not specified");
    }

    let loginEmail: string | null = null;
    let loginPassword: string | null = null;
    if (client.userId !== null) {
      const loginUser = await storage.getUser(client.userId);
      if (loginUser) {
        loginEmail = loginUser.email;
        loginPassword = loginUser.encryptedPlainPassword
          ? this.deps.cipher.decrypt(loginUser.encryptedPlainPassword)
          : null;
      }
    }

    const loginUrl = buildLoginUrl(this.deps.frontendUrl);
    if (!loginUrl) {
      console.warn(`[SCHEDULER] FRONTEND_URL not configured; login_url placeholder used for scheduled email ${row.id}`);
    }

    const [firstService] = await storage.getClientServices(client.id);
    const orgAdmin = await storage.getOrganizationAdmin(organization.id);

    let rendered: RenderedEmail;
    try {
      const context = buildTemplateContext({
        client,
        organization,
        template,
        orgAdmin,
        serviceDescription: firstService?.description,
        scheduledDate: row.scheduledDate,
        deadlineDate: row.scheduledDate,
        loginEmail,
        loginPassword,
        loginUrl,
        now: options.now,
      });
      rendered = renderTemplate(template, context, organization.name);
    } catch (error) {
      return fail(`Template variable replacement error: ${getErrorMessage(error)}`);
    }

    const errors: string[] = [];
    let successCount = 0;

    for (const [index, recipient] of row.recipientEmails.entries()) {
      if (!options.mailConfigured) {
        errors.push(`Error sending to ${recipient}: ${EMAIL_NOT_CONFIGURED}`);
        continue;
      }

      if (index > 0 && this.deps.delivery.emailDelayMs > 0) {
        await this.deps.delivery.pause(this.deps.delivery.emailDelayMs);
      }

      const result = await this.deps.delivery.deliver({
        to: recipient,
        subject: rendered.subject,
        html: rendered.html,
        fromName: organization.name,
      });

      if (result.success) {
        successCount++;
      } else {
        errors.push(`Error sending to ${recipient}: ${result.error ?? "Unknown error"}`);
      }
    }

    if (successCount === 0) {
      return fail(errors.length > 0 ? errors.join("; ") : "No recipients to send to");
    }

    const updated = await storage.updateScheduledEmail(row.id, {
      status: ScheduledEmailStatus.SENT,
      sentAt: options.now,
      errorMessage: errors.length > 0 ? errors.join("; ") : null,
    });
    console.log(
      `[SCHEDULER] Scheduled email ${row.id} sent to ${successCount}/${row.recipientEmails.length} recipient(s)`,
    );

    const next = nextOccurrence(updated);
    if (!next) {
      return { row: updated, continuation: null };
    }

    const [continuation] = await storage.createScheduledEmails([next]);
    console.log(`[SCHEDULER] Created next recurring email ${continuation.id} for ${next.scheduledDate} ${next.scheduledTime}`);
    return { row: updated, continuation };
  }
}
