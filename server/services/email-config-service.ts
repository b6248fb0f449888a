import {
  ScheduledEmailStatus,
  type Client,
  type ClientEmailConfig,
  type EmailConfigData,
  type InsertScheduledEmail,
  type RecipientConfig,
  type ScheduledEmail,
  type ScheduledEmailStatusType,
  type ScheduledEmailWithTemplate,
} from "@shared/schema";
import { format } from "date-fns";
import { normalizeTime, toDateString } from "@shared/utils";
import { BadRequestError, ConfigValidationError, ForbiddenError, NotFoundError } from "../errors";
import type { IStorage } from "../storage";
import { validateEmailConfig } from "./config-validation";
import { expandServiceSchedule } from "./recurrence";

export interface EmailConfigResponse {
  clientId: number;
  emails: string[];
  emailTemplates: EmailConfigData["emailTemplates"];
  services: EmailConfigData["services"];
  createdAt: Date | null;
  updatedAt: Date | null;
}

export interface ScheduledEmailListQuery {
  status?: ScheduledEmailStatusType;
  limit: number;
  skip: number;
}

export interface AdHocScheduleInput {
  clientId: number;
  templateId: number;
  recipientEmails: string[];
  sendInSeconds: number;
}

export function toConfigResponse(config: ClientEmailConfig): EmailConfigResponse {
  return {
    clientId: config.clientId,
    emails: config.configData.emails ?? [],
    emailTemplates: config.configData.emailTemplates ?? {},
    services: config.configData.services ?? {},
    createdAt: config.createdAt,
    updatedAt: config.updatedAt,
  };
}

export function serializeScheduledEmail<T extends ScheduledEmail>(row: T): T {
  return { ...row, scheduledTime: normalizeTime(row.scheduledTime) };
}

/**
 * Per-client email configuration: validation, persistence and the
 * scheduled rows derived from it.
 */
export class EmailConfigService {
  constructor(
    private readonly storage: IStorage,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async getClientForOrg(clientId: number, orgId: number): Promise<Client> {
    const client = await this.storage.getClient(clientId);
    if (!client || client.orgId !== orgId) {
      throw new NotFoundError("Client not found");
    }
    return client;
  }

  private async getConfigOrThrow(clientId: number, orgId: number): Promise<ClientEmailConfig> {
    await this.getClientForOrg(clientId, orgId);
    const config = await this.storage.getClientEmailConfig(clientId);
    if (!config) {
      throw new NotFoundError("Email configuration not found");
    }
    return config;
  }

  /**
   * Validates against today's date and expands every enabled service into rows.
   * Throws ConfigValidationError before anything is written.
   */
  private async expand(config: EmailConfigData, clientId: number, orgId: number): Promise<InsertScheduledEmail[]> {
    const now = this.now();
    const result = await validateEmailConfig(config, orgId, this.storage, toDateString(now));
    if (!result.ok) {
      throw new ConfigValidationError(result.errors);
    }

    return result.schedules.flatMap((schedule) => expandServiceSchedule(config, clientId, schedule, now));
  }

  async createConfig(clientId: number, orgId: number, config: EmailConfigData): Promise<EmailConfigResponse> {
    await this.getClientForOrg(clientId, orgId);

    if (await this.storage.getClientEmailConfig(clientId)) {
      throw new BadRequestError("Email configuration already exists. Use PUT to update.");
    }

    const rows = await this.expand(config, clientId, orgId);

    const saved = await this.storage.transaction(async (tx) => {
      const created = await tx.createClientEmailConfig(clientId, config);
      await tx.createScheduledEmails(rows);
      return created;
    });

    console.log(`[EMAIL CONFIG] Created configuration for client ${clientId} with ${rows.length} scheduled email(s)`);
    return toConfigResponse(saved);
  }

  /**
   * Replaces (or creates) the configuration. Pending rows of the previous
   * configuration are cancelled before the new expansion is written.
   */
  async replaceConfig(clientId: number, orgId: number, config: EmailConfigData): Promise<EmailConfigResponse> {
    await this.getClientForOrg(clientId, orgId);

    const rows = await this.expand(config, clientId, orgId);

    const { saved, cancelled } = await this.storage.transaction(async (tx) => {
      const existing = await tx.getClientEmailConfig(clientId);
      const cancelledCount = existing ? await tx.cancelPendingScheduledEmails(clientId) : 0;
      const written = existing
        ? await tx.updateClientEmailConfig(clientId, config)
        : await tx.createClientEmailConfig(clientId, config);
      await tx.createScheduledEmails(rows);
      return { saved: written, cancelled: cancelledCount };
    });

    console.log(
      `[EMAIL CONFIG] Replaced configuration for client ${clientId}: ${cancelled} pending cancelled, ${rows.length} scheduled`,
    );
    return toConfigResponse(saved);
  }

  async getConfig(clientId: number, orgId: number): Promise<EmailConfigResponse> {
    return toConfigResponse(await this.getConfigOrThrow(clientId, orgId));
  }

  async deleteConfig(clientId: number, orgId: number): Promise<void> {
    await this.getClientForOrg(clientId, orgId);

    const cancelled = await this.storage.transaction(async (tx) => {
      const count = await tx.cancelPendingScheduledEmails(clientId);
      await tx.deleteClientEmailConfig(clientId);
      return count;
    });

    console.log(`[EMAIL CONFIG] Deleted configuration for client ${clientId}, cancelled ${cancelled} pending email(s)`);
  }

  async listRecipients(clientId: number, orgId: number): Promise<{ emails: RecipientConfig[]; total: number }> {
    const config = await this.getConfigOrThrow(clientId, orgId);
    const emails = Object.entries(config.configData.emailTemplates ?? {}).map(([email, recipient]) => ({
      email,
      selectedTemplates: recipient.selectedTemplates ?? [],
    }));
    return { emails, total: emails.length };
  }

  async getRecipient(clientId: number, orgId: number, email: string): Promise<RecipientConfig> {
    const config = await this.getConfigOrThrow(clientId, orgId);
    const recipient = config.configData.emailTemplates[email];
    if (!recipient) {
      throw new NotFoundError(`Email '${email}' not found in configuration`);
    }
    return { email, selectedTemplates: recipient.selectedTemplates ?? [] };
  }

  async addRecipient(clientId: number, orgId: number, recipient: RecipientConfig): Promise<RecipientConfig> {
    const config = await this.getConfigOrThrow(clientId, orgId);
    const data = config.configData;

    if (data.emailTemplates[recipient.email]) {
      throw new BadRequestError(`Email '${recipient.email}' already exists in configuration`);
    }
    await this.assertTemplatesAccessible(recipient.selectedTemplates, orgId);

    const next: EmailConfigData = {
      ...data,
      emails: data.emails.includes(recipient.email) ? data.emails : [...data.emails, recipient.email],
      emailTemplates: {
        ...data.emailTemplates,
        [recipient.email]: { email: recipient.email, selectedTemplates: recipient.selectedTemplates },
      },
    };
    await this.storage.updateClientEmailConfig(clientId, next);

    return { email: recipient.email, selectedTemplates: recipient.selectedTemplates };
  }

  async updateRecipient(
    clientId: number,
    orgId: number,
    email: string,
    selectedTemplates: number[],
  ): Promise<RecipientConfig> {
    const config = await this.getConfigOrThrow(clientId, orgId);
    const data = config.configData;

    if (!data.emailTemplates[email]) {
      throw new NotFoundError(`Email '${email}' not found in configuration`);
    }
    await this.assertTemplatesAccessible(selectedTemplates, orgId);

    await this.storage.updateClientEmailConfig(clientId, {
      ...data,
      emailTemplates: { ...data.emailTemplates, [email]: { email, selectedTemplates } },
    });

    return { email, selectedTemplates };
  }

  /**
   * Drops an address from the configuration and from every pending row.
   * Rows left without recipients are cancelled.
   */
  async removeRecipient(clientId: number, orgId: number, email: string): Promise<{ message: string }> {
    const config = await this.getConfigOrThrow(clientId, orgId);
    const data = config.configData;

    if (!data.emailTemplates[email]) {
      throw new NotFoundError(`Email '${email}' not found in configuration`);
    }

    const remaining = Object.fromEntries(
      Object.entries(data.emailTemplates).filter(([address]) => address !== email),
    );
    const next: EmailConfigData = {
      ...data,
      emails: data.emails.filter((address) => address !== email),
      emailTemplates: remaining,
    };

    await this.storage.transaction(async (tx) => {
      for (const row of await tx.getPendingScheduledEmails(clientId)) {
        if (!row.recipientEmails.includes(email)) continue;

        const recipients = row.recipientEmails.filter((address) => address !== email);
        await tx.updateScheduledEmail(
          row.id,
          recipients.length > 0 ? { recipientEmails: recipients } : { status: ScheduledEmailStatus.CANCELLED },
        );
      }
      await tx.updateClientEmailConfig(clientId, next);
    });

    return { message: `Email '${email}' successfully removed from configuration` };
  }

  private async assertTemplatesAccessible(templateIds: number[], orgId: number): Promise<void> {
    if (templateIds.length === 0) return;

    const templates = await this.storage.getEmailTemplatesByIds(templateIds);
    const found = new Set(templates.map((template) => template.id));
    const missing = templateIds.filter((id) => !found.has(id));
    if (missing.length > 0) {
      throw new BadRequestError(`Invalid template IDs: [${missing.join(", ")}]`);
    }

    const foreign = templates.find((template) => template.orgId !== null && template.orgId !== orgId);
    if (foreign) {
      throw new ForbiddenError(`Template ID ${foreign.id} does not belong to your organization`);
    }
  }

  async listScheduledEmails(
    clientId: number,
    orgId: number,
    query: ScheduledEmailListQuery,
  ): Promise<{ scheduledEmails: ScheduledEmailWithTemplate[]; total: number }> {
    await this.getClientForOrg(clientId, orgId);
    const page = await this.storage.listScheduledEmails(clientId, query);
    return { scheduledEmails: page.items.map(serializeScheduledEmail), total: page.total };
  }

  private async getScheduledEmailForClient(clientId: number, orgId: number, emailId: number): Promise<ScheduledEmail> {
    await this.getClientForOrg(clientId, orgId);
    const row = await this.storage.getScheduledEmail(emailId);
    if (!row || row.clientId !== clientId) {
      throw new NotFoundError("Scheduled email not found");
    }
    return row;
  }

  /**
   * Cancels a pending row. Rows in any other state are left as they are.
   */
  async cancelScheduledEmail(clientId: number, orgId: number, emailId: number): Promise<void> {
    const row = await this.getScheduledEmailForClient(clientId, orgId, emailId);
    if (row.status === ScheduledEmailStatus.PENDING) {
      await this.storage.updateScheduledEmail(row.id, { status: ScheduledEmailStatus.CANCELLED });
    }
  }

  async retryScheduledEmail(clientId: number, orgId: number, emailId: number): Promise<{ message: string }> {
    const row = await this.getScheduledEmailForClient(clientId, orgId, emailId);
    if (row.status !== ScheduledEmailStatus.FAILED) {
      throw new BadRequestError("Can only retry failed emails");
    }

    await this.storage.updateScheduledEmail(row.id, { status: ScheduledEmailStatus.PENDING, errorMessage: null });
    return { message: "Email scheduled for retry" };
  }

  /**
   * One-off row due `sendInSeconds` from now, picked up by the next scheduler run.
   */
  async scheduleAdHoc(orgId: number, input: AdHocScheduleInput): Promise<ScheduledEmail> {
    await this.getClientForOrg(input.clientId, orgId);

    const template = await this.storage.getEmailTemplate(input.templateId);
    if (!template || (template.orgId !== null && template.orgId !== orgId)) {
      throw new NotFoundError("Template not found");
    }

    const scheduledDatetime = new Date(this.now().getTime() + input.sendInSeconds * 1000);
    const [row] = await this.storage.createScheduledEmails([
      {
        clientId: input.clientId,
        templateId: template.id,
        recipientEmails: input.recipientEmails,
        scheduledDate: toDateString(scheduledDatetime),
        scheduledTime: format(scheduledDatetime, "HH:mm:ss"),
        scheduledDatetime,
        status: ScheduledEmailStatus.PENDING,
        isRecurring: false,
        recurrenceEndDate: null,
      },
    ]);

    console.log(`[EMAIL CONFIG] Ad-hoc scheduled email ${row.id} due at ${scheduledDatetime.toISOString()}`);
    return serializeScheduledEmail(row);
  }
}
