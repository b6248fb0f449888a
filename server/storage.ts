import {
  users,
  organizations,
  clients,
  services,
  clientServices,
  emailTemplates,
  clientEmailConfigs,
  scheduledEmails,
  StaffRole,
  ScheduledEmailStatus,
  type User,
  type Organization,
  type Client,
  type Service,
  type EmailTemplate,
  type InsertEmailTemplate,
  type ClientEmailConfig,
  type EmailConfigData,
  type ScheduledEmail,
  type InsertScheduledEmail,
  type ScheduledEmailStatusType,
  type ScheduledEmailWithTemplate,
} from "@shared/schema";
import type * as schema from "@shared/schema";
import { and, asc, desc, eq, getTableColumns, gte, inArray, isNull, lte, or, sql } from "drizzle-orm";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";

export interface ScheduledEmailListOptions {
  status?: ScheduledEmailStatusType;
  limit: number;
  skip: number;
}

export interface ScheduledEmailPage {
  items: ScheduledEmailWithTemplate[];
  total: number;
}

export type ScheduledEmailUpdate = Partial<
  Pick<ScheduledEmail, "status" | "errorMessage" | "sentAt" | "recipientEmails">
>;

export type EmailTemplateUpdate = Partial<Pick<EmailTemplate, "name" | "subject" | "body" | "variables">>;

export interface IStorage {
  /**
   * Runs `fn` against a storage bound to one database transaction. A throw
   * inside `fn` rolls every write back.
   */
  transaction<T>(fn: (tx: IStorage) => Promise<T>): Promise<T>;

  getUser(id: number): Promise<User | undefined>;
  getOrganization(id: number): Promise<Organization | undefined>;
  getOrganizationAdmin(orgId: number): Promise<User | undefined>;
  getClient(id: number): Promise<Client | undefined>;
  getClientServices(clientId: number): Promise<Service[]>;

  getEmailTemplate(id: number): Promise<EmailTemplate | undefined>;
  getEmailTemplatesByIds(ids: number[]): Promise<EmailTemplate[]>;
  getVisibleEmailTemplates(orgId: number): Promise<EmailTemplate[]>;
  getMasterEmailTemplates(): Promise<EmailTemplate[]>;
  getOrgEmailTemplateByName(orgId: number, name: string): Promise<EmailTemplate | undefined>;
  getMasterEmailTemplateByName(name: string): Promise<EmailTemplate | undefined>;
  getOrgCustomization(orgId: number, masterTemplateId: number): Promise<EmailTemplate | undefined>;
  countTemplateCustomizations(masterTemplateId: number): Promise<number>;
  createEmailTemplate(template: InsertEmailTemplate): Promise<EmailTemplate>;
  updateEmailTemplate(id: number, updates: EmailTemplateUpdate): Promise<EmailTemplate>;
  deleteEmailTemplate(id: number): Promise<void>;

  getClientEmailConfig(clientId: number): Promise<ClientEmailConfig | undefined>;
  createClientEmailConfig(clientId: number, configData: EmailConfigData): Promise<ClientEmailConfig>;
  updateClientEmailConfig(clientId: number, configData: EmailConfigData): Promise<ClientEmailConfig>;
  deleteClientEmailConfig(clientId: number): Promise<void>;

  createScheduledEmails(rows: InsertScheduledEmail[]): Promise<ScheduledEmail[]>;
  getScheduledEmail(id: number): Promise<ScheduledEmail | undefined>;
  getDueScheduledEmails(now: Date, today: string): Promise<ScheduledEmail[]>;
  getPendingScheduledEmails(clientId: number): Promise<ScheduledEmail[]>;
  listScheduledEmails(clientId: number, options: ScheduledEmailListOptions): Promise<ScheduledEmailPage>;
  updateScheduledEmail(id: number, updates: ScheduledEmailUpdate): Promise<ScheduledEmail>;
  cancelPendingScheduledEmails(clientId: number): Promise<number>;
}

// Both the pool-backed database and a transaction handle satisfy this
type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Executor) {}

  async transaction<T>(fn: (tx: IStorage) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(new DatabaseStorage(tx)));
  }

  async getUser(id: number): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.id, id));
    return user;
  }

  async getOrganization(id: number): Promise<Organization | undefined> {
    const [organization] = await this.db.select().from(organizations).where(eq(organizations.id, id));
    return organization;
  }

  async getOrganizationAdmin(orgId: number): Promise<User | undefined> {
    const [admin] = await this.db
      .select()
      .from(users)
      .where(and(eq(users.orgId, orgId), eq(users.role, StaffRole.ADMIN)))
      .orderBy(asc(users.id))
      .limit(1);
    return admin;
  }

  async getClient(id: number): Promise<Client | undefined> {
    const [client] = await this.db.select().from(clients).where(eq(clients.id, id));
    return client;
  }

  async getClientServices(clientId: number): Promise<Service[]> {
    const rows = await this.db
      .select({ service: services })
      .from(clientServices)
      .innerJoin(services, eq(clientServices.serviceId, services.id))
      .where(eq(clientServices.clientId, clientId))
      .orderBy(asc(services.id));
    return rows.map((row) => row.service);
  }

  async getEmailTemplate(id: number): Promise<EmailTemplate | undefined> {
    const [template] = await this.db.select().from(emailTemplates).where(eq(emailTemplates.id, id));
    return template;
  }

  async getEmailTemplatesByIds(ids: number[]): Promise<EmailTemplate[]> {
    if (ids.length === 0) return [];
    return this.db.select().from(emailTemplates).where(inArray(emailTemplates.id, ids));
  }

  async getVisibleEmailTemplates(orgId: number): Promise<EmailTemplate[]> {
    return this.db
      .select()
      .from(emailTemplates)
      .where(
        or(
          eq(emailTemplates.orgId, orgId),
          and(isNull(emailTemplates.orgId), eq(emailTemplates.isDefault, true)),
        ),
      )
      .orderBy(asc(emailTemplates.name), asc(emailTemplates.id));
  }

  async getMasterEmailTemplates(): Promise<EmailTemplate[]> {
    return this.db
      .select()
      .from(emailTemplates)
      .where(and(isNull(emailTemplates.orgId), eq(emailTemplates.isDefault, true)))
      .orderBy(asc(emailTemplates.name), asc(emailTemplates.id));
  }

  async getOrgEmailTemplateByName(orgId: number, name: string): Promise<EmailTemplate | undefined> {
    const [template] = await this.db
      .select()
      .from(emailTemplates)
      .where(and(eq(emailTemplates.orgId, orgId), eq(emailTemplates.name, name)));
    return template;
  }

  async getMasterEmailTemplateByName(name: string): Promise<EmailTemplate | undefined> {
    const [template] = await this.db
      .select()
      .from(emailTemplates)
      .where(and(isNull(emailTemplates.orgId), eq(emailTemplates.isDefault, true), eq(emailTemplates.name, name)));
    return template;
  }

  async getOrgCustomization(orgId: number, masterTemplateId: number): Promise<EmailTemplate | undefined> {
    const [template] = await this.db
      .select()
      .from(emailTemplates)
      .where(and(eq(emailTemplates.orgId, orgId), eq(emailTemplates.masterTemplateId, masterTemplateId)));
    return template;
  }

  async countTemplateCustomizations(masterTemplateId: number): Promise<number> {
    const [result] = await this.db
      .select({ count: sql<number>`count(*)::int` })
      .from(emailTemplates)
      .where(eq(emailTemplates.masterTemplateId, masterTemplateId));
    return result?.count ?? 0;
  }

  async createEmailTemplate(template: InsertEmailTemplate): Promise<EmailTemplate> {
    const [created] = await this.db.insert(emailTemplates).values(template).returning();
    return created;
  }

  async updateEmailTemplate(id: number, updates: EmailTemplateUpdate): Promise<EmailTemplate> {
    const [updated] = await this.db
      .update(emailTemplates)
      .set({ ...updates, updatedAt: new Date() })
      .where(eq(emailTemplates.id, id))
      .returning();
    return updated;
  }

  async deleteEmailTemplate(id: number): Promise<void> {
    await this.db.delete(emailTemplates).where(eq(emailTemplates.id, id));
  }

  async getClientEmailConfig(clientId: number): Promise<ClientEmailConfig | undefined> {
    const [config] = await this.db
      .select()
      .from(clientEmailConfigs)
      .where(eq(clientEmailConfigs.clientId, clientId));
    return config;
  }

  async createClientEmailConfig(clientId: number, configData: EmailConfigData): Promise<ClientEmailConfig> {
    const [config] = await this.db.insert(clientEmailConfigs).values({ clientId, configData }).returning();
    return config;
  }

  async updateClientEmailConfig(clientId: number, configData: EmailConfigData): Promise<ClientEmailConfig> {
    const [config] = await this.db
      .update(clientEmailConfigs)
      .set({ configData, updatedAt: new Date() })
      .where(eq(clientEmailConfigs.clientId, clientId))
      .returning();
    return config;
  }

  async deleteClientEmailConfig(clientId: number): Promise<void> {
    await this.db.delete(clientEmailConfigs).where(eq(clientEmailConfigs.clientId, clientId));
  }

  async createScheduledEmails(rows: InsertScheduledEmail[]): Promise<ScheduledEmail[]> {
    if (rows.length === 0) return [];
    return this.db.insert(scheduledEmails).values(rows).returning();
  }

  async getScheduledEmail(id: number): Promise<ScheduledEmail | undefined> {
    const [row] = await this.db.select().from(scheduledEmails).where(eq(scheduledEmails.id, id));
    return row;
  }

  async getDueScheduledEmails(now: Date, today: string): Promise<ScheduledEmail[]> {
    return this.db
      .select()
      .from(scheduledEmails)
      .where(
        and(
          eq(scheduledEmails.status, ScheduledEmailStatus.PENDING),
          lte(scheduledEmails.scheduledDatetime, now),
          or(
            eq(scheduledEmails.isRecurring, false),
            isNull(scheduledEmails.recurrenceEndDate),
            gte(scheduledEmails.recurrenceEndDate, today),
          ),
        ),
      )
      .orderBy(asc(scheduledEmails.scheduledDatetime), asc(scheduledEmails.id))
      .for("update", { skipLocked: true });
  }

  async getPendingScheduledEmails(clientId: number): Promise<ScheduledEmail[]> {
    return this.db
      .select()
      .from(scheduledEmails)
      .where(and(eq(scheduledEmails.clientId, clientId), eq(scheduledEmails.status, ScheduledEmailStatus.PENDING)))
      .orderBy(asc(scheduledEmails.scheduledDatetime), asc(scheduledEmails.id));
  }

  async listScheduledEmails(clientId: number, options: ScheduledEmailListOptions): Promise<ScheduledEmailPage> {
    const filter = options.status
      ? and(eq(scheduledEmails.clientId, clientId), eq(scheduledEmails.status, options.status))
      : eq(scheduledEmails.clientId, clientId);

    const items = await this.db
      .select({ ...getTableColumns(scheduledEmails), templateName: emailTemplates.name })
      .from(scheduledEmails)
      .leftJoin(emailTemplates, eq(scheduledEmails.templateId, emailTemplates.id))
      .where(filter)
      .orderBy(desc(scheduledEmails.scheduledDatetime), desc(scheduledEmails.id))
      .limit(options.limit)
      .offset(options.skip);

    const [counted] = await this.db
      .select({ count: sql<number>`count(*)::int` })
      .from(scheduledEmails)
      .where(filter);

    return { items, total: counted?.count ?? 0 };
  }

  async updateScheduledEmail(id: number, updates: ScheduledEmailUpdate): Promise<ScheduledEmail> {
    const [row] = await this.db
      .update(scheduledEmails)
      .set({ ...updates, updatedAt: new Date() })
      .where(eq(scheduledEmails.id, id))
      .returning();
    return row;
  }

  async cancelPendingScheduledEmails(clientId: number): Promise<number> {
    const cancelled = await this.db
      .update(scheduledEmails)
      .set({ status: ScheduledEmailStatus.CANCELLED, updatedAt: new Date() })
      .where(and(eq(scheduledEmails.clientId, clientId), eq(scheduledEmails.status, ScheduledEmailStatus.PENDING)))
      .returning({ id: scheduledEmails.id });
    return cancelled.length;
  }
}
