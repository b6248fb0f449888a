import {
  pgTable,
  text,
  serial,
  integer,
  timestamp,
  boolean,
  date,
  time,
  jsonb,
  index,
  primaryKey,
  type AnyPgColumn,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const StaffRole = {
  ADMIN: "admin",
  EMPLOYEE: "employee",
  MASTER_ADMIN: "master_admin", // Manages global (master) templates
} as const;

export type StaffRoleType = typeof StaffRole[keyof typeof StaffRole];

export const ScheduledEmailStatus = {
  PENDING: "pending",
  SENT: "sent",
  FAILED: "failed",
  CANCELLED: "cancelled",
} as const;

export type ScheduledEmailStatusType = typeof ScheduledEmailStatus[keyof typeof ScheduledEmailStatus];

export const SCHEDULED_EMAIL_STATUSES = [
  ScheduledEmailStatus.PENDING,
  ScheduledEmailStatus.SENT,
  ScheduledEmailStatus.FAILED,
  ScheduledEmailStatus.CANCELLED,
] as const;

export const DateType = {
  SINGLE: "single",
  RANGE: "range",
  ALL: "all",
} as const;

export type DateTypeValue = typeof DateType[keyof typeof DateType];

export const EMAIL_TEMPLATE_CATEGORIES = [
  "service",
  "login",
  "notification",
  "follow_up",
  "reminder",
] as const;

export const EMAIL_TEMPLATE_TYPES = [
  "gst_filing",
  "income_tax_return",
  "tds",
  "audit",
  "company_registration",
  "tax_planning",
  "compliances",
  "login_credentials",
  "other",
] as const;

export type EmailTemplateCategory = typeof EMAIL_TEMPLATE_CATEGORIES[number];
export type EmailTemplateTypeValue = typeof EMAIL_TEMPLATE_TYPES[number];

export const organizations = pgTable("organizations", {
  id: serial("id").primaryKey(),
  name: text("name").notNull(),
  address: text("address"),
  city: text("city"),
  state: text("state"),
  country: text("country"),
  pincode: text("pincode"),
  createdAt: timestamp("created_at").defaultNow(),
  updatedAt: timestamp("updated_at").defaultNow(),
});

export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  email: text("email").unique().notNull(),
  hashedPassword: text("hashed_password").notNull(),
  // Reversible copy used only to include login details in client emails
  encryptedPlainPassword: text("encrypted_plain_password"),
  fullName: text("full_name"),
  phone: text("phone"),
  orgId: integer("org_id")
    .notNull()
    .references(() => organizations.id),
  role: text("role").$type<StaffRoleType | "client">().notNull().default(StaffRole.EMPLOYEE),
  createdAt: timestamp("created_at").defaultNow(),
  updatedAt: timestamp("updated_at").defaultNow(),
});

export const clients = pgTable("clients", {
  id: serial("id").primaryKey(),
  clientName: text("client_name").notNull(),
  email: text("email"),
  phoneNumber: text("phone_number").notNull(),
  companyName: text("company_name").notNull(),
  status: text("status").notNull().default("active"),
  address: text("address"),
  city: text("city"),
  state: text("state"),
  country: text("country"),
  pinCode: text("pin_code"),
  followDate: date("follow_date", { mode: "string" }),
  additionalNotes: text("additional_notes"),
  userId: integer("user_id").references(() => users.id, { onDelete: "set null" }),
  orgId: integer("org_id")
    .notNull()
    .references(() => organizations.id, { onDelete: "cascade" }),
  createdAt: timestamp("created_at").defaultNow(),
  updatedAt: timestamp("updated_at").defaultNow(),
});

export const services = pgTable("services", {
  id: serial("id").primaryKey(),
  name: text("name").notNull(),
  description: text("description"),
});

export const clientServices = pgTable(
  "client_services",
  {
    clientId: integer("client_id")
      .notNull()
      .references(() => clients.id, { onDelete: "cascade" }),
    serviceId: integer("service_id")
      .notNull()
      .references(() => services.id, { onDelete: "cascade" }),
  },
  (table) => [primaryKey({ columns: [table.clientId, table.serviceId] })],
);

export const emailTemplates = pgTable("email_templates", {
  id: serial("id").primaryKey(),
  name: text("name").notNull(),
  category: text("category").$type<EmailTemplateCategory>().notNull(),
  type: text("type").$type<EmailTemplateTypeValue>().notNull(),
  subject: text("subject").notNull(),
  body: text("body").notNull(),
  isDefault: boolean("is_default").notNull().default(false),
  // null org + isDefault = master template shared by every organization
  orgId: integer("org_id").references(() => organizations.id, { onDelete: "cascade" }),
  masterTemplateId: integer("master_template_id").references((): AnyPgColumn => emailTemplates.id, {
    onDelete: "set null",
  }),
  variables: jsonb("variables").$type<string[]>(),
  createdBy: integer("created_by").references(() => users.id, { onDelete: "set null" }),
  createdAt: timestamp("created_at").defaultNow(),
  updatedAt: timestamp("updated_at").defaultNow(),
});

// Per-client email configuration document (JSON, validated on write)
const isoDateString = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Use YYYY-MM-DD format");

export const recipientConfigSchema = z.object({
  email: z.string().email(),
  selectedTemplates: z.array(z.number().int().positive()).default([]),
});

export const serviceConfigSchema = z.object({
  enabled: z.boolean(),
  templateId: z.number().int().positive(),
  templateName: z.string(),
  dateType: z.enum([DateType.SINGLE, DateType.RANGE, DateType.ALL], {
    errorMap: () => ({ message: "dateType must be 'single', 'range', or 'all'" }),
  }),
  scheduledDate: isoDateString.nullable().default(null),
  scheduledDateFrom: isoDateString.nullable().default(null),
  scheduledDateTo: isoDateString.nullable().default(null),
  scheduledTimes: z.array(z.string()),
});

export const emailConfigSchema = z.object({
  emails: z.array(z.string().email()),
  emailTemplates: z.record(z.string(), recipientConfigSchema),
  services: z.record(z.string(), serviceConfigSchema),
});

export type RecipientConfig = z.infer<typeof recipientConfigSchema>;
export type ServiceConfig = z.infer<typeof serviceConfigSchema>;
export type EmailConfigData = z.infer<typeof emailConfigSchema>;

export const clientEmailConfigs = pgTable("client_email_configs", {
  id: serial("id").primaryKey(),
  clientId: integer("client_id")
    .notNull()
    .unique()
    .references(() => clients.id, { onDelete: "cascade" }),
  configData: jsonb("config_data").$type<EmailConfigData>().notNull(),
  createdAt: timestamp("created_at").defaultNow(),
  updatedAt: timestamp("updated_at").defaultNow(),
});

export const scheduledEmails = pgTable(
  "scheduled_emails",
  {
    id: serial("id").primaryKey(),
    clientId: integer("client_id")
      .notNull()
      .references(() => clients.id, { onDelete: "cascade" }),
    templateId: integer("template_id").references(() => emailTemplates.id, { onDelete: "set null" }),
    // Snapshot taken when the row is created, not a live reference to the configuration
    recipientEmails: jsonb("recipient_emails").$type<string[]>().notNull(),
    scheduledDate: date("scheduled_date", { mode: "string" }).notNull(),
    scheduledTime: time("scheduled_time").notNull(),
    scheduledDatetime: timestamp("scheduled_datetime").notNull(),
    status: text("status").$type<ScheduledEmailStatusType>().notNull().default(ScheduledEmailStatus.PENDING),
    isRecurring: boolean("is_recurring").notNull().default(false),
    recurrenceEndDate: date("recurrence_end_date", { mode: "string" }),
    errorMessage: text("error_message"),
    sentAt: timestamp("sent_at"),
    createdAt: timestamp("created_at").defaultNow(),
    updatedAt: timestamp("updated_at").defaultNow(),
  },
  (table) => [
    index("scheduled_emails_status_due_idx").on(table.status, table.scheduledDatetime),
    index("scheduled_emails_client_idx").on(table.clientId),
  ],
);

export type Organization = typeof organizations.$inferSelect;
export type InsertOrganization = typeof organizations.$inferInsert;
export type User = typeof users.$inferSelect;
export type InsertUser = typeof users.$inferInsert;
export type Client = typeof clients.$inferSelect;
export type InsertClient = typeof clients.$inferInsert;
export type Service = typeof services.$inferSelect;
export type EmailTemplate = typeof emailTemplates.$inferSelect;
export type InsertEmailTemplate = typeof emailTemplates.$inferInsert;
export type ClientEmailConfig = typeof clientEmailConfigs.$inferSelect;
export type ScheduledEmail = typeof scheduledEmails.$inferSelect;
export type InsertScheduledEmail = typeof scheduledEmails.$inferInsert;

export type ScheduledEmailWithTemplate = ScheduledEmail & {
  templateName: string | null; // Joined from emailTemplates table
};

// Request schemas for organization templates
const templateName = z.string().trim().min(1, "Name is required").max(255, "Name must be 255 characters or less");
const templateSubject = z.string().trim().min(1, "Subject is required").max(500, "Subject must be 500 characters or less");
const templateBody = z.string().trim().min(1, "Body is required").max(10000, "Body must be 10000 characters or less");

export const insertEmailTemplateSchema = createInsertSchema(emailTemplates)
  .pick({
    name: true,
    category: true,
    type: true,
    subject: true,
    body: true,
    variables: true,
  })
  .extend({
    name: templateName,
    category: z.enum(EMAIL_TEMPLATE_CATEGORIES),
    type: z.enum(EMAIL_TEMPLATE_TYPES),
    subject: templateSubject,
    body: templateBody,
    variables: z.array(z.string()).nullable().optional(),
  });

export const updateEmailTemplateSchema = z.object({
  name: templateName.optional(),
  subject: templateSubject.optional(),
  body: templateBody.optional(),
  variables: z.array(z.string()).optional(),
});

export const customizeTemplateSchema = z.object({
  subject: templateSubject.optional(),
  body: templateBody.optional(),
});

export type CreateEmailTemplateRequest = z.infer<typeof insertEmailTemplateSchema>;
export type UpdateEmailTemplateRequest = z.infer<typeof updateEmailTemplateSchema>;
export type CustomizeTemplateRequest = z.infer<typeof customizeTemplateSchema>;

export const recipientCreateSchema = z.object({
  email: z.string().email(),
  selectedTemplates: z.array(z.number().int().positive()).default([]),
});

export const recipientUpdateSchema = z.object({
  selectedTemplates: z.array(z.number().int().positive()),
});

export const testEmailSchema = z.object({
  toEmail: z.string().email(),
  subject: z.string().default("Test Email"),
  message: z.string().default("This is a test email to verify email configuration."),
});

export const adHocScheduledEmailSchema = z.object({
  clientId: z.number().int().positive(),
  templateId: z.number().int().positive(),
  recipientEmails: z.array(z.string().email()).min(1),
  sendInSeconds: z.number().int().min(0).default(60),
});
