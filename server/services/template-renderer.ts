import { format } from "date-fns";
import type { Client, EmailTemplate, Organization, User } from "@shared/schema";

export type TemplateContext = Record<string, string>;

export interface RenderedEmail {
  subject: string;
  html: string;
}

export const EMAIL_DISCLAIMER =
  "This is an automated message. Please do not reply directly to this email.";

export const LOGIN_PASSWORD_PLACEHOLDER =
  "[Password not available. Please use password reset or contact administrator.]";

export const LOGIN_URL_PLACEHOLDER = "[Login URL not configured. Please contact administrator.]";

const PLACEHOLDER_PATTERN = /\{\{(\w+)\}\}/g;
const HTML_TAG_PATTERN = /<[a-z][\s\S]*>/i;

/**
 * Replaces `{{name}}` placeholders. Names missing from the context become "".
 */
export function replaceVariables(text: string, context: TemplateContext): string {
  return text.replace(PLACEHOLDER_PATTERN, (_match, name: string) =>
    Object.prototype.hasOwnProperty.call(context, name) ? context[name] : "",
  );
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function containsHtml(body: string): boolean {
  return HTML_TAG_PATTERN.test(body);
}

/**
 * HTML bodies pass through untouched; plain text becomes one escaped
 * paragraph per non-blank line.
 */
export function formatBody(body: string): string {
  if (containsHtml(body)) {
    return body;
  }

  return body
    .split(/\r?\n/)
    .filter((line) => line.trim() !== "")
    .map((line) => `<p style="margin: 0 0 16px 0;">${escapeHtml(line)}</p>`)
    .join("\n");
}

export function wrapInLayout(content: string, brandName: string): string {
  const brand = escapeHtml(brandName);

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
</head>
<body style="margin: 0; padding: 0; background-color: #f4f4f5; font-family: Arial, sans-serif;">
  <div style="max-width: 600px; margin: 0 auto; background-color: #ffffff;">
    <div style="background-color: #1f2937; color: #ffffff; padding: 20px; text-align: center;">
      <h1 style="margin: 0; font-size: 20px;">${brand}</h1>
    </div>
    <div style="padding: 30px; color: #333333; line-height: 1.6;">
${content}
    </div>
    <div style="padding: 20px; border-top: 1px solid #e5e7eb; text-align: center; font-size: 12px; color: #6b7280;">
      <p style="margin: 0 0 8px 0;">${brand}</p>
      <p style="margin: 0;">${EMAIL_DISCLAIMER}</p>
    </div>
  </div>
</body>
</html>`;
}

export function renderTemplate(
  template: Pick<EmailTemplate, "subject" | "body">,
  context: TemplateContext,
  brandName: string,
): RenderedEmail {
  return {
    subject: replaceVariables(template.subject, context),
    html: wrapInLayout(formatBody(replaceVariables(template.body, context)), brandName),
  };
}

/**
 * Text alternative for clients that do not render HTML.
 */
export function htmlToPlainText(html: string): string {
  return html
    .replace(/<(style|head)[\s\S]*?<\/\1>/gi, "")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/p>/gi, "\n")
    .replace(/<[^>]+>/g, "")
    .replace(/&nbsp;/g, " ")
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "")
    .join("\n");
}

export interface TemplateContextInput {
  client: Client;
  organization: Organization;
  template: Pick<EmailTemplate, "name">;
  /** First admin of the organization; supplies org_email and org_phone. */
  orgAdmin?: Pick<User, "email" | "phone">;
  serviceDescription?: string | null;
  scheduledDate?: string | null;
  deadlineDate?: string | null;
  loginEmail?: string | null;
  loginPassword?: string | null;
  loginUrl?: string | null;
  amount?: string | null;
  documentName?: string | null;
  now: Date;
}

export function buildTemplateContext(input: TemplateContextInput): TemplateContext {
  const { client, organization, now } = input;
  const currentDate = format(now, "yyyy-MM-dd");
  const scheduledDate = input.scheduledDate ?? "";

  return {
    client_name: client.clientName ?? "",
    company_name: client.companyName ?? "",
    client_email: client.email ?? "",
    client_phone: client.phoneNumber ?? "",

    org_name: organization.name ?? "",
    org_email: input.orgAdmin?.email ?? "",
    org_phone: input.orgAdmin?.phone ?? "",
    org_city: organization.city ?? "",
    org_state: organization.state ?? "",
    org_country: organization.country ?? "",
    org_pincode: organization.pincode ?? "",

    service_name: input.template.name ?? "",
    service_description: input.serviceDescription ?? "",

    current_date: currentDate,
    current_datetime: format(now, "yyyy-MM-dd HH:mm:ss"),
    current_time: format(now, "HH:mm"),
    today: currentDate,
    scheduled_date: scheduledDate,
    deadline_date: input.deadlineDate ?? scheduledDate,
    follow_up_date: client.followDate ?? "",

    login_email: input.loginEmail ?? "",
    login_password: input.loginPassword || LOGIN_PASSWORD_PLACEHOLDER,
    login_url: input.loginUrl || LOGIN_URL_PLACEHOLDER,

    amount: input.amount ?? "",
    document_name: input.documentName ?? "",
    additional_notes: client.additionalNotes ?? "",
  };
}
