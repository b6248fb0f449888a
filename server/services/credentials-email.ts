import { buildLoginUrl } from "../config";
import type { CredentialCipher } from "../credentials";
import { BadRequestError, NotFoundError, ServiceUnavailableError } from "../errors";
import type { IStorage } from "../storage";
import type { DeliveryResult, EmailDelivery } from "./email-delivery";
import { escapeHtml, wrapInLayout } from "./template-renderer";

const ROLE_MESSAGES: Record<string, { title: string; description: string }> = {
  admin: {
    title: "Welcome! Your Admin Account Has Been Created",
    description: "Your admin account has been created. You can now manage your organization and users.",
  },
  employee: {
    title: "Welcome! Your Employee Account Has Been Created",
    description: "Your employee account has been created. You can now access the system.",
  },
  client: {
    title: "Welcome! Your Client Portal Access Has Been Created",
    description: "Your client portal account has been created. You can now access your account information.",
  },
};

const DEFAULT_ROLE_MESSAGE = {
  title: "Welcome! Your Account Has Been Created",
  description: "Your account has been created. You can now access the system.",
};

export interface CredentialsEmailContent {
  recipientName: string;
  loginEmail: string;
  password: string;
  role: string;
  organizationName: string;
  loginUrl?: string;
}

export function buildCredentialsEmail(content: CredentialsEmailContent): { subject: string; html: string } {
  const message = ROLE_MESSAGES[content.role.toLowerCase()] ?? DEFAULT_ROLE_MESSAGE;
  const loginLine = content.loginUrl
    ? `<p>Sign in at <a href="${escapeHtml(content.loginUrl)}">${escapeHtml(content.loginUrl)}</a>.</p>`
    : "<p>You can now log in to the system using the credentials above.</p>";

  const body = `<h2 style="margin-top: 0;">${escapeHtml(message.title)}</h2>
<p>Dear ${escapeHtml(content.recipientName)},</p>
<p>${escapeHtml(message.description)}</p>
<p><strong>Organization:</strong> ${escapeHtml(content.organizationName)}</p>
<div style="background-color: #f5f5f5; border-left: 4px solid #1f2937; padding: 15px; margin: 20px 0;">
  <p style="margin: 0 0 8px 0;"><strong>Email:</strong> <span style="font-family: monospace;">${escapeHtml(content.loginEmail)}</span></p>
  <p style="margin: 0;"><strong>Password:</strong> <span style="font-family: monospace;">${escapeHtml(content.password)}</span></p>
</div>
<p style="background-color: #fff3cd; border: 1px solid #ffc107; padding: 15px; color: #856404;"><strong>Security Notice:</strong> Please change your password after your first login.</p>
${loginLine}
<p>If you have any questions or need assistance, please contact your administrator.</p>`;

  return { subject: message.title, html: wrapInLayout(body, content.organizationName) };
}

export interface CredentialsEmailDeps {
  storage: IStorage;
  delivery: EmailDelivery;
  cipher: CredentialCipher;
  frontendUrl?: string;
}

/**
 * Sends a client's portal login to the client's linked user account.
 */
export async function sendClientCredentials(
  deps: CredentialsEmailDeps,
  clientId: number,
  orgId: number,
): Promise<DeliveryResult & { sentTo: string }> {
  const client = await deps.storage.getClient(clientId);
  if (!client || client.orgId !== orgId) {
    throw new NotFoundError("Client not found");
  }
  if (client.userId === null) {
    throw new BadRequestError("Client does not have a portal login");
  }

  const [user, organization] = await Promise.all([
    deps.storage.getUser(client.userId),
    deps.storage.getOrganization(client.orgId),
  ]);
  if (!user) {
    throw new NotFoundError("Client login user not found");
  }
  if (!organization) {
    throw new NotFoundError("Organization not found");
  }

  const password = user.encryptedPlainPassword ? deps.cipher.decrypt(user.encryptedPlainPassword) : null;
  if (!password) {
    throw new BadRequestError("Stored password is not available. Reset the client's password first.");
  }

  if (!deps.delivery.isConfigured()) {
    throw new ServiceUnavailableError("Email service is not configured", {
      missing: deps.delivery.missingSettings(),
    });
  }

  const email = buildCredentialsEmail({
    recipientName: user.fullName || client.clientName,
    loginEmail: user.email,
    password,
    role: user.role,
    organizationName: organization.name,
    loginUrl: buildLoginUrl(deps.frontendUrl),
  });

  const result = await deps.delivery.deliver({
    to: user.email,
    subject: email.subject,
    html: email.html,
    fromName: organization.name,
  });

  if (result.success) {
    console.log(`[EMAIL] Login credentials sent to ${user.email} for client ${client.id}`);
  } else {
    console.error(`[EMAIL] Login credentials email to ${user.email} failed: ${result.error}`);
  }

  return { ...result, sentTo: user.email };
}
