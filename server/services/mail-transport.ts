import nodemailer from "nodemailer";
import type Mail from "nodemailer/lib/mailer";
import type SMTPTransport from "nodemailer/lib/smtp-transport";
import type { MailSettings } from "../config";
import { getErrorMessage } from "../errors";
import { htmlToPlainText } from "./template-renderer";

export interface OutgoingEmail {
  to: string;
  subject: string;
  html: string;
  text?: string;
  fromName?: string;
}

/**
 * One SMTP send. Implementations throw on failure; retrying is the caller's concern.
 */
export interface MailTransport {
  send(email: OutgoingEmail): Promise<void>;
}

export interface SmtpConnection {
  sendMail(message: Mail.Options): Promise<unknown>;
  close(): void;
}

export type SmtpConnectionFactory = (options: SMTPTransport.Options) => SmtpConnection;

const IMPLICIT_TLS_PORT = 465;
const STARTTLS_FALLBACK_PORT = 587;

export function isTimeoutError(error: unknown): boolean {
  if (error instanceof Error && "code" in error && error.code === "ETIMEDOUT") {
    return true;
  }
  const message = getErrorMessage(error).toLowerCase();
  return message.includes("timeout") || message.includes("timed out");
}

export class SmtpMailTransport implements MailTransport {
  constructor(
    private readonly settings: MailSettings,
    private readonly connect: SmtpConnectionFactory = (options) => nodemailer.createTransport(options),
  ) {}

  async send(email: OutgoingEmail): Promise<void> {
    const message = this.buildMessage(email);

    if (this.settings.port !== IMPLICIT_TLS_PORT) {
      await this.deliver(this.startTlsOptions(this.settings.port), message);
      return;
    }

    try {
      await this.deliver(this.implicitTlsOptions(), message);
    } catch (error) {
      if (!isTimeoutError(error)) {
        throw error;
      }
      console.warn(`[EMAIL] Port ${IMPLICIT_TLS_PORT} connection timed out. Trying port ${STARTTLS_FALLBACK_PORT} as fallback...`);
      await this.deliver(this.startTlsOptions(STARTTLS_FALLBACK_PORT), message);
      console.log(`[EMAIL] Sent via ${this.settings.host}:${STARTTLS_FALLBACK_PORT} STARTTLS (fallback from ${IMPLICIT_TLS_PORT})`);
    }
  }

  private buildMessage(email: OutgoingEmail): Mail.Options {
    return {
      from: {
        name: email.fromName || this.settings.fromName,
        address: this.settings.fromEmail ?? "",
      },
      to: email.to,
      subject: email.subject,
      text: email.text ?? htmlToPlainText(email.html),
      html: email.html,
    };
  }

  private baseOptions(): SMTPTransport.Options {
    const timeoutMs = this.settings.timeoutSeconds * 1000;
    return {
      host: this.settings.host,
      auth: { user: this.settings.user, pass: this.settings.password },
      connectionTimeout: timeoutMs,
      greetingTimeout: timeoutMs,
      socketTimeout: timeoutMs,
    };
  }

  private implicitTlsOptions(): SMTPTransport.Options {
    return {
      ...this.baseOptions(),
      port: IMPLICIT_TLS_PORT,
      secure: true,
      // Several shared hosts present certificates for a different hostname on 465
      tls: { rejectUnauthorized: false },
    };
  }

  private startTlsOptions(port: number): SMTPTransport.Options {
    return {
      ...this.baseOptions(),
      port,
      secure: false,
      requireTLS: this.settings.useTls,
      ignoreTLS: !this.settings.useTls,
    };
  }

  private async deliver(options: SMTPTransport.Options, message: Mail.Options): Promise<void> {
    const connection = this.connect(options);
    try {
      await connection.sendMail(message);
    } finally {
      connection.close();
    }
  }
}
