import nodemailer from "nodemailer";
import { Resend } from "resend";
import { SendError, errorMessage } from "./errors.js";
import type { EmailConfig } from "./config.js";

export interface EmailMessage {
  to: string;
  subject: string;
  text: string;
}

/** Either transport; `send` rejects with SendError. */
export interface EmailTransport {
  readonly name: string;
  send(message: EmailMessage): Promise<void>;
}

// The slices of the Resend and nodemailer clients we call.
export interface ResendEmails {
  send(payload: {
    from: string;
    to: string[];
    subject: string;
    text: string;
    html: string;
  }): Promise<{ error: { message: string } | null }>;
}

export interface SmtpMailer {
  sendMail(mail: { from: string; to: string; subject: string; text: string }): Promise<unknown>;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function toHtml(text: string): string {
  return `<p>${escapeHtml(text).replace(/\n/g, "<br>")}</p>`;
}

// ─── Resend ───────────────────────────────────────────────────────────────────

export class ResendTransport implements EmailTransport {
  readonly name = "resend";

  constructor(
    private readonly sender: string,
    private readonly emails: ResendEmails
  ) {}

  async send(message: EmailMessage): Promise<void> {
    const { error } = await this.emails
      .send({
        from: this.sender,
        to: [message.to],
        subject: message.subject,
        text: message.text,
        html: toHtml(message.text),
      })
      .catch((err: unknown) => {
        throw new SendError(message.to, errorMessage(err), err);
      });
    if (error) throw new SendError(message.to, error.message);
  }
}

// ─── SMTP ─────────────────────────────────────────────────────────────────────

export class SmtpTransport implements EmailTransport {
  readonly name = "smtp";

  constructor(
    private readonly sender: string,
    private readonly mailer: SmtpMailer
  ) {}

  async send(message: EmailMessage): Promise<void> {
    try {
      await this.mailer.sendMail({
        from: this.sender,
        to: message.to,
        subject: message.subject,
        text: message.text,
      });
    } catch (err) {
      throw new SendError(message.to, errorMessage(err), err);
    }
  }
}

// ─── Selection ────────────────────────────────────────────────────────────────

/** Returns undefined when no email provider is configured. */
export function createEmailTransport(config: EmailConfig): EmailTransport | undefined {
  switch (config.provider) {
    case "resend":
      return new ResendTransport(config.sender, new Resend(config.apiKey).emails);
    case "smtp": {
      // Port 465 speaks TLS from the first byte; anything else upgrades via STARTTLS.
      const implicitTls = config.useTls && config.port === 465;
      const mailer = nodemailer.createTransport({
        host: config.host,
        port: config.port,
        secure: implicitTls,
        requireTLS: config.useTls && !implicitTls,
        ignoreTLS: !config.useTls,
        ...(config.password ? { auth: { user: config.username, pass: config.password } } : {}),
      });
      return new SmtpTransport(config.sender, mailer);
    }
    case "none":
      return undefined;
  }
}
