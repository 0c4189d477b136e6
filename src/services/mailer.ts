// src/services/mailer.ts
import path from "path";
import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import type { Env } from "../config/env";

export interface OutgoingMail {
  to: string; // comma-separated
  cc?: string;
  subject: string;
  body: string;
  attachments: string[];
}

export type MailResult =
  | { ok: true; messageId: string }
  | { ok: false; reason: string };

export interface Mailer {
  send(mail: OutgoingMail): Promise<MailResult>;
}

/** Acknowledges without a transport; used when SMTP is not configured. */
export class LogMailer implements Mailer {
  async send(mail: OutgoingMail): Promise<MailResult> {
    console.log("[Mailer] send called (no SMTP configured)", {
      to: mail.to,
      cc: mail.cc,
      subject: mail.subject,
      attachments: mail.attachments.map((a) => path.basename(a)),
    });
    return { ok: true, messageId: `logged-${Date.now()}` };
  }
}

export class SmtpMailer implements Mailer {
  constructor(
    private readonly transporter: Transporter,
    private readonly from: string
  ) {}

  async send(mail: OutgoingMail): Promise<MailResult> {
    try {
      const info = await this.transporter.sendMail({
        from: this.from,
        to: mail.to,
        cc: mail.cc || undefined,
        subject: mail.subject,
        text: mail.body,
        attachments: mail.attachments.map((file) => ({ filename: path.basename(file), path: file })),
      });
      return { ok: true, messageId: String(info.messageId) };
    } catch (err) {
      console.error("[Mailer] Error sending email:", err);
      return { ok: false, reason: err instanceof Error ? err.message : "send-exception" };
    }
  }
}

export function createMailer(
  config: Pick<Env, "SMTP_HOST" | "SMTP_PORT" | "SMTP_USER" | "SMTP_PASS" | "BID_EMAIL">
): Mailer {
  if (!config.SMTP_HOST || !config.SMTP_PORT || !config.SMTP_USER || !config.SMTP_PASS) {
    console.warn("[Mailer] SMTP settings missing; emails will only be logged.");
    return new LogMailer();
  }

  const transporter = nodemailer.createTransport({
    host: config.SMTP_HOST,
    port: config.SMTP_PORT,
    secure: config.SMTP_PORT === 465,
    auth: {
      user: config.SMTP_USER,
      pass: config.SMTP_PASS,
    },
  });
  return new SmtpMailer(transporter, `"Bid Office" <${config.BID_EMAIL || config.SMTP_USER}>`);
}
