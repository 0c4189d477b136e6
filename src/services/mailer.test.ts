import nodemailer from "nodemailer";
import { describe, expect, it } from "vitest";
import { LogMailer, SmtpMailer, createMailer } from "./mailer";

const noSmtp = { SMTP_HOST: "", SMTP_PORT: 0, SMTP_USER: "", SMTP_PASS: "", BID_EMAIL: "bids@example.com" };

describe("createMailer", () => {
  it("logs instead of sending when SMTP is not configured", () => {
    expect(createMailer(noSmtp)).toBeInstanceOf(LogMailer);
  });

  it("uses SMTP once every setting is present", () => {
    const mailer = createMailer({
      ...noSmtp,
      SMTP_HOST: "smtp.example.test",
      SMTP_PORT: 587,
      SMTP_USER: "bids",
      SMTP_PASS: "test-secret",
    });
    expect(mailer).toBeInstanceOf(SmtpMailer);
  });
});

describe("SmtpMailer", () => {
  it("hands the message to the transport", async () => {
    const mailer = new SmtpMailer(nodemailer.createTransport({ jsonTransport: true }), "bids@example.com");
    const result = await mailer.send({
      to: "procurement@example.com",
      cc: "",
      subject: "EOI: Grounds Care",
      body: "Dear Procurement Team",
      attachments: [],
    });
    expect(result.ok).toBe(true);
  });
});

describe("LogMailer", () => {
  it("acknowledges every message", async () => {
    const result = await new LogMailer().send({ to: "a@example.com", subject: "s", body: "b", attachments: ["/docs/x.docx"] });
    expect(result.ok).toBe(true);
  });
});
