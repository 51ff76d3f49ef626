import { basename } from "node:path";
import nodemailer, { type Transporter } from "nodemailer";
import type { SmtpCredentials } from "../lib/env.js";
import { workshopImageCid } from "../lib/email-templates.js";
import { errorMessage, SendError } from "../lib/errors.js";

export interface MailMessage {
  to: string;
  subject: string;
  html: string;
  text: string;
}

export interface MailReceipt {
  messageId: string | null;
}

export interface Mailer {
  /** @throws SendError */
  send(message: MailMessage): Promise<MailReceipt>;
}

export interface SmtpMailerOptions {
  inlineImagePath?: string;
  /** Replaces the SMTP transport built from the credentials. */
  transport?: Transporter;
}

export class SmtpMailer implements Mailer {
  private readonly transporter: Transporter;
  private readonly from: string;

  public constructor(
    credentials: SmtpCredentials,
    private readonly options: SmtpMailerOptions = {},
  ) {
    this.transporter = options.transport ?? nodemailer.createTransport({
      host: credentials.host,
      port: credentials.port,
      secure: credentials.secure,
      auth: {
        user: credentials.user,
        pass: credentials.password,
      },
    });
    this.from = `${credentials.senderName} <${credentials.user}>`;
  }

  public async send(message: MailMessage): Promise<MailReceipt> {
    const imagePath = this.options.inlineImagePath;

    try {
      const info = await this.transporter.sendMail({
        from: this.from,
        to: message.to,
        subject: message.subject,
        html: message.html,
        text: message.text,
        attachments: imagePath
          ? [{ filename: basename(imagePath), path: imagePath, cid: workshopImageCid }]
          : undefined,
      });

      return { messageId: typeof info.messageId === "string" ? info.messageId : null };
    } catch (error) {
      throw new SendError(message.to, errorMessage(error, "smtp_send_failed"), { cause: error });
    }
  }

  public close(): void {
    this.transporter.close();
  }
}
