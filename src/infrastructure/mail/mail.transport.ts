import nodemailer from 'nodemailer';
import type { EmailConfig } from '../../config/monitor.config';

export interface MailAttachment {
  readonly filename: string;
  readonly content: Buffer;
  readonly contentType: string;
  readonly cid: string;
}

export interface MailMessage {
  readonly from: string;
  readonly to: string;
  readonly subject: string;
  readonly text: string;
  readonly html: string;
  readonly attachments: MailAttachment[];
}

/** The part of a nodemailer transporter the notifier uses. */
export interface MailTransport {
  sendMail(message: MailMessage): Promise<{ messageId: string }>;
}

export function createMailTransport(email: EmailConfig): MailTransport {
  return nodemailer.createTransport({
    host: email.smtpHost,
    port: email.smtpPort,
    secure: email.smtpSecure,
    auth: { user: email.address, pass: email.password },
  });
}
