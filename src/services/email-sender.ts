import nodemailer, { type Transporter } from 'nodemailer';

import type { Env } from '../config/env.js';

export interface EmailMessage {
  to: string;
  subject: string;
  text: string;
  html?: string;
}

export interface EmailSender {
  send(message: EmailMessage): Promise<void>;
}

export interface NodemailerEmailSenderConfig {
  from: string;
  host: string | undefined;
  port: number;
  secure: boolean;
  user: string | undefined;
  password: string | undefined;
}

/**
 * SMTP delivery through nodemailer. Without an SMTP host the message is
 * rendered by the JSON transport and only logged.
 */
export class NodemailerEmailSender implements EmailSender {
  private readonly transporter: Transporter;

  public constructor(private readonly config: NodemailerEmailSenderConfig) {
    if (config.host === undefined) {
      this.transporter = nodemailer.createTransport({ jsonTransport: true });
      return;
    }

    this.transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.secure,
      auth: config.user === undefined
        ? undefined
        : { user: config.user, pass: config.password ?? '' }
    });
  }

  public async send(message: EmailMessage): Promise<void> {
    const info = await this.transporter.sendMail({
      from: this.config.from,
      to: message.to,
      subject: message.subject,
      text: message.text,
      html: message.html
    });

    console.log('email_sent', {
      messageId: info.messageId,
      transport: this.config.host === undefined ? 'json' : 'smtp',
      subject: message.subject
    });
  }
}

export function createEmailSender(env: Env): EmailSender {
  return new NodemailerEmailSender({
    from: env.MAIL_FROM,
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    secure: env.SMTP_SECURE,
    user: env.SMTP_USER,
    password: env.SMTP_PASSWORD
  });
}
