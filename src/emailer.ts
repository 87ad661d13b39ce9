import nodemailer, { type SendMailOptions } from 'nodemailer';
import { Resend } from 'resend';
import { log } from './logger.js';
import { ConfigError, SendError, errorMessage } from './errors.js';
import type { EmailSettings } from './config.js';

export interface DigestMessage {
  subject: string;
  text: string;
  html: string;
}

export interface Mailer {
  /** Resolves with the provider's message id; rejects with SendError. */
  send(message: DigestMessage): Promise<string>;
}

export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<{ messageId: string; rejected?: unknown }>;
}

function fromHeader(settings: EmailSettings): string {
  return `"${settings.fromName}" <${settings.fromEmail}>`;
}

export class SmtpMailer implements Mailer {
  private readonly transport: MailTransport;

  constructor(
    private readonly settings: EmailSettings,
    password: string,
    transport?: MailTransport,
  ) {
    this.transport =
      transport ??
      nodemailer.createTransport({
        host: settings.smtp.host,
        port: settings.smtp.port,
        secure: settings.smtp.secure,
        requireTLS: !settings.smtp.secure,
        auth: { user: settings.fromEmail, pass: password },
      });
  }

  async send(message: DigestMessage): Promise<string> {
    log.info(`Sending digest to ${this.settings.toEmails.join(', ')}: "${message.subject}"`);

    let info: { messageId: string; rejected?: unknown };
    try {
      info = await this.transport.sendMail({
        from: fromHeader(this.settings),
        to: this.settings.toEmails,
        subject: message.subject,
        text: message.text,
        html: message.html,
      });
    } catch (err: unknown) {
      throw new SendError(`SMTP send failed: ${errorMessage(err)}`, { cause: err });
    }

    const rejected = Array.isArray(info.rejected) ? info.rejected.length : 0;
    if (rejected >= this.settings.toEmails.length) {
      throw new SendError('SMTP server rejected every recipient');
    }
    if (rejected > 0) {
      log.warn(`SMTP server rejected ${rejected} of ${this.settings.toEmails.length} recipients`);
    }

    log.info(`Email sent successfully (${info.messageId})`);
    return info.messageId;
  }
}

export class ResendMailer implements Mailer {
  private readonly resend: Resend;

  constructor(
    private readonly settings: EmailSettings,
    apiKey: string,
  ) {
    this.resend = new Resend(apiKey);
  }

  async send(message: DigestMessage): Promise<string> {
    log.info(`Sending digest via Resend to ${this.settings.toEmails.join(', ')}: "${message.subject}"`);

    let result: Awaited<ReturnType<Resend['emails']['send']>>;
    try {
      result = await this.resend.emails.send({
        from: fromHeader(this.settings),
        to: this.settings.toEmails,
        subject: message.subject,
        text: message.text,
        html: message.html,
      });
    } catch (err: unknown) {
      throw new SendError(`Resend send failed: ${errorMessage(err)}`, { cause: err });
    }

    if (result.error || !result.data) {
      throw new SendError(`Resend send failed: ${result.error?.message ?? 'no response data'}`);
    }

    log.info(`Email sent successfully (${result.data.id})`);
    return result.data.id;
  }
}

/**
 * Builds the configured mailer. A missing secret is a configuration problem,
 * raised before anything is fetched.
 */
export function createMailer(settings: EmailSettings, env: NodeJS.ProcessEnv = process.env): Mailer {
  if (settings.transport === 'resend') {
    const apiKey = env['RESEND_API_KEY'];
    if (!apiKey) throw new ConfigError('RESEND_API_KEY not set — cannot send email');
    return new ResendMailer(settings, apiKey);
  }

  const password = env[settings.passwordEnv];
  if (!password) throw new ConfigError(`${settings.passwordEnv} not set — cannot send email`);
  return new SmtpMailer(settings, password);
}
