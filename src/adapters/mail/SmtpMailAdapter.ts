import nodemailer from 'nodemailer';
import type { MailPort, OutgoingMail } from '../../ports/MailPort.js';
import { createLogger } from '../../utils/logger.js';
import { SmtpError } from '../../utils/errors.js';

// nodemailer error codes for a server that could not be reached or dropped the session
const CONNECTION_ERROR_CODES = new Set(['ECONNECTION', 'ETIMEDOUT', 'ESOCKET', 'EDNS']);

export interface SmtpSettings {
  host: string;
  port: number;
  username?: string;
  password?: string;
  /** Require STARTTLS before authenticating. */
  tls: boolean;
}

/** Wraps SMTP-level failures in SmtpError; anything else is returned unchanged. */
export function toSmtpError(error: unknown): unknown {
  if (!(error instanceof Error)) {
    return error;
  }
  const responseCode =
    'responseCode' in error && typeof error.responseCode === 'number' ? error.responseCode : undefined;
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;

  if (responseCode !== undefined || (code !== undefined && CONNECTION_ERROR_CODES.has(code))) {
    return new SmtpError(error.message, responseCode, { cause: error });
  }
  return error;
}

export class SmtpMailAdapter implements MailPort {
  private readonly logger = createLogger({ adapter: 'SmtpMailAdapter' });
  private readonly transport: nodemailer.Transporter;

  constructor(settings: SmtpSettings) {
    this.transport = nodemailer.createTransport({
      host: settings.host,
      port: settings.port,
      secure: false,
      requireTLS: settings.tls,
      ignoreTLS: !settings.tls,
      auth: settings.username ? { user: settings.username, pass: settings.password ?? '' } : undefined,
    });
  }

  async send(mail: OutgoingMail): Promise<void> {
    try {
      const info = await this.transport.sendMail({
        from: mail.from,
        to: mail.to.join(', '),
        subject: mail.subject,
        text: mail.text,
      });
      this.logger.debug({ messageId: info.messageId, recipients: mail.to.length }, 'Email sent');
    } catch (error) {
      throw toSmtpError(error);
    }
  }

  async verify(): Promise<void> {
    try {
      await this.transport.verify();
    } catch (error) {
      throw toSmtpError(error);
    }
  }
}
