import type { MailPort } from '../../ports/MailPort.js';
import type { SmsMessage } from '../../ports/ModemPort.js';
import { createLogger } from '../../utils/logger.js';
import { SmtpError } from '../../utils/errors.js';
import { retry } from '../../utils/retry.js';
import type { Sleep } from '../../utils/sleep.js';
import { buildBody, buildSubject, type SmsTimestamp } from './smsFormat.js';

export const SMTP_RETRY_DELAY_MS = 15_000;

export interface MailDeliveryOptions {
  sender: string;
  recipients: string[];
  subjectTemplate: string;
  retryDelayMs?: number;
  sleep?: Sleep;
}

/**
 * Sends one email per SMS. A message that reached this point is never
 * dropped because of an SMTP failure: delivery is retried until it succeeds.
 */
export class MailDelivery {
  private readonly logger = createLogger({ service: 'MailDelivery' });

  constructor(
    private readonly mailPort: MailPort,
    private readonly options: MailDeliveryOptions
  ) {}

  /** Resolves with the number of attempts it took. */
  async deliver(message: SmsMessage, timestamp: SmsTimestamp, signal?: AbortSignal): Promise<number> {
    const retryDelayMs = this.options.retryDelayMs ?? SMTP_RETRY_DELAY_MS;
    const mail = {
      from: this.options.sender,
      to: this.options.recipients,
      subject: buildSubject(this.options.subjectTemplate, message.number),
      text: buildBody(message, timestamp),
    };

    let attempts = 0;
    await retry(
      async (attempt) => {
        attempts = attempt;
        await this.mailPort.send(mail);
      },
      {
        delayMs: retryDelayMs,
        isRetryable: (error) => error instanceof SmtpError,
        sleep: this.options.sleep,
        signal,
        onRetry: (error, attempt) =>
          this.logger.error({ error, id: message.id, attempt, retryInMs: retryDelayMs }, 'Failed to send email, SMTP error'),
      }
    );
    return attempts;
  }
}
