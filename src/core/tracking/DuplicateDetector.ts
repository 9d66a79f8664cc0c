import type { SmsMessage } from '../../ports/ModemPort.js';

type Identity = Pick<SmsMessage, 'number' | 'text' | 'timestamp'>;

/**
 * Remembers only the most recently delivered message, so it catches a message
 * the modem reports twice in a row and nothing older.
 */
export class DuplicateDetector {
  private last: Identity | null = null;

  isDuplicate(message: Identity): boolean {
    return (
      this.last !== null &&
      this.last.number === message.number &&
      this.last.text === message.text &&
      this.last.timestamp === message.timestamp
    );
  }

  remember(message: Identity): void {
    this.last = { number: message.number, text: message.text, timestamp: message.timestamp };
  }

  lastDelivered(): Readonly<Identity> | null {
    return this.last;
  }
}
