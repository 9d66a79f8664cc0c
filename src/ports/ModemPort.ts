/** Integers for ordinal gateways, opaque strings (e.g. D-Bus object paths) otherwise. */
export type MessageId = number | string;

/**
 * `ordinal`: a larger id is a newer message.
 * `token`: ids carry no order; only membership matters.
 */
export type MessageIdScheme = 'ordinal' | 'token';

export interface SmsMessage {
  readonly id: MessageId;
  readonly number: string;
  readonly text: string;
  readonly timestamp: string; // raw, e.g. 2024-01-02T03:04:05+02
  readonly state: string; // informational only
}

export interface ModemPort {
  readonly idScheme: MessageIdScheme;
  listInbox(): Promise<MessageId[]>;
  fetchMessage(id: MessageId): Promise<SmsMessage>;
  deleteMessage(id: MessageId): Promise<void>;
  /** First modem the gateway can see, or null when there is none. */
  discoverModem(): Promise<string | null>;
  selectModem(modemId: string): void;
  getModemId(): string;
}
