export interface OutgoingMail {
  from: string;
  to: string[];
  subject: string;
  text: string;
}

export interface MailPort {
  /** Rejects with SmtpError on protocol or connection failures. */
  send(mail: OutgoingMail): Promise<void>;
  verify?(): Promise<void>;
}
