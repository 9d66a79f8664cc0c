export class RelayError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RelayError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

const MODEM_MISSING_MARKER = "couldn't find modem";

export class GatewayError extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'GATEWAY_ERROR', options);
    this.name = 'GatewayError';
  }

  /** True when ModemManager reports that the selected modem has gone away. */
  isModemMissing(): boolean {
    return this.message.toLowerCase().includes(MODEM_MISSING_MARKER);
  }
}

export class SmtpError extends RelayError {
  public readonly responseCode?: number;

  constructor(message: string, responseCode?: number, options?: ErrorOptions) {
    super(message, 'SMTP_ERROR', options);
    this.name = 'SmtpError';
    this.responseCode = responseCode;
  }
}

export class TimestampParseError extends RelayError {
  constructor(raw: string) {
    super(`Invalid SMS timestamp: ${raw}`, 'TIMESTAMP_PARSE_ERROR');
    this.name = 'TimestampParseError';
  }
}
