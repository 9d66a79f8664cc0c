import type { SmsMessage } from '../../ports/ModemPort.js';
import { TimestampParseError } from '../../utils/errors.js';

const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// ModemManager reports "+HH"; "+HHMM", "+HH:MM" and "Z" are accepted as well
const TIMESTAMP_REGEX =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:Z|([+-])(\d{2})(?::?(\d{2}))?)$/;

export interface SmsTimestamp {
  date: Date;
  /** Minutes east of UTC. */
  offsetMinutes: number;
}

export function parseSmsTimestamp(raw: string): SmsTimestamp {
  const m = TIMESTAMP_REGEX.exec(raw.trim());
  if (!m) {
    throw new TimestampParseError(raw);
  }

  const field = (index: number): number => parseInt(m[index] ?? '0', 10);
  const year = field(1);
  const month = field(2);
  const day = field(3);
  const hour = field(4);
  const minute = field(5);
  const second = field(6);
  const offsetHours = field(8);
  const offsetMins = field(9);
  if (hour > 23 || minute > 59 || second > 59 || offsetHours > 23 || offsetMins > 59) {
    throw new TimestampParseError(raw);
  }

  const wallClock = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC rolls 2024-02-30 over into March; reject instead
  if (wallClock.getUTCMonth() !== month - 1 || wallClock.getUTCDate() !== day) {
    throw new TimestampParseError(raw);
  }

  const offsetMinutes = (m[7] === '-' ? -1 : 1) * (offsetHours * 60 + offsetMins);
  return {
    date: new Date(wallClock.getTime() - offsetMinutes * 60_000),
    offsetMinutes,
  };
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/** "Tue Jan 02 03:04:05 2024 +0200", in the message's own offset and always in English. */
export function formatSmsDate({ date, offsetMinutes }: SmsTimestamp): string {
  const local = new Date(date.getTime() + offsetMinutes * 60_000);
  const sign = offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(offsetMinutes);

  return [
    DAYS[local.getUTCDay()],
    MONTHS[local.getUTCMonth()],
    pad(local.getUTCDate()),
    `${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}:${pad(local.getUTCSeconds())}`,
    String(local.getUTCFullYear()),
    `${sign}${pad(Math.floor(absolute / 60))}${pad(absolute % 60)}`,
  ].join(' ');
}

export function buildSubject(template: string, number: string): string {
  return template.replaceAll('%number%', number);
}

export function buildBody(message: Pick<SmsMessage, 'number' | 'text'>, timestamp: SmsTimestamp): string {
  return `From: ${message.number}\nDate: ${formatSmsDate(timestamp)}\nMessage: ${message.text}`;
}
