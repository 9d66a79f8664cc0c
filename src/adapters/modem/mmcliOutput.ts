import { z } from 'zod';
import type { MessageId, MessageIdScheme, SmsMessage } from '../../ports/ModemPort.js';
import { GatewayError } from '../../utils/errors.js';

const SMS_PATH_REGEX = /\/org\/freedesktop\/ModemManager\d*\/SMS\/(\d+)$/;

const smsListSchema = z.object({
  'modem.messaging.sms': z.array(z.string()),
});

const smsSchema = z.object({
  sms: z.object({
    content: z.object({
      number: z.string(),
      text: z.string(),
    }),
    properties: z.object({
      timestamp: z.string(),
      state: z.string().default('unknown'),
    }),
  }),
});

const modemListSchema = z.object({
  'modem-list': z.array(z.string()),
});

function parseJson<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, stdout: string, what: string): T {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch (error) {
    throw new GatewayError(`mmcli returned invalid JSON for ${what}`, { cause: error });
  }
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new GatewayError(`Unexpected mmcli output for ${what}: ${result.error.issues[0]?.message ?? 'unknown'}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/** Extracts the numeric SMS index from a ModemManager object path, or null. */
export function parseSmsPath(path: string): number | null {
  const match = SMS_PATH_REGEX.exec(path.trim());
  return match?.[1] ? parseInt(match[1], 10) : null;
}

export interface InboxListing {
  ids: MessageId[];
  /** Paths that could not be turned into an ordinal id. */
  rejected: string[];
}

export function parseInboxListing(stdout: string, scheme: MessageIdScheme): InboxListing {
  const paths = parseJson(smsListSchema, stdout, 'the SMS list')['modem.messaging.sms'];
  if (scheme === 'token') {
    return { ids: paths, rejected: [] };
  }

  const ids: MessageId[] = [];
  const rejected: string[] = [];
  for (const path of paths) {
    const id = parseSmsPath(path);
    if (id === null) {
      rejected.push(path);
    } else {
      ids.push(id);
    }
  }
  return { ids, rejected };
}

export function parseSmsDetails(stdout: string, id: MessageId): SmsMessage {
  const { sms } = parseJson(smsSchema, stdout, `SMS ${id}`);
  return {
    id,
    number: sms.content.number,
    text: sms.content.text,
    timestamp: sms.properties.timestamp,
    state: sms.properties.state,
  };
}

export function parseModemList(stdout: string): string[] {
  return parseJson(modemListSchema, stdout, 'the modem list')['modem-list'];
}
