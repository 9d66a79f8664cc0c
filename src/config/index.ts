import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { resolveLogLevel } from '../utils/logger.js';

const booleanFlag = (defaultValue: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false'], { message: 'must be "true" or "false"' }))
    .transform((value) => value === 'true')
    .optional()
    .transform((value) => value ?? defaultValue);

const configSchema = z.object({
  logLevel: z
    .string()
    .default('info')
    .transform((value, ctx) => {
      const level = resolveLogLevel(value);
      if (!level) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'must be one of trace, debug, info, warning, error, critical, silent',
        });
        return z.NEVER;
      }
      return level;
    }),

  // Modem
  // "auto" (or the legacy -1) picks the first modem ModemManager reports
  modemId: z
    .string()
    .trim()
    .min(1)
    .default('auto')
    .transform((value) => (value === '-1' ? 'auto' : value)),
  smsIdScheme: z.enum(['ordinal', 'token']).default('ordinal'),
  pollInterval: z.coerce.number().int().nonnegative().default(30),
  deleteSms: booleanFlag(true),
  ignoreExistingSms: booleanFlag(true),
  blacklistPath: z.string().min(1).default('blacklist.json'),

  // SMTP
  smtpHost: z.string().min(1),
  smtpPort: z.coerce.number().int().min(1).max(65535).default(25),
  smtpUsername: z.string().optional(),
  smtpPassword: z.string().optional(),
  smtpTls: booleanFlag(false),
  smtpSender: z.string().min(1),
  smtpRecipients: z
    .string()
    .transform((value) =>
      value
        .split(',')
        .map((recipient) => recipient.trim())
        .filter((recipient) => recipient.length > 0)
    )
    .pipe(z.array(z.string()).min(1, 'must contain at least one recipient')),
  smtpSubject: z.string().default(''),

  // Health endpoint, disabled unless a port is given
  healthPort: z.coerce.number().int().min(1).max(65535).optional(),
  host: z.string().default('0.0.0.0'),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    logLevel: env('LOG_LEVEL'),
    modemId: env('MODEM_ID'),
    smsIdScheme: env('SMS_ID_SCHEME'),
    pollInterval: env('POLL_INTERVAL'),
    deleteSms: env('DELETE_SMS'),
    ignoreExistingSms: env('IGNORE_EXISTING_SMS'),
    blacklistPath: env('BLACKLIST_PATH'),
    smtpHost: env('SMTP_HOST'),
    smtpPort: env('SMTP_PORT'),
    smtpUsername: env('SMTP_USERNAME'),
    smtpPassword: env('SMTP_PASSWORD'),
    smtpTls: env('SMTP_TLS'),
    smtpSender: env('SMTP_SENDER'),
    smtpRecipients: env('SMTP_RECIPIENTS'),
    // An empty subject is legal, so read it raw
    smtpSubject: source.SMTP_SUBJECT,
    healthPort: env('HEALTH_PORT'),
    host: env('HOST'),
  };

  try {
    return configSchema.parse(raw);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { cause: error });
    }
    throw error;
  }
}
