import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { SmsMessage } from '../../ports/ModemPort.js';
import { createLogger } from '../../utils/logger.js';
import { ConfigError } from '../../utils/errors.js';

const logger = createLogger({ component: 'blacklist' });

const blacklistFileSchema = z.object({
  words: z.array(z.string()).default([]),
  numbers: z.array(z.string()).default([]),
});

export type Classification =
  | { verdict: 'allowed' }
  | { verdict: 'blocked'; reason: 'content' | 'sender'; pattern: string };

/**
 * Ordered content and sender patterns. Content is checked first; within each
 * list the first matching pattern decides.
 */
export class Blacklist {
  static empty(): Blacklist {
    return new Blacklist([], []);
  }

  /** Compiles patterns; an invalid expression is a ConfigError. */
  static fromPatterns(words: readonly string[], numbers: readonly string[]): Blacklist {
    return new Blacklist(words.map(compile), numbers.map(compile));
  }

  private constructor(
    private readonly content: readonly RegExp[],
    private readonly sender: readonly RegExp[]
  ) {}

  get size(): { content: number; sender: number } {
    return { content: this.content.length, sender: this.sender.length };
  }

  classify(message: Pick<SmsMessage, 'number' | 'text'>): Classification {
    const word = this.content.find((pattern) => pattern.test(message.text));
    if (word) {
      return { verdict: 'blocked', reason: 'content', pattern: word.source };
    }
    const number = this.sender.find((pattern) => pattern.test(message.number));
    if (number) {
      return { verdict: 'blocked', reason: 'sender', pattern: number.source };
    }
    return { verdict: 'allowed' };
  }
}

function compile(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ConfigError(`Invalid blacklist pattern: ${pattern}`, { cause: error });
  }
}

export async function loadBlacklist(path: string): Promise<Blacklist> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.info({ path }, 'Blacklist file not found, not using a blacklist');
      return Blacklist.empty();
    }
    throw new ConfigError(`Failed to read blacklist ${path}`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    logger.warn({ path }, 'Blacklist file does not contain valid JSON');
    return Blacklist.empty();
  }

  const parsed = blacklistFileSchema.safeParse(data);
  if (!parsed.success) {
    logger.warn({ path, issues: parsed.error.issues }, 'Blacklist file has an unexpected shape');
    return Blacklist.empty();
  }

  const blacklist = Blacklist.fromPatterns(parsed.data.words, parsed.data.numbers);
  logger.info(
    { path, words: blacklist.size.content, numbers: blacklist.size.sender },
    'Loaded blacklist'
  );
  return blacklist;
}
