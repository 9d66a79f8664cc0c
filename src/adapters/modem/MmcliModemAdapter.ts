import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { MessageId, MessageIdScheme, ModemPort, SmsMessage } from '../../ports/ModemPort.js';
import { createLogger } from '../../utils/logger.js';
import { GatewayError } from '../../utils/errors.js';
import { retry } from '../../utils/retry.js';
import { parseInboxListing, parseModemList, parseSmsDetails } from './mmcliOutput.js';

const DELETE_ATTEMPTS = 3;

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (file: string, args: string[]) => Promise<CommandResult>;

const execFileAsync = promisify(execFile);

export const runCommand: CommandRunner = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, args, { encoding: 'utf8' });
  return { stdout, stderr };
};

function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
    return stderr || error.message;
  }
  return String(error);
}

export interface MmcliModemAdapterOptions {
  modemId: string;
  idScheme: MessageIdScheme;
  binary?: string;
  runner?: CommandRunner;
}

export class MmcliModemAdapter implements ModemPort {
  private readonly logger = createLogger({ adapter: 'MmcliModemAdapter' });
  private readonly binary: string;
  private readonly runner: CommandRunner;
  private modemId: string;
  readonly idScheme: MessageIdScheme;

  constructor(options: MmcliModemAdapterOptions) {
    this.modemId = options.modemId;
    this.idScheme = options.idScheme;
    this.binary = options.binary ?? 'mmcli';
    this.runner = options.runner ?? runCommand;
  }

  getModemId(): string {
    return this.modemId;
  }

  selectModem(modemId: string): void {
    this.logger.info({ previous: this.modemId, modemId }, 'Switching modem');
    this.modemId = modemId;
  }

  async listInbox(): Promise<MessageId[]> {
    const stdout = await this.mmcli(
      ['--modem', this.modemId, '--messaging-list-sms', '--output-json'],
      'Failed to fetch SMS list'
    );
    const { ids, rejected } = parseInboxListing(stdout, this.idScheme);
    for (const path of rejected) {
      this.logger.error({ path }, 'Failed to parse SMS id from path');
    }
    return ids;
  }

  async fetchMessage(id: MessageId): Promise<SmsMessage> {
    const stdout = await this.mmcli(
      ['--modem', this.modemId, '--sms', String(id), '--output-json'],
      `Failed to fetch SMS message ${id}`
    );
    return parseSmsDetails(stdout, id);
  }

  async deleteMessage(id: MessageId): Promise<void> {
    // ModemManager sometimes fails with "Couldn't delete N parts from this SMS"
    await retry(
      () =>
        this.mmcli(
          ['--modem', this.modemId, '--messaging-delete-sms', String(id)],
          `Failed to delete SMS message ${id}`
        ),
      {
        delayMs: 0,
        maxAttempts: DELETE_ATTEMPTS,
        isRetryable: (error) => error instanceof GatewayError,
        onRetry: (error, attempt) => this.logger.debug({ error, id, attempt }, 'Delete attempt failed'),
      }
    );
    this.logger.debug({ id }, 'Deleted SMS message');
  }

  async discoverModem(): Promise<string | null> {
    let modems: string[];
    try {
      modems = parseModemList(await this.mmcli(['--list-modems', '--output-json'], 'Failed to list modems'));
    } catch (error) {
      this.logger.error({ error }, 'Failed to auto-detect modem');
      return null;
    }

    const [first] = modems;
    if (first === undefined) {
      this.logger.error('Failed to auto-detect modem: no modems found');
      return null;
    }
    this.logger.info({ modemId: first }, 'Auto-detected modem');
    return first;
  }

  private async mmcli(args: string[], failure: string): Promise<string> {
    try {
      const { stdout } = await this.runner(this.binary, args);
      return stdout;
    } catch (error) {
      throw new GatewayError(`${failure}: ${describeFailure(error)}`, { cause: error });
    }
  }
}
