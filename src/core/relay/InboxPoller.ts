import type pino from 'pino';
import type { MessageId, ModemPort, SmsMessage } from '../../ports/ModemPort.js';
import type { Blacklist } from '../filter/Blacklist.js';
import { Baseline, establishBaseline } from '../tracking/Baseline.js';
import { DuplicateDetector } from '../tracking/DuplicateDetector.js';
import type { MailDelivery } from './MailDelivery.js';
import { formatSmsDate, parseSmsTimestamp, type SmsTimestamp } from './smsFormat.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';
import { GatewayError } from '../../utils/errors.js';
import { sleep as defaultSleep, type Sleep } from '../../utils/sleep.js';

export type PollerState = 'initializing' | 'waiting' | 'fetching_list' | 'processing';

export type MessageOutcome =
  | 'delivered'
  | 'blocked'
  | 'duplicate'
  | 'fetch_failed'
  | 'invalid_timestamp'
  | 'failed';

export interface CycleReport {
  /** False when the inbox could not be listed. */
  listed: boolean;
  outcomes: Array<{ id: MessageId; outcome: MessageOutcome }>;
}

export interface PollerStatus {
  state: PollerState;
  modemId: string;
  cycles: number;
  lastPollAt: string | null;
  baseline: ReturnType<Baseline['describe']> | null;
  counts: Record<MessageOutcome, number>;
}

export interface InboxPollerDependencies {
  modemPort: ModemPort;
  blacklist: Blacklist;
  delivery: MailDelivery;
  duplicates?: DuplicateDetector;
  sleep?: Sleep;
  now?: () => Date;
}

export interface InboxPollerOptions {
  pollIntervalSeconds: number;
  deleteAfterProcessing: boolean;
  ignoreExisting: boolean;
  baselineRetryDelayMs?: number;
}

function isAbort(error: unknown, signal?: AbortSignal): boolean {
  return signal?.aborted === true || (error instanceof Error && error.name === 'AbortError');
}

/**
 * Polls the modem on a fixed interval and relays every new SMS that survives
 * the blacklist and duplicate check. One cycle runs to completion before the
 * next sleep starts; messages are handled strictly one at a time.
 */
export class InboxPoller {
  private readonly logger = createLogger({ service: 'InboxPoller' });
  private readonly deps: InboxPollerDependencies;
  private readonly options: InboxPollerOptions;
  private readonly duplicates: DuplicateDetector;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  private state: PollerState = 'initializing';
  private baseline: Baseline | null = null;
  private cycles = 0;
  private lastPollAt: Date | null = null;
  private readonly counts: Record<MessageOutcome, number> = {
    delivered: 0,
    blocked: 0,
    duplicate: 0,
    fetch_failed: 0,
    invalid_timestamp: 0,
    failed: 0,
  };

  constructor(deps: InboxPollerDependencies, options: InboxPollerOptions) {
    this.deps = deps;
    this.options = options;
    this.duplicates = deps.duplicates ?? new DuplicateDetector();
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  getStatus(): PollerStatus {
    return {
      state: this.state,
      modemId: this.deps.modemPort.getModemId(),
      cycles: this.cycles,
      lastPollAt: this.lastPollAt?.toISOString() ?? null,
      baseline: this.baseline?.describe() ?? null,
      counts: { ...this.counts },
    };
  }

  async initialize(signal?: AbortSignal): Promise<void> {
    this.state = 'initializing';
    this.baseline = await establishBaseline(
      { idScheme: this.deps.modemPort.idScheme, listInbox: () => this.listInbox() },
      {
        ignoreExisting: this.options.ignoreExisting,
        retryDelayMs: this.options.baselineRetryDelayMs,
        sleep: this.sleep,
        signal,
      }
    );
    this.state = 'waiting';
  }

  /** Runs until `signal` aborts. */
  async run(signal?: AbortSignal): Promise<void> {
    try {
      await this.initialize(signal);
      for (;;) {
        this.state = 'waiting';
        await this.sleep(this.options.pollIntervalSeconds * 1000, signal);
        await this.runCycle(signal);
      }
    } catch (error) {
      if (isAbort(error, signal)) {
        this.logger.info('Poller stopped');
        return;
      }
      throw error;
    }
  }

  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    const baseline = this.baseline ?? Baseline.empty(this.deps.modemPort.idScheme);
    this.baseline = baseline;
    const logger = this.logger.child({ cycle: generateCorrelationId() });
    const report: CycleReport = { listed: false, outcomes: [] };

    this.cycles++;
    this.lastPollAt = this.now();
    this.state = 'fetching_list';

    let snapshot: MessageId[];
    try {
      snapshot = await this.listInbox();
    } catch (error) {
      logger.error({ error }, 'Failed to fetch SMS inbox, skipping cycle');
      this.state = 'waiting';
      return report;
    }
    report.listed = true;

    if (snapshot.length === 0) {
      logger.debug('Got empty SMS inbox list, skipping');
      this.state = 'waiting';
      return report;
    }
    logger.debug({ snapshot }, 'Fetched SMS inbox list');

    this.state = 'processing';
    for (const id of baseline.select(snapshot)) {
      const outcome = await this.processMessage(id, baseline, logger, signal);
      this.counts[outcome]++;
      report.outcomes.push({ id, outcome });
    }

    this.state = 'waiting';
    return report;
  }

  /**
   * Lists the inbox. When ModemManager says the modem is gone, tries once to
   * find a replacement for later cycles and still fails this call.
   */
  private async listInbox(): Promise<MessageId[]> {
    try {
      return await this.deps.modemPort.listInbox();
    } catch (error) {
      if (error instanceof GatewayError && error.isModemMissing()) {
        this.logger.warn({ modemId: this.deps.modemPort.getModemId() }, 'Modem no longer exists, re-detecting modem');
        const replacement = await this.deps.modemPort.discoverModem();
        if (replacement !== null) {
          this.deps.modemPort.selectModem(replacement);
        }
      }
      throw error;
    }
  }

  private async processMessage(
    id: MessageId,
    baseline: Baseline,
    logger: pino.Logger,
    signal?: AbortSignal
  ): Promise<MessageOutcome> {
    let sms: SmsMessage;
    try {
      sms = await this.deps.modemPort.fetchMessage(id);
    } catch (error) {
      logger.error({ error, id }, 'Failed to fetch SMS message');
      return 'fetch_failed';
    }

    let timestamp: SmsTimestamp;
    try {
      timestamp = parseSmsTimestamp(sms.timestamp);
    } catch (error) {
      // The fallback only labels the log line; the message is not relayed
      const fallback = this.now();
      logger.warn(
        { error, id, timestamp: sms.timestamp, fallback: fallback.toISOString() },
        'Failed to parse SMS timestamp, skipping message'
      );
      return 'invalid_timestamp';
    }

    const details = { id, from: sms.number, date: formatSmsDate(timestamp), text: sms.text };

    const classification = this.deps.blacklist.classify(sms);
    if (classification.verdict === 'blocked') {
      logger.warn(
        { ...details, reason: classification.reason, pattern: classification.pattern },
        'Received blacklisted SMS'
      );
      await this.deleteIfEnabled(id, logger);
      baseline.consume(id);
      return 'blocked';
    }

    if (this.duplicates.isDuplicate(sms)) {
      logger.debug({ id }, 'Ignoring duplicate SMS');
      await this.deleteIfEnabled(id, logger);
      baseline.consume(id);
      return 'duplicate';
    }

    logger.info(details, 'Received SMS');
    try {
      const attempts = await this.deps.delivery.deliver(sms, timestamp, signal);
      logger.info({ id, attempts }, 'SMS relayed by email');
    } catch (error) {
      if (isAbort(error, signal)) {
        throw error;
      }
      logger.error({ error, id }, 'Failed to relay SMS');
      return 'failed';
    }

    await this.deleteIfEnabled(id, logger);
    this.duplicates.remember(sms);
    baseline.consume(id);
    return 'delivered';
  }

  // Best effort: a message that stays on the modem is still consumed
  private async deleteIfEnabled(id: MessageId, logger: pino.Logger): Promise<void> {
    if (!this.options.deleteAfterProcessing) {
      return;
    }
    try {
      await this.deps.modemPort.deleteMessage(id);
    } catch (error) {
      logger.error({ error, id }, 'Failed to delete SMS message');
    }
  }
}
