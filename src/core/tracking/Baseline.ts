import type { MessageId, MessageIdScheme, ModemPort } from '../../ports/ModemPort.js';
import { createLogger } from '../../utils/logger.js';
import { GatewayError } from '../../utils/errors.js';
import { retry } from '../../utils/retry.js';
import type { Sleep } from '../../utils/sleep.js';

const logger = createLogger({ component: 'baseline' });

export const BASELINE_RETRY_DELAY_MS = 30_000;

export type BaselineState =
  | { kind: 'ordinal'; watermark: number; pending: Set<number> }
  | { kind: 'token'; seen: Set<MessageId> };

function toOrdinal(id: MessageId): number | null {
  if (typeof id === 'number') {
    return Number.isInteger(id) ? id : null;
  }
  return /^\d+$/.test(id) ? parseInt(id, 10) : null;
}

/**
 * Which inbox entries predate the current session (or were already handled).
 * Ordinal ids are new above a watermark, or while offered and not yet
 * consumed; opaque ids are new until seen.
 */
export class Baseline {
  private constructor(private readonly state: BaselineState) {}

  static empty(scheme: MessageIdScheme): Baseline {
    return scheme === 'ordinal'
      ? new Baseline({ kind: 'ordinal', watermark: -1, pending: new Set() })
      : new Baseline({ kind: 'token', seen: new Set() });
  }

  /** Treats everything in `snapshot` as pre-existing. */
  static capture(scheme: MessageIdScheme, snapshot: readonly MessageId[]): Baseline {
    const baseline = Baseline.empty(scheme);
    for (const id of snapshot) {
      baseline.consume(id);
    }
    return baseline;
  }

  describe(): { kind: MessageIdScheme; watermark?: number; seen?: number } {
    return this.state.kind === 'ordinal'
      ? { kind: 'ordinal', watermark: this.state.watermark }
      : { kind: 'token', seen: this.state.seen.size };
  }

  isNew(id: MessageId): boolean {
    if (this.state.kind === 'token') {
      return !this.state.seen.has(id);
    }
    const ordinal = toOrdinal(id);
    return ordinal !== null && (ordinal > this.state.watermark || this.state.pending.has(ordinal));
  }

  consume(id: MessageId): void {
    if (this.state.kind === 'token') {
      this.state.seen.add(id);
      return;
    }
    const ordinal = toOrdinal(id);
    if (ordinal === null) {
      return;
    }
    this.state.pending.delete(ordinal);
    if (ordinal > this.state.watermark) {
      this.state.watermark = ordinal;
    }
  }

  /**
   * New ids from a snapshot, oldest first. An ordinal id handed out here
   * stays new until consumed, even after a higher id is consumed. Ids no
   * longer in the inbox are forgotten.
   */
  select(snapshot: readonly MessageId[]): MessageId[] {
    if (this.state.kind === 'token') {
      const present = new Set(snapshot);
      for (const id of this.state.seen) {
        if (!present.has(id)) {
          this.state.seen.delete(id);
        }
      }
      return snapshot.filter((id) => this.isNew(id));
    }

    const present = new Set(snapshot.map(toOrdinal));
    for (const ordinal of this.state.pending) {
      if (!present.has(ordinal)) {
        this.state.pending.delete(ordinal);
      }
    }
    const fresh = snapshot.filter((id) => this.isNew(id));
    for (const id of fresh) {
      const ordinal = toOrdinal(id);
      if (ordinal !== null) {
        this.state.pending.add(ordinal);
      }
    }
    return fresh.sort((a, b) => (toOrdinal(a) ?? 0) - (toOrdinal(b) ?? 0));
  }
}

export interface EstablishBaselineOptions {
  ignoreExisting: boolean;
  retryDelayMs?: number;
  sleep?: Sleep;
  signal?: AbortSignal;
}

export async function establishBaseline(
  source: Pick<ModemPort, 'idScheme' | 'listInbox'>,
  options: EstablishBaselineOptions
): Promise<Baseline> {
  if (!options.ignoreExisting) {
    logger.info('Treating messages already in the inbox as new');
    return Baseline.empty(source.idScheme);
  }

  logger.info('Fetching initial SMS inbox');
  const snapshot = await retry(() => source.listInbox(), {
    delayMs: options.retryDelayMs ?? BASELINE_RETRY_DELAY_MS,
    isRetryable: (error) => error instanceof GatewayError,
    sleep: options.sleep,
    signal: options.signal,
    onRetry: (error, attempt) =>
      logger.warn(
        { error, attempt, retryInMs: options.retryDelayMs ?? BASELINE_RETRY_DELAY_MS },
        'Initial SMS inbox fetch failed, retrying'
      ),
  });

  const baseline = Baseline.capture(source.idScheme, snapshot);
  logger.info({ baseline: baseline.describe(), existing: snapshot.length }, 'Baseline established, waiting for new messages');
  return baseline;
}
