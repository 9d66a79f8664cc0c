import { describe, it, expect, vi } from 'vitest';
import { Baseline, establishBaseline } from '../../core/tracking/Baseline.js';
import { GatewayError } from '../../utils/errors.js';
import type { MessageId, MessageIdScheme } from '../../ports/ModemPort.js';

function source(scheme: MessageIdScheme, listInbox: () => Promise<MessageId[]>) {
  return { idScheme: scheme, listInbox: vi.fn(listInbox) };
}

describe('Baseline', () => {
  describe('ordinal', () => {
    it('treats ids above the captured maximum as new', () => {
      const baseline = Baseline.capture('ordinal', [3, 5, 4]);
      expect(baseline.isNew(5)).toBe(false);
      expect(baseline.isNew(2)).toBe(false);
      expect(baseline.isNew(6)).toBe(true);
      expect(baseline.describe()).toEqual({ kind: 'ordinal', watermark: 5 });
    });

    it('accepts everything when empty', () => {
      const baseline = Baseline.empty('ordinal');
      expect(baseline.isNew(0)).toBe(true);
      expect(baseline.describe()).toEqual({ kind: 'ordinal', watermark: -1 });
    });

    it('selects new ids oldest first', () => {
      const baseline = Baseline.capture('ordinal', [5]);
      expect(baseline.select([7, 5, 6])).toEqual([6, 7]);
    });

    it('advances the watermark on consume', () => {
      const baseline = Baseline.capture('ordinal', [5]);
      baseline.consume(7);
      expect(baseline.isNew(6)).toBe(false);
      expect(baseline.isNew(8)).toBe(true);
    });

    it('compares numeric strings by value', () => {
      const baseline = Baseline.capture('ordinal', ['9']);
      expect(baseline.isNew('10')).toBe(true);
      expect(baseline.select(['10', '9', '11'])).toEqual(['10', '11']);
    });

    it('keeps offering a skipped id after a higher one is consumed', () => {
      const baseline = Baseline.capture('ordinal', [5]);
      expect(baseline.select([7, 6])).toEqual([6, 7]);

      baseline.consume(7);
      expect(baseline.isNew(6)).toBe(true);
      expect(baseline.select([6, 7])).toEqual([6]);

      baseline.consume(6);
      expect(baseline.select([6, 7])).toEqual([]);
    });

    it('forgets a skipped id once it leaves the inbox', () => {
      const baseline = Baseline.capture('ordinal', [5]);
      baseline.select([6, 7]);
      baseline.consume(7);

      expect(baseline.select([7])).toEqual([]);
      expect(baseline.isNew(6)).toBe(false);
    });
  });

  describe('token', () => {
    it('treats ids outside the captured set as new', () => {
      const baseline = Baseline.capture('token', ['a', 'b']);
      expect(baseline.isNew('a')).toBe(false);
      expect(baseline.isNew('c')).toBe(true);
      expect(baseline.describe()).toEqual({ kind: 'token', seen: 2 });
    });

    it('keeps snapshot order when selecting', () => {
      const baseline = Baseline.capture('token', ['b']);
      expect(baseline.select(['z', 'b', 'a'])).toEqual(['z', 'a']);
    });

    it('remembers consumed ids', () => {
      const baseline = Baseline.empty('token');
      baseline.consume('x');
      expect(baseline.isNew('x')).toBe(false);
    });

    it('forgets ids that are no longer in the inbox', () => {
      const baseline = Baseline.capture('token', ['a', 'b']);

      expect(baseline.select(['b'])).toEqual([]);
      expect(baseline.describe()).toEqual({ kind: 'token', seen: 1 });
      expect(baseline.isNew('a')).toBe(true);
    });
  });

  describe('establishBaseline', () => {
    it('does not list the inbox when existing messages are wanted', async () => {
      const src = source('ordinal', async () => [1, 2]);
      const baseline = await establishBaseline(src, { ignoreExisting: false });
      expect(src.listInbox).not.toHaveBeenCalled();
      expect(baseline.isNew(1)).toBe(true);
    });

    it('captures the newest ordinal id', async () => {
      const src = source('ordinal', async () => [5, 3]);
      const baseline = await establishBaseline(src, { ignoreExisting: true });
      expect(baseline.describe()).toEqual({ kind: 'ordinal', watermark: 5 });
    });

    it('captures an empty inbox as the empty baseline', async () => {
      const src = source('ordinal', async () => []);
      const baseline = await establishBaseline(src, { ignoreExisting: true });
      expect(baseline.describe()).toEqual({ kind: 'ordinal', watermark: -1 });
    });

    it('captures the full token set', async () => {
      const src = source('token', async () => ['/sms/a', '/sms/b']);
      const baseline = await establishBaseline(src, { ignoreExisting: true });
      expect(baseline.isNew('/sms/a')).toBe(false);
      expect(baseline.isNew('/sms/b')).toBe(false);
      expect(baseline.isNew('/sms/c')).toBe(true);
    });

    it('retries a failed listing after 30 seconds', async () => {
      const sleep = vi.fn().mockResolvedValue(undefined);
      const listInbox = vi
        .fn<() => Promise<MessageId[]>>()
        .mockRejectedValueOnce(new GatewayError('modem not ready'))
        .mockResolvedValueOnce([4]);

      const baseline = await establishBaseline({ idScheme: 'ordinal', listInbox }, { ignoreExisting: true, sleep });

      expect(listInbox).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep.mock.calls[0]?.[0]).toBe(30_000);
      expect(baseline.describe()).toEqual({ kind: 'ordinal', watermark: 4 });
    });

    it('keeps retrying without a ceiling', async () => {
      const sleep = vi.fn().mockResolvedValue(undefined);
      const listInbox = vi.fn<() => Promise<MessageId[]>>();
      for (let i = 0; i < 10; i++) {
        listInbox.mockRejectedValueOnce(new GatewayError('modem not ready'));
      }
      listInbox.mockResolvedValueOnce([]);

      await establishBaseline({ idScheme: 'ordinal', listInbox }, { ignoreExisting: true, sleep });

      expect(listInbox).toHaveBeenCalledTimes(11);
      expect(sleep).toHaveBeenCalledTimes(10);
    });

    it('does not retry errors that are not gateway failures', async () => {
      const sleep = vi.fn().mockResolvedValue(undefined);
      const listInbox = vi.fn<() => Promise<MessageId[]>>().mockRejectedValue(new TypeError('bug'));

      await expect(
        establishBaseline({ idScheme: 'ordinal', listInbox }, { ignoreExisting: true, sleep })
      ).rejects.toBeInstanceOf(TypeError);
      expect(sleep).not.toHaveBeenCalled();
    });
  });
});
