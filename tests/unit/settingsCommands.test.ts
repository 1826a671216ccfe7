/**
 * Unit tests for the per-group settings commands
 * Tests: src/commands/settings.ts
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { parseVisibility, parseWholeNumber } from '../../src/commands/settings';
import { MAX_DELAY_SECONDS } from '../../src/services/deletionScheduler';
import { InvalidInputError } from '../../src/utils/errors';
import {
  createTestRouter,
  GROUP_ID,
  MEMBER,
  makeRequest,
  replyText,
  type TestRouter,
} from '../helpers';

describe('settings commands', () => {
  let fixture: TestRouter;

  const run = async (command: string, text = '') =>
    replyText(await fixture.router.dispatch(makeRequest(command, text)));
  const config = () => fixture.services.configStore.get(GROUP_ID);

  beforeEach(() => {
    vi.clearAllMocks();
    fixture = createTestRouter();
  });

  describe('/setwarnlimit and /resetwarnlimit', () => {
    it('stores a valid limit', async () => {
      expect(await run('setwarnlimit', '5')).toBe('✅ Warning limit set to 5.');
      expect(config().warnThreshold).toBe(5);
    });

    it.each(['0', 'abc', '-2', '2.5', ''])('rejects %j and keeps the old limit', async (raw) => {
      expect(await run('setwarnlimit', raw)).toBe(
        '❌ Usage: /setwarnlimit <number>\n\nThe limit must be a whole number of 1 or more.',
      );
      expect(config().warnThreshold).toBe(3);
    });

    it('reset reports whether anything changed', async () => {
      await run('setwarnlimit', '7');
      expect(await run('resetwarnlimit')).toBe('✅ Warning limit reset to default (3).');
      expect(await run('resetwarnlimit')).toBe('ℹ️ Warning limit is already the default (3).');
    });

    it('is refused for ordinary members', async () => {
      const reply = await fixture.router.dispatch(
        makeRequest('setwarnlimit', '1', { issuer: MEMBER }),
      );
      expect(replyText(reply)).toBe('❌ Only admins can use this command.');
      expect(config().warnThreshold).toBe(3);
    });
  });

  describe('/setmutetime and /resetmutetime', () => {
    it('stores and resets the duration', async () => {
      expect(await run('setmutetime', '12')).toBe('✅ Auto-mute duration set to 12 hour(s).');
      expect(config().muteDurationHours).toBe(12);

      expect(await run('resetmutetime')).toBe(
        '✅ Auto-mute duration reset to default (24 hour(s)).',
      );
      expect(config().muteDurationHours).toBe(24);
    });

    it('rejects zero hours', async () => {
      await run('setmutetime', '0');
      expect(config().muteDurationHours).toBe(24);
    });
  });

  describe('switches', () => {
    it('/editdelete turns edit deletion on and off', async () => {
      expect(await run('editdelete', 'on')).toBe(
        '✅ Edited messages from members will be deleted.',
      );
      expect(config().editDeletionEnabled).toBe(true);

      expect(await run('editdelete', 'off')).toBe('✅ Edited messages will no longer be deleted.');
      expect(config().editDeletionEnabled).toBe(false);
    });

    it('/nsfw accepts any case', async () => {
      expect(await run('nsfw', 'ON')).toBe('✅ NSFW filter enabled.');
      expect(config().nsfwFilterEnabled).toBe(true);
    });

    it('reject anything but on and off', async () => {
      expect(await run('nsfw', 'maybe')).toBe('❌ Usage: /nsfw on|off');
      expect(config().nsfwFilterEnabled).toBe(false);
    });
  });

  describe('self-destruct', () => {
    it('sets and clears the delay', async () => {
      expect(await run('resetselfdestruct')).toBe('ℹ️ Self-destruct is already off.');
      expect(await run('setselfdestruct', '30')).toBe(
        '✅ Bot replies will be deleted after 30 second(s).',
      );
      expect(config().selfDestructSeconds).toBe(30);

      expect(await run('resetselfdestruct')).toBe(
        '✅ Self-destruct disabled. Bot replies will be kept.',
      );
      expect(config().selfDestructSeconds).toBe(0);
    });

    it('rejects delays a timer cannot hold', async () => {
      await run('setselfdestruct', '30');

      expect(await run('setselfdestruct', '2200000')).toBe(
        '❌ Usage: /setselfdestruct <seconds>\n\nThe delay must be a whole number from 1 to 2147483.',
      );
      expect(config().selfDestructSeconds).toBe(30);
    });
  });

  describe('/servicemsg and /eventmsg', () => {
    it('off deletes immediately', async () => {
      expect(await run('servicemsg', 'off')).toBe('✅ Service messages: ❌ Deleted immediately');
      expect(config().serviceMsg).toEqual({ enabled: false, deleteAfterSeconds: 30 });
    });

    it('on keeps the current delay', async () => {
      await run('servicemsg', 'off');
      expect(await run('servicemsg', 'on')).toBe('✅ Service messages: ⏱️ Deleted after 30s');
    });

    it('a number sets the delay, 0 keeps messages', async () => {
      expect(await run('eventmsg', '120')).toBe('✅ Event messages: ⏱️ Deleted after 120s');
      expect(await run('eventmsg', '0')).toBe('✅ Event messages: ✅ Kept');
      expect(config().eventMsg).toEqual({ enabled: true, deleteAfterSeconds: 0 });
      expect(config().serviceMsg).toEqual({ enabled: true, deleteAfterSeconds: 30 });
    });

    it('rejects negative delays', async () => {
      expect((await run('eventmsg', '-5'))?.split('\n')[0]).toBe(
        '❌ Usage: /eventmsg on|off|<seconds>',
      );
      expect(config().eventMsg).toEqual({ enabled: true, deleteAfterSeconds: 30 });
    });

    it('accepts the longest timer delay and rejects anything longer', async () => {
      expect(await run('servicemsg', '2147483')).toBe(
        '✅ Service messages: ⏱️ Deleted after 2147483s',
      );

      expect((await run('servicemsg', '2200000'))?.split('\n')[0]).toBe(
        '❌ Usage: /servicemsg on|off|<seconds>',
      );
      expect(config().serviceMsg).toEqual({ enabled: true, deleteAfterSeconds: 2147483 });
    });

    it('keeps service messages when an oversized delay is refused', async () => {
      vi.useFakeTimers();
      try {
        await run('servicemsg', '2200000');
        await fixture.services.evaluator.handle({ kind: 'service', groupId: GROUP_ID, messageId: 77 });
        await vi.advanceTimersByTimeAsync(100);

        expect(fixture.gateway.deleteMessage).not.toHaveBeenCalled();
        expect(fixture.services.scheduler.pendingCount()).toBe(1);
      } finally {
        fixture.services.scheduler.clearAll();
        vi.useRealTimers();
      }
    });
  });

  it('/settings summarizes the effective values', async () => {
    await run('setwarnlimit', '4');
    await run('servicemsg', 'off');

    const lines = (await run('settings'))?.split('\n');

    expect(lines).toEqual([
      '⚙️ Group Settings',
      '',
      'Warning limit: 4',
      'Auto-mute duration: 24 hour(s)',
      'Delete edited messages: ❌ Off',
      'NSFW filter: ❌ Off',
      'Bot reply self-destruct: Off',
      'Service messages: ❌ Deleted immediately',
      'Event messages: ⏱️ Deleted after 30s',
      'Custom welcome: ❌ text, ❌ image',
      '',
      'Use /help to see the commands that change these.',
    ]);
  });
});

describe('argument parsers', () => {
  it('parseWholeNumber enforces the minimum', () => {
    expect(parseWholeNumber('0', 0, 'usage')).toBe(0);
    expect(() => parseWholeNumber('0', 1, 'usage')).toThrow(InvalidInputError);
    expect(() => parseWholeNumber(undefined, 0, 'usage')).toThrow('usage');
  });

  it('parseWholeNumber enforces the maximum', () => {
    expect(MAX_DELAY_SECONDS).toBe(2147483);
    expect(parseWholeNumber('2147483', 0, 'usage', MAX_DELAY_SECONDS)).toBe(2147483);
    expect(() => parseWholeNumber('2147484', 0, 'usage', MAX_DELAY_SECONDS)).toThrow(
      InvalidInputError,
    );
  });

  it('parseVisibility understands on, off and seconds', () => {
    expect(parseVisibility('on', 'usage')).toEqual({ enabled: true });
    expect(parseVisibility('Off', 'usage')).toEqual({ enabled: false });
    expect(parseVisibility('45', 'usage')).toEqual({ enabled: true, deleteAfterSeconds: 45 });
  });
});
