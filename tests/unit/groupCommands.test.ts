/**
 * Unit tests for filters, welcome, restriction panel, roles and help
 * Tests: src/commands/filters.ts, src/commands/welcome.ts,
 *        src/commands/restrictions.ts, src/commands/roles.ts, src/commands/help.ts
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { PRIVILEGED_TARGET_REFUSAL } from '../../src/commands/restrictions';
import { NO_RIGHTS, ROLE_TEMPLATES } from '../../src/commands/roles';
import type { RepliedMessage } from '../../src/services/commandRouter';
import { failed } from '../../src/services/enforcementGateway';
import { emptyRestrictionSet } from '../../src/services/restrictionMatrix';
import { memberKey } from '../../src/types';
import { restrictionPanelKeyboard } from '../../src/utils/keyboards';
import {
  BOT_ID,
  createTestRouter,
  GROUP_ID,
  MEMBER,
  makeRequest,
  replyText,
  type TestRouter,
} from '../helpers';

const photoReply: RepliedMessage = {
  messageId: 41,
  sender: MEMBER,
  media: [{ kind: 'photo', fileId: 'photo-9' }],
  caption: 'Read these',
};

describe('group commands', () => {
  let fixture: TestRouter;

  beforeEach(() => {
    vi.clearAllMocks();
    fixture = createTestRouter();
  });

  describe('keyword filters', () => {
    it('/filter binds the keyword to the replied-to media', async () => {
      const reply = await fixture.router.dispatch(
        makeRequest('filter', 'Rules', { replyTo: photoReply }),
      );

      expect(replyText(reply)).toBe(
        "✅ Filter set successfully!\n\nKeyword: rules\nMedia Type: Photo\n\nWhen users send 'rules', the bot will respond with this photo.",
      );
      expect(fixture.services.filters.get(GROUP_ID, 'rules')).toEqual({
        keyword: 'rules',
        mediaKind: 'photo',
        mediaHandle: 'photo-9',
        caption: 'Read these',
      });
    });

    it('/filter needs a reply, a keyword and usable media', async () => {
      const noReply = await fixture.router.dispatch(makeRequest('filter', 'rules'));
      expect(replyText(noReply)?.split('\n')[0]).toBe(
        '❌ Please reply to a message containing media (photo/sticker/GIF/video).',
      );

      const noKeyword = await fixture.router.dispatch(
        makeRequest('filter', '', { replyTo: photoReply }),
      );
      expect(replyText(noKeyword)?.split('\n')[0]).toBe('❌ Please provide a keyword.');

      const documentOnly = await fixture.router.dispatch(
        makeRequest('filter', 'rules', {
          replyTo: { messageId: 41, media: [{ kind: 'document', fileId: 'doc-1' }] },
        }),
      );
      expect(replyText(documentOnly)).toBe(
        '❌ The replied message must contain a photo, sticker, GIF, or video.',
      );

      expect(fixture.services.filters.list(GROUP_ID)).toEqual([]);
    });

    it('/filters lists the group filters for anyone', async () => {
      const empty = await fixture.router.dispatch(makeRequest('filters', '', { issuer: MEMBER }));
      expect(replyText(empty)).toBe(
        '📝 No filters set in this group.\n\nUse /filter keyword while replying to media to create one.',
      );

      fixture.services.filters.set(GROUP_ID, 'rules', 'photo', 'photo-9');
      const listed = await fixture.router.dispatch(makeRequest('filters', '', { issuer: MEMBER }));
      expect(replyText(listed)).toBe('📝 Active Filters:\n\n• rules → Photo\n\nTotal: 1 filter(s)');
    });

    it('/stopfilter removes a filter', async () => {
      fixture.services.filters.set(GROUP_ID, 'rules', 'photo', 'photo-9');

      const removed = await fixture.router.dispatch(makeRequest('stopfilter', 'RULES'));
      expect(replyText(removed)).toBe('✅ Filter removed successfully!\n\nKeyword: rules');

      const missing = await fixture.router.dispatch(makeRequest('stopfilter', 'rules'));
      expect(replyText(missing)).toBe('❌ No filter found for keyword: rules');
    });
  });

  describe('welcome settings', () => {
    it('/setwelcomemessage stores the template and previews it', async () => {
      const reply = await fixture.router.dispatch(
        makeRequest('setwelcomemessage', 'Hi {name}, welcome to {group}'),
      );

      expect(reply).toEqual({
        content: '✅ Welcome message set successfully!\n\nPreview:\nHi John, welcome to Test Group',
        options: { parseMode: 'HTML' },
      });
      expect(fixture.services.configStore.get(GROUP_ID).welcomeText).toBe(
        'Hi {name}, welcome to {group}',
      );
    });

    it('/setwelcomemessage without text shows the usage', async () => {
      const reply = await fixture.router.dispatch(makeRequest('setwelcomemessage'));
      expect(replyText(reply)?.split('\n')[0]).toBe('❌ Please provide a welcome message.');
    });

    it('/setwelcomeimage takes the replied-to photo', async () => {
      const reply = await fixture.router.dispatch(
        makeRequest('setwelcomeimage', '', { replyTo: photoReply }),
      );
      expect(replyText(reply)).toBe('✅ Welcome image set successfully!');
      expect(fixture.services.configStore.get(GROUP_ID).welcomeImageHandle).toBe('photo-9');

      const withoutPhoto = await fixture.router.dispatch(makeRequest('setwelcomeimage'));
      expect(replyText(withoutPhoto)).toBe(
        '❌ Please reply to an image with /setwelcomeimage to set it as the welcome image.',
      );
    });

    it('/resetwelcome names what it cleared', async () => {
      const nothing = await fixture.router.dispatch(makeRequest('resetwelcome'));
      expect(replyText(nothing)).toBe('ℹ️ No custom welcome settings found. Already using default.');

      fixture.services.configStore.set(GROUP_ID, 'welcomeText', 'Hi');
      fixture.services.configStore.set(GROUP_ID, 'welcomeImageHandle', 'photo-9');
      const both = await fixture.router.dispatch(makeRequest('resetwelcome'));
      expect(replyText(both)).toBe('✅ Welcome message and image reset to default!');

      fixture.services.configStore.set(GROUP_ID, 'welcomeImageHandle', 'photo-9');
      const image = await fixture.router.dispatch(makeRequest('resetwelcomeimage'));
      expect(replyText(image)).toBe('✅ Welcome image reset to default!');
    });

    it('/service shows the default until /setservice replaces it', async () => {
      const before = await fixture.router.dispatch(makeRequest('service', '', { issuer: MEMBER }));
      expect(replyText(before)?.split('\n')[0]).toBe('🎁 Free Services Available');

      const set = await fixture.router.dispatch(makeRequest('setservice', 'Free lessons on Friday'));
      expect(replyText(set)).toBe(
        '✅ Service information set successfully!\n\nPreview:\nFree lessons on Friday',
      );

      const after = await fixture.router.dispatch(makeRequest('service', '', { issuer: MEMBER }));
      expect(replyText(after)).toBe('Free lessons on Friday');

      const reset = await fixture.router.dispatch(makeRequest('resetservice'));
      expect(replyText(reset)).toBe('✅ Service information reset to default!');
    });
  });

  describe('/free', () => {
    it('opens the panel and creates the restriction record', async () => {
      const reply = await fixture.router.dispatch(makeRequest('free', '444444444'));
      const key = memberKey(GROUP_ID, MEMBER.id);

      expect(fixture.services.restrictions.hasEntry(key)).toBe(true);
      expect(fixture.services.restrictions.allowsLinks(key)).toBe(true);
      expect(replyText(reply)?.split('\n').slice(0, 3)).toEqual([
        '🔧 Restriction Manager',
        '',
        'ID: 444444444',
      ]);
      expect(reply?.keyboard).toEqual(restrictionPanelKeyboard(MEMBER.id, emptyRestrictionSet()));
    });

    it('refuses privileged targets', async () => {
      const reply = await fixture.router.dispatch(makeRequest('free', '111111111'));

      expect(replyText(reply)).toBe(PRIVILEGED_TARGET_REFUSAL);
      expect(fixture.services.restrictions.hasEntry(memberKey(GROUP_ID, 111111111))).toBe(false);
    });
  });

  describe('roles', () => {
    it('/promote admin grants the administrator template', async () => {
      const reply = await fixture.router.dispatch(makeRequest('promote', 'admin 444444444'));

      expect(fixture.gateway.promoteMember).toHaveBeenCalledWith(
        GROUP_ID,
        MEMBER.id,
        ROLE_TEMPLATES.admin,
      );
      expect(replyText(reply)).toBe('✅ User promoted to Administrator.');
    });

    it('/promote defaults to moderator', async () => {
      const reply = await fixture.router.dispatch(
        makeRequest('promote', '', { replyTo: photoReply }),
      );

      expect(fixture.gateway.promoteMember).toHaveBeenCalledWith(
        GROUP_ID,
        MEMBER.id,
        ROLE_TEMPLATES.mod,
      );
      expect(replyText(reply)).toBe('✅ Bob promoted to Moderator.');
    });

    it('/promote reports platform failures', async () => {
      fixture.gateway.promoteMember.mockResolvedValueOnce(failed(new Error('not enough rights')));

      const reply = await fixture.router.dispatch(makeRequest('promote', 'mod 444444444'));

      expect(replyText(reply)).toBe('❌ Failed to promote user: not enough rights');
    });

    it('/demote clears every right', async () => {
      const reply = await fixture.router.dispatch(makeRequest('demote', '', { replyTo: photoReply }));

      expect(fixture.gateway.promoteMember).toHaveBeenCalledWith(GROUP_ID, MEMBER.id, NO_RIGHTS);
      expect(replyText(reply)).toBe('✅ Bob has been demoted.');
    });
  });

  describe('help and status', () => {
    it('/help lists public and admin commands separately', async () => {
      const reply = await fixture.router.dispatch(
        makeRequest('help', '', { issuer: MEMBER, chatKind: 'private' }),
      );
      const lines = replyText(reply)?.split('\n') ?? [];

      const general = lines.indexOf('General commands:');
      const admin = lines.indexOf('Admin commands:');
      expect(general).toBeGreaterThan(0);
      expect(admin).toBeGreaterThan(general);
      expect(lines.indexOf('/filters - List all filters')).toBeLessThan(admin);
      expect(lines.indexOf('/ban - Ban user (reply/mention/ID/@username)')).toBeGreaterThan(admin);
    });

    it('/start answers differently in private', async () => {
      const privateReply = await fixture.router.dispatch(
        makeRequest('start', '', { chatKind: 'private' }),
      );
      expect(replyText(privateReply)?.split('\n')[0]).toBe(
        '👋 Hello! Add me to a group and make me an admin to manage it.',
      );

      const groupReply = await fixture.router.dispatch(makeRequest('start'));
      expect(replyText(groupReply)).toBe('✅ Bot is active! Use /help to see available commands.');
    });

    it('/status marks every right for an owner bot', async () => {
      fixture = createTestRouter({ owners: [BOT_ID] });

      const reply = await fixture.router.dispatch(makeRequest('status', '', { issuer: MEMBER }));

      expect(fixture.gateway.getMemberStatus).toHaveBeenCalledWith(GROUP_ID, BOT_ID);
      expect(replyText(reply)?.split('\n')).toEqual([
        '🤖 Bot Status',
        '',
        'Status: creator',
        '',
        'Permissions:',
        '✅ Delete messages',
        '✅ Restrict members',
        '✅ Invite users',
        '✅ Pin messages',
        '✅ Manage topics',
        '✅ Change info',
      ]);
    });

    it('/status reports a failed lookup', async () => {
      fixture.gateway.getMemberStatus.mockResolvedValueOnce(failed(new Error('chat not found')));

      const reply = await fixture.router.dispatch(makeRequest('status', '', { issuer: MEMBER }));

      expect(replyText(reply)).toBe('❌ Failed to get bot status: chat not found');
    });
  });
});
