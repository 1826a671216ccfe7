/**
 * Unit tests for command target resolution
 * Tests: src/utils/targetResolver.ts
 */

import { describe, expect, it } from 'vitest';
import {
  remainingArgs,
  requireTarget,
  resolveTarget,
  targetName,
} from '../../src/utils/targetResolver';
import { UnresolvedTargetError } from '../../src/utils/errors';
import { ADMIN, createFakeGateway, MEMBER, makeRequest } from '../helpers';

const gateway = createFakeGateway({ admins: [ADMIN] });

describe('resolveTarget', () => {
  it('prefers the replied-to sender over everything else', async () => {
    const target = await resolveTarget(
      makeRequest('ban', '555', { replyTo: { messageId: 1, sender: MEMBER, media: [] } }),
      gateway,
    );
    expect(target).toEqual({ userId: MEMBER.id, profile: MEMBER, source: 'reply' });
  });

  it('uses a text mention before a numeric id', async () => {
    const target = await resolveTarget(makeRequest('ban', '555', { textMentions: [MEMBER] }), gateway);
    expect(target?.source).toBe('text_mention');
  });

  it('accepts a numeric id', async () => {
    expect(await resolveTarget(makeRequest('ban', '555 spam'), gateway)).toEqual({
      userId: 555,
      source: 'id',
    });
  });

  it('looks @usernames up among administrators', async () => {
    const target = await resolveTarget(makeRequest('info', '@Alice_Admin'), gateway);
    expect(target).toEqual({ userId: ADMIN.id, profile: ADMIN, source: 'username' });
  });

  it('falls back to mention entities', async () => {
    const target = await resolveTarget(
      makeRequest('info', 'please check @alice_admin', { mentionedUsernames: ['alice_admin'] }),
      gateway,
    );
    expect(target?.source).toBe('mention');
  });

  it('cannot resolve ordinary members by username', async () => {
    expect(await resolveTarget(makeRequest('info', '@bob'), gateway)).toBeUndefined();
    await expect(requireTarget(makeRequest('info', '@bob'), gateway)).rejects.toThrow(
      UnresolvedTargetError,
    );
    await expect(requireTarget(makeRequest('info'), gateway, 'custom usage')).rejects.toThrow(
      'custom usage',
    );
  });
});

describe('remainingArgs', () => {
  it('drops the id or username word only', () => {
    const request = makeRequest('mute', '555 3');
    expect(remainingArgs(request, { userId: 555, source: 'id' })).toEqual(['3']);
  });

  it('drops every @word for mention targets', () => {
    const request = makeRequest('mute', 'hey @alice_admin 3');
    expect(remainingArgs(request, { userId: 1, source: 'mention' })).toEqual(['hey', '3']);
  });

  it('keeps all arguments for replies', () => {
    const request = makeRequest('mute', '3');
    expect(remainingArgs(request, { userId: 1, source: 'reply' })).toEqual(['3']);
  });
});

describe('targetName', () => {
  it('uses the first name when known', () => {
    expect(targetName({ userId: MEMBER.id, profile: MEMBER, source: 'reply' })).toBe('Bob');
    expect(targetName({ userId: 5, source: 'id' })).toBe('User');
  });
});
