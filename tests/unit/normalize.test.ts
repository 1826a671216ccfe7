/**
 * Unit tests for update classification and command parsing
 * Tests: src/handlers/normalize.ts, src/handlers/commands.ts
 */

import type { Chat, Message, MessageEntity, Update, User } from 'telegraf/types';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildCommandRequest, deliverReply } from '../../src/handlers/commands';
import { classifyUpdate, type RepliedTelegramMessage } from '../../src/handlers/normalize';
import { ADMIN, createTestServices, GROUP_ID, MEMBER, type TestServices } from '../helpers';

const DATE = 1_700_000_000;

const group: Chat.SupergroupChat = { id: GROUP_ID, type: 'supergroup', title: 'Test Group' };
const bobUser: User = { id: MEMBER.id, is_bot: false, first_name: 'Bob', username: 'bob' };
const aliceUser: User = {
  id: ADMIN.id,
  is_bot: false,
  first_name: 'Alice',
  username: 'alice_admin',
};
const helperBot: User = { id: 999, is_bot: true, first_name: 'Helper' };

describe('classifyUpdate', () => {
  it('turns a group text message into a message event', () => {
    const update: Update = {
      update_id: 1,
      message: { message_id: 42, date: DATE, chat: group, from: bobUser, text: 'good morning' },
    };

    expect(classifyUpdate(update)).toEqual({
      kind: 'message',
      message: {
        groupId: GROUP_ID,
        groupTitle: 'Test Group',
        messageId: 42,
        sender: MEMBER,
        text: 'good morning',
        caption: undefined,
        hasUrlEntity: false,
        media: [],
        isCommand: false,
        edited: false,
      },
    });
  });

  it('keeps the largest photo size and notices caption links', () => {
    const update: Update = {
      update_id: 1,
      message: {
        message_id: 43,
        date: DATE,
        chat: group,
        from: bobUser,
        photo: [
          { file_id: 'photo-small', file_unique_id: 'ps', width: 90, height: 90 },
          { file_id: 'photo-large', file_unique_id: 'pl', width: 800, height: 800 },
        ],
        caption: 'see example.com',
        caption_entities: [{ type: 'url', offset: 4, length: 11 }],
      },
    };

    const event = classifyUpdate(update);
    expect(event?.kind).toBe('message');
    if (event?.kind !== 'message') return;
    expect(event.message.media).toEqual([{ kind: 'photo', fileId: 'photo-large' }]);
    expect(event.message.hasUrlEntity).toBe(true);
    expect(event.message.caption).toBe('see example.com');
  });

  it('marks commands', () => {
    const update: Update = {
      update_id: 1,
      message: {
        message_id: 44,
        date: DATE,
        chat: group,
        from: aliceUser,
        text: '/settings',
        entities: [{ type: 'bot_command', offset: 0, length: 9 }],
      },
    };

    const event = classifyUpdate(update);
    expect(event?.kind === 'message' && event.message.isCommand).toBe(true);
  });

  it('reports edits separately', () => {
    const update: Update = {
      update_id: 2,
      edited_message: {
        message_id: 42,
        date: DATE,
        edit_date: DATE + 5,
        chat: group,
        from: bobUser,
        text: 'good evening',
      },
    };

    const event = classifyUpdate(update);
    expect(event?.kind).toBe('edited');
    expect(event?.kind === 'edited' && event.message.edited).toBe(true);
  });

  it('collects joined members, bots included', () => {
    const update: Update = {
      update_id: 3,
      message: {
        message_id: 90,
        date: DATE,
        chat: group,
        from: bobUser,
        new_chat_members: [bobUser, helperBot],
      },
    };

    expect(classifyUpdate(update)).toEqual({
      kind: 'members_joined',
      groupId: GROUP_ID,
      groupTitle: 'Test Group',
      messageId: 90,
      members: [MEMBER, { id: 999, firstName: 'Helper', isBot: true }],
    });
  });

  it('classifies join requests', () => {
    const update: Update = {
      update_id: 4,
      chat_join_request: { chat: group, from: bobUser, user_chat_id: MEMBER.id, date: DATE },
    };

    expect(classifyUpdate(update)).toEqual({
      kind: 'join_request',
      groupId: GROUP_ID,
      userId: MEMBER.id,
    });
  });

  it('separates service notices from event content', () => {
    const renamed: Update = {
      update_id: 5,
      message: { message_id: 91, date: DATE, chat: group, from: aliceUser, new_chat_title: 'New' },
    };
    const dice: Update = {
      update_id: 6,
      message: {
        message_id: 92,
        date: DATE,
        chat: group,
        from: bobUser,
        dice: { emoji: '🎲', value: 4 },
      },
    };

    expect(classifyUpdate(renamed)).toEqual({ kind: 'service', groupId: GROUP_ID, messageId: 91 });
    expect(classifyUpdate(dice)).toEqual({ kind: 'event', groupId: GROUP_ID, messageId: 92 });
  });

  it('ignores private chats', () => {
    const update: Update = {
      update_id: 7,
      message: {
        message_id: 1,
        date: DATE,
        chat: { id: MEMBER.id, type: 'private', first_name: 'Bob' },
        from: bobUser,
        text: 'hi',
      },
    };

    expect(classifyUpdate(update)).toBeUndefined();
  });
});

function commandMessage(
  text: string,
  entities: MessageEntity[],
  extra: Partial<Message.TextMessage> = {},
): Message.TextMessage {
  return { message_id: 7, date: DATE, chat: group, from: aliceUser, text, entities, ...extra };
}

describe('buildCommandRequest', () => {
  it('strips the bot name and splits the arguments', () => {
    const request = buildCommandRequest(
      commandMessage('/BAN@ModBot 444444444  spam\nagain', [
        { type: 'bot_command', offset: 0, length: 11 },
      ]),
    );

    expect(request).toEqual({
      command: 'ban',
      chatId: GROUP_ID,
      chatKind: 'supergroup',
      chatTitle: 'Test Group',
      messageId: 7,
      issuer: ADMIN,
      args: ['444444444', 'spam', 'again'],
      argText: '444444444  spam\nagain',
      replyTo: undefined,
      textMentions: [],
      mentionedUsernames: [],
    });
  });

  it('lifts text mentions out of the arguments', () => {
    const request = buildCommandRequest(
      commandMessage('/mute Bob 2', [
        { type: 'bot_command', offset: 0, length: 5 },
        { type: 'text_mention', offset: 6, length: 3, user: bobUser },
      ]),
    );

    expect(request?.args).toEqual(['2']);
    expect(request?.textMentions).toEqual([MEMBER]);
  });

  it('collects @username mentions without the @', () => {
    const request = buildCommandRequest(
      commandMessage('/info @bob', [
        { type: 'bot_command', offset: 0, length: 5 },
        { type: 'mention', offset: 6, length: 4 },
      ]),
    );

    expect(request?.mentionedUsernames).toEqual(['bob']);
    expect(request?.args).toEqual(['@bob']);
  });

  it('describes the replied-to message', () => {
    const replied: RepliedTelegramMessage = {
      message_id: 41,
      date: DATE,
      chat: group,
      from: bobUser,
      sticker: {
        file_id: 'sticker-1',
        file_unique_id: 's1',
        type: 'regular',
        width: 512,
        height: 512,
        is_animated: false,
        is_video: false,
      },
      reply_to_message: undefined,
    };

    const request = buildCommandRequest(
      commandMessage('/filter hello', [{ type: 'bot_command', offset: 0, length: 7 }], {
        reply_to_message: replied,
      }),
    );

    expect(request?.replyTo).toEqual({
      messageId: 41,
      sender: MEMBER,
      media: [{ kind: 'sticker', fileId: 'sticker-1' }],
      caption: undefined,
    });
  });

  it('ignores text that does not start with a command', () => {
    expect(
      buildCommandRequest(commandMessage('try /ban', [{ type: 'bot_command', offset: 4, length: 4 }])),
    ).toBeUndefined();
    expect(buildCommandRequest(commandMessage('/ban', []))).toBeUndefined();
  });
});

describe('deliverReply', () => {
  let fixture: TestServices;

  beforeEach(() => {
    vi.clearAllMocks();
    fixture = createTestServices();
  });

  afterEach(() => {
    fixture.services.scheduler.clearAll();
  });

  it('sends the reply with its options and keyboard', async () => {
    const keyboard = { inline_keyboard: [[{ text: 'OK', callback_data: 'free_1_apply' }]] };

    await deliverReply(
      fixture.services,
      { chatId: GROUP_ID, chatKind: 'supergroup', messageId: 7 },
      { content: '<b>done</b>', options: { parseMode: 'HTML' }, keyboard },
    );

    expect(fixture.gateway.sendText).toHaveBeenCalledWith(GROUP_ID, '<b>done</b>', {
      parseMode: 'HTML',
      keyboard,
    });
    expect(fixture.services.scheduler.pendingCount()).toBe(0);
  });

  it('schedules the command and the reply when self-destruct is on', async () => {
    fixture.services.configStore.set(GROUP_ID, 'selfDestructSeconds', 10);

    await deliverReply(
      fixture.services,
      { chatId: GROUP_ID, chatKind: 'supergroup', messageId: 7 },
      { content: 'done' },
    );

    expect(fixture.services.scheduler.pendingCount()).toBe(2);
  });

  it('never schedules in private chats', async () => {
    fixture.services.configStore.set(MEMBER.id, 'selfDestructSeconds', 10);

    await deliverReply(
      fixture.services,
      { chatId: MEMBER.id, chatKind: 'private', messageId: 7 },
      { content: 'done' },
    );

    expect(fixture.services.scheduler.pendingCount()).toBe(0);
  });
});
