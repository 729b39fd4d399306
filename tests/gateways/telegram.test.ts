/**
 * Unit tests for Telegram Gateway
 *
 * Note: These tests mock node-telegram-bot-api to test gateway logic without
 * requiring an actual Telegram connection.
 */

import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import type TelegramBot from 'node-telegram-bot-api';
import { TelegramGateway, splitMessage } from '../../src/gateways/telegram.js';
import { MessageRouter } from '../../src/gateways/message-router.js';
import type { GatewayEvent } from '../../src/gateways/types.js';
import { ConversationEngine } from '../../src/wizard/conversation-engine.js';
import { QuestionCatalog } from '../../src/wizard/question-catalog.js';
import { DEFAULT_QUESTIONS } from '../../src/wizard/default-questions.js';
import { SqliteSessionStore } from '../../src/wizard/session-store.js';
import { setLogLevel } from '../../src/debug-logger.js';

type MessageListener = (msg: TelegramBot.Message) => Promise<void>;
type BotUser = { id: number; is_bot: boolean; first_name: string; username?: string };

const BOT_USER: BotUser = { id: 1, is_bot: true, first_name: 'Puffdown', username: 'puffdown_bot' };

const { mockBot, MockTelegramBot } = vi.hoisted(() => {
  const mockBot = {
    on: vi.fn<(event: string, listener: MessageListener) => void>(),
    getMe: vi.fn<() => Promise<BotUser>>(),
    startPolling: vi.fn<() => Promise<void>>(),
    stopPolling: vi.fn<() => Promise<void>>(),
    sendMessage: vi.fn<(chatId: string, text: string) => Promise<object>>(),
  };
  // Regular function so the gateway can call it with `new`
  const MockTelegramBot = vi.fn(function () {
    return mockBot;
  });
  return { mockBot, MockTelegramBot };
});

vi.mock('node-telegram-bot-api', () => ({ default: MockTelegramBot }));

function textMessage(text: string, overrides: Partial<TelegramBot.Message> = {}): TelegramBot.Message {
  return {
    message_id: 7,
    date: 0,
    chat: { id: 100, type: 'private' },
    from: { id: 42, is_bot: false, first_name: 'Ana', username: 'ana' },
    text,
    ...overrides,
  };
}

function messageListener(): MessageListener {
  const call = mockBot.on.mock.calls.find(([event]) => event === 'message');
  if (!call) {
    throw new Error('no message listener registered');
  }
  return call[1];
}

describe('TelegramGateway', () => {
  let store: SqliteSessionStore;
  let router: MessageRouter;
  let gateway: TelegramGateway;
  let events: GatewayEvent[];

  beforeAll(() => {
    setLogLevel('NONE');
  });

  afterAll(() => {
    setLogLevel(null);
  });

  beforeEach(() => {
    vi.clearAllMocks();
    mockBot.getMe.mockResolvedValue(BOT_USER);
    mockBot.startPolling.mockResolvedValue(undefined);
    mockBot.stopPolling.mockResolvedValue(undefined);
    mockBot.sendMessage.mockResolvedValue({});

    store = new SqliteSessionStore(new Database(':memory:'));
    router = new MessageRouter({
      engine: new ConversationEngine({ catalog: new QuestionCatalog(DEFAULT_QUESTIONS), store }),
    });
    gateway = new TelegramGateway({ token: 'test-token', messageRouter: router });
    events = [];
    gateway.onEvent((event) => events.push(event));
  });

  afterEach(() => {
    store.close();
  });

  describe('constructor', () => {
    it('should default to allowing every chat', () => {
      expect(gateway.source).toBe('telegram');
      expect(gateway.getConfig()).toEqual({ token: 'test-token', allowedChats: [] });
      expect(gateway.isConnected()).toBe(false);
    });
  });

  describe('start()', () => {
    it('should check the token before polling and emit connected', async () => {
      await gateway.start();

      expect(MockTelegramBot).toHaveBeenCalledWith('test-token', { polling: false });
      expect(mockBot.startPolling).toHaveBeenCalledTimes(1);
      expect(mockBot.getMe.mock.invocationCallOrder[0]).toBeLessThan(
        mockBot.startPolling.mock.invocationCallOrder[0]
      );
      expect(gateway.isConnected()).toBe(true);
      expect(events.map((e) => e.type)).toEqual(['connected']);
      expect(events[0].data).toEqual({ username: 'puffdown_bot' });
    });

    it('should not start twice', async () => {
      await gateway.start();
      await gateway.start();

      expect(MockTelegramBot).toHaveBeenCalledTimes(1);
    });

    it('should never poll and rethrow when the token is refused', async () => {
      mockBot.getMe.mockRejectedValueOnce(new Error('401 Unauthorized'));

      await expect(gateway.start()).rejects.toThrow('401 Unauthorized');
      expect(mockBot.startPolling).not.toHaveBeenCalled();
      expect(gateway.isConnected()).toBe(false);
      await expect(gateway.sendMessage('100', 'hi')).rejects.toThrow(
        'Telegram gateway not connected'
      );
    });

    it('should reply to a message that arrives before the login check finishes', async () => {
      let finishLogin: (me: BotUser) => void = () => {};
      mockBot.getMe.mockReturnValueOnce(
        new Promise<BotUser>((resolve) => {
          finishLogin = resolve;
        })
      );
      store.put('42', { userId: '42', currentStep: 0, answers: [] });

      const starting = gateway.start();
      await vi.waitFor(() => expect(mockBot.getMe).toHaveBeenCalledTimes(1));
      await messageListener()(textMessage('20'));

      expect(store.get('42')).toEqual({ userId: '42', currentStep: 1, answers: [20] });
      expect(mockBot.sendMessage).toHaveBeenCalledWith('100', "🎯 Reduce by 'number' or 'percent'?");
      expect(mockBot.startPolling).not.toHaveBeenCalled();

      finishLogin(BOT_USER);
      await starting;

      expect(mockBot.startPolling).toHaveBeenCalledTimes(1);
      expect(gateway.isConnected()).toBe(true);
    });
  });

  describe('stop()', () => {
    it('should stop polling and emit disconnected', async () => {
      await gateway.start();
      await gateway.stop();

      expect(mockBot.stopPolling).toHaveBeenCalledTimes(1);
      expect(gateway.isConnected()).toBe(false);
      expect(events.map((e) => e.type)).toEqual(['connected', 'disconnected']);
    });
  });

  describe('message handling', () => {
    beforeEach(async () => {
      await gateway.start();
      events = [];
    });

    it('should greet on /start using the first name', async () => {
      await messageListener()(textMessage('/start'));

      expect(mockBot.sendMessage).toHaveBeenCalledTimes(1);
      const [chatId, text] = mockBot.sendMessage.mock.calls[0];
      expect(chatId).toBe('100');
      expect(text.startsWith('Hello Ana! 👋')).toBe(true);
    });

    it('should key the wizard by sender and reply in the chat', async () => {
      const listener = messageListener();
      await listener(textMessage('/setup'));
      await listener(textMessage('abc'));
      await listener(textMessage('20'));

      expect(mockBot.sendMessage.mock.calls.map(([, text]) => text)).toEqual([
        '📊 How many puffs per day?',
        '⚠️ Please send a number greater than zero, e.g. 20.',
        "🎯 Reduce by 'number' or 'percent'?",
      ]);
      expect(store.get('42')).toEqual({ userId: '42', currentStep: 1, answers: [20] });
    });

    it('should emit received and sent events', async () => {
      await messageListener()(textMessage('/help'));

      expect(events.map((e) => e.type)).toEqual(['message_received', 'message_sent']);
      expect(events[0].data).toEqual({ chatId: '100', userId: '42' });
      expect(events[1].data).toMatchObject({ chatId: '100', kind: 'help' });
    });

    it('should ignore messages without a sender', async () => {
      await messageListener()(textMessage('/start', { from: undefined }));

      expect(mockBot.sendMessage).not.toHaveBeenCalled();
    });

    it('should ignore messages without text', async () => {
      await messageListener()(textMessage('   '));
      await messageListener()(textMessage('', { text: undefined }));

      expect(mockBot.sendMessage).not.toHaveBeenCalled();
      expect(events).toEqual([]);
    });

    it('should send one reply before routing the next message from the same user', async () => {
      let releaseFirstReply: () => void = () => {};
      mockBot.sendMessage.mockReturnValueOnce(
        new Promise<object>((resolve) => {
          releaseFirstReply = () => resolve({});
        })
      );
      const listener = messageListener();

      const first = listener(textMessage('/setup'));
      const second = listener(textMessage('20'));
      await vi.waitFor(() => expect(mockBot.sendMessage).toHaveBeenCalledTimes(1));
      await new Promise((resolve) => setTimeout(resolve, 20));

      expect(mockBot.sendMessage).toHaveBeenCalledTimes(1);
      expect(store.get('42')?.currentStep).toBe(0);

      releaseFirstReply();
      await Promise.all([first, second]);

      expect(mockBot.sendMessage.mock.calls.map(([, text]) => text)).toEqual([
        '📊 How many puffs per day?',
        "🎯 Reduce by 'number' or 'percent'?",
      ]);
      expect(store.get('42')?.currentStep).toBe(1);
    });

    it('should emit an error event when the reply cannot be sent', async () => {
      mockBot.sendMessage.mockRejectedValueOnce(new Error('429 Too Many Requests'));

      await messageListener()(textMessage('/help'));

      const error = events.find((e) => e.type === 'error');
      expect(error?.error?.message).toBe('429 Too Many Requests');
    });
  });

  describe('onEvent()', () => {
    it('should stop calling a handler once it is removed', async () => {
      const seen: string[] = [];
      const remove = gateway.onEvent((event) => seen.push(event.type));

      await gateway.start();
      remove();
      await gateway.stop();

      expect(seen).toEqual(['connected']);
      expect(events.map((e) => e.type)).toEqual(['connected', 'disconnected']);
    });

    it('should keep notifying other handlers when one throws', async () => {
      gateway.onEvent(() => {
        throw new Error('handler bug');
      });
      const after: string[] = [];
      gateway.onEvent((event) => after.push(event.type));

      await gateway.start();

      expect(after).toEqual(['connected']);
    });
  });

  describe('allowed chats', () => {
    it('should ignore chats outside the list', async () => {
      const restricted = new TelegramGateway({
        token: 'test-token',
        messageRouter: router,
        config: { allowedChats: ['555'] },
      });
      await restricted.start();

      await messageListener()(textMessage('/start'));
      expect(mockBot.sendMessage).not.toHaveBeenCalled();

      await messageListener()(textMessage('/start', { chat: { id: 555, type: 'group' } }));
      expect(mockBot.sendMessage).toHaveBeenCalledWith('555', expect.stringContaining('Hello Ana!'));
    });
  });

  describe('sendMessage()', () => {
    it('should refuse to send before start', async () => {
      await expect(gateway.sendMessage('100', 'hi')).rejects.toThrow(
        'Telegram gateway not connected'
      );
    });

    it('should split long text into several messages', async () => {
      await gateway.start();
      await gateway.sendMessage('100', 'x'.repeat(5000));

      expect(mockBot.sendMessage.mock.calls.map(([, text]) => text.length)).toEqual([4096, 904]);
    });
  });
});

describe('splitMessage()', () => {
  it('should return short text as one chunk', () => {
    expect(splitMessage('hello', 10)).toEqual(['hello']);
  });

  it('should break after a late line break', () => {
    expect(splitMessage('aaaaaaaa\nbbbb', 10)).toEqual(['aaaaaaaa', 'bbbb']);
  });

  it('should fall back to a space when there is no line break', () => {
    expect(splitMessage('aaaaaa bbbbbbb', 10)).toEqual(['aaaaaa', 'bbbbbbb']);
  });

  it('should cut mid-line when the only break is too early', () => {
    expect(splitMessage('aa\nbbbbbbbbbbbb', 10)).toEqual(['aa\nbbbbbbb', 'bbbbb']);
  });

  it('should not cut an emoji in half', () => {
    expect(splitMessage(`${'a'.repeat(9)}😀b`, 10)).toEqual(['aaaaaaaaa', '😀b']);
  });

  it('should default to the Bot API limit', () => {
    expect(splitMessage('x'.repeat(5000)).map((chunk) => chunk.length)).toEqual([4096, 904]);
  });
});
