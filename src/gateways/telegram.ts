/**
 * Telegram Gateway
 *
 * Long-polls the Bot API, hands each text message to the router and sends
 * the reply back to the chat it came from.
 */

import type TelegramBot from 'node-telegram-bot-api';

import { DebugLogger } from '../debug-logger.js';
import type { MessageRouter } from './message-router.js';
import type {
  Gateway,
  GatewayEvent,
  GatewayEventHandler,
  GatewayEventType,
  NormalizedMessage,
} from './types.js';

const logger = new DebugLogger('telegram');

/**
 * Telegram Gateway configuration
 */
export interface TelegramGatewayConfig {
  /** Telegram bot token from @BotFather */
  token: string;
  /** Allowed chat IDs (empty = allow all) */
  allowedChats: string[];
}

/**
 * Telegram Gateway options
 */
export interface TelegramGatewayOptions {
  /** Telegram bot token */
  token: string;
  /** Message router for processing messages */
  messageRouter: MessageRouter;
  /** Gateway configuration */
  config?: Partial<Omit<TelegramGatewayConfig, 'token'>>;
}

/** Bot API limit for one message */
const MAX_MESSAGE_LENGTH = 4096;

/**
 * Telegram Gateway class
 */
export class TelegramGateway implements Gateway {
  readonly source = 'telegram' as const;

  private messageRouter: MessageRouter;
  private config: TelegramGatewayConfig;
  private eventHandlers: GatewayEventHandler[] = [];
  private connected = false;
  private bot: TelegramBot | null = null;

  constructor(options: TelegramGatewayOptions) {
    this.messageRouter = options.messageRouter;
    this.config = {
      token: options.token,
      allowedChats: options.config?.allowedChats ?? [],
    };
  }

  /**
   * Start the Telegram gateway
   */
  async start(): Promise<void> {
    if (this.connected) {
      logger.warn('Telegram gateway already connected');
      return;
    }

    // Loaded lazily so the CLI's other commands don't pull in the client
    const TelegramBotModule = await import('node-telegram-bot-api');
    const TelegramBotClass = TelegramBotModule.default;

    // Replies can go out as soon as the client exists; polling waits for the token check
    const bot = new TelegramBotClass(this.config.token, { polling: false });
    bot.on('message', (msg: TelegramBot.Message) => this.onMessage(msg));
    this.bot = bot;

    let username: string | undefined;
    try {
      const me = await bot.getMe();
      username = me.username;
    } catch (error) {
      logger.error('Telegram connection failed:', error);
      this.bot = null;
      throw error;
    }

    logger.info(`Telegram bot logged in as @${username ?? 'unknown'}`);
    this.connected = true;
    await bot.startPolling();
    this.emit('connected', { data: { username } });
  }

  /**
   * Stop the Telegram gateway
   */
  async stop(): Promise<void> {
    if (this.bot) {
      await this.bot.stopPolling();
      this.bot = null;
    }
    this.connected = false;
    this.emit('disconnected');
  }

  /**
   * Listener registered with the client. Errors are logged here because
   * nothing upstream awaits the listener.
   */
  private onMessage(msg: TelegramBot.Message): Promise<void> {
    return this.handleMessage(msg).catch((error: unknown) => {
      logger.error(`Failed to handle message ${msg.message_id}:`, error);
      this.emit('error', { error: error instanceof Error ? error : new Error(String(error)) });
    });
  }

  /**
   * Handle incoming Telegram message
   */
  private async handleMessage(msg: TelegramBot.Message): Promise<void> {
    const chatId = String(msg.chat.id);

    if (this.config.allowedChats.length > 0 && !this.config.allowedChats.includes(chatId)) {
      logger.debug(`Ignoring message from unauthorized chat: ${chatId}`);
      return;
    }

    // Channel posts have no sender, and the wizard is keyed by sender
    if (!msg.from) return;

    const text = msg.text ?? '';
    if (!text.trim()) return;

    const userId = String(msg.from.id);
    logger.debug(`Message from ${msg.from.username ?? userId} in chat ${chatId}`);

    this.emit('message_received', { data: { chatId, userId } });

    const normalizedMessage: NormalizedMessage = {
      source: 'telegram',
      channelId: chatId,
      userId,
      text,
      metadata: {
        firstName: msg.from.first_name,
        username: msg.from.username,
        messageId: String(msg.message_id),
        chatType: msg.chat.type,
      },
    };

    // The reply goes out on the sender's lane, so prompts arrive in order
    const result = await this.messageRouter.process(normalizedMessage, (processed) =>
      this.sendMessage(chatId, processed.response)
    );

    this.emit('message_sent', {
      data: { chatId, kind: result.kind, duration: result.duration },
    });
  }

  /**
   * Send plain text to a chat, split at the Bot API length limit
   */
  async sendMessage(chatId: string, text: string): Promise<void> {
    if (!this.bot) {
      throw new Error('Telegram gateway not connected');
    }

    for (const chunk of splitMessage(text)) {
      await this.bot.sendMessage(chatId, chunk);
    }
  }

  /**
   * Stamp an event with this gateway's source and the current time, then
   * hand it to every handler. A throwing handler is logged and skipped.
   */
  private emit(type: GatewayEventType, extra: Pick<GatewayEvent, 'data' | 'error'> = {}): void {
    const event: GatewayEvent = { type, source: this.source, timestamp: new Date(), ...extra };
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        logger.error(`Gateway event handler failed on '${type}':`, error);
      }
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * @returns a function that removes the handler again
   */
  onEvent(handler: GatewayEventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      this.eventHandlers = this.eventHandlers.filter((registered) => registered !== handler);
    };
  }

  getConfig(): TelegramGatewayConfig {
    return { ...this.config, allowedChats: [...this.config.allowedChats] };
  }
}

/** Preferred places to break a long reply, best first */
const SPLIT_POINTS = ['\n', ' '];

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Where to cut `text` so the first piece fits in `maxLength`: after the last
 * line break or space in the second half of the window, otherwise a hard cut
 * that keeps a surrogate pair (emoji) in one piece.
 */
function findSplitPoint(text: string, maxLength: number): number {
  for (const point of SPLIT_POINTS) {
    const index = text.lastIndexOf(point, maxLength - point.length);
    if (index >= maxLength / 2) {
      return index + point.length;
    }
  }
  return maxLength > 1 && isHighSurrogate(text.charCodeAt(maxLength - 1))
    ? maxLength - 1
    : maxLength;
}

/**
 * Split a reply into messages of at most `maxLength` UTF-16 units. Text that
 * fits is returned untouched; otherwise whitespace at each cut is dropped.
 */
export function splitMessage(text: string, maxLength = MAX_MESSAGE_LENGTH): string[] {
  if (text.length <= maxLength) {
    return [text];
  }

  const chunks: string[] = [];
  let remaining = text;
  while (remaining.length > maxLength) {
    const cut = findSplitPoint(remaining, maxLength);
    const chunk = remaining.slice(0, cut).trimEnd();
    if (chunk) {
      chunks.push(chunk);
    }
    remaining = remaining.slice(cut).trimStart();
  }
  if (remaining) {
    chunks.push(remaining);
  }
  return chunks;
}
