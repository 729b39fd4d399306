/**
 * Message gateway: Telegram transport and routing into the wizard
 */

export { TelegramGateway, splitMessage } from './telegram.js';
export type { TelegramGatewayConfig, TelegramGatewayOptions } from './telegram.js';
export { MessageRouter } from './message-router.js';
export type { MessageRouterOptions } from './message-router.js';
export {
  parseInput,
  welcomeText,
  HELP_TEXT,
  UNKNOWN_COMMAND_TEXT,
  FAILURE_TEXT,
} from './bot-commands.js';
export type { BotCommand, ParsedInput } from './bot-commands.js';
export type * from './types.js';
