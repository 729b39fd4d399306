/**
 * Slash commands and their static texts
 */

export type BotCommand = 'start' | 'help' | 'setup' | 'cancel';

export type ParsedInput =
  | { type: 'command'; command: BotCommand }
  | { type: 'unknown_command'; name: string }
  | { type: 'text'; text: string };

const COMMANDS: readonly BotCommand[] = ['start', 'help', 'setup', 'cancel'];

function isBotCommand(name: string): name is BotCommand {
  return COMMANDS.some((command) => command === name);
}

/**
 * Classify a message. Only the first token can be a command; a trailing
 * "@botname" (group chats) is dropped.
 */
export function parseInput(text: string): ParsedInput {
  const trimmed = text.trim();
  if (!trimmed.startsWith('/')) {
    return { type: 'text', text };
  }

  const [token] = trimmed.split(/\s+/, 1);
  const name = token.slice(1).split('@', 1)[0].toLowerCase();
  if (isBotCommand(name)) {
    return { type: 'command', command: name };
  }
  return { type: 'unknown_command', name };
}

export function welcomeText(firstName?: string): string {
  const greeting = firstName?.trim() ? `Hello ${firstName.trim()}! 👋` : 'Hello! 👋';
  return (
    `${greeting}\n\n` +
    "I'm your personal vaping-reduction assistant.\n" +
    'Send /setup to plan your reduction, or /help for all commands.'
  );
}

export const HELP_TEXT = [
  'Available commands:',
  '• /start – welcome message',
  '• /setup – configure your reduction plan',
  '• /cancel – abort current setup',
  '• /help – this help',
].join('\n');

export const UNKNOWN_COMMAND_TEXT = "I don't know that command. Send /help to see what I can do.";

export const FAILURE_TEXT = "Sorry, I couldn't save your progress. Please send that again.";
