/**
 * Configuration types for the Puffdown CLI
 */

/**
 * Telegram connection settings
 */
export interface TelegramConfig {
  /**
   * Bot token from @BotFather.
   * TELEGRAM_BOT_TOKEN in the environment takes precedence.
   */
  token?: string;
  /**
   * Chats the bot answers in; empty means every chat
   * @example ["123456789"]
   */
  allowed_chats: string[];
}

export interface DatabaseConfig {
  /** SQLite file holding in-progress wizard sessions */
  path: string;
}

export interface LoggingConfig {
  /** debug | info | warn | error | none */
  level: string;
}

export interface WizardConfig {
  /**
   * Replacement question list. Checked at startup; a bad list stops the bot.
   * Each entry: key, label, prompt, rejection, validation { kind, choices? }
   */
  questions?: unknown[];
}

/**
 * Main configuration structure (~/.puffdown/config.yaml)
 */
export interface PuffdownConfig {
  version: number;
  telegram: TelegramConfig;
  database: DatabaseConfig;
  logging: LoggingConfig;
  wizard?: WizardConfig;
}

export const VALID_LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'none'] as const;

export const DEFAULT_CONFIG: PuffdownConfig = {
  version: 1,
  telegram: {
    token: '',
    allowed_chats: [],
  },
  database: {
    path: '~/.puffdown/sessions.db',
  },
  logging: {
    level: 'info',
  },
};

export const PUFFDOWN_PATHS = {
  /** Home directory (PUFFDOWN_HOME overrides) */
  HOME: '~/.puffdown',
  /** Configuration file name inside the home directory */
  CONFIG_FILE: 'config.yaml',
} as const;
