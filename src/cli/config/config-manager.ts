/**
 * Configuration Manager
 *
 * Manages the YAML configuration file at ~/.puffdown/config.yaml
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import * as yaml from 'js-yaml';

import { ConfigurationError, isPuffdownError } from '../../errors.js';
import { QuestionCatalog, parseQuestionDefinitions } from '../../wizard/question-catalog.js';
import { DEFAULT_QUESTIONS } from '../../wizard/default-questions.js';
import type { PuffdownConfig, TelegramConfig } from './types.js';
import { DEFAULT_CONFIG, PUFFDOWN_PATHS, VALID_LOG_LEVELS } from './types.js';

/**
 * Expand ~ to home directory
 */
export function expandPath(path: string): string {
  if (path.startsWith('~')) {
    return path.replace('~', homedir());
  }
  return path;
}

/**
 * Get the Puffdown home directory
 */
export function getPuffdownHome(): string {
  const override = process.env.PUFFDOWN_HOME?.trim();
  return override ? resolve(expandPath(override)) : expandPath(PUFFDOWN_PATHS.HOME);
}

/**
 * Get the full path to config file
 */
export function getConfigPath(): string {
  return join(getPuffdownHome(), PUFFDOWN_PATHS.CONFIG_FILE);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(key, 'must be a mapping');
  }
  return value;
}

function optionalString(
  raw: Record<string, unknown>,
  key: string,
  configKey: string
): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigurationError(configKey, 'must be a string');
  }
  return value;
}

function parseTelegram(raw: Record<string, unknown>): TelegramConfig {
  const chats = raw.allowed_chats ?? [];
  if (
    !Array.isArray(chats) ||
    !chats.every((chat) => typeof chat === 'string' || typeof chat === 'number')
  ) {
    throw new ConfigurationError('telegram.allowed_chats', 'must be a list of chat ids');
  }
  return {
    token: optionalString(raw, 'token', 'telegram.token') ?? DEFAULT_CONFIG.telegram.token,
    allowed_chats: chats.map((chat) => String(chat)),
  };
}

/**
 * Merge user config with defaults
 */
function mergeWithDefaults(raw: Record<string, unknown>): PuffdownConfig {
  const version = raw.version;
  if (typeof version !== 'number') {
    throw new ConfigurationError('version', 'missing required field');
  }

  const database = section(raw, 'database');
  const logging = section(raw, 'logging');
  const wizard = section(raw, 'wizard');

  const config: PuffdownConfig = {
    version,
    telegram: parseTelegram(section(raw, 'telegram')),
    database: {
      path: optionalString(database, 'path', 'database.path') ?? DEFAULT_CONFIG.database.path,
    },
    logging: {
      level: optionalString(logging, 'level', 'logging.level') ?? DEFAULT_CONFIG.logging.level,
    },
  };

  const questions = wizard.questions;
  if (questions !== undefined && questions !== null) {
    if (!Array.isArray(questions)) {
      throw new ConfigurationError('wizard.questions', 'must be a list');
    }
    config.wizard = { questions };
  }

  return config;
}

/**
 * Load configuration from file
 *
 * @throws ConfigurationError if the file doesn't exist or is invalid
 */
export async function loadConfig(): Promise<PuffdownConfig> {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    throw new ConfigurationError(
      'file',
      `Configuration file not found: ${configPath}\nRun 'puffdown init' to create it.`
    );
  }

  let parsed: unknown;
  try {
    const content = await readFile(configPath, 'utf-8');
    parsed = yaml.load(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError('file', `Failed to load configuration: ${message}`, {
      path: configPath,
    });
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError('file', 'configuration must be a YAML mapping', {
      path: configPath,
    });
  }

  return mergeWithDefaults(parsed);
}

/**
 * Save configuration to file
 */
export async function saveConfig(config: PuffdownConfig): Promise<void> {
  const configPath = getConfigPath();
  const configDir = dirname(configPath);

  if (!existsSync(configDir)) {
    await mkdir(configDir, { recursive: true });
  }

  const content = yaml.dump(config, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
  });

  const fileContent = `# Puffdown Configuration
# Generated: ${new Date().toISOString()}

${content}`;

  await writeFile(configPath, fileContent, 'utf-8');
}

/**
 * Create default configuration file
 *
 * @param overwrite - Whether to overwrite existing config
 * @returns Path to created config file
 * @throws ConfigurationError if config exists and overwrite is false
 */
export async function createDefaultConfig(overwrite = false): Promise<string> {
  const configPath = getConfigPath();

  if (existsSync(configPath) && !overwrite) {
    throw new ConfigurationError(
      'file',
      `Configuration file already exists: ${configPath}\nUse --force to overwrite.`
    );
  }

  await saveConfig(DEFAULT_CONFIG);
  return configPath;
}

/**
 * Build the question catalog the config asks for
 *
 * @throws CatalogConfigurationError if the configured questions are malformed
 */
export function buildCatalog(config: PuffdownConfig): QuestionCatalog {
  const questions = config.wizard?.questions;
  return new QuestionCatalog(
    questions === undefined ? DEFAULT_QUESTIONS : parseQuestionDefinitions(questions)
  );
}

/**
 * Validate configuration
 *
 * @returns List of problems (empty if valid)
 */
export function validateConfig(config: PuffdownConfig): string[] {
  const errors: string[] = [];

  if (config.version !== 1) {
    errors.push(`Unsupported config version: ${config.version}`);
  }

  if (!config.database.path.trim()) {
    errors.push('database.path is required');
  }

  if (!VALID_LOG_LEVELS.some((level) => level === config.logging.level)) {
    errors.push(`logging.level must be one of: ${VALID_LOG_LEVELS.join(', ')}`);
  }

  try {
    buildCatalog(config);
  } catch (error) {
    if (!isPuffdownError(error)) {
      throw error;
    }
    errors.push(error.message);
  }

  return errors;
}

/**
 * Token from TELEGRAM_BOT_TOKEN, falling back to the config file
 *
 * @throws ConfigurationError when neither has one
 */
export function resolveBotToken(config: PuffdownConfig): string {
  const fromEnv = process.env.TELEGRAM_BOT_TOKEN?.trim();
  if (fromEnv) {
    return fromEnv;
  }
  const fromConfig = config.telegram.token?.trim();
  if (fromConfig) {
    return fromConfig;
  }
  throw new ConfigurationError(
    'telegram.token',
    `no bot token; set TELEGRAM_BOT_TOKEN or add it to ${getConfigPath()}`
  );
}
