/**
 * puffdown start command
 *
 * Run the Telegram bot in the foreground until SIGINT/SIGTERM
 */

import { UserLaneQueue } from '../../concurrency/index.js';
import { DebugLogger, setLogLevel } from '../../debug-logger.js';
import { ConfigurationError } from '../../errors.js';
import { MessageRouter, TelegramGateway } from '../../gateways/index.js';
import { ConversationEngine, SqliteSessionStore, openSessionDatabase } from '../../wizard/index.js';
import {
  buildCatalog,
  expandPath,
  loadConfig,
  resolveBotToken,
  validateConfig,
} from '../config/config-manager.js';

const startLogger = new DebugLogger('cli');

export async function startCommand(): Promise<void> {
  const config = await loadConfig();

  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new ConfigurationError('file', `invalid configuration:\n  - ${problems.join('\n  - ')}`);
  }
  setLogLevel(config.logging.level);

  const token = resolveBotToken(config);
  const catalog = buildCatalog(config);

  const store = new SqliteSessionStore(openSessionDatabase(expandPath(config.database.path)));
  startLogger.info(
    `Session store ready: ${config.database.path} (${store.count()} sessions in progress)`
  );

  const engine = new ConversationEngine({ catalog, store });
  const messageRouter = new MessageRouter({ engine, lanes: new UserLaneQueue() });
  const gateway = new TelegramGateway({
    token,
    messageRouter,
    config: { allowedChats: config.telegram.allowed_chats },
  });

  try {
    await gateway.start();
  } catch (error) {
    store.close();
    throw error;
  }

  console.log(`✓ Bot started with ${catalog.stepCount()} setup questions. Press Ctrl+C to stop.`);

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    startLogger.info(`Received ${signal}, shutting down`);
    try {
      await gateway.stop();
    } catch (error) {
      startLogger.error('Failed to stop Telegram gateway:', error);
      process.exitCode = 1;
    } finally {
      store.close();
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}
