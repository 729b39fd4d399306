/**
 * puffdown init command
 *
 * Write the default configuration file
 */

import { createDefaultConfig } from '../config/config-manager.js';

export interface InitOptions {
  /** Overwrite an existing config file */
  force?: boolean;
}

export async function initCommand(options: InitOptions = {}): Promise<void> {
  const configPath = await createDefaultConfig(options.force ?? false);

  console.log(`✓ Configuration written to ${configPath}`);
  console.log('');
  console.log('Next steps:');
  console.log('  1. Add your bot token under telegram.token (or set TELEGRAM_BOT_TOKEN)');
  console.log('  2. Run: puffdown start');
}
