/**
 * puffdown sessions command
 *
 * List wizard runs that are waiting on an answer
 */

import { SqliteSessionStore, openSessionDatabase } from '../../wizard/index.js';
import type { StoredSession } from '../../wizard/index.js';
import { buildCatalog, expandPath, loadConfig } from '../config/config-manager.js';

/**
 * One line per session: user, progress and last update
 */
export function formatSessionLine(session: StoredSession, stepCount: number): string {
  const updated = new Date(session.updatedAt).toISOString();
  return `${session.userId}\tstep ${session.currentStep + 1}/${stepCount}\tupdated ${updated}`;
}

export async function sessionsCommand(): Promise<void> {
  const config = await loadConfig();
  const catalog = buildCatalog(config);
  const store = new SqliteSessionStore(openSessionDatabase(expandPath(config.database.path)));

  try {
    const sessions = store.list();
    if (sessions.length === 0) {
      console.log('No sessions in progress.');
      return;
    }

    console.log(`\n📋 ${sessions.length} session(s) in progress\n`);
    for (const session of sessions) {
      console.log(formatSessionLine(session, catalog.stepCount()));
    }
    console.log('');
  } finally {
    store.close();
  }
}
