import 'dotenv/config';

import { loadMonitorConfig } from '../config/monitor.config';
import { migrateHistoryFile } from '../infrastructure/repositories/history-migration';
import { Logger } from '../shared/logger';

const logger = new Logger('MigrateHistory');

/**
 * Rewrites the history file (HISTORY_FILE, or the path given as the first
 * argument) in the current per-indicator format.
 */
async function migrate(): Promise<void> {
  const config = loadMonitorConfig();
  const filePath = process.argv[2] || config.history.filePath;

  const counts = await migrateHistoryFile(filePath, config.history.maxSamples);
  logger.info(`Rewrote ${filePath}: ${counts.length > 0 ? counts.join(', ') : 'no samples'}`);
}

migrate().then(
  () => {
    process.exitCode = 0;
  },
  (error: unknown) => {
    logger.error('History migration failed:', error);
    process.exitCode = 1;
  },
);
