import 'dotenv/config';

import { bootstrap } from './bootstrap';
import { Logger } from './shared/logger';

const logger = new Logger('Main');

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection:', reason);
  process.exit(1);
});

// exitCode rather than process.exit, so the file transports drain the last lines
void bootstrap().then((status) => {
  process.exitCode = status;
});
