import { loadMonitorConfig } from './config/monitor.config';
import { registerDependencies } from './app.container';
import { Logger } from './shared/logger';

const logger = new Logger('Bootstrap');

/** One monitor run; resolves to the process exit status and never rejects. */
export async function bootstrap(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const config = loadMonitorConfig(env);
    const container = registerDependencies(config);
    await container.get('MarketExitMonitor').run();
    return 0;
  } catch (error) {
    // ConfigError, NotifyError and anything unexpected end the run with status 1
    logger.error('Market Exit Monitor failed:', error);
    return 1;
  }
}
