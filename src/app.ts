import { Logger } from './shared/logger';
import type { RunMonitorUseCase, RunReport } from './application/use-cases/run-monitor.use-case';

export class MarketExitMonitor {
  private readonly logger = new Logger(MarketExitMonitor.name);

  constructor(private readonly runMonitor: RunMonitorUseCase) {}

  public async run(): Promise<RunReport> {
    this.logger.info('Starting Market Exit Monitor run...');
    try {
      const report = await this.runMonitor.execute();

      const fired = report.alerts.length;
      const skipped = report.outcomes.filter((o) => o.status === 'skipped').length;
      this.logger.info(
        `Run finished: ${fired} alert(s), ${skipped} evaluator(s) skipped, ` +
          `${report.failures.length} source(s) unavailable, email ${report.notification.sent ? 'sent' : 'not sent'}`,
      );
      return report;
    } catch (error) {
      this.logger.error('Monitor run failed:', error);
      throw error;
    }
  }
}
