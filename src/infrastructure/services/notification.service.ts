import type { AlertCondition } from '../../domain/entities/alert-condition.entity';
import type { IndicatorId } from '../../domain/entities/indicator-sample.entity';
import type {
  INotificationService,
  IndicatorReading,
  NotificationResult,
  RenderedChart,
} from '../../domain/interfaces/services.interface';
import type { EmailConfig } from '../../config/monitor.config';
import { buildAlertEmail } from '../../presentation/email/alert-message.builder';
import { NotifyError, describeError } from '../../shared/errors';
import { Logger } from '../../shared/logger';
import type { MailTransport } from '../mail/mail.transport';

export class EmailNotificationService implements INotificationService {
  private readonly logger = new Logger(EmailNotificationService.name);

  constructor(
    private readonly transport: MailTransport,
    private readonly email: EmailConfig,
    private readonly dryRun: boolean = false,
  ) {}

  public async notify(
    alerts: readonly AlertCondition[],
    charts: ReadonlyMap<IndicatorId, RenderedChart>,
    latest: ReadonlyMap<IndicatorId, IndicatorReading>,
  ): Promise<NotificationResult> {
    if (alerts.length === 0) {
      this.logger.info('No alerts, nothing to send');
      return { sent: false, alertCount: 0 };
    }

    const message = buildAlertEmail(alerts, charts, latest);

    if (this.dryRun) {
      this.logger.info(`📭 DRY_RUN: would send "${message.subject}" to ${this.email.to || '(unset)'}`, {
        text: message.text,
        attachments: message.attachments.map((a) => a.filename),
      });
      return { sent: false, alertCount: alerts.length };
    }

    if (!this.email.address || !this.email.password || !this.email.to) {
      throw new NotifyError('EMAIL_ADDRESS, EMAIL_PASSWORD and EMAIL_TO must be set to send alerts');
    }

    try {
      const info = await this.transport.sendMail({
        from: this.email.address,
        to: this.email.to,
        subject: message.subject,
        text: message.text,
        html: message.html,
        attachments: [...message.attachments],
      });
      this.logger.info(`📤 Sent "${message.subject}" with ${alerts.length} alert(s), id ${info.messageId}`);
      return { sent: true, alertCount: alerts.length, messageId: info.messageId };
    } catch (error) {
      this.logger.error('Failed to send alert email:', error);
      throw new NotifyError(`Failed to send alert email: ${describeError(error)}`, { cause: error });
    }
  }
}
