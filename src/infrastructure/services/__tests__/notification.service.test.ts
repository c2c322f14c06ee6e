import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { EmailNotificationService } from '../notification.service';
import type { MailTransport } from '../../mail/mail.transport';
import type { EmailConfig } from '../../../config/monitor.config';
import { createAlert } from '../../../domain/entities/alert-condition.entity';
import { NotifyError } from '../../../shared/errors';

const email: EmailConfig = {
  address: 'monitor@example.com',
  password: 'test-secret',
  to: 'me@example.com',
  smtpHost: 'smtp.example.com',
  smtpPort: 587,
  smtpSecure: false,
};

const alert = createAlert('DominanceLow', 'BTC dominance 44.00% < 45% → trim low-cap alts.', ['btc_dominance']);

describe('EmailNotificationService', () => {
  let sendMail: Mock<MailTransport['sendMail']>;
  let transport: MailTransport;

  beforeEach(() => {
    sendMail = vi.fn<MailTransport['sendMail']>().mockResolvedValue({ messageId: '<1@example.com>' });
    transport = { sendMail };
  });

  it('sends nothing when no alert fired', async () => {
    const result = await new EmailNotificationService(transport, email).notify([], new Map(), new Map());

    expect(result).toEqual({ sent: false, alertCount: 0 });
    expect(sendMail).not.toHaveBeenCalled();
  });

  it('sends one email for the alerts', async () => {
    const result = await new EmailNotificationService(transport, email).notify([alert], new Map(), new Map());

    expect(result).toEqual({ sent: true, alertCount: 1, messageId: '<1@example.com>' });
    expect(sendMail).toHaveBeenCalledTimes(1);
    expect(sendMail.mock.calls[0][0]).toMatchObject({
      from: 'monitor@example.com',
      to: 'me@example.com',
      subject: '⚠️ Trim Risky Alts',
      attachments: [],
    });
  });

  it('wraps transport failures in NotifyError', async () => {
    sendMail.mockRejectedValue(new Error('535 authentication failed'));

    const notifier = new EmailNotificationService(transport, email);

    await expect(notifier.notify([alert], new Map(), new Map())).rejects.toThrow(
      new NotifyError('Failed to send alert email: 535 authentication failed'),
    );
  });

  it('refuses to send without credentials', async () => {
    const notifier = new EmailNotificationService(transport, { ...email, password: '' });

    await expect(notifier.notify([alert], new Map(), new Map())).rejects.toBeInstanceOf(NotifyError);
    expect(sendMail).not.toHaveBeenCalled();
  });

  it('only logs in dry-run mode', async () => {
    const notifier = new EmailNotificationService(transport, { ...email, password: '' }, true);

    await expect(notifier.notify([alert], new Map(), new Map())).resolves.toEqual({ sent: false, alertCount: 1 });
    expect(sendMail).not.toHaveBeenCalled();
  });
});
