import { SendMailOptions } from 'nodemailer';
import { MailTransport } from '../../src/system/notification';
import { EmailSettings } from '../../src/system/config';

/**
 * In-memory mail transport that records every message
 */
export class RecordingTransport implements MailTransport {
  public sent: SendMailOptions[] = [];
  public failWith: Error | null = null;

  async sendMail(options: SendMailOptions): Promise<{ messageId: string }> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push(options);
    return { messageId: `<msg-${this.sent.length}@example.com>` };
  }
}

export const TEST_EMAIL: EmailSettings = {
  enabled: true,
  smtpHost: 'smtp.example.com',
  smtpPort: 587,
  smtpSecure: false,
  smtpUser: 'radar@example.com',
  smtpPass: 'test-password',
  recipient: 'team@example.com'
};
