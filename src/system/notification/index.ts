/**
 * Notification Module
 *
 * Adapter-based notification delivery. Email goes out through nodemailer;
 * the transport can be injected so that tests never open an SMTP connection.
 */

import path from 'path';
import nodemailer, { SendMailOptions } from 'nodemailer';
import { EmailSettings, NotificationSettings } from '../config';
import { toError } from '../../collection/utils/error-handler';
import { createPipelineLogger } from '../../collection/utils/logger';
import { MarkdownReportRenderer, formatDate } from '../../report/markdown-renderer';
import { RadarReport, ReportFiles } from '../../report/types';

export interface NotificationAttachment {
  filename: string;
  /** Path on disk; takes precedence over content */
  path?: string;
  content?: string;
}

export interface NotificationMessage {
  title: string;
  content: string;
  priority?: 'low' | 'medium' | 'high' | 'critical';
  attachments?: NotificationAttachment[];
}

export interface NotificationResult {
  success: boolean;
  channel: string;
  messageId?: string;
  error?: string;
  timestamp: Date;
}

export interface NotificationAdapter {
  name: string;
  send(message: NotificationMessage): Promise<NotificationResult>;
  isAvailable(): Promise<boolean>;
}

/**
 * The part of a nodemailer transporter the email adapter relies on
 */
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<{ messageId: string }>;
}

export class NotificationHistory {
  private history: NotificationResult[] = [];

  record(result: NotificationResult): void {
    this.history.push(result);
  }

  /**
   * Newest first
   */
  getHistory(limit?: number): NotificationResult[] {
    const sorted = [...this.history].sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
    return limit ? sorted.slice(0, limit) : sorted;
  }

  getSuccessRate(channel?: string): number {
    const filtered = channel
      ? this.history.filter(result => result.channel === channel)
      : this.history;

    if (filtered.length === 0) return 100;

    const successes = filtered.filter(result => result.success).length;
    return (successes / filtered.length) * 100;
  }

  clear(): void {
    this.history = [];
  }
}

/**
 * Base notification adapter with common functionality
 */
export abstract class BaseNotificationAdapter implements NotificationAdapter {
  abstract name: string;
  protected logger = createPipelineLogger().createSubLogger('notification');

  async send(message: NotificationMessage): Promise<NotificationResult> {
    try {
      this.validateMessage(message);
      const result = await this.doSend(message);

      return {
        success: true,
        channel: this.name,
        messageId: result.messageId,
        timestamp: new Date()
      };
    } catch (error) {
      const cause = toError(error);
      this.logger.error(`通知发送失败: ${this.name}`, cause, { title: message.title }, 'send');
      return {
        success: false,
        channel: this.name,
        error: cause.message,
        timestamp: new Date()
      };
    }
  }

  abstract isAvailable(): Promise<boolean>;

  protected abstract doSend(message: NotificationMessage): Promise<{ messageId?: string }>;

  protected validateMessage(message: NotificationMessage): void {
    if (!message.title || !message.content) {
      throw new Error('Notification title and content are required');
    }

    if (message.title.length > 200) {
      throw new Error('Notification title too long (max 200 characters)');
    }
  }
}

/**
 * Email Notification Adapter
 */
export class EmailNotificationAdapter extends BaseNotificationAdapter {
  name = 'email';
  private settings: EmailSettings;
  private transport: MailTransport;

  constructor(settings: EmailSettings, transport?: MailTransport) {
    super();
    this.settings = settings;
    this.transport = transport ?? nodemailer.createTransport({
      host: settings.smtpHost,
      port: settings.smtpPort,
      secure: settings.smtpSecure,
      auth: {
        user: settings.smtpUser,
        pass: settings.smtpPass
      }
    });
  }

  async isAvailable(): Promise<boolean> {
    return this.settings.enabled && Boolean(this.settings.smtpHost && this.settings.recipient);
  }

  protected async doSend(message: NotificationMessage): Promise<{ messageId?: string }> {
    const info = await this.transport.sendMail({
      from: this.settings.sender ?? this.settings.smtpUser,
      to: this.settings.recipient,
      subject: message.title,
      text: message.content,
      attachments: message.attachments?.map(attachment =>
        attachment.path
          ? { filename: attachment.filename, path: attachment.path }
          : { filename: attachment.filename, content: attachment.content ?? '' }
      )
    });

    this.logger.info(`邮件已发送: ${message.title}`, { recipient: this.settings.recipient }, 'doSend');
    return { messageId: info.messageId };
  }
}

/**
 * Notification Manager for multi-channel support
 */
export class NotificationManager {
  private adapters: NotificationAdapter[];
  private history: NotificationHistory = new NotificationHistory();

  constructor(adapters: NotificationAdapter[] = []) {
    this.adapters = adapters;
  }

  /**
   * Build the adapters the configuration enables
   */
  static fromConfig(settings: NotificationSettings, transport?: MailTransport): NotificationManager {
    const adapters: NotificationAdapter[] = [];
    if (settings.email.enabled) {
      adapters.push(new EmailNotificationAdapter(settings.email, transport));
    }
    return new NotificationManager(adapters);
  }

  addAdapter(adapter: NotificationAdapter): void {
    this.adapters.push(adapter);
  }

  /**
   * Send through the first available adapter that succeeds; critical messages go through all of them
   */
  async send(message: NotificationMessage): Promise<NotificationResult[]> {
    const results: NotificationResult[] = [];

    for (const adapter of this.adapters) {
      const result = await this.sendVia(adapter, message);
      results.push(result);
      this.history.record(result);

      if (result.success && message.priority !== 'critical') {
        break;
      }
    }

    return results;
  }

  /**
   * Report a failed run
   */
  async sendAlert(title: string, details: string[]): Promise<NotificationResult[]> {
    return this.send({
      title: `[Radar alert] ${title}`,
      content: details.length > 0 ? details.join('\n') : title,
      priority: 'critical'
    });
  }

  /**
   * Deliver a finished report: Markdown as the body, report files attached
   */
  async sendReport(report: RadarReport, files: ReportFiles | null): Promise<NotificationResult[]> {
    const markdown = new MarkdownReportRenderer().render(report);
    const attachments: NotificationAttachment[] = files
      ? [
        { filename: path.basename(files.markdownPath), path: files.markdownPath },
        { filename: path.basename(files.csvPath), path: files.csvPath }
      ]
      : [{ filename: `radar_${formatDate(report.generatedAt)}.md`, content: markdown }];

    return this.send({
      title: `Product Trend Radar ${formatDate(report.generatedAt)}`,
      content: markdown,
      priority: report.errors.length > 0 ? 'high' : 'medium',
      attachments
    });
  }

  async getAvailableAdapters(): Promise<string[]> {
    const available: string[] = [];

    for (const adapter of this.adapters) {
      if (await adapter.isAvailable()) {
        available.push(adapter.name);
      }
    }

    return available;
  }

  getHistory(limit?: number): NotificationResult[] {
    return this.history.getHistory(limit);
  }

  getSuccessRate(channel?: string): number {
    return this.history.getSuccessRate(channel);
  }

  private async sendVia(adapter: NotificationAdapter, message: NotificationMessage): Promise<NotificationResult> {
    try {
      if (!(await adapter.isAvailable())) {
        return {
          success: false,
          channel: adapter.name,
          error: 'Adapter not available',
          timestamp: new Date()
        };
      }
      return await adapter.send(message);
    } catch (error) {
      return {
        success: false,
        channel: adapter.name,
        error: toError(error).message,
        timestamp: new Date()
      };
    }
  }
}

