import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import * as nodemailer from 'nodemailer';
import { Alert, AlertType, AlertSeverity } from '../entities/alert.entity';
import { AlertConfig } from './dto/alert-config.dto';
import { LoggerService } from '../logger/logger.service';
import { RealtimeService } from '../realtime/realtime.service';

type AlertMetadata = Record<string, unknown>;

const SEVERITY_TAG: Record<AlertSeverity, string> = {
  [AlertSeverity.INFO]: '[INFO]',
  [AlertSeverity.WARNING]: '[WARNING]',
  [AlertSeverity.ERROR]: '[ERROR]',
  [AlertSeverity.CRITICAL]: '[CRITICAL]',
};

function escapeHtml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export interface AlertEmail {
  subject: string;
  text: string;
  html: string;
}

/** Message plus one line per metadata field (exchange, pair, alert id, job). */
export function renderAlertEmail(
  alert: Pick<Alert, 'type' | 'severity' | 'title' | 'message' | 'metadata' | 'createdAt'>,
): AlertEmail {
  const fields = Object.entries(alert.metadata ?? {}).map(
    ([name, value]): [string, string] => [name, typeof value === 'string' ? value : JSON.stringify(value)],
  );
  const heading = `${alert.type} at ${alert.createdAt.toISOString()}`;

  const lines = [heading, '', alert.message];
  if (fields.length > 0) {
    lines.push('', ...fields.map(([name, value]) => `${name}: ${value}`));
  }
  const text = lines.join('\n');
  const rows = fields
    .map(([name, value]) => `<tr><td>${escapeHtml(name)}</td><td>${escapeHtml(value)}</td></tr>`)
    .join('');
  const html =
    `<p><strong>${escapeHtml(heading)}</strong></p>` +
    `<p>${escapeHtml(alert.message).replace(/\n/g, '<br>')}</p>` +
    (rows ? `<table>${rows}</table>` : '');

  return { subject: `${SEVERITY_TAG[alert.severity]} ${alert.title}`, text, html };
}

@Injectable()
export class AlertsService {
  private transporter: nodemailer.Transporter | null = null;
  private lastAlertTimes: Map<string, number> = new Map(); // Last delivery per type+key
  private readonly config: AlertConfig;

  constructor(
    @InjectRepository(Alert)
    private alertRepository: Repository<Alert>,
    private configService: ConfigService,
    private realtimeService: RealtimeService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('AlertsService');
    this.config = this.loadConfig();
    this.initializeEmail();
  }

  private minutes(key: string, fallback: number): number {
    const parsed = parseInt(this.configService.get<string>(key) || String(fallback), 10);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
  }

  private loadConfig(): AlertConfig {
    return {
      enabled: this.configService.get<string>('ALERTS_ENABLED', 'true') === 'true',
      emailEnabled: this.configService.get<string>('ALERTS_EMAIL_ENABLED', 'true') === 'true',
      emailRecipients: (this.configService.get<string>('ALERTS_EMAIL_RECIPIENTS') || '')
        .split(',')
        .map((e) => e.trim())
        .filter((e) => e),
      cooldownMinutes: {
        [AlertType.ORPHAN_EXIT]: this.minutes('ALERTS_COOLDOWN_ORPHAN_EXIT', 15),
        [AlertType.EXCHANGE_UNREACHABLE]: this.minutes('ALERTS_COOLDOWN_EXCHANGE', 30),
        [AlertType.SIGNAL_REJECTED]: this.minutes('ALERTS_COOLDOWN_SIGNAL_REJECTED', 60),
        [AlertType.JOB_FAILURE]: this.minutes('ALERTS_COOLDOWN_JOB_FAILURE', 60),
        [AlertType.HEALTH_CHECK_FAILED]: this.minutes('ALERTS_COOLDOWN_HEALTH', 30),
      },
    };
  }

  private initializeEmail() {
    if (!this.config.emailEnabled || this.config.emailRecipients.length === 0) {
      this.logger.warn('Email alerts disabled or no recipients configured');
      return;
    }

    const smtpHost = this.configService.get<string>('SMTP_HOST');
    const smtpPort = parseInt(this.configService.get<string>('SMTP_PORT') || '587', 10);
    const smtpUser = this.configService.get<string>('SMTP_USER');
    const smtpPassword = this.configService.get<string>('SMTP_PASSWORD');
    const smtpSecure = this.configService.get<string>('SMTP_SECURE', 'false') === 'true';

    if (!smtpHost || !smtpUser || !smtpPassword) {
      this.logger.warn('SMTP configuration incomplete, email alerts disabled');
      return;
    }

    this.transporter = nodemailer.createTransport({
      host: smtpHost,
      port: smtpPort,
      secure: smtpSecure, // true for 465, false for other ports
      auth: {
        user: smtpUser,
        pass: smtpPassword,
      },
    });

    this.logger.log('Email transporter initialized', {
      host: smtpHost,
      port: smtpPort,
      recipients: this.config.emailRecipients.length,
    });
  }

  private getCooldownKey(type: AlertType, key?: string): string {
    return `${type}:${key || 'default'}`;
  }

  private shouldSendAlert(type: AlertType, key?: string): boolean {
    if (!this.config.enabled) {
      return false;
    }

    const cooldownMs = this.config.cooldownMinutes[type] * 60 * 1000;
    const lastAlertTime = this.lastAlertTimes.get(this.getCooldownKey(type, key));
    return lastAlertTime === undefined || Date.now() - lastAlertTime >= cooldownMs;
  }

  /**
   * Persists the alert and, outside its cooldown, e-mails it. Never throws:
   * alerting must not fail the operation that raised it.
   */
  async sendAlert(
    type: AlertType,
    severity: AlertSeverity,
    title: string,
    message: string,
    metadata?: AlertMetadata,
    key?: string,
  ): Promise<void> {
    try {
      if (!this.shouldSendAlert(type, key)) {
        this.logger.debug('Alert suppressed due to cooldown', { type, key });
        await this.saveAlert(type, severity, title, message, metadata, false);
        return;
      }

      this.lastAlertTimes.set(this.getCooldownKey(type, key), Date.now());
      const alert = await this.saveAlert(type, severity, title, message, metadata, true);
      this.realtimeService.broadcast('alert', {
        id: alert.id,
        type,
        severity,
        title,
        metadata: metadata ?? null,
      });

      if (this.config.emailEnabled && this.transporter && this.config.emailRecipients.length > 0) {
        await this.sendEmail(alert);
      }

      this.logger.log('Alert sent', { type, severity, title });
    } catch (error: unknown) {
      this.logger.error('Error sending alert', error instanceof Error ? error.stack : undefined, {
        type,
        severity,
        title,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async saveAlert(
    type: AlertType,
    severity: AlertSeverity,
    title: string,
    message: string,
    metadata: AlertMetadata | undefined,
    sent: boolean,
  ): Promise<Alert> {
    const alert = this.alertRepository.create({
      type,
      severity,
      title,
      message,
      metadata: metadata ?? null,
      sent,
      sentAt: sent ? new Date() : null,
    });

    return await this.alertRepository.save(alert);
  }

  private async sendEmail(alert: Alert): Promise<void> {
    if (!this.transporter || this.config.emailRecipients.length === 0) {
      return;
    }

    const { subject, text, html } = renderAlertEmail(alert);
    await this.transporter.sendMail({
      from: this.configService.get<string>('SMTP_FROM') || this.configService.get<string>('SMTP_USER'),
      to: this.config.emailRecipients.join(', '),
      subject,
      text,
      html,
    });
    this.logger.debug('Email alert sent', {
      alertId: alert.id,
      recipients: this.config.emailRecipients.length,
    });
  }

  async alertOrphanExit(exchange: string, pair: string, alertId: string) {
    await this.sendAlert(
      AlertType.ORPHAN_EXIT,
      AlertSeverity.WARNING,
      `Orphan Exit: ${pair} on ${exchange}`,
      `An exit signal arrived for ${pair} on ${exchange} but no trade is open.\n\nAlert id: ${alertId}`,
      { exchange, pair, alertId },
      `${exchange}:${pair}`,
    );
  }

  async alertExchangeUnreachable(exchange: string, error: string) {
    await this.sendAlert(
      AlertType.EXCHANGE_UNREACHABLE,
      AlertSeverity.CRITICAL,
      `Exchange Unreachable: ${exchange}`,
      `Cannot fetch market data from ${exchange}.\n\nError: ${error}`,
      { exchange, error },
      exchange,
    );
  }

  async alertSignalRejected(exchange: string, pair: string, violations: string[], alertId: string) {
    await this.sendAlert(
      AlertType.SIGNAL_REJECTED,
      AlertSeverity.WARNING,
      `Signal Rejected: ${pair} on ${exchange}`,
      `A pyramid signal broke the trading rules and was not recorded.\n\n${violations.join('\n')}`,
      { exchange, pair, alertId, violations },
      `${exchange}:${pair}`,
    );
  }

  async alertJobFailure(jobName: string, error: string, jobId?: string) {
    await this.sendAlert(
      AlertType.JOB_FAILURE,
      AlertSeverity.ERROR,
      `Job Failed: ${jobName}`,
      `Job "${jobName}" failed to execute.\n\nError: ${error}`,
      { jobName, jobId, error },
      jobName,
    );
  }

  async alertHealthCheckFailed(component: string, error: string) {
    await this.sendAlert(
      AlertType.HEALTH_CHECK_FAILED,
      AlertSeverity.CRITICAL,
      `Health Check Failed: ${component}`,
      `Health check failed for ${component}.\n\nError: ${error}`,
      { component, error },
      component,
    );
  }

  async getAlertHistory(limit: number = 50): Promise<Alert[]> {
    return await this.alertRepository.find({
      order: { createdAt: 'DESC' },
      take: limit,
    });
  }

  async getAlertsByType(type: AlertType, limit: number = 50): Promise<Alert[]> {
    return await this.alertRepository.find({
      where: { type },
      order: { createdAt: 'DESC' },
      take: limit,
    });
  }
}
