import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { AlertsService } from '../alerts/alerts.service';
import { DAILY_REPORT_QUEUE } from '../jobs/jobs.constants';

export interface ComponentCheck {
  status: 'up' | 'down';
  responseTime?: number;
  error?: string;
}

export interface QueueStats {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}

export interface HealthCheckResult {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  checks: {
    database: ComponentCheck;
    redis: ComponentCheck;
  };
  queues: Record<string, QueueStats | null>;
}

function messageOf(error: unknown, fallback: string): string {
  return error instanceof Error && error.message ? error.message : fallback;
}

@Injectable()
export class HealthService {
  private startTime: number;

  constructor(
    @InjectDataSource() private dataSource: DataSource,
    @InjectQueue(DAILY_REPORT_QUEUE) private dailyReportQueue: Queue,
    private alertsService: AlertsService,
  ) {
    this.startTime = Date.now();
  }

  async checkHealth(): Promise<HealthCheckResult> {
    const [database, redis] = await Promise.all([this.checkDatabase(), this.checkRedis()]);
    const queues = { [DAILY_REPORT_QUEUE]: redis.status === 'up' ? await this.getQueueStats(this.dailyReportQueue) : null };

    return {
      status: database.status === 'up' && redis.status === 'up' ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000), // seconds
      checks: { database, redis },
      queues,
    };
  }

  private async checkDatabase(): Promise<ComponentCheck> {
    const start = Date.now();
    try {
      await this.dataSource.query('SELECT 1');
      return { status: 'up', responseTime: Date.now() - start };
    } catch (error: unknown) {
      const errorMsg = messageOf(error, 'Database connection failed');
      await this.alertsService.alertHealthCheckFailed('database', errorMsg);
      return { status: 'down', error: errorMsg };
    }
  }

  private async checkRedis(): Promise<ComponentCheck> {
    const start = Date.now();
    try {
      // Any queue command fails when Redis is down
      await this.dailyReportQueue.getWaitingCount();
      return { status: 'up', responseTime: Date.now() - start };
    } catch (error: unknown) {
      const errorMsg = messageOf(error, 'Redis connection failed');
      await this.alertsService.alertHealthCheckFailed('redis', errorMsg);
      return { status: 'down', error: errorMsg };
    }
  }

  private async getQueueStats(queue: Queue): Promise<QueueStats | null> {
    try {
      const [waiting, active, completed, failed, delayed] = await Promise.all([
        queue.getWaitingCount(),
        queue.getActiveCount(),
        queue.getCompletedCount(),
        queue.getFailedCount(),
        queue.getDelayedCount(),
      ]);
      return { waiting, active, completed, failed, delayed };
    } catch {
      return null;
    }
  }
}
