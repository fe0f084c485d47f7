import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { HealthService } from './health.service';
import { HealthController } from './health.controller';
import { AlertsModule } from '../alerts/alerts.module';
import { DAILY_REPORT_QUEUE } from '../jobs/jobs.constants';

@Module({
  imports: [AlertsModule, BullModule.registerQueue({ name: DAILY_REPORT_QUEUE })],
  controllers: [HealthController],
  providers: [HealthService],
  exports: [HealthService],
})
export class HealthModule {}
