import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DailyReport } from '../entities/daily-report.entity';
import { TradesModule } from '../trades/trades.module';
import { RealtimeModule } from '../realtime/realtime.module';
import { ReportsService } from './reports.service';
import { ReportsController } from './reports.controller';

@Module({
  imports: [TypeOrmModule.forFeature([DailyReport]), TradesModule, RealtimeModule],
  controllers: [ReportsController],
  providers: [ReportsService],
  exports: [ReportsService],
})
export class ReportsModule {}
