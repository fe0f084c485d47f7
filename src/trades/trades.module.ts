import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Trade } from '../entities/trade.entity';
import { Pyramid } from '../entities/pyramid.entity';
import { TradeExit } from '../entities/trade-exit.entity';
import { ExchangeModule } from '../exchange/exchange.module';
import { AlertsModule } from '../alerts/alerts.module';
import { RealtimeModule } from '../realtime/realtime.module';
import { TradesService } from './trades.service';
import { TradesController } from './trades.controller';
import { TradeLifecycleService } from './trade-lifecycle.service';
import { TradeStore } from './trade-store';
import { TypeOrmTradeStore } from './typeorm-trade.store';
import { FeeScheduleService } from './fee-schedule';

@Module({
  imports: [TypeOrmModule.forFeature([Trade, Pyramid, TradeExit]), ExchangeModule, AlertsModule, RealtimeModule],
  controllers: [TradesController],
  providers: [
    TradesService,
    TradeLifecycleService,
    FeeScheduleService,
    { provide: TradeStore, useClass: TypeOrmTradeStore },
  ],
  exports: [TradesService, TradeLifecycleService, TradeStore, FeeScheduleService],
})
export class TradesModule {}
