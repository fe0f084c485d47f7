import { Module } from '@nestjs/common';
import { TradesModule } from '../trades/trades.module';
import { TradeRecoveryService } from './trade-recovery.service';

@Module({
  imports: [TradesModule],
  providers: [TradeRecoveryService],
  exports: [TradeRecoveryService],
})
export class RecoveryModule {}
