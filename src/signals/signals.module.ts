import { Module } from '@nestjs/common';
import { TradesModule } from '../trades/trades.module';
import { SettingsModule } from '../settings/settings.module';
import { SignalsService } from './signals.service';
import { SignalsController } from './signals.controller';

@Module({
  imports: [TradesModule, SettingsModule],
  controllers: [SignalsController],
  providers: [SignalsService],
})
export class SignalsModule {}
