import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SymbolRule } from '../entities/symbol-rule.entity';
import { ExchangeService, exchangeTimeoutMs } from './exchange.service';
import { ExchangeController } from './exchange.controller';
import { SymbolRuleCache } from './symbol-rule.cache';
import { EXCHANGE_ADAPTERS, createExchangeAdapters } from './adapters';

@Module({
  imports: [TypeOrmModule.forFeature([SymbolRule])],
  controllers: [ExchangeController],
  providers: [
    ExchangeService,
    SymbolRuleCache,
    {
      provide: EXCHANGE_ADAPTERS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => createExchangeAdapters(exchangeTimeoutMs(configService)),
    },
  ],
  exports: [ExchangeService],
})
export class ExchangeModule {}
