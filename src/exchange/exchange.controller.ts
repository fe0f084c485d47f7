import { Controller, Get, Param, UseGuards } from '@nestjs/common';
import { ApiKeyGuard } from '../common/guards/shared-secret.guard';
import { ExchangeService } from './exchange.service';
import { displayPair, normalizeTarget } from './symbol-normalizer';

@Controller('api/exchange')
@UseGuards(ApiKeyGuard)
export class ExchangeController {
  constructor(private exchangeService: ExchangeService) {}

  /**
   * Live price and current trading rules for one pair, as the ingestion
   * path would see them.
   */
  @Get(':exchange/:symbol')
  async getMarket(@Param('exchange') exchange: string, @Param('symbol') symbol: string) {
    const target = normalizeTarget(exchange, symbol);
    const { quote, rule } = await this.exchangeService.getSnapshot(target.exchange, target);
    return {
      exchange: target.exchange,
      pair: displayPair(target),
      price: quote.price,
      fetchedAt: quote.fetchedAt.toISOString(),
      rules: {
        tickSize: rule.tickSize,
        stepSize: rule.stepSize,
        minQuantity: rule.minQuantity,
        minNotional: rule.minNotional,
        refreshedAt: rule.refreshedAt.toISOString(),
      },
    };
  }
}
