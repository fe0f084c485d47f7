import {
  Controller,
  DefaultValuePipe,
  Get,
  Param,
  ParseEnumPipe,
  ParseIntPipe,
  ParseUUIDPipe,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiKeyGuard } from '../common/guards/shared-secret.guard';
import { TradesService } from './trades.service';
import { TradeStatus } from './trade.types';

enum TradeStatusFilter {
  OPEN = 'OPEN',
  CLOSED = 'CLOSED',
}

@Controller('api/trades')
@UseGuards(ApiKeyGuard)
export class TradesController {
  constructor(private tradesService: TradesService) {}

  @Get()
  findAll(
    @Query('status', new ParseEnumPipe(TradeStatusFilter, { optional: true })) status: TradeStatus | undefined,
    @Query('limit', new DefaultValuePipe(100), ParseIntPipe) limit: number,
  ) {
    return this.tradesService.findAll(status, Math.min(Math.max(limit, 1), 500));
  }

  @Get(':id')
  findOne(@Param('id', ParseUUIDPipe) id: string) {
    return this.tradesService.findOne(id);
  }
}
