import { Injectable, NotFoundException } from '@nestjs/common';
import { displayPair } from '../exchange/symbol-normalizer';
import { TradeDetail, TradeStore } from './trade-store';
import { TradeRecord, TradeStatus } from './trade.types';

export interface TradeView extends TradeRecord {
  pair: string;
}

export interface TradeDetailView extends TradeView {
  pyramids: TradeDetail['pyramids'];
  exit: TradeDetail['exit'];
}

@Injectable()
export class TradesService {
  constructor(private tradeStore: TradeStore) {}

  async findAll(status?: TradeStatus, limit = 100): Promise<TradeView[]> {
    const trades = await this.tradeStore.listTrades({ status, limit });
    return trades.map((trade) => ({ ...trade, pair: displayPair(trade) }));
  }

  async findOpen(limit = 100): Promise<TradeView[]> {
    return this.findAll('OPEN', limit);
  }

  async findOne(id: string): Promise<TradeDetailView> {
    const detail = await this.tradeStore.getTrade(id);
    if (!detail) {
      throw new NotFoundException(`Trade ${id} not found`);
    }
    return {
      ...detail.trade,
      pair: displayPair(detail.trade),
      pyramids: detail.pyramids,
      exit: detail.exit,
    };
  }
}
