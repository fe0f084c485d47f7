import { CanonicalExchange } from '../exchange/symbol-normalizer';

export const MAX_PYRAMIDS = 5;

export type TradeStatus = 'OPEN' | 'CLOSED';

export interface TradeRecord {
  id: string;
  exchange: CanonicalExchange;
  base: string;
  quote: string;
  status: TradeStatus;
  openedAt: Date;
  closedAt: Date | null;
  netPnl: number | null;
  netPnlPercent: number | null;
}

export interface PyramidRecord {
  id: string;
  tradeId: string;
  index: number;
  entryPrice: number;
  size: number;
  entryTime: Date;
  entryFee: number;
  signalKey: string;
  warnings: string[];
  netPnl: number | null;
  netPnlPercent: number | null;
}

export interface ExitRecord {
  id: string;
  tradeId: string;
  price: number;
  time: Date;
  fee: number;
  signalKey: string;
}

export type PyramidDraft = Omit<PyramidRecord, 'id' | 'tradeId' | 'netPnl' | 'netPnlPercent'>;

export type ExitDraft = Omit<ExitRecord, 'id' | 'tradeId' | 'fee'>;

export interface ClosedTrade {
  trade: TradeRecord;
  pyramids: PyramidRecord[];
  exit: ExitRecord;
}

/**
 * What the lifecycle engine publishes once a trade closes. Only executed
 * pyramids appear, ordered by index.
 */
export interface TradeSummary {
  tradeId: string;
  exchange: CanonicalExchange;
  base: string;
  quote: string;
  openedAt: Date;
  closedAt: Date;
  pyramids: Array<{
    index: number;
    entryPrice: number;
    size: number;
    entryTime: Date;
    fee: number;
    netPnl: number;
    netPnlPercent: number;
  }>;
  exit: { price: number; time: Date; fee: number };
  grossPnl: number;
  totalFees: number;
  netPnl: number;
  netPnlPercent: number;
}

export type PyramidOutcome =
  | {
      status: 'recorded';
      tradeId: string;
      openedTrade: boolean;
      pyramid: { index: number; entryPrice: number; size: number; entryTime: Date; fee: number };
      warnings: string[];
    }
  | { status: 'duplicate'; tradeId: string; index: number };

export type ExitOutcome = { status: 'closed'; summary: TradeSummary } | { status: 'already_closed'; tradeId: string };

export function pyramidSignalKey(alertId: string, index: number): string {
  return `${alertId}:pyramid:${index}`;
}

export function exitSignalKey(alertId: string): string {
  return `${alertId}:exit`;
}
