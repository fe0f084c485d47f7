import { Trade } from '../entities/trade.entity';
import { Pyramid } from '../entities/pyramid.entity';
import { TradeExit } from '../entities/trade-exit.entity';
import { fromColumn } from '../common/utils/decimal.util';
import { toInstant } from '../common/utils/time.util';
import { isCanonicalExchange } from '../exchange/symbol-normalizer';
import { ExitRecord, PyramidRecord, TradeRecord } from './trade.types';

function required(value: string | number | null | undefined, field: string): number {
  const parsed = fromColumn(value);
  if (parsed === null) {
    throw new Error(`Stored ${field} is not numeric: ${String(value)}`);
  }
  return parsed;
}

function instant(value: unknown, field: string): Date {
  const parsed = toInstant(value);
  if (!parsed) {
    throw new Error(`Stored ${field} is not an absolute instant: ${String(value)}`);
  }
  return parsed;
}

export function toTradeRecord(row: Trade): TradeRecord {
  if (!isCanonicalExchange(row.exchange)) {
    throw new Error(`Stored trade ${row.id} has unknown exchange ${row.exchange}`);
  }
  return {
    id: row.id,
    exchange: row.exchange,
    base: row.base,
    quote: row.quote,
    status: row.status,
    openedAt: instant(row.openedAt, 'trade.openedAt'),
    closedAt: row.closedAt === null ? null : instant(row.closedAt, 'trade.closedAt'),
    netPnl: fromColumn(row.netPnl),
    netPnlPercent: fromColumn(row.netPnlPercent),
  };
}

export function toPyramidRecord(row: Pyramid): PyramidRecord {
  return {
    id: row.id,
    tradeId: row.tradeId,
    index: row.pyramidIndex,
    entryPrice: required(row.entryPrice, 'pyramid.entryPrice'),
    size: required(row.size, 'pyramid.size'),
    entryTime: instant(row.entryTime, 'pyramid.entryTime'),
    entryFee: required(row.entryFee, 'pyramid.entryFee'),
    signalKey: row.signalKey,
    warnings: Array.isArray(row.warnings) ? row.warnings.filter((w): w is string => typeof w === 'string') : [],
    netPnl: fromColumn(row.netPnl),
    netPnlPercent: fromColumn(row.netPnlPercent),
  };
}

export function toExitRecord(row: TradeExit): ExitRecord {
  return {
    id: row.id,
    tradeId: row.tradeId,
    price: required(row.price, 'exit.price'),
    time: instant(row.time, 'exit.time'),
    fee: required(row.fee, 'exit.fee'),
    signalKey: row.signalKey,
  };
}
