import { CanonicalPair, SignalTarget } from '../exchange/symbol-normalizer';
import { Settlement } from './pnl';
import {
  ClosedTrade,
  ExitDraft,
  ExitRecord,
  PyramidDraft,
  PyramidRecord,
  TradeRecord,
  TradeStatus,
} from './trade.types';

export type PyramidWrite =
  | { status: 'recorded'; trade: TradeRecord; pyramid: PyramidRecord; openedTrade: boolean }
  | { status: 'duplicate'; tradeId: string; existing: PyramidRecord | null };

export type ExitWrite = { status: 'closed'; closed: ClosedTrade; settlement: Settlement } | { status: 'already_closed'; tradeId: string };

export type SettleFn = (pyramids: PyramidRecord[]) => Settlement;

export interface TradeDetail {
  trade: TradeRecord;
  pyramids: PyramidRecord[];
  exit: ExitRecord | null;
}

export interface TradeQuery {
  status?: TradeStatus;
  limit: number;
}

/**
 * Persistence port for the lifecycle engine. Writes are conditional inserts
 * whose loser observes a duplicate outcome; implementations must never
 * check-then-insert outside a transaction.
 */
export abstract class TradeStore {
  abstract findOpenTrade(exchange: string, pair: CanonicalPair): Promise<TradeRecord | null>;

  abstract findPyramidBySignalKey(signalKey: string): Promise<{ trade: TradeRecord; pyramid: PyramidRecord } | null>;

  abstract findExitBySignalKey(signalKey: string): Promise<{ trade: TradeRecord; exit: ExitRecord } | null>;

  /**
   * Adds a pyramid to the OPEN trade for `target`, opening one in the same
   * transaction when none exists. A clash on (trade, index) or on the signal
   * key yields `duplicate` and leaves no new rows behind.
   */
  abstract recordPyramid(target: SignalTarget, draft: PyramidDraft): Promise<PyramidWrite>;

  /**
   * Inserts the exit if absent and, only when this call inserted it, settles
   * the trade and marks it CLOSED in the same transaction. `settle` runs at
   * most once per trade.
   */
  abstract closeTrade(tradeId: string, draft: ExitDraft, settle: SettleFn): Promise<ExitWrite>;

  abstract getTrade(id: string): Promise<TradeDetail | null>;

  abstract listTrades(query: TradeQuery): Promise<TradeRecord[]>;

  /** Trades closed in the half-open window [start, end). */
  abstract findClosedBetween(start: Date, end: Date): Promise<ClosedTrade[]>;
}
