import Decimal from 'decimal.js';
import { percentOf, toDecimal, toNumber } from '../common/utils/decimal.util';
import { InstantWindow } from '../common/utils/time.util';
import { displayPair } from '../exchange/symbol-normalizer';
import { ClosedTrade } from '../trades/trade.types';

export interface ReportBreakdown {
  trades: number;
  pyramids: number;
  capital: number;
  netProfit: number;
}

/** One closed trade as listed in a report. */
export interface ReportTradeLine {
  tradeId: string;
  exchange: string;
  pair: string;
  pyramids: number;
  closedAt: Date;
  netPnl: number;
  netPnlPercent: number;
}

export interface TradingReport {
  window: InstantWindow;
  label?: string;
  timezone?: string;
  totalTrades: number;
  totalPyramids: number;
  capital: number;
  grossProfit: number;
  /** Sum of losing trades' net PnL; zero or negative. */
  grossLoss: number;
  netProfit: number;
  netProfitPercent: number;
  /** Share of trades with positive net PnL, 0 to 1. */
  winRate: number;
  /** Null when no trade lost money. */
  profitFactor: number | null;
  byPair: Record<string, ReportBreakdown>;
  byExchange: Record<string, ReportBreakdown>;
  /** Best result first. */
  trades: ReportTradeLine[];
}

interface Bucket {
  trades: number;
  pyramids: number;
  capital: Decimal;
  netProfit: Decimal;
}

function tradeNet(closed: ClosedTrade): Decimal {
  if (closed.trade.netPnl !== null) {
    return toDecimal(closed.trade.netPnl);
  }
  return closed.pyramids.reduce((acc, p) => acc.plus(p.netPnl ?? 0), new Decimal(0));
}

function addTo(buckets: Map<string, Bucket>, key: string, pyramids: number, capital: Decimal, net: Decimal): void {
  const bucket = buckets.get(key) ?? { trades: 0, pyramids: 0, capital: new Decimal(0), netProfit: new Decimal(0) };
  bucket.trades += 1;
  bucket.pyramids += pyramids;
  bucket.capital = bucket.capital.plus(capital);
  bucket.netProfit = bucket.netProfit.plus(net);
  buckets.set(key, bucket);
}

function toBreakdown(buckets: Map<string, Bucket>): Record<string, ReportBreakdown> {
  const out: Record<string, ReportBreakdown> = {};
  for (const key of [...buckets.keys()].sort()) {
    const bucket = buckets.get(key);
    if (bucket) {
      out[key] = {
        trades: bucket.trades,
        pyramids: bucket.pyramids,
        capital: toNumber(bucket.capital),
        netProfit: toNumber(bucket.netProfit),
      };
    }
  }
  return out;
}

/**
 * Folds trades closed in the half-open window [start, end) into one report.
 * Trades closed outside the window are ignored even if the caller passes them.
 */
export function aggregateTrades(trades: ClosedTrade[], window: InstantWindow): TradingReport {
  const start = window.start.getTime();
  const end = window.end.getTime();
  const inWindow = trades.filter((t) => {
    const closedAt = (t.trade.closedAt ?? t.exit.time).getTime();
    return closedAt >= start && closedAt < end;
  });

  let capital = new Decimal(0);
  let grossProfit = new Decimal(0);
  let grossLoss = new Decimal(0);
  let pyramids = 0;
  let winners = 0;
  const byPair = new Map<string, Bucket>();
  const byExchange = new Map<string, Bucket>();
  const lines: ReportTradeLine[] = [];

  for (const closed of inWindow) {
    const net = tradeNet(closed);
    const tradeCapital = closed.pyramids.reduce(
      (acc, p) => acc.plus(toDecimal(p.entryPrice).times(p.size)),
      new Decimal(0),
    );

    capital = capital.plus(tradeCapital);
    pyramids += closed.pyramids.length;
    if (net.gt(0)) {
      winners += 1;
      grossProfit = grossProfit.plus(net);
    } else if (net.lt(0)) {
      grossLoss = grossLoss.plus(net);
    }

    addTo(byPair, displayPair(closed.trade), closed.pyramids.length, tradeCapital, net);
    addTo(byExchange, closed.trade.exchange, closed.pyramids.length, tradeCapital, net);
    lines.push({
      tradeId: closed.trade.id,
      exchange: closed.trade.exchange,
      pair: displayPair(closed.trade),
      pyramids: closed.pyramids.length,
      closedAt: closed.trade.closedAt ?? closed.exit.time,
      netPnl: toNumber(net),
      netPnlPercent: closed.trade.netPnlPercent ?? toNumber(percentOf(net, tradeCapital)),
    });
  }
  lines.sort((a, b) => b.netPnl - a.netPnl || a.closedAt.getTime() - b.closedAt.getTime());

  const netProfit = grossProfit.plus(grossLoss);
  return {
    window: { start: window.start, end: window.end },
    totalTrades: inWindow.length,
    totalPyramids: pyramids,
    capital: toNumber(capital),
    grossProfit: toNumber(grossProfit),
    grossLoss: toNumber(grossLoss),
    netProfit: toNumber(netProfit),
    netProfitPercent: toNumber(percentOf(netProfit, capital)),
    winRate: inWindow.length > 0 ? toNumber(new Decimal(winners).dividedBy(inWindow.length)) : 0,
    profitFactor: grossLoss.isZero() ? null : toNumber(grossProfit.dividedBy(grossLoss.abs())),
    byPair: toBreakdown(byPair),
    byExchange: toBreakdown(byExchange),
    trades: lines,
  };
}
