import Decimal from 'decimal.js';
import { percentOf, sum, toDecimal, toNumber } from '../common/utils/decimal.util';

export interface PyramidFill {
  index: number;
  entryPrice: number;
  size: number;
  entryFee: number;
}

export interface PyramidSettlement {
  index: number;
  grossPnl: number;
  entryFee: number;
  exitFee: number;
  netPnl: number;
  netPnlPercent: number;
}

export interface Settlement {
  pyramids: PyramidSettlement[];
  capital: number;
  exitFee: number;
  grossPnl: number;
  totalFees: number;
  netPnl: number;
  netPnlPercent: number;
}

export function executionFee(price: number, size: number, rate: number): number {
  return toNumber(toDecimal(price).times(size).times(rate));
}

/**
 * Long-only settlement of every executed pyramid against one exit price.
 * The exit fee is charged on the whole closed size and shared out by size.
 */
export function settle(fills: PyramidFill[], exitPrice: number, exitFeeRate: number): Settlement {
  if (fills.length === 0) {
    throw new Error('Cannot settle a trade with no executed pyramids');
  }

  const exit = toDecimal(exitPrice);
  const totalSize = sum(fills.map((f) => toDecimal(f.size)));
  const exitFee = exit.times(totalSize).times(exitFeeRate);

  let gross = new Decimal(0);
  let entryFees = new Decimal(0);
  let capital = new Decimal(0);
  let net = new Decimal(0);

  const pyramids = [...fills]
    .sort((a, b) => a.index - b.index)
    .map((fill) => {
      const size = toDecimal(fill.size);
      const cost = toDecimal(fill.entryPrice).times(size);
      const pyramidGross = exit.minus(fill.entryPrice).times(size);
      const allocated = exitFee.times(size).dividedBy(totalSize);
      const pyramidNet = pyramidGross.minus(fill.entryFee).minus(allocated);

      gross = gross.plus(pyramidGross);
      entryFees = entryFees.plus(fill.entryFee);
      capital = capital.plus(cost);
      net = net.plus(pyramidNet);

      return {
        index: fill.index,
        grossPnl: toNumber(pyramidGross),
        entryFee: fill.entryFee,
        exitFee: toNumber(allocated),
        netPnl: toNumber(pyramidNet),
        netPnlPercent: toNumber(percentOf(pyramidNet, cost)),
      };
    });

  return {
    pyramids,
    capital: toNumber(capital),
    exitFee: toNumber(exitFee),
    grossPnl: toNumber(gross),
    totalFees: toNumber(entryFees.plus(exitFee)),
    netPnl: toNumber(net),
    netPnlPercent: toNumber(percentOf(net, capital)),
  };
}
