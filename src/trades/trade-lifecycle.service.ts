import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ExchangeUnavailableError,
  InvalidPyramidIndexError,
  MalformedSignalError,
  NoOpenTradeError,
  ValidationError,
} from '../common/errors';
import { toColumn } from '../common/utils/decimal.util';
import { ExchangeService, MarketSnapshot } from '../exchange/exchange.service';
import { TradingRuleSpec } from '../exchange/exchange.types';
import { SignalTarget, displayPair, normalizeTarget } from '../exchange/symbol-normalizer';
import { LoggerService } from '../logger/logger.service';
import { RealtimeService } from '../realtime/realtime.service';
import { AlertsService } from '../alerts/alerts.service';
import { FeeScheduleService } from './fee-schedule';
import { Settlement, executionFee, settle } from './pnl';
import { TradeStore } from './trade-store';
import {
  ValidatedOrder,
  ValidationMode,
  parseValidationMode,
  roundPriceToTick,
  validateOrder,
} from './validation-policy';
import {
  ClosedTrade,
  ExitOutcome,
  MAX_PYRAMIDS,
  PyramidOutcome,
  TradeRecord,
  TradeSummary,
  exitSignalKey,
  pyramidSignalKey,
} from './trade.types';

export interface PyramidSignal {
  exchange: string;
  symbol: string;
  index: number;
  size: number;
  alertId: string;
}

export interface ExitSignal {
  exchange: string;
  symbol: string;
  alertId: string;
}

export function buildTradeSummary(closed: ClosedTrade, settlement: Settlement): TradeSummary {
  return {
    tradeId: closed.trade.id,
    exchange: closed.trade.exchange,
    base: closed.trade.base,
    quote: closed.trade.quote,
    openedAt: closed.trade.openedAt,
    closedAt: closed.exit.time,
    pyramids: closed.pyramids.map((p) => {
      const share = settlement.pyramids.find((s) => s.index === p.index);
      return {
        index: p.index,
        entryPrice: p.entryPrice,
        size: p.size,
        entryTime: p.entryTime,
        fee: p.entryFee,
        netPnl: share ? share.netPnl : 0,
        netPnlPercent: share ? share.netPnlPercent : 0,
      };
    }),
    exit: { price: closed.exit.price, time: closed.exit.time, fee: settlement.exitFee },
    grossPnl: settlement.grossPnl,
    totalFees: settlement.totalFees,
    netPnl: settlement.netPnl,
    netPnlPercent: settlement.netPnlPercent,
  };
}

function samePair(trade: TradeRecord, target: SignalTarget): boolean {
  return trade.exchange === target.exchange && trade.base === target.base && trade.quote === target.quote;
}

/**
 * The trade state machine: NO_TRADE -> OPEN -> CLOSED per (exchange, pair).
 * Every mutation goes through the store's conditional inserts, so replicas
 * and re-delivered webhooks need no in-process coordination.
 */
@Injectable()
export class TradeLifecycleService {
  readonly mode: ValidationMode;

  constructor(
    private tradeStore: TradeStore,
    private exchangeService: ExchangeService,
    private feeSchedule: FeeScheduleService,
    private realtimeService: RealtimeService,
    private alertsService: AlertsService,
    private configService: ConfigService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('TradeLifecycleService');
    this.mode = parseValidationMode(this.configService.get<string>('VALIDATION_MODE'));
  }

  async recordPyramid(signal: PyramidSignal): Promise<PyramidOutcome> {
    if (!Number.isInteger(signal.index) || signal.index < 1 || signal.index > MAX_PYRAMIDS) {
      throw new InvalidPyramidIndexError(signal.index);
    }
    const alertId = this.requireAlertId(signal.alertId);
    if (!Number.isFinite(signal.size) || signal.size <= 0) {
      throw new MalformedSignalError(`Pyramid size must be a positive number, got ${signal.size}`, { alertId });
    }

    const target = normalizeTarget(signal.exchange, signal.symbol);
    const pair = displayPair(target);
    const signalKey = pyramidSignalKey(alertId, signal.index);

    const prior = await this.tradeStore.findPyramidBySignalKey(signalKey);
    if (prior) {
      // Compared at column precision: the stored size went through a decimal(30,12) column
      if (!samePair(prior.trade, target) || toColumn(prior.pyramid.size) !== toColumn(signal.size)) {
        throw new MalformedSignalError(`alert_id ${alertId} was already used for a different pyramid signal`, {
          alertId,
          index: signal.index,
          recorded: { exchange: prior.trade.exchange, pair: displayPair(prior.trade), size: prior.pyramid.size },
          received: { exchange: target.exchange, pair, size: signal.size },
        });
      }
      this.logger.warn('Duplicate pyramid signal ignored', { alertId, exchange: target.exchange, pair, index: signal.index });
      return { status: 'duplicate', tradeId: prior.trade.id, index: signal.index };
    }

    const { quote, rule } = await this.fetchMarket(target);

    const validated = await this.validate(quote.price, signal.size, rule, target, alertId, signal.index);

    const entryFee = executionFee(validated.price, validated.size, this.feeSchedule.rateFor(target.exchange, 'entry'));
    const write = await this.tradeStore.recordPyramid(target, {
      index: signal.index,
      entryPrice: validated.price,
      size: validated.size,
      entryTime: new Date(),
      entryFee,
      signalKey,
      warnings: validated.warnings,
    });

    if (write.status === 'duplicate') {
      this.logger.warn('Pyramid already recorded, treating as duplicate', {
        alertId,
        exchange: target.exchange,
        pair,
        index: signal.index,
        tradeId: write.tradeId,
      });
      return { status: 'duplicate', tradeId: write.tradeId, index: signal.index };
    }

    const { trade, pyramid, openedTrade } = write;
    if (validated.warnings.length > 0) {
      this.logger.warn('Pyramid recorded with rule warnings', {
        tradeId: trade.id,
        exchange: target.exchange,
        pair,
        index: pyramid.index,
        warnings: validated.warnings,
      });
    }
    this.logger.log(openedTrade ? 'Trade opened' : 'Pyramid recorded', {
      tradeId: trade.id,
      exchange: target.exchange,
      pair,
      index: pyramid.index,
      price: pyramid.entryPrice,
      size: pyramid.size,
      fee: pyramid.entryFee,
    });

    const outcome: PyramidOutcome = {
      status: 'recorded',
      tradeId: trade.id,
      openedTrade,
      pyramid: {
        index: pyramid.index,
        entryPrice: pyramid.entryPrice,
        size: pyramid.size,
        entryTime: pyramid.entryTime,
        fee: pyramid.entryFee,
      },
      warnings: pyramid.warnings,
    };
    this.realtimeService.broadcast('pyramid-recorded', {
      ...outcome,
      exchange: target.exchange,
      base: target.base,
      quote: target.quote,
    });
    return outcome;
  }

  async recordExit(signal: ExitSignal): Promise<ExitOutcome> {
    const alertId = this.requireAlertId(signal.alertId);
    const target = normalizeTarget(signal.exchange, signal.symbol);
    const pair = displayPair(target);
    const signalKey = exitSignalKey(alertId);

    const prior = await this.tradeStore.findExitBySignalKey(signalKey);
    if (prior) {
      if (!samePair(prior.trade, target)) {
        throw new MalformedSignalError(`alert_id ${alertId} was already used for an exit on another pair`, {
          alertId,
          recorded: { exchange: prior.trade.exchange, pair: displayPair(prior.trade) },
          received: { exchange: target.exchange, pair },
        });
      }
      this.logger.warn('Duplicate exit signal ignored', { alertId, tradeId: prior.trade.id, exchange: target.exchange, pair });
      return { status: 'already_closed', tradeId: prior.trade.id };
    }

    const open = await this.tradeStore.findOpenTrade(target.exchange, target);
    if (!open) {
      this.logger.warn('Orphan exit: no open trade', { alertId, exchange: target.exchange, pair });
      await this.alertsService.alertOrphanExit(target.exchange, pair, alertId);
      throw new NoOpenTradeError(target.exchange, pair);
    }

    const { quote, rule } = await this.fetchMarket(target);
    // Exits are never held to minimums: an open position must always be closable.
    const price = roundPriceToTick(quote.price, rule.tickSize);
    const exitRate = this.feeSchedule.rateFor(target.exchange, 'exit');

    const write = await this.tradeStore.closeTrade(open.id, { price, time: new Date(), signalKey }, (pyramids) =>
      settle(
        pyramids.map((p) => ({ index: p.index, entryPrice: p.entryPrice, size: p.size, entryFee: p.entryFee })),
        price,
        exitRate,
      ),
    );

    if (write.status === 'already_closed') {
      this.logger.warn('Exit lost the race, trade already closed', { alertId, tradeId: write.tradeId, exchange: target.exchange, pair });
      return write;
    }

    const summary = buildTradeSummary(write.closed, write.settlement);
    this.logger.log('Trade closed', {
      tradeId: summary.tradeId,
      exchange: summary.exchange,
      pair,
      pyramids: summary.pyramids.length,
      exitPrice: summary.exit.price,
      netPnl: summary.netPnl,
      netPnlPercent: summary.netPnlPercent,
    });
    this.realtimeService.broadcast('trade-closed', summary);
    return { status: 'closed', summary };
  }

  private requireAlertId(alertId: string): string {
    const trimmed = typeof alertId === 'string' ? alertId.trim() : '';
    if (!trimmed) {
      throw new MalformedSignalError('alert_id is required');
    }
    return trimmed;
  }

  private async validate(
    price: number,
    size: number,
    rule: TradingRuleSpec,
    target: SignalTarget,
    alertId: string,
    index: number,
  ): Promise<ValidatedOrder> {
    const pair = displayPair(target);
    try {
      return validateOrder(price, size, rule, this.mode, { exchange: target.exchange, pair, alertId, index });
    } catch (error: unknown) {
      if (error instanceof ValidationError) {
        this.logger.warn('Pyramid signal rejected by trading rules', {
          alertId,
          exchange: target.exchange,
          pair,
          violations: error.violations,
        });
        await this.alertsService.alertSignalRejected(target.exchange, pair, error.violations, alertId);
      }
      throw error;
    }
  }

  private async fetchMarket(target: SignalTarget): Promise<MarketSnapshot> {
    try {
      return await this.exchangeService.getSnapshot(target.exchange, target);
    } catch (error: unknown) {
      if (error instanceof ExchangeUnavailableError) {
        await this.alertsService.alertExchangeUnreachable(target.exchange, error.message);
      }
      throw error;
    }
  }
}
