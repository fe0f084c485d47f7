import { Injectable } from '@nestjs/common';
import { DomainError, InvalidPyramidIndexError, MalformedSignalError } from '../common/errors';
import { SignalTarget, displayPair, normalizeTarget } from '../exchange/symbol-normalizer';
import { LoggerService } from '../logger/logger.service';
import { FeeScheduleService } from '../trades/fee-schedule';
import { executionFee, settle } from '../trades/pnl';
import { TradeStore } from '../trades/trade-store';
import { MAX_PYRAMIDS, exitSignalKey, pyramidSignalKey } from '../trades/trade.types';
import { ExportedSignal } from './alert-export.parser';

export const RECOVERED_WARNING = 'recovered from alert export';

export interface RecoveryOptions {
  /** Count what would change without writing. */
  dryRun: boolean;
  entries: boolean;
  exits: boolean;
}

export interface RecoveryResult {
  signals: number;
  pyramidsRecorded: number;
  tradesOpened: number;
  exitsRecorded: number;
  skippedExisting: number;
  skippedClosed: number;
  skippedNoOpenTrade: number;
  errors: string[];
}

type ExportedPyramid = Extract<ExportedSignal, { type: 'pyramid' }>;
type ExportedExit = Extract<ExportedSignal, { type: 'exit' }>;

/**
 * Replays signals from an alert export that never reached the webhook.
 * Writes go through the same signal keys as live traffic, so anything the
 * webhook already recorded is skipped and a replay can run any number of
 * times. Prices are the ones the alerts carried, not live quotes.
 */
@Injectable()
export class TradeRecoveryService {
  constructor(
    private tradeStore: TradeStore,
    private feeSchedule: FeeScheduleService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('TradeRecoveryService');
  }

  async replay(signals: ExportedSignal[], options: RecoveryOptions): Promise<RecoveryResult> {
    const result: RecoveryResult = {
      signals: signals.length,
      pyramidsRecorded: 0,
      tradesOpened: 0,
      exitsRecorded: 0,
      skippedExisting: 0,
      skippedClosed: 0,
      skippedNoOpenTrade: 0,
      errors: [],
    };
    // Open/closed state per pair as a dry run would have left it
    const simulated = new Map<string, boolean>();

    for (const signal of signals) {
      try {
        if (signal.type === 'pyramid' && options.entries) {
          await this.replayPyramid(signal, options.dryRun, result, simulated);
        } else if (signal.type === 'exit' && options.exits) {
          await this.replayExit(signal, options.dryRun, result, simulated);
        }
      } catch (error: unknown) {
        if (!(error instanceof DomainError)) {
          throw error;
        }
        result.errors.push(`${signal.alertId}: ${error.message}`);
        this.logger.warn('Exported signal rejected', {
          alertId: signal.alertId,
          exportId: signal.exportId,
          code: error.code,
          error: error.message,
        });
      }
    }

    this.logger.log(options.dryRun ? 'Recovery dry run finished' : 'Recovery finished', {
      ...result,
      errors: result.errors.length,
    });
    return result;
  }

  private async replayPyramid(
    signal: ExportedPyramid,
    dryRun: boolean,
    result: RecoveryResult,
    simulated: Map<string, boolean>,
  ): Promise<void> {
    if (!Number.isInteger(signal.index) || signal.index < 1 || signal.index > MAX_PYRAMIDS) {
      throw new InvalidPyramidIndexError(signal.index);
    }
    if (!(signal.size > 0)) {
      throw new MalformedSignalError(`Pyramid size must be a positive number, got ${signal.size}`, {
        alertId: signal.alertId,
      });
    }

    const target = normalizeTarget(signal.exchange, signal.symbol);
    const signalKey = pyramidSignalKey(signal.alertId, signal.index);
    if (await this.tradeStore.findPyramidBySignalKey(signalKey)) {
      result.skippedExisting += 1;
      return;
    }

    if (dryRun) {
      if (!(await this.isOpen(target, simulated))) {
        result.tradesOpened += 1;
      }
      simulated.set(pairKey(target), true);
      result.pyramidsRecorded += 1;
      this.logger.log('Would record pyramid', {
        alertId: signal.alertId,
        exchange: target.exchange,
        pair: displayPair(target),
        index: signal.index,
        price: signal.price,
      });
      return;
    }

    const write = await this.tradeStore.recordPyramid(target, {
      index: signal.index,
      entryPrice: signal.price,
      size: signal.size,
      entryTime: signal.time,
      entryFee: executionFee(signal.price, signal.size, this.feeSchedule.rateFor(target.exchange, 'entry')),
      signalKey,
      warnings: [RECOVERED_WARNING],
    });
    if (write.status === 'duplicate') {
      result.skippedExisting += 1;
      return;
    }

    result.pyramidsRecorded += 1;
    if (write.openedTrade) {
      result.tradesOpened += 1;
    }
    this.logger.log('Recovered pyramid', {
      alertId: signal.alertId,
      tradeId: write.trade.id,
      exchange: target.exchange,
      pair: displayPair(target),
      index: signal.index,
      price: signal.price,
    });
  }

  private async replayExit(
    signal: ExportedExit,
    dryRun: boolean,
    result: RecoveryResult,
    simulated: Map<string, boolean>,
  ): Promise<void> {
    const target = normalizeTarget(signal.exchange, signal.symbol);
    const pair = displayPair(target);
    const signalKey = exitSignalKey(signal.alertId);
    if (await this.tradeStore.findExitBySignalKey(signalKey)) {
      result.skippedClosed += 1;
      return;
    }

    if (dryRun) {
      if (!(await this.isOpen(target, simulated))) {
        result.skippedNoOpenTrade += 1;
        return;
      }
      simulated.set(pairKey(target), false);
      result.exitsRecorded += 1;
      this.logger.log('Would close trade', { alertId: signal.alertId, exchange: target.exchange, pair, price: signal.price });
      return;
    }

    const open = await this.tradeStore.findOpenTrade(target.exchange, target);
    if (!open) {
      result.skippedNoOpenTrade += 1;
      this.logger.warn('Exported exit has no open trade', { alertId: signal.alertId, exchange: target.exchange, pair });
      return;
    }

    const exitRate = this.feeSchedule.rateFor(target.exchange, 'exit');
    const write = await this.tradeStore.closeTrade(
      open.id,
      { price: signal.price, time: signal.time, signalKey },
      (pyramids) =>
        settle(
          pyramids.map((p) => ({ index: p.index, entryPrice: p.entryPrice, size: p.size, entryFee: p.entryFee })),
          signal.price,
          exitRate,
        ),
    );
    if (write.status === 'already_closed') {
      result.skippedClosed += 1;
      return;
    }

    result.exitsRecorded += 1;
    this.logger.log('Recovered exit', {
      alertId: signal.alertId,
      tradeId: open.id,
      exchange: target.exchange,
      pair,
      price: signal.price,
      netPnl: write.settlement.netPnl,
    });
  }

  private async isOpen(target: SignalTarget, simulated: Map<string, boolean>): Promise<boolean> {
    const known = simulated.get(pairKey(target));
    if (known !== undefined) {
      return known;
    }
    const open = (await this.tradeStore.findOpenTrade(target.exchange, target)) !== null;
    simulated.set(pairKey(target), open);
    return open;
  }
}

function pairKey(target: SignalTarget): string {
  return `${target.exchange}:${displayPair(target)}`;
}
