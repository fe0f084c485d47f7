import { Injectable } from '@nestjs/common';
import { displayPair, normalizeTarget } from '../exchange/symbol-normalizer';
import { LoggerService } from '../logger/logger.service';
import { SettingsService } from '../settings/settings.service';
import { TradeLifecycleService } from '../trades/trade-lifecycle.service';
import { ExitOutcome, PyramidOutcome } from '../trades/trade.types';
import { parseSignal } from './dto/signal.dto';

export type IgnoredSignal = { status: 'ignored'; reason: 'paused' | 'ignored_pair' };

export type SignalResult = PyramidOutcome | ExitOutcome | IgnoredSignal;

@Injectable()
export class SignalsService {
  constructor(
    private lifecycle: TradeLifecycleService,
    private settingsService: SettingsService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('SignalsService');
  }

  async handle(body: unknown): Promise<SignalResult> {
    const signal = parseSignal(body);
    const target = normalizeTarget(signal.exchange, signal.symbol);
    const pair = displayPair(target);
    const meta = { type: signal.type, alertId: signal.alertId, exchange: target.exchange, pair };

    if (await this.settingsService.isPaused()) {
      this.logger.warn('Signals paused, acknowledging without processing', meta);
      return { status: 'ignored', reason: 'paused' };
    }
    const ignored = await this.settingsService.getIgnoredPairs();
    if (ignored.has(pair)) {
      this.logger.log('Pair is ignored, acknowledging without processing', meta);
      return { status: 'ignored', reason: 'ignored_pair' };
    }

    this.logger.debug('Dispatching signal', meta);
    if (signal.type === 'exit') {
      return this.lifecycle.recordExit(signal);
    }
    return this.lifecycle.recordPyramid(signal);
  }
}
