import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance, Type } from 'class-transformer';
import { IsIn, IsNumber, IsObject, IsOptional, Max, Min, ValidateNested, validateSync } from 'class-validator';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { LoggerService } from '../logger/logger.service';

export const LIQUIDITY_SIDES = ['maker', 'taker'] as const;

export type Liquidity = (typeof LIQUIDITY_SIDES)[number];

export type TradeLeg = 'entry' | 'exit';

export class FeeRates {
  @IsNumber()
  @Min(0)
  @Max(0.1)
  maker!: number;

  @IsNumber()
  @Min(0)
  @Max(0.1)
  taker!: number;
}

export class ExchangeFeeRates extends FeeRates {
  @IsOptional()
  @IsIn(LIQUIDITY_SIDES)
  entryLiquidity?: Liquidity;

  @IsOptional()
  @IsIn(LIQUIDITY_SIDES)
  exitLiquidity?: Liquidity;
}

class FeeScheduleDocument {
  @IsIn(LIQUIDITY_SIDES)
  defaultLiquidity!: Liquidity;

  @ValidateNested()
  @Type(() => FeeRates)
  fallback!: FeeRates;

  @IsObject()
  exchanges!: Record<string, unknown>;
}

export interface FeeSchedule {
  defaultLiquidity: Liquidity;
  fallback: FeeRates;
  exchanges: Map<string, ExchangeFeeRates>;
}

function check<T extends object>(value: T, where: string): T {
  const errors = validateSync(value);
  if (errors.length > 0) {
    const details = errors
      .map((e) => `${e.property}: ${Object.values(e.constraints ?? { nested: 'invalid nested value' }).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid fee schedule (${where}): ${details}`);
  }
  return value;
}

/**
 * Validates a parsed fee-schedule document. Rates are fractions of notional.
 */
export function parseFeeSchedule(raw: unknown): FeeSchedule {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('Invalid fee schedule: expected a JSON object');
  }
  const document = check(plainToInstance(FeeScheduleDocument, raw), 'root');
  const exchanges = new Map<string, ExchangeFeeRates>();
  for (const [exchange, rates] of Object.entries(document.exchanges)) {
    if (typeof rates !== 'object' || rates === null) {
      throw new Error(`Invalid fee schedule (${exchange}): expected an object`);
    }
    exchanges.set(exchange.toLowerCase(), check(plainToInstance(ExchangeFeeRates, rates), exchange));
  }
  return { defaultLiquidity: document.defaultLiquidity, fallback: document.fallback, exchanges };
}

export function feeRateFor(schedule: FeeSchedule, exchange: string, leg: TradeLeg): number {
  const rates = schedule.exchanges.get(exchange);
  if (!rates) {
    return schedule.fallback[schedule.defaultLiquidity];
  }
  const side = (leg === 'entry' ? rates.entryLiquidity : rates.exitLiquidity) ?? schedule.defaultLiquidity;
  return rates[side];
}

@Injectable()
export class FeeScheduleService {
  private readonly schedule: FeeSchedule;

  constructor(
    private configService: ConfigService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('FeeScheduleService');
    const path = resolve(this.configService.get<string>('FEE_SCHEDULE_PATH') || 'config/fee-schedule.json');
    this.schedule = parseFeeSchedule(JSON.parse(readFileSync(path, 'utf8')));
    this.logger.log('Loaded fee schedule', {
      path,
      exchanges: [...this.schedule.exchanges.keys()],
      defaultLiquidity: this.schedule.defaultLiquidity,
    });
  }

  rateFor(exchange: string, leg: TradeLeg): number {
    return feeRateFor(this.schedule, exchange, leg);
  }
}
