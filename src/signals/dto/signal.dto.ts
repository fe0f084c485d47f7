import { plainToInstance, Type } from 'class-transformer';
import { IsIn, IsNotEmpty, IsNumber, IsString, validateSync } from 'class-validator';
import { MalformedSignalError } from '../../common/errors';
import { ExitSignal, PyramidSignal } from '../../trades/trade-lifecycle.service';

export const SIGNAL_TYPES = ['pyramid', 'exit'] as const;

export type SignalType = (typeof SIGNAL_TYPES)[number];

class SignalEnvelope {
  @IsIn(SIGNAL_TYPES)
  type!: SignalType;
}

export class ExitSignalDto {
  @IsString()
  @IsNotEmpty()
  exchange!: string;

  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @IsString()
  @IsNotEmpty()
  alert_id!: string;
}

export class PyramidSignalDto extends ExitSignalDto {
  // Range is checked by the lifecycle engine so it can answer with InvalidPyramidIndexError
  @Type(() => Number)
  @IsNumber()
  index!: number;

  @Type(() => Number)
  @IsNumber({ allowNaN: false, allowInfinity: false })
  size!: number;
}

export type ParsedSignal = ({ type: 'pyramid' } & PyramidSignal) | ({ type: 'exit' } & ExitSignal);

function validated<T extends object>(value: T): T {
  const errors = validateSync(value);
  if (errors.length > 0) {
    const violations = errors.flatMap((e) => Object.values(e.constraints ?? {}));
    throw new MalformedSignalError(`Malformed signal: ${violations.join('; ')}`, { violations });
  }
  return value;
}

/**
 * Turns a webhook body into a typed signal. Numeric fields may arrive as
 * strings; everything else must already have the right type.
 */
export function parseSignal(body: unknown): ParsedSignal {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new MalformedSignalError('Signal body must be a JSON object');
  }

  const { type } = validated(plainToInstance(SignalEnvelope, body));
  if (type === 'exit') {
    const exit = validated(plainToInstance(ExitSignalDto, body));
    return { type, exchange: exit.exchange, symbol: exit.symbol, alertId: exit.alert_id };
  }

  const entry = validated(plainToInstance(PyramidSignalDto, body));
  return {
    type,
    exchange: entry.exchange,
    symbol: entry.symbol,
    index: entry.index,
    size: entry.size,
    alertId: entry.alert_id,
  };
}
