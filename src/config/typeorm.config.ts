import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { Trade } from '../entities/trade.entity';
import { Pyramid } from '../entities/pyramid.entity';
import { TradeExit } from '../entities/trade-exit.entity';
import { SymbolRule } from '../entities/symbol-rule.entity';
import { DailyReport } from '../entities/daily-report.entity';
import { Alert } from '../entities/alert.entity';
import { Setting } from '../entities/setting.entity';

export const ENTITIES = [Trade, Pyramid, TradeExit, SymbolRule, DailyReport, Alert, Setting];

export const typeOrmConfig = (): TypeOrmModuleOptions => {
  const databaseUrl = process.env.DATABASE_URL;
  const development = process.env.NODE_ENV === 'development';

  if (databaseUrl) {
    return {
      type: 'postgres',
      url: databaseUrl,
      entities: ENTITIES,
      synchronize: development,
      logging: development,
    };
  }

  return {
    type: 'postgres',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    database: process.env.DB_DATABASE || 'pyramid_ledger',
    entities: ENTITIES,
    synchronize: development,
    logging: development,
  };
};
