import { Injectable } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { Trade } from '../entities/trade.entity';
import { Pyramid } from '../entities/pyramid.entity';
import { TradeExit } from '../entities/trade-exit.entity';
import { TradeConflictError } from '../common/errors';
import { toColumn } from '../common/utils/decimal.util';
import { CanonicalPair, SignalTarget, displayPair } from '../exchange/symbol-normalizer';
import { LoggerService } from '../logger/logger.service';
import { toExitRecord, toPyramidRecord, toTradeRecord } from './trade.mapper';
import { ExitWrite, PyramidWrite, SettleFn, TradeDetail, TradeQuery, TradeStore } from './trade-store';
import { ClosedTrade, ExitDraft, PyramidDraft, PyramidRecord, TradeRecord } from './trade.types';

/**
 * Ids from an `INSERT ... ON CONFLICT DO NOTHING RETURNING id`. An ignored
 * insert returns no rows.
 */
export function returnedIds(raw: unknown): string[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  return raw.flatMap((row: unknown) =>
    typeof row === 'object' && row !== null && 'id' in row && typeof row.id === 'string' ? [row.id] : [],
  );
}

@Injectable()
export class TypeOrmTradeStore extends TradeStore {
  constructor(
    @InjectDataSource()
    private dataSource: DataSource,
    @InjectRepository(Trade)
    private tradeRepository: Repository<Trade>,
    @InjectRepository(Pyramid)
    private pyramidRepository: Repository<Pyramid>,
    @InjectRepository(TradeExit)
    private exitRepository: Repository<TradeExit>,
    private logger: LoggerService,
  ) {
    super();
    this.logger.setContext('TypeOrmTradeStore');
  }

  async findOpenTrade(exchange: string, pair: CanonicalPair): Promise<TradeRecord | null> {
    const row = await this.tradeRepository.findOne({
      where: { exchange, base: pair.base, quote: pair.quote, status: 'OPEN' },
    });
    return row ? toTradeRecord(row) : null;
  }

  async findPyramidBySignalKey(signalKey: string) {
    const row = await this.pyramidRepository.findOne({ where: { signalKey }, relations: { trade: true } });
    if (!row || !row.trade) {
      return null;
    }
    return { trade: toTradeRecord(row.trade), pyramid: toPyramidRecord(row) };
  }

  async findExitBySignalKey(signalKey: string) {
    const row = await this.exitRepository.findOne({ where: { signalKey }, relations: { trade: true } });
    if (!row || !row.trade) {
      return null;
    }
    return { trade: toTradeRecord(row.trade), exit: toExitRecord(row) };
  }

  async recordPyramid(target: SignalTarget, draft: PyramidDraft): Promise<PyramidWrite> {
    return this.dataSource.transaction(async (manager): Promise<PyramidWrite> => {
      // Conflicts with the partial unique index when an OPEN trade already exists
      const opened = await manager
        .createQueryBuilder()
        .insert()
        .into(Trade)
        .values({ exchange: target.exchange, base: target.base, quote: target.quote, status: 'OPEN' })
        .orIgnore()
        .returning(['id'])
        .execute();
      const [openedTradeId] = returnedIds(opened.raw);

      const trade = await this.lockOpenTrade(manager, target);
      if (!trade) {
        throw new TradeConflictError(`Open trade for ${displayPair(target)} on ${target.exchange} changed concurrently`, {
          exchange: target.exchange,
          pair: displayPair(target),
        });
      }

      const inserted = await manager
        .createQueryBuilder()
        .insert()
        .into(Pyramid)
        .values({
          tradeId: trade.id,
          pyramidIndex: draft.index,
          entryPrice: toColumn(draft.entryPrice),
          size: toColumn(draft.size),
          entryTime: draft.entryTime,
          entryFee: toColumn(draft.entryFee),
          signalKey: draft.signalKey,
          warnings: draft.warnings,
        })
        .orIgnore()
        .returning(['id'])
        .execute();
      const [pyramidId] = returnedIds(inserted.raw);

      if (!pyramidId) {
        if (openedTradeId === trade.id) {
          // The pyramid lost on its signal key; a trade with no pyramid must not survive.
          await manager.delete(Trade, { id: trade.id });
        }
        const existing = await manager.findOne(Pyramid, {
          where: [{ tradeId: trade.id, pyramidIndex: draft.index }, { signalKey: draft.signalKey }],
        });
        return {
          status: 'duplicate',
          tradeId: existing ? existing.tradeId : trade.id,
          existing: existing ? toPyramidRecord(existing) : null,
        };
      }

      const pyramid = await manager.findOneOrFail(Pyramid, { where: { id: pyramidId } });
      return {
        status: 'recorded',
        trade: toTradeRecord(trade),
        pyramid: toPyramidRecord(pyramid),
        openedTrade: openedTradeId === trade.id,
      };
    });
  }

  async closeTrade(tradeId: string, draft: ExitDraft, settle: SettleFn): Promise<ExitWrite> {
    return this.dataSource.transaction(async (manager): Promise<ExitWrite> => {
      const trade = await manager
        .getRepository(Trade)
        .createQueryBuilder('trade')
        .setLock('pessimistic_write')
        .where('trade.id = :tradeId', { tradeId })
        .getOne();
      if (!trade || trade.status !== 'OPEN') {
        return { status: 'already_closed', tradeId };
      }

      const inserted = await manager
        .createQueryBuilder()
        .insert()
        .into(TradeExit)
        .values({
          tradeId,
          price: toColumn(draft.price),
          time: draft.time,
          fee: '0',
          signalKey: draft.signalKey,
        })
        .orIgnore()
        .returning(['id'])
        .execute();
      const [exitId] = returnedIds(inserted.raw);
      if (!exitId) {
        this.logger.warn('Exit insert ignored, trade already has an exit', { tradeId, signalKey: draft.signalKey });
        return { status: 'already_closed', tradeId };
      }

      const rows = await manager.find(Pyramid, { where: { tradeId }, order: { pyramidIndex: 'ASC' } });
      const pyramids = rows.map(toPyramidRecord);
      const settlement = settle(pyramids);

      const settled: PyramidRecord[] = [];
      for (const pyramid of pyramids) {
        const share = settlement.pyramids.find((p) => p.index === pyramid.index);
        const netPnl = share ? share.netPnl : 0;
        const netPnlPercent = share ? share.netPnlPercent : 0;
        await manager.update(
          Pyramid,
          { id: pyramid.id },
          { netPnl: toColumn(netPnl), netPnlPercent: toColumn(netPnlPercent) },
        );
        settled.push({ ...pyramid, netPnl, netPnlPercent });
      }

      await manager.update(TradeExit, { id: exitId }, { fee: toColumn(settlement.exitFee) });
      await manager.update(
        Trade,
        { id: tradeId },
        {
          status: 'CLOSED',
          closedAt: draft.time,
          netPnl: toColumn(settlement.netPnl),
          netPnlPercent: toColumn(settlement.netPnlPercent),
        },
      );

      const closed: ClosedTrade = {
        trade: {
          ...toTradeRecord(trade),
          status: 'CLOSED',
          closedAt: draft.time,
          netPnl: settlement.netPnl,
          netPnlPercent: settlement.netPnlPercent,
        },
        pyramids: settled,
        exit: { id: exitId, tradeId, price: draft.price, time: draft.time, fee: settlement.exitFee, signalKey: draft.signalKey },
      };
      return { status: 'closed', closed, settlement };
    });
  }

  async getTrade(id: string): Promise<TradeDetail | null> {
    const row = await this.tradeRepository.findOne({ where: { id }, relations: { pyramids: true, exit: true } });
    if (!row) {
      return null;
    }
    return {
      trade: toTradeRecord(row),
      pyramids: (row.pyramids ?? []).map(toPyramidRecord).sort((a, b) => a.index - b.index),
      exit: row.exit ? toExitRecord(row.exit) : null,
    };
  }

  async listTrades(query: TradeQuery): Promise<TradeRecord[]> {
    const rows = await this.tradeRepository.find({
      where: query.status ? { status: query.status } : {},
      order: { openedAt: 'DESC' },
      take: query.limit,
    });
    return rows.map(toTradeRecord);
  }

  async findClosedBetween(start: Date, end: Date): Promise<ClosedTrade[]> {
    const rows = await this.tradeRepository
      .createQueryBuilder('trade')
      .leftJoinAndSelect('trade.pyramids', 'pyramid')
      .leftJoinAndSelect('trade.exit', 'exit')
      .where('trade.status = :status', { status: 'CLOSED' })
      .andWhere('trade.closedAt >= :start AND trade.closedAt < :end', { start, end })
      .orderBy('trade.closedAt', 'ASC')
      .addOrderBy('pyramid.pyramidIndex', 'ASC')
      .getMany();

    const closed: ClosedTrade[] = [];
    for (const row of rows) {
      if (!row.exit) {
        this.logger.warn('Closed trade has no exit row, skipping', { tradeId: row.id });
        continue;
      }
      closed.push({
        trade: toTradeRecord(row),
        pyramids: (row.pyramids ?? []).map(toPyramidRecord),
        exit: toExitRecord(row.exit),
      });
    }
    return closed;
  }

  private lockOpenTrade(manager: EntityManager, target: SignalTarget): Promise<Trade | null> {
    return manager
      .getRepository(Trade)
      .createQueryBuilder('trade')
      .setLock('pessimistic_write')
      .where('trade.exchange = :exchange', { exchange: target.exchange })
      .andWhere('trade.base = :base AND trade.quote = :quote', { base: target.base, quote: target.quote })
      .andWhere('trade.status = :status', { status: 'OPEN' })
      .getOne();
  }
}
