import { Entity, PrimaryGeneratedColumn, Column, Index, ManyToOne, JoinColumn } from 'typeorm';
import { Trade } from './trade.entity';

@Entity('pyramids')
@Index(['tradeId', 'pyramidIndex'], { unique: true })
export class Pyramid {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column('uuid')
  tradeId!: string;

  @ManyToOne(() => Trade, (trade) => trade.pyramids, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'tradeId' })
  trade?: Trade;

  @Column('smallint')
  pyramidIndex!: number;

  @Column('decimal', { precision: 30, scale: 12 })
  entryPrice!: string;

  @Column('decimal', { precision: 30, scale: 12 })
  size!: string;

  @Column('timestamptz')
  entryTime!: Date;

  @Column('decimal', { precision: 30, scale: 12, default: '0' })
  entryFee!: string; // In quote currency

  // `${alertId}:pyramid:${index}`
  @Column({ unique: true })
  signalKey!: string;

  @Column('jsonb', { default: () => "'[]'" })
  warnings!: string[];

  @Column('decimal', { precision: 30, scale: 12, nullable: true })
  netPnl!: string | null;

  @Column('decimal', { precision: 18, scale: 8, nullable: true })
  netPnlPercent!: string | null;
}
