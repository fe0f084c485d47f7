import { Entity, PrimaryGeneratedColumn, Column, OneToOne, JoinColumn } from 'typeorm';
import { Trade } from './trade.entity';

@Entity('trade_exits')
export class TradeExit {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  // Unique: the conflict target for the exit's insert-if-absent
  @Column({ type: 'uuid', unique: true })
  tradeId!: string;

  @OneToOne(() => Trade, (trade) => trade.exit, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'tradeId' })
  trade?: Trade;

  @Column('decimal', { precision: 30, scale: 12 })
  price!: string;

  @Column('timestamptz')
  time!: Date;

  @Column('decimal', { precision: 30, scale: 12, default: '0' })
  fee!: string;

  // `${alertId}:exit`
  @Column({ unique: true })
  signalKey!: string;
}
