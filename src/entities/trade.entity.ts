import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index, OneToMany, OneToOne } from 'typeorm';
import { Pyramid } from './pyramid.entity';
import { TradeExit } from './trade-exit.entity';

// At most one OPEN trade per (exchange, pair); closed trades accumulate freely.
@Entity('trades')
@Index('uq_trades_open_pair', ['exchange', 'base', 'quote'], { unique: true, where: `"status" = 'OPEN'` })
@Index(['status', 'closedAt'])
export class Trade {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  exchange!: string;

  @Column()
  base!: string;

  @Column()
  quote!: string;

  @Column({ type: 'varchar', length: 8, default: 'OPEN' })
  status!: 'OPEN' | 'CLOSED';

  @CreateDateColumn({ type: 'timestamptz' })
  openedAt!: Date;

  @Column({ type: 'timestamptz', nullable: true })
  closedAt!: Date | null;

  @Column('decimal', { precision: 30, scale: 12, nullable: true })
  netPnl!: string | null;

  @Column('decimal', { precision: 18, scale: 8, nullable: true })
  netPnlPercent!: string | null;

  @OneToMany(() => Pyramid, (pyramid) => pyramid.trade)
  pyramids?: Pyramid[];

  @OneToOne(() => TradeExit, (exit) => exit.trade)
  exit?: TradeExit | null;
}
