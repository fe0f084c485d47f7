import { Column, Entity, Index, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';

@Entity('daily_reports')
@Index(['reportDate', 'timezone'], { unique: true })
export class DailyReport {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 10 })
  reportDate!: string; // YYYY-MM-DD in `timezone`

  @Column({ length: 64 })
  timezone!: string;

  @Column('timestamptz')
  windowStart!: Date;

  @Column('timestamptz')
  windowEnd!: Date;

  @Column('int')
  totalTrades!: number;

  @Column('decimal', { precision: 30, scale: 12 })
  netProfit!: string;

  @Column('jsonb')
  report!: object; // TradingReport with ISO window bounds

  @UpdateDateColumn({ type: 'timestamptz' })
  generatedAt!: Date;
}
