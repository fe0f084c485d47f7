import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity('symbol_rules')
@Index(['exchange', 'base', 'quote'], { unique: true })
export class SymbolRule {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  exchange!: string;

  @Column()
  base!: string;

  @Column()
  quote!: string;

  @Column('decimal', { precision: 30, scale: 12 })
  tickSize!: string;

  @Column('decimal', { precision: 30, scale: 12 })
  stepSize!: string;

  @Column('decimal', { precision: 30, scale: 12 })
  minQuantity!: string;

  @Column('decimal', { precision: 30, scale: 12 })
  minNotional!: string;

  // Always an absolute instant; rows written before this column was zoned are discarded on read
  @Column('timestamptz')
  refreshedAt!: Date;
}
