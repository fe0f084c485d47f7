import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from 'typeorm';

export enum AlertType {
  ORPHAN_EXIT = 'orphan_exit',
  EXCHANGE_UNREACHABLE = 'exchange_unreachable',
  SIGNAL_REJECTED = 'signal_rejected',
  JOB_FAILURE = 'job_failure',
  HEALTH_CHECK_FAILED = 'health_check_failed',
}

export enum AlertSeverity {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}

@Entity('alerts')
export class Alert {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({
    type: 'enum',
    enum: AlertType,
  })
  type!: AlertType;

  @Column({
    type: 'enum',
    enum: AlertSeverity,
    default: AlertSeverity.WARNING,
  })
  severity!: AlertSeverity;

  @Column()
  title!: string;

  @Column('text')
  message!: string;

  @Column('jsonb', { nullable: true })
  metadata!: Record<string, unknown> | null; // exchange, pair, alertId, ...

  @Column({ default: false })
  sent!: boolean; // Whether the alert was delivered (not suppressed by cooldown)

  @Column({ type: 'timestamptz', nullable: true })
  sentAt!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
