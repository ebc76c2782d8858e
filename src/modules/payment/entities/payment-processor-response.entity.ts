import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

/**
 * Raw request/response pairs exchanged with a gateway, kept for audit.
 * Rows are only ever inserted.
 */
@Entity('payment_processor_responses')
@Index(['processorName', 'transactionId'])
export class PaymentProcessorResponseEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 32 })
  processorName!: string;

  @Column({ type: 'varchar', length: 128, nullable: true })
  transactionId!: string | null;

  @Column({ type: 'uuid', nullable: true })
  basketId!: string | null;

  @Column({ type: 'jsonb' })
  response!: Record<string, unknown>;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
