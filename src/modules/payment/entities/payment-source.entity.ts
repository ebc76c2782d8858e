import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { PaymentProvider } from '../enums/provider.enum';

@Entity('payment_sources')
@Index(['transactionId'], { unique: true })
export class PaymentSourceEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 32 })
  processorName!: PaymentProvider;

  // Gateway invoice id; unique so a second settlement of the same invoice fails
  @Column({ type: 'varchar', length: 128 })
  transactionId!: string;

  @Column({ type: 'varchar', length: 128 })
  orderNumber!: string;

  @Column({ type: 'uuid' })
  basketId!: string;

  @Column({ type: 'numeric', precision: 12, scale: 2 })
  amount!: string;

  @Column({ type: 'varchar', length: 3 })
  currency!: string;

  @Column({ type: 'varchar', length: 64 })
  cardLabel!: string;

  @Column({ type: 'jsonb' })
  rawResponse!: Record<string, unknown>;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
