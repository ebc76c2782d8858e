import {
  Column,
  CreateDateColumn,
  Entity,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';

export enum BasketStatus {
  OPEN = 'OPEN',
  FROZEN = 'FROZEN',
  SUBMITTED = 'SUBMITTED',
}

@Entity('baskets')
export class BasketEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 128, unique: true })
  orderNumber!: string;

  @Column({ type: 'varchar', length: 128 })
  ownerId!: string;

  @Column({ type: 'numeric', precision: 12, scale: 2 })
  totalInclTax!: string;

  @Column({ type: 'varchar', length: 3 })
  currency!: string;

  @Column({ type: 'enum', enum: BasketStatus, default: BasketStatus.OPEN })
  status!: BasketStatus;

  @Column({ type: 'int', default: 0 })
  lineCount!: number;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updatedAt!: Date;
}
