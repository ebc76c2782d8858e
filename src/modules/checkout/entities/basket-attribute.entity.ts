import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

export const PAYMENT_INTENT_ID_ATTRIBUTE = 'payment_intent_id';

@Entity('basket_attributes')
@Index(['basketId', 'name'], { unique: true })
@Index(['name', 'valueText'])
export class BasketAttributeEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  basketId!: string;

  @Column({ type: 'varchar', length: 128 })
  name!: string;

  @Column({ type: 'text' })
  valueText!: string;
}
