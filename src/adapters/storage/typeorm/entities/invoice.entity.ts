import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import { bigintTransformer } from './column.transformers';

/**
 * Settlement columns of the invoices table. Rows are issued by billing.
 */
@Entity('invoices')
@Index(['tenantId', 'customerId'])
export class InvoiceEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'tenant_id' })
  tenantId!: string;

  @Column({ name: 'customer_id' })
  customerId!: string;

  @Column({ length: 3 })
  currency!: string;

  @Column({ type: 'bigint', transformer: bigintTransformer })
  subtotal!: number;

  @Column({
    name: 'amount_paid',
    type: 'bigint',
    default: 0,
    transformer: bigintTransformer,
  })
  amountPaid!: number;

  @Column({ name: 'paid_at', type: 'timestamptz', nullable: true })
  paidAt!: Date | null;
}
