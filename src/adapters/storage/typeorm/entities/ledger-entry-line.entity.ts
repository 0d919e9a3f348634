import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import { LedgerDirection } from '../../../../core';
import { bigintTransformer } from './column.transformers';

@Entity('ledger_entry_lines')
@Index(['ledgerEntryId'])
@Index(['accountId', 'currency'])
export class LedgerEntryLineEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'ledger_entry_id' })
  ledgerEntryId!: string;

  @Column({ name: 'account_id' })
  accountId!: string;

  @Column({ type: 'enum', enum: LedgerDirection })
  direction!: LedgerDirection;

  @Column({ length: 3 })
  currency!: string;

  @Column({ type: 'bigint', transformer: bigintTransformer })
  amount!: number;
}
