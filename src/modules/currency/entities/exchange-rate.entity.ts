import {
  Column,
  CreateDateColumn,
  DeleteDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  Unique,
  UpdateDateColumn,
} from 'typeorm';
import { ExchangeRateTransformer } from '../../../common/transformers/decimal.transformer';

/**
 * Last known rate for one direction of a currency pair. Refreshes upsert in
 * place; pruning soft-deletes rows that stopped being refreshed.
 */
@Entity('exchange_rates')
@Unique('UQ_exchange_rates_pair', ['baseCurrency', 'targetCurrency'])
export class ExchangeRate {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'base_currency', type: 'varchar', length: 3 })
  baseCurrency!: string;

  @Column({ name: 'target_currency', type: 'varchar', length: 3 })
  targetCurrency!: string;

  @Column({
    type: 'decimal',
    precision: 20,
    scale: 10,
    transformer: ExchangeRateTransformer,
  })
  rate!: number;

  @Index('IDX_exchange_rates_fetched_at')
  @Column({ name: 'fetched_at', type: 'timestamptz' })
  fetchedAt!: Date;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;

  @DeleteDateColumn({ name: 'deleted_at', type: 'timestamptz', nullable: true })
  deletedAt!: Date | null;
}
