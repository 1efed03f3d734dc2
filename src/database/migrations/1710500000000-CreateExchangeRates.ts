import { MigrationInterface, QueryRunner, Table, TableIndex, TableUnique } from 'typeorm';

export class CreateExchangeRates1710500000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'exchange_rates',
        columns: [
          {
            name: 'id',
            type: 'uuid',
            isPrimary: true,
            generationStrategy: 'uuid',
            default: 'gen_random_uuid()',
          },
          {
            name: 'base_currency',
            type: 'varchar',
            length: '3',
            isNullable: false,
          },
          {
            name: 'target_currency',
            type: 'varchar',
            length: '3',
            isNullable: false,
          },
          {
            name: 'rate',
            type: 'decimal',
            precision: 20,
            scale: 10,
            isNullable: false,
          },
          {
            name: 'fetched_at',
            type: 'timestamptz',
            isNullable: false,
          },
          {
            name: 'created_at',
            type: 'timestamptz',
            default: 'now()',
          },
          {
            name: 'updated_at',
            type: 'timestamptz',
            default: 'now()',
          },
          {
            name: 'deleted_at',
            type: 'timestamptz',
            isNullable: true,
          },
        ],
        uniques: [
          new TableUnique({
            name: 'UQ_exchange_rates_pair',
            columnNames: ['base_currency', 'target_currency'],
          }),
        ],
      }),
      true,
    );

    // Pruning scans by age
    await queryRunner.createIndex(
      'exchange_rates',
      new TableIndex({
        name: 'IDX_exchange_rates_fetched_at',
        columnNames: ['fetched_at'],
      }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('exchange_rates', true);
  }
}
