import { MigrationInterface, QueryRunner, Table } from 'typeorm';

const PARTITION_TABLES = ['issue', 'pull_request', 'discussion'];

export class CreateRecordPartitions1760000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    for (const name of PARTITION_TABLES) {
      await queryRunner.createTable(
        new Table({
          name,
          columns: [
            {
              name: 'key',
              type: 'blob',
              isPrimary: true,
            },
            {
              name: 'value',
              type: 'blob',
              isNullable: false,
            },
          ],
        }),
        true,
      );
    }
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    for (const name of [...PARTITION_TABLES].reverse()) {
      await queryRunner.dropTable(name, true);
    }
  }
}
