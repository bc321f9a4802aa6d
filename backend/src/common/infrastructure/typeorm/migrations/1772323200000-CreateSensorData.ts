/* eslint-disable prettier/prettier */
import { MigrationInterface, QueryRunner } from 'typeorm'

export class CreateSensorData1772323200000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS sensor_data (
        measurement VARCHAR(64) NOT NULL,
        device_id VARCHAR(255) NOT NULL,
        device_type VARCHAR(255) NOT NULL,
        module_type VARCHAR(255) NOT NULL,
        module_tag VARCHAR(255) NOT NULL,
        block_id VARCHAR(16) NOT NULL,
        "time" TIMESTAMPTZ NOT NULL,
        fields JSONB NOT NULL DEFAULT '{}'::jsonb,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
        PRIMARY KEY (measurement, device_id, module_tag, "time")
      )
    `)

    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS idx_sensor_data_device_time
      ON sensor_data (device_id, "time" DESC)
    `)
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('DROP INDEX IF EXISTS idx_sensor_data_device_time')
    await queryRunner.query('DROP TABLE IF EXISTS sensor_data')
  }
}
