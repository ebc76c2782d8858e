import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitialCheckoutSchema1729300000000 implements MigrationInterface {
  name = 'InitialCheckoutSchema1729300000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "pgcrypto"`);
    await queryRunner.query(
      `CREATE TYPE "baskets_status_enum" AS ENUM ('OPEN', 'FROZEN', 'SUBMITTED')`,
    );
    await queryRunner.query(`CREATE TYPE "orders_status_enum" AS ENUM ('COMPLETE', 'REFUNDED')`);

    await queryRunner.query(`
      CREATE TABLE "baskets" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "orderNumber" varchar(128) NOT NULL,
        "ownerId" varchar(128) NOT NULL,
        "totalInclTax" numeric(12,2) NOT NULL,
        "currency" varchar(3) NOT NULL,
        "status" "baskets_status_enum" NOT NULL DEFAULT 'OPEN',
        "lineCount" integer NOT NULL DEFAULT 0,
        "createdAt" timestamptz NOT NULL DEFAULT now(),
        "updatedAt" timestamptz NOT NULL DEFAULT now(),
        CONSTRAINT "PK_baskets_id" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_baskets_order_number" UNIQUE ("orderNumber")
      )`);

    await queryRunner.query(`
      CREATE TABLE "basket_attributes" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "basketId" uuid NOT NULL,
        "name" varchar(128) NOT NULL,
        "valueText" text NOT NULL,
        CONSTRAINT "PK_basket_attributes_id" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_basket_attributes_basket_name" UNIQUE ("basketId", "name"),
        CONSTRAINT "FK_basket_attributes_basket" FOREIGN KEY ("basketId")
          REFERENCES "baskets" ("id") ON DELETE CASCADE
      )`);
    await queryRunner.query(
      `CREATE INDEX "IDX_basket_attributes_name_value" ON "basket_attributes" ("name", "valueText")`,
    );

    await queryRunner.query(`
      CREATE TABLE "orders" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "orderNumber" varchar(128) NOT NULL,
        "basketId" uuid NOT NULL,
        "total" numeric(12,2) NOT NULL,
        "currency" varchar(3) NOT NULL,
        "status" "orders_status_enum" NOT NULL DEFAULT 'COMPLETE',
        "createdAt" timestamptz NOT NULL DEFAULT now(),
        CONSTRAINT "PK_orders_id" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_orders_order_number" UNIQUE ("orderNumber"),
        CONSTRAINT "FK_orders_basket" FOREIGN KEY ("basketId") REFERENCES "baskets" ("id")
      )`);

    await queryRunner.query(`
      CREATE TABLE "payment_processor_responses" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "processorName" varchar(32) NOT NULL,
        "transactionId" varchar(128),
        "basketId" uuid,
        "response" jsonb NOT NULL,
        "createdAt" timestamptz NOT NULL DEFAULT now(),
        CONSTRAINT "PK_payment_processor_responses_id" PRIMARY KEY ("id")
      )`);
    await queryRunner.query(
      `CREATE INDEX "IDX_payment_processor_responses_processor_tx" ON "payment_processor_responses" ("processorName", "transactionId")`,
    );

    await queryRunner.query(`
      CREATE TABLE "payment_sources" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "processorName" varchar(32) NOT NULL,
        "transactionId" varchar(128) NOT NULL,
        "orderNumber" varchar(128) NOT NULL,
        "basketId" uuid NOT NULL,
        "amount" numeric(12,2) NOT NULL,
        "currency" varchar(3) NOT NULL,
        "cardLabel" varchar(64) NOT NULL,
        "rawResponse" jsonb NOT NULL,
        "createdAt" timestamptz NOT NULL DEFAULT now(),
        CONSTRAINT "PK_payment_sources_id" PRIMARY KEY ("id")
      )`);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_payment_sources_transaction_id" ON "payment_sources" ("transactionId")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE "payment_sources"`);
    await queryRunner.query(`DROP TABLE "payment_processor_responses"`);
    await queryRunner.query(`DROP TABLE "orders"`);
    await queryRunner.query(`DROP TABLE "basket_attributes"`);
    await queryRunner.query(`DROP TABLE "baskets"`);
    await queryRunner.query(`DROP TYPE "orders_status_enum"`);
    await queryRunner.query(`DROP TYPE "baskets_status_enum"`);
  }
}
