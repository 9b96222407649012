import { sql } from "drizzle-orm";
import { check, index, integer, numeric, pgEnum, pgTable, text, timestamp, uuid, varchar } from "drizzle-orm/pg-core";
import { batchTable } from "./batch";
import { prescriptionTable } from "./prescription";

export const paymentMethodEnum = pgEnum("payment_method", [
    'cash',
    'card',
    'upi',
    'insurance'
]);

export const saleTable = pgTable('sale', {
    id: uuid('id').defaultRandom().primaryKey(),
    saleDate: timestamp('sale_date', { withTimezone: true }).defaultNow().notNull(),
    soldBy: uuid('sold_by').notNull(),
    batchId: uuid('batch_id').references(() => batchTable.id).notNull(),
    prescriptionId: uuid('prescription_id').references(() => prescriptionTable.id, { onDelete: 'set null' }),
    quantitySold: integer('quantity_sold').notNull(),
    salePrice: numeric('sale_price', { mode: 'number', precision: 12, scale: 2 }).notNull(),
    // quantitySold * salePrice, computed in cents
    totalAmount: numeric('total_amount', { mode: 'number', precision: 14, scale: 2 }).notNull(),
    paymentMethod: paymentMethodEnum('payment_method').default('cash').notNull(),
    customerName: varchar('customer_name', { length: 100 }),
    customerPhone: varchar('customer_phone', { length: 20 }),
    customerInfo: text('customer_info'),
}, (table) => [
    index('idx_sale_date').on(table.saleDate),
    index('idx_sale_batch').on(table.batchId),
    check('sale_quantity_positive', sql`${table.quantitySold} > 0`),
]);

export type PaymentMethod = (typeof paymentMethodEnum.enumValues)[number];
export type SaleTable = typeof saleTable.$inferSelect;
export type NewSale = typeof saleTable.$inferInsert;
