import { boolean, date, index, integer, numeric, pgEnum, pgTable, timestamp, uuid, varchar } from 'drizzle-orm/pg-core';
import { medicineTable } from './medicine';
import { supplierTable } from './supplier';

export const purchaseOrderStatusEnum = pgEnum('purchase_order_status', [
    'pending',
    'approved',
    'shipped',
    'delivered',
    'cancelled',
]);

export const purchaseOrderTable = pgTable('purchase_order', {
    id: uuid('id').defaultRandom().primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
    createdBy: uuid('created_by'),
    supplierId: uuid('supplier_id').references(() => supplierTable.id, { onDelete: 'set null' }),
    medicineId: uuid('medicine_id').references(() => medicineTable.id).notNull(),
    // PO-<yyyymmdd>-<medicineId> for auto-generated orders
    orderNumber: varchar('order_number', { length: 80 }).notNull().unique(),
    quantityOrdered: integer('quantity_ordered').notNull(),
    expectedPrice: numeric('expected_price', { mode: 'number', precision: 12, scale: 2 }),
    orderDate: date('order_date', { mode: 'string' }).notNull(),
    expectedDeliveryDate: date('expected_delivery_date', { mode: 'string' }),
    actualDeliveryDate: date('actual_delivery_date', { mode: 'string' }),
    status: purchaseOrderStatusEnum('status').default('pending').notNull(),
    autoGenerated: boolean('auto_generated').default(false).notNull(),
}, (table) => [
    index('idx_purchase_order_supplier').on(table.supplierId),
    index('idx_purchase_order_medicine').on(table.medicineId),
]);

export type PurchaseOrderStatus = (typeof purchaseOrderStatusEnum.enumValues)[number];
export type PurchaseOrderTable = typeof purchaseOrderTable.$inferSelect;
export type NewPurchaseOrder = typeof purchaseOrderTable.$inferInsert;
