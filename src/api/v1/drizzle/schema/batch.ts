import { sql } from 'drizzle-orm';
import { boolean, check, date, index, integer, numeric, pgTable, timestamp, uniqueIndex, uuid, varchar } from 'drizzle-orm/pg-core';
import { medicineTable } from './medicine';
import { supplierTable } from './supplier';

export const batchTable = pgTable('batch', {
    id: uuid('id').defaultRandom().primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
    createdBy: uuid('created_by'),
    // Medicine removal is gated in MedicineService, never cascaded
    medicineId: uuid('medicine_id').references(() => medicineTable.id).notNull(),
    supplierId: uuid('supplier_id').references(() => supplierTable.id, { onDelete: 'set null' }),
    batchNumber: varchar('batch_number', { length: 50 }).notNull(),
    expiryDate: date('expiry_date', { mode: 'string' }).notNull(),
    manufactureDate: date('manufacture_date', { mode: 'string' }),
    quantity: integer('quantity').notNull(),
    costPrice: numeric('cost_price', { mode: 'number', precision: 12, scale: 2 }),
    sellingPrice: numeric('selling_price', { mode: 'number', precision: 12, scale: 2 }),
    mrp: numeric('mrp', { mode: 'number', precision: 12, scale: 2 }),
    barcode: varchar('barcode', { length: 100 }),
    storageLocation: varchar('storage_location', { length: 50 }),
    isRecalled: boolean('is_recalled').default(false).notNull(),
    isExpired: boolean('is_expired').default(false).notNull(),
    ocrVerified: boolean('ocr_verified').default(false).notNull(),
}, (table) => [
    uniqueIndex('uq_batch_medicine_batch_number').on(table.medicineId, table.batchNumber),
    index('idx_batch_medicine').on(table.medicineId),
    index('idx_batch_expiry').on(table.expiryDate),
    check('batch_quantity_non_negative', sql`${table.quantity} >= 0`),
]);

export type BatchTable = typeof batchTable.$inferSelect;
export type NewBatch = typeof batchTable.$inferInsert;
