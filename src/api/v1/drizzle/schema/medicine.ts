import { sql } from 'drizzle-orm';
import { boolean, check, index, integer, pgTable, text, timestamp, uuid, varchar } from 'drizzle-orm/pg-core';

export const medicineTable = pgTable('medicine', {
    id: uuid('id').defaultRandom().primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
    name: varchar('name', { length: 100 }).notNull(),
    genericName: varchar('generic_name', { length: 100 }),
    composition: text('composition'),
    manufacturer: varchar('manufacturer', { length: 100 }),
    dosageForm: varchar('dosage_form', { length: 50 }),
    strength: varchar('strength', { length: 50 }),
    barcode: varchar('barcode', { length: 100 }).unique(),
    category: varchar('category', { length: 50 }),
    storageConditions: text('storage_conditions'),
    requiresPrescription: boolean('requires_prescription').default(false).notNull(),
    minimumStockLevel: integer('minimum_stock_level').default(10).notNull(),
    // Expected to sit above minimumStockLevel; not enforced
    reorderPoint: integer('reorder_point').default(20).notNull(),
    isActive: boolean('is_active').default(true).notNull(),
}, (table) => [
    index('idx_medicine_name').on(table.name),
    check('medicine_stock_levels_non_negative', sql`${table.minimumStockLevel} >= 0 AND ${table.reorderPoint} >= 0`),
]);

export type MedicineTable = typeof medicineTable.$inferSelect;
export type NewMedicine = typeof medicineTable.$inferInsert;
