import { sql } from 'drizzle-orm';
import { check, integer, numeric, pgTable, text, timestamp, uuid } from 'drizzle-orm/pg-core';
import { purchaseOrderTable } from './purchaseOrder';
import { supplierTable } from './supplier';

export const supplierRatingTable = pgTable('supplier_rating', {
    id: uuid('id').defaultRandom().primaryKey(),
    ratedAt: timestamp('rated_at', { withTimezone: true }).defaultNow().notNull(),
    ratedBy: uuid('rated_by').notNull(),
    supplierId: uuid('supplier_id').references(() => supplierTable.id).notNull(),
    orderId: uuid('order_id').references(() => purchaseOrderTable.id).notNull(),
    qualityRating: integer('quality_rating').notNull(),
    deliveryRating: integer('delivery_rating').notNull(),
    communicationRating: integer('communication_rating').notNull(),
    overallRating: numeric('overall_rating', { mode: 'number', precision: 3, scale: 2 }).notNull(),
    comments: text('comments'),
}, (table) => [
    check('supplier_rating_scores_range', sql`
        ${table.qualityRating} BETWEEN 1 AND 5
        AND ${table.deliveryRating} BETWEEN 1 AND 5
        AND ${table.communicationRating} BETWEEN 1 AND 5`),
]);

export type SupplierRatingTable = typeof supplierRatingTable.$inferSelect;
export type NewSupplierRating = typeof supplierRatingTable.$inferInsert;
