import { sql } from 'drizzle-orm';
import { boolean, check, integer, numeric, pgTable, text, timestamp, uuid, varchar } from 'drizzle-orm/pg-core';

export const supplierTable = pgTable('supplier', {
    id: uuid('id').defaultRandom().primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    supplierName: varchar('supplier_name', { length: 100 }).notNull(),
    contactPerson: varchar('contact_person', { length: 100 }),
    email: varchar('email', { length: 100 }),
    phone: varchar('phone', { length: 20 }),
    address: text('address'),
    city: varchar('city', { length: 50 }),
    country: varchar('country', { length: 50 }),
    // Running mean of SupplierRating.overallRating
    rating: numeric('rating', { mode: 'number', precision: 3, scale: 2 }),
    totalOrders: integer('total_orders').default(0).notNull(),
    // Percentage of delivered orders that arrived on or before the expected date
    onTimeDeliveryRate: numeric('on_time_delivery_rate', { mode: 'number', precision: 5, scale: 2 }),
    isActive: boolean('is_active').default(true).notNull(),
}, (table) => [
    check('supplier_rating_range', sql`${table.rating} >= 0 AND ${table.rating} <= 5`),
]);

export type SupplierTable = typeof supplierTable.$inferSelect;
export type NewSupplier = typeof supplierTable.$inferInsert;
