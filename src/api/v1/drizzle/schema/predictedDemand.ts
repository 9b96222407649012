import { sql } from 'drizzle-orm';
import { check, date, index, integer, numeric, pgTable, timestamp, uuid, varchar } from 'drizzle-orm/pg-core';
import { medicineTable } from './medicine';

// Written by the external forecasting job; the engine only reads it
export const predictedDemandTable = pgTable('predicted_demand', {
    id: uuid('id').defaultRandom().primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    medicineId: uuid('medicine_id').references(() => medicineTable.id).notNull(),
    predictedDate: date('predicted_date', { mode: 'string' }).notNull(),
    predictedQuantity: integer('predicted_quantity').notNull(),
    confidenceLevel: numeric('confidence_level', { mode: 'number', precision: 3, scale: 2 }),
    modelUsed: varchar('model_used', { length: 50 }),
}, (table) => [
    index('idx_predicted_demand_date').on(table.predictedDate, table.medicineId),
    check('predicted_demand_confidence_range', sql`${table.confidenceLevel} >= 0 AND ${table.confidenceLevel} <= 1`),
]);

export type PredictedDemandTable = typeof predictedDemandTable.$inferSelect;
export type NewPredictedDemand = typeof predictedDemandTable.$inferInsert;
