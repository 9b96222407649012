import { sql } from 'drizzle-orm';
import { check, pgEnum, pgTable, text, timestamp, uniqueIndex, uuid } from 'drizzle-orm/pg-core';
import { medicineTable } from './medicine';

export const interactionTypeEnum = pgEnum('interaction_type', [
    'minor',
    'moderate',
    'severe',
]);

export const medicineInteractionTable = pgTable('medicine_interaction', {
    id: uuid('id').defaultRandom().primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    // Pair is stored ordered so (a, b) and (b, a) collapse to one row
    medicineId1: uuid('medicine_id_1').references(() => medicineTable.id).notNull(),
    medicineId2: uuid('medicine_id_2').references(() => medicineTable.id).notNull(),
    interactionType: interactionTypeEnum('interaction_type').notNull(),
    description: text('description').notNull(),
}, (table) => [
    uniqueIndex('uq_medicine_interaction_pair').on(table.medicineId1, table.medicineId2),
    check('medicine_interaction_ordered_pair', sql`${table.medicineId1} < ${table.medicineId2}`),
]);

export type InteractionType = (typeof interactionTypeEnum.enumValues)[number];
export type MedicineInteractionTable = typeof medicineInteractionTable.$inferSelect;
export type NewMedicineInteraction = typeof medicineInteractionTable.$inferInsert;
