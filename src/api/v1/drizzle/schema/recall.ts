import { date, integer, pgEnum, pgTable, text, timestamp, uuid, varchar } from 'drizzle-orm/pg-core';
import { batchTable } from './batch';
import { severityEnum } from './enums';

export const recallStatusEnum = pgEnum('recall_status', [
    'active',
    'resolved',
    'cancelled',
]);

export const recallTable = pgTable('recall', {
    id: uuid('id').defaultRandom().primaryKey(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    createdBy: uuid('created_by').notNull(),
    batchId: uuid('batch_id').references(() => batchTable.id).notNull(),
    recallReason: text('recall_reason').notNull(),
    recallDate: date('recall_date', { mode: 'string' }).notNull(),
    announcedBy: varchar('announced_by', { length: 100 }),
    status: recallStatusEnum('status').default('active').notNull(),
    severity: severityEnum('severity').notNull(),
    // Batch quantity at the moment the recall was recorded
    affectedQuantity: integer('affected_quantity').notNull(),
    returnedQuantity: integer('returned_quantity').default(0).notNull(),
    instructions: text('instructions'),
});

export type RecallStatus = (typeof recallStatusEnum.enumValues)[number];
export type RecallTable = typeof recallTable.$inferSelect;
export type NewRecall = typeof recallTable.$inferInsert;
