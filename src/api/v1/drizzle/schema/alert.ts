import { sql } from 'drizzle-orm';
import { boolean, index, pgEnum, pgTable, text, timestamp, uniqueIndex, uuid } from 'drizzle-orm/pg-core';
import { batchTable } from './batch';
import { recallTable } from './recall';
import { severityEnum, type Severity } from './enums';

export const alertTypeEnum = pgEnum('alert_type', [
    'expiry',
    'recall',
    'low_stock',
    'out_of_stock',
    'reorder',
]);

export const alertTable = pgTable('alert', {
    id: uuid('id').defaultRandom().primaryKey(),
    generatedAt: timestamp('generated_at', { withTimezone: true }).defaultNow().notNull(),
    batchId: uuid('batch_id').references(() => batchTable.id).notNull(),
    // Set for recall alerts only; recall alerts dedup on this instead of (batch, type)
    recallId: uuid('recall_id').references(() => recallTable.id),
    alertType: alertTypeEnum('alert_type').notNull(),
    alertMessage: text('alert_message').notNull(),
    severity: severityEnum('severity').default('medium').notNull(),
    isAcknowledged: boolean('is_acknowledged').default(false).notNull(),
    acknowledgedBy: uuid('acknowledged_by'),
    acknowledgedAt: timestamp('acknowledged_at', { withTimezone: true }),
    actionTaken: text('action_taken'),
}, (table) => [
    index('idx_alert_batch').on(table.batchId),
    // At most one open alert per (batch, type), recall alerts excepted
    uniqueIndex('uq_alert_open_batch_type')
        .on(table.batchId, table.alertType)
        .where(sql`is_acknowledged = false AND alert_type <> 'recall'`),
    uniqueIndex('uq_alert_recall')
        .on(table.recallId)
        .where(sql`recall_id IS NOT NULL`),
]);

export type AlertType = (typeof alertTypeEnum.enumValues)[number];
export type AlertSeverity = Severity;
export type AlertTable = typeof alertTable.$inferSelect;
export type NewAlert = typeof alertTable.$inferInsert;
