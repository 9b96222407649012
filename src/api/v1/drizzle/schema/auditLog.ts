import { bigserial, index, jsonb, pgEnum, pgTable, timestamp, uuid, varchar } from 'drizzle-orm/pg-core';

export const auditActionEnum = pgEnum('audit_action', [
    'INSERT',
    'UPDATE',
    'DELETE',
]);

/**
 * Append-only before/after snapshots. The serial id orders entries per record.
 */
export const auditLogTable = pgTable('audit_log', {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    changedAt: timestamp('changed_at', { withTimezone: true }).defaultNow().notNull(),
    changedBy: uuid('changed_by').notNull(),
    tableName: varchar('table_name', { length: 50 }).notNull(),
    recordId: varchar('record_id', { length: 100 }).notNull(),
    action: auditActionEnum('action').notNull(),
    oldValues: jsonb('old_values').$type<Record<string, unknown>>(),
    newValues: jsonb('new_values').$type<Record<string, unknown>>(),
    ipAddress: varchar('ip_address', { length: 45 }),
}, (table) => [
    index('idx_audit_log_record').on(table.tableName, table.recordId),
]);

export type AuditAction = (typeof auditActionEnum.enumValues)[number];
export type AuditLogTable = typeof auditLogTable.$inferSelect;
export type NewAuditLog = typeof auditLogTable.$inferInsert;
