import { and, asc, eq } from "drizzle-orm";
import { db, type Transaction } from "../drizzle/db";
import { auditLogTable, type AuditAction } from "../drizzle/schema/auditLog";
import type { ActorContext } from "../types/actor";

export interface AuditEntry {
    tableName: string;
    recordId: string;
    action: AuditAction;
    oldValues?: Record<string, unknown> | null;
    newValues?: Record<string, unknown> | null;
}

export class AuditService {
    /**
     * Append an audit entry inside a savepoint of the caller's transaction.
     * A failed write rolls back to the savepoint only, so the primary operation
     * still commits; the failure is logged and reported through the return value.
     */
    static async record(tx: Transaction, actor: ActorContext, entry: AuditEntry): Promise<boolean> {
        try {
            await tx.transaction(async (savepoint) => {
                await savepoint.insert(auditLogTable).values({
                    tableName: entry.tableName,
                    recordId: entry.recordId,
                    action: entry.action,
                    oldValues: entry.oldValues ?? null,
                    newValues: entry.newValues ?? null,
                    changedBy: actor.userId,
                    ipAddress: actor.ipAddress ?? null,
                });
            });
            return true;
        } catch (error) {
            console.error(`❌ [AuditService] Failed to record ${entry.action} on ${entry.tableName}/${entry.recordId}:`, error);
            return false;
        }
    }

    /**
     * Entries for one record, oldest first
     */
    static async getTrail(tableName: string, recordId: string) {
        return await db.select()
            .from(auditLogTable)
            .where(and(
                eq(auditLogTable.tableName, tableName),
                eq(auditLogTable.recordId, recordId)
            ))
            .orderBy(asc(auditLogTable.id));
    }
}
