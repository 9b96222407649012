import { desc, eq } from "drizzle-orm";
import { db } from "../drizzle/db";
import { batchTable } from "../drizzle/schema/batch";
import type { Severity } from "../drizzle/schema/enums";
import { medicineTable } from "../drizzle/schema/medicine";
import { recallTable, type RecallStatus, type RecallTable } from "../drizzle/schema/recall";
import { InvalidTransitionError, NotFoundError, ValidationError } from "../utils/AppError";
import { today } from "../utils/timezone";
import { withTransaction } from "../utils/transaction";
import type { ActorContext } from "../types/actor";
import { AlertService, type RaiseResult } from "./alert.service";
import { AuditService } from "./audit.service";
import { StockLedgerService } from "./stockLedger.service";

export interface AddRecallInput {
    batchId: string;
    reason: string;
    recallDate?: string;
    announcedBy?: string | null;
    severity: Severity;
    instructions?: string | null;
}

export interface RecallOutcome {
    recall: RecallTable;
    alert: RaiseResult;
}

export class RecallService {

    /**
     * Pull a batch from sale: record the recall, raise its critical alert,
     * flag the batch and write off whatever stock remained.
     */
    static async addRecall(input: AddRecallInput, actor: ActorContext): Promise<RecallOutcome> {
        if (input.reason.trim().length === 0) {
            throw new ValidationError("Recall reason is required");
        }

        return await withTransaction("RecallService.addRecall", async (tx) => {
            const [batch] = await tx.select().from(batchTable).where(eq(batchTable.id, input.batchId)).for("update");
            if (!batch) {
                throw new NotFoundError("Batch", input.batchId);
            }

            const [medicine] = await tx.select({ name: medicineTable.name })
                .from(medicineTable)
                .where(eq(medicineTable.id, batch.medicineId));
            if (!medicine) {
                throw new NotFoundError("Medicine", batch.medicineId);
            }

            const [recall] = await tx.insert(recallTable).values({
                batchId: batch.id,
                recallReason: input.reason,
                recallDate: input.recallDate ?? today(),
                announcedBy: input.announcedBy ?? null,
                severity: input.severity,
                affectedQuantity: batch.quantity,
                instructions: input.instructions ?? null,
                status: "active",
                createdBy: actor.userId,
            }).returning();

            const alert = await AlertService.raise({
                batchId: batch.id,
                recallId: recall.id,
                type: "recall",
                severity: "critical",
                message: `URGENT RECALL: ${medicine.name} (Batch: ${batch.batchNumber}) - ${input.reason}`,
            }, tx);

            // Recalled stock is written off in full
            let current = batch;
            if (batch.quantity > 0) {
                const written = await StockLedgerService.applyAdjustment(tx, {
                    batchId: batch.id,
                    delta: -batch.quantity,
                    movementType: "disposal",
                    referenceId: recall.id,
                    reason: `Recalled: ${input.reason}`,
                }, actor);
                current = written.batch;
            }

            const [flagged] = await tx.update(batchTable)
                .set({ isRecalled: true, updatedAt: new Date() })
                .where(eq(batchTable.id, batch.id))
                .returning();

            await AuditService.record(tx, actor, {
                tableName: "recall",
                recordId: recall.id,
                action: "INSERT",
                newValues: recall,
            });
            await AuditService.record(tx, actor, {
                tableName: "batch",
                recordId: batch.id,
                action: "UPDATE",
                oldValues: current,
                newValues: flagged,
            });

            console.log(`⛔ [RecallService] Recalled batch ${batch.batchNumber} of ${medicine.name}: ${batch.quantity} units written off`);
            return { recall, alert };
        });
    }

    /**
     * Close an active recall as resolved or cancelled.
     */
    static async updateRecallStatus(
        recallId: string,
        status: Exclude<RecallStatus, "active">,
        actor: ActorContext,
        returnedQuantity?: number
    ): Promise<RecallTable> {
        if (returnedQuantity !== undefined && (!Number.isInteger(returnedQuantity) || returnedQuantity < 0)) {
            throw new ValidationError("Returned quantity must be a non-negative integer");
        }

        return await withTransaction("RecallService.updateRecallStatus", async (tx) => {
            const [current] = await tx.select().from(recallTable).where(eq(recallTable.id, recallId)).for("update");
            if (!current) {
                throw new NotFoundError("Recall", recallId);
            }
            if (current.status !== "active") {
                throw new InvalidTransitionError("Recall", current.status, status);
            }

            const [updated] = await tx.update(recallTable)
                .set({ status, returnedQuantity: returnedQuantity ?? current.returnedQuantity })
                .where(eq(recallTable.id, recallId))
                .returning();

            await AuditService.record(tx, actor, {
                tableName: "recall",
                recordId: recallId,
                action: "UPDATE",
                oldValues: current,
                newValues: updated,
            });

            return updated;
        });
    }

    static async getRecallById(recallId: string) {
        const [recall] = await db.select().from(recallTable).where(eq(recallTable.id, recallId));
        if (!recall) {
            throw new NotFoundError("Recall", recallId);
        }
        return recall;
    }

    static async listRecalls(status?: RecallStatus) {
        return await db.select()
            .from(recallTable)
            .where(status ? eq(recallTable.status, status) : undefined)
            .orderBy(desc(recallTable.createdAt));
    }
}
