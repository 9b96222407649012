import { and, desc, eq, gte, inArray, lt, sql } from "drizzle-orm";
import { db, type Transaction } from "../drizzle/db";
import { alertTable } from "../drizzle/schema/alert";
import { batchTable, type BatchTable } from "../drizzle/schema/batch";
import { inventoryMovementTable, type MovementType } from "../drizzle/schema/inventoryMovement";
import { medicineTable } from "../drizzle/schema/medicine";
import { recallTable } from "../drizzle/schema/recall";
import { saleTable } from "../drizzle/schema/sale";
import { supplierTable } from "../drizzle/schema/supplier";
import { RECEIPT_EXPIRY_BANDS } from "../config/policy";
import {
    DuplicateBatchError,
    InsufficientStockError,
    NotFoundError,
    RecalledOrExpiredError,
    ReferentialIntegrityError,
    ValidationError,
} from "../utils/AppError";
import { daysBetween, today } from "../utils/timezone";
import { getPgErrorCode, UNIQUE_VIOLATION, withTransaction } from "../utils/transaction";
import type { ActorContext } from "../types/actor";
import { AlertService, bandSeverity, type RaiseResult } from "./alert.service";
import { AuditService } from "./audit.service";

export interface ReceiveBatchInput {
    medicineId: string;
    supplierId?: string | null;
    purchaseOrderId?: string | null;
    batchNumber: string;
    expiryDate: string;
    manufactureDate?: string | null;
    quantity: number;
    costPrice?: number | null;
    sellingPrice?: number | null;
    mrp?: number | null;
    barcode?: string | null;
    storageLocation?: string | null;
    ocrVerified?: boolean;
}

export interface AdjustmentInput {
    batchId: string;
    /** Signed change to apply to the batch quantity */
    delta: number;
    movementType: Exclude<MovementType, "purchase">;
    reason?: string | null;
    referenceId?: string | null;
}

export interface AdjustmentResult {
    batch: BatchTable;
    previousQuantity: number;
    stockAlert: RaiseResult | null;
}

// Movement kinds callers may post directly; sale and disposal belong to their workflows
const MANUAL_MOVEMENT_TYPES: ReadonlySet<MovementType> = new Set<MovementType>(["adjustment", "return"]);

function expiryMessage(medicineName: string, batchNumber: string, daysRemaining: number): string {
    if (daysRemaining <= RECEIPT_EXPIRY_BANDS[0].maxDays) {
        return `${medicineName} (Batch: ${batchNumber}) expires in ${daysRemaining} days`;
    }
    const band = RECEIPT_EXPIRY_BANDS.find(b => daysRemaining <= b.maxDays);
    return `${medicineName} (Batch: ${batchNumber}) expires within ${band ? band.maxDays : daysRemaining} days`;
}

export class StockLedgerService {

    /**
     * Record a received lot: create the batch, append its purchase movement
     * and raise an expiry alert when it already sits inside an expiry band.
     */
    static async receive(input: ReceiveBatchInput, actor: ActorContext) {
        if (!Number.isInteger(input.quantity) || input.quantity <= 0) {
            throw new ValidationError("Received quantity must be a positive integer");
        }

        console.log('📦 [StockLedgerService] Receiving batch', input.batchNumber, 'for medicine', input.medicineId);

        try {
            return await withTransaction("StockLedgerService.receive", async (tx) => {
                const [medicine] = await tx.select().from(medicineTable).where(eq(medicineTable.id, input.medicineId));
                if (!medicine) {
                    throw new NotFoundError("Medicine", input.medicineId);
                }
                if (!medicine.isActive) {
                    throw new ValidationError(`Medicine ${medicine.name} is deactivated and cannot receive stock`);
                }

                if (input.supplierId) {
                    const [supplier] = await tx.select({ id: supplierTable.id }).from(supplierTable).where(eq(supplierTable.id, input.supplierId));
                    if (!supplier) {
                        throw new NotFoundError("Supplier", input.supplierId);
                    }
                }

                const [duplicate] = await tx.select({ id: batchTable.id })
                    .from(batchTable)
                    .where(and(
                        eq(batchTable.medicineId, input.medicineId),
                        eq(batchTable.batchNumber, input.batchNumber)
                    ));
                if (duplicate) {
                    throw new DuplicateBatchError(input.batchNumber);
                }

                const [batch] = await tx.insert(batchTable).values({
                    medicineId: input.medicineId,
                    supplierId: input.supplierId ?? null,
                    batchNumber: input.batchNumber,
                    expiryDate: input.expiryDate,
                    manufactureDate: input.manufactureDate ?? null,
                    quantity: input.quantity,
                    costPrice: input.costPrice ?? null,
                    sellingPrice: input.sellingPrice ?? null,
                    mrp: input.mrp ?? null,
                    barcode: input.barcode ?? null,
                    storageLocation: input.storageLocation ?? null,
                    ocrVerified: input.ocrVerified ?? false,
                    createdBy: actor.userId,
                }).returning();

                await tx.insert(inventoryMovementTable).values({
                    batchId: batch.id,
                    movementType: "purchase",
                    quantity: input.quantity,
                    referenceId: input.purchaseOrderId ?? null,
                    reason: "New batch received",
                    movedBy: actor.userId,
                });

                await AuditService.record(tx, actor, {
                    tableName: "batch",
                    recordId: batch.id,
                    action: "INSERT",
                    newValues: batch,
                });

                // Banding uses the date at call time, not the manufacture or order date
                const daysRemaining = daysBetween(today(), batch.expiryDate);
                const severity = bandSeverity(daysRemaining, RECEIPT_EXPIRY_BANDS);
                const expiryAlert = severity
                    ? await AlertService.raise({
                        batchId: batch.id,
                        type: "expiry",
                        severity,
                        message: expiryMessage(medicine.name, batch.batchNumber, daysRemaining),
                    }, tx)
                    : null;

                console.log('✅ [StockLedgerService] Batch received:', batch.id, 'quantity', batch.quantity);
                return { batch, expiryAlert };
            });
        } catch (error) {
            if (getPgErrorCode(error) === UNIQUE_VIOLATION) {
                throw new DuplicateBatchError(input.batchNumber);
            }
            throw error;
        }
    }

    /**
     * Manual quantity correction or customer return.
     */
    static async adjust(input: AdjustmentInput, actor: ActorContext): Promise<AdjustmentResult> {
        if (!MANUAL_MOVEMENT_TYPES.has(input.movementType)) {
            throw new ValidationError(`Movement type ${input.movementType} cannot be posted directly`);
        }
        return await withTransaction("StockLedgerService.adjust", (tx) => StockLedgerService.applyAdjustment(tx, input, actor));
    }

    /**
     * The single write path for batch quantity after creation. The update is a
     * compare-and-swap guarded by `quantity + delta >= 0`, appended to the
     * movement trail and audited in the caller's transaction.
     */
    static async applyAdjustment(tx: Transaction, input: AdjustmentInput, actor: ActorContext): Promise<AdjustmentResult> {
        if (!Number.isInteger(input.delta) || input.delta === 0) {
            throw new ValidationError("Adjustment delta must be a non-zero integer");
        }

        const [before] = await tx.select().from(batchTable).where(eq(batchTable.id, input.batchId)).for("update");
        if (!before) {
            throw new NotFoundError("Batch", input.batchId);
        }
        if (input.delta > 0 && before.isRecalled) {
            throw new RecalledOrExpiredError(before.batchNumber, "recalled");
        }

        const [after] = await tx.update(batchTable)
            .set({
                quantity: sql`${batchTable.quantity} + ${input.delta}`,
                updatedAt: new Date(),
            })
            .where(and(
                eq(batchTable.id, input.batchId),
                gte(sql`${batchTable.quantity} + ${input.delta}`, 0)
            ))
            .returning();

        if (!after) {
            throw new InsufficientStockError(before.quantity, -input.delta);
        }

        await tx.insert(inventoryMovementTable).values({
            batchId: after.id,
            movementType: input.movementType,
            quantity: input.delta,
            referenceId: input.referenceId ?? null,
            reason: input.reason ?? null,
            movedBy: actor.userId,
        });

        await AuditService.record(tx, actor, {
            tableName: "batch",
            recordId: after.id,
            action: "UPDATE",
            oldValues: before,
            newValues: after,
        });

        // Disposal empties a recalled batch; the recall alert already covers it
        const stockAlert = input.delta < 0 && input.movementType !== "disposal"
            ? await AlertService.evaluateStockLevel(tx, after, before.quantity)
            : null;

        return { batch: after, previousQuantity: before.quantity, stockAlert };
    }

    /**
     * Flag every batch whose expiry date is before `asOfDate`. Already flagged
     * batches are left alone, so repeating a sweep changes nothing.
     */
    static async expireSweep(actor: ActorContext, asOfDate: string = today()): Promise<number> {
        return await withTransaction("StockLedgerService.expireSweep", async (tx) => {
            const due = await tx.select()
                .from(batchTable)
                .where(and(
                    lt(batchTable.expiryDate, asOfDate),
                    eq(batchTable.isExpired, false)
                ))
                .for("update");

            if (due.length === 0) {
                console.log('✨ [StockLedgerService] Expiry sweep found nothing to flag as of', asOfDate);
                return 0;
            }

            const flagged = await tx.update(batchTable)
                .set({ isExpired: true, updatedAt: new Date() })
                .where(inArray(batchTable.id, due.map(b => b.id)))
                .returning();

            const previous = new Map(due.map(b => [b.id, b]));
            for (const batch of flagged) {
                await AuditService.record(tx, actor, {
                    tableName: "batch",
                    recordId: batch.id,
                    action: "UPDATE",
                    oldValues: previous.get(batch.id) ?? null,
                    newValues: batch,
                });
            }

            console.log('🧹 [StockLedgerService] Expiry sweep flagged', flagged.length, 'batches as of', asOfDate);
            return flagged.length;
        });
    }

    /**
     * Remove a batch together with its alerts, recalls and movements.
     * Refused while any sale references the batch.
     */
    static async deleteBatch(batchId: string, actor: ActorContext): Promise<void> {
        await withTransaction("StockLedgerService.deleteBatch", async (tx) => {
            const [batch] = await tx.select().from(batchTable).where(eq(batchTable.id, batchId)).for("update");
            if (!batch) {
                throw new NotFoundError("Batch", batchId);
            }

            const [sale] = await tx.select({ id: saleTable.id }).from(saleTable).where(eq(saleTable.batchId, batchId)).limit(1);
            if (sale) {
                throw new ReferentialIntegrityError(`Batch ${batch.batchNumber} has recorded sales and cannot be deleted`);
            }

            // Alerts go first: recall alerts reference the recalls below
            const alerts = await tx.delete(alertTable).where(eq(alertTable.batchId, batchId)).returning({ id: alertTable.id });
            const recalls = await tx.delete(recallTable).where(eq(recallTable.batchId, batchId)).returning({ id: recallTable.id });
            const movements = await tx.delete(inventoryMovementTable).where(eq(inventoryMovementTable.batchId, batchId)).returning({ id: inventoryMovementTable.id });
            await tx.delete(batchTable).where(eq(batchTable.id, batchId));

            await AuditService.record(tx, actor, {
                tableName: "batch",
                recordId: batchId,
                action: "DELETE",
                oldValues: batch,
            });

            console.log('🗑️ [StockLedgerService] Deleted batch', batch.batchNumber, 'with', alerts.length, 'alerts,', recalls.length, 'recalls,', movements.length, 'movements');
        });
    }

    static async getBatchById(batchId: string) {
        const [batch] = await db.select().from(batchTable).where(eq(batchTable.id, batchId));
        return batch ?? null;
    }

    /**
     * Movement trail for a batch, newest first
     */
    static async getMovements(batchId: string) {
        return await db.select()
            .from(inventoryMovementTable)
            .where(eq(inventoryMovementTable.batchId, batchId))
            .orderBy(desc(inventoryMovementTable.movementDate));
    }
}
