import { and, asc, desc, eq, gt, gte, lte, sql } from "drizzle-orm";
import { db, type Transaction } from "../drizzle/db";
import { alertTable, type AlertSeverity, type AlertTable, type AlertType } from "../drizzle/schema/alert";
import { batchTable, type BatchTable } from "../drizzle/schema/batch";
import { medicineTable } from "../drizzle/schema/medicine";
import {
    SCAN_EXPIRY_BANDS,
    SCAN_EXPIRY_FALLBACK_SEVERITY,
    type ExpiryBand,
} from "../config/policy";
import {
    AlreadyAcknowledgedError,
    ConcurrencyConflictError,
    NotFoundError,
    ValidationError,
} from "../utils/AppError";
import { addDays, daysBetween, today } from "../utils/timezone";
import { withTransaction } from "../utils/transaction";
import type { ActorContext } from "../types/actor";
import { AuditService } from "./audit.service";

export interface RaiseAlertInput {
    batchId: string;
    type: AlertType;
    message: string;
    severity: AlertSeverity;
    /** Required for recall alerts, which dedup on the recall rather than the batch */
    recallId?: string | null;
}

export type RaiseResult =
    | { status: "raised"; alert: AlertTable }
    | { status: "suppressed"; existingAlertId: string };

export interface ExpiryScanResult {
    scanned: number;
    raised: number;
    suppressed: number;
}

export interface AlertListFilter {
    type?: AlertType;
    batchId?: string;
    includeAcknowledged?: boolean;
}

/**
 * First band whose upper bound covers `daysRemaining`, or `fallback`.
 * Bands are expected in ascending `maxDays` order.
 */
export function bandSeverity(
    daysRemaining: number,
    bands: readonly ExpiryBand[],
    fallback: AlertSeverity | null = null
): AlertSeverity | null {
    const band = bands.find(b => daysRemaining <= b.maxDays);
    return band ? band.severity : fallback;
}

export class AlertService {
    /**
     * Insert an alert unless an equivalent unacknowledged one is open.
     * Non-recall alerts dedup on (batch, type); recall alerts on the recall id.
     * Joins the caller's transaction when one is given.
     */
    static async raise(input: RaiseAlertInput, tx?: Transaction): Promise<RaiseResult> {
        if (!tx) {
            return await withTransaction("AlertService.raise", (t) => AlertService.raise(input, t));
        }

        const [batch] = await tx.select({ id: batchTable.id }).from(batchTable).where(eq(batchTable.id, input.batchId));
        if (!batch) {
            throw new NotFoundError("Batch", input.batchId);
        }

        const existing = await AlertService.findOpenDuplicate(tx, input);
        if (existing) {
            console.log(`🔕 [AlertService] Suppressed ${input.type} alert for batch ${input.batchId}; open alert ${existing} already exists`);
            return { status: "suppressed", existingAlertId: existing };
        }

        const [alert] = await tx.insert(alertTable).values({
            batchId: input.batchId,
            recallId: input.type === "recall" ? input.recallId : null,
            alertType: input.type,
            alertMessage: input.message,
            severity: input.severity,
        }).onConflictDoNothing().returning();

        if (!alert) {
            // A concurrent writer claimed the dedup slot after our lookup
            throw new ConcurrencyConflictError("AlertService.raise");
        }

        console.log(`🚨 [AlertService] Raised ${alert.severity} ${alert.alertType} alert ${alert.id}: ${alert.alertMessage}`);
        return { status: "raised", alert };
    }

    private static async findOpenDuplicate(tx: Transaction, input: RaiseAlertInput): Promise<string | null> {
        if (input.type === "recall") {
            if (!input.recallId) {
                throw new ValidationError("Recall alerts must reference a recall");
            }
            const [existing] = await tx.select({ id: alertTable.id })
                .from(alertTable)
                .where(eq(alertTable.recallId, input.recallId))
                .limit(1);
            return existing ? existing.id : null;
        }

        const [existing] = await tx.select({ id: alertTable.id })
            .from(alertTable)
            .where(and(
                eq(alertTable.batchId, input.batchId),
                eq(alertTable.alertType, input.type),
                eq(alertTable.isAcknowledged, false)
            ))
            .limit(1);
        return existing ? existing.id : null;
    }

    /**
     * Mark an alert handled. Succeeds exactly once per alert.
     */
    static async acknowledge(alertId: string, actor: ActorContext, actionTaken?: string | null): Promise<AlertTable> {
        return await withTransaction("AlertService.acknowledge", async (tx) => {
            const [current] = await tx.select().from(alertTable).where(eq(alertTable.id, alertId)).for("update");
            if (!current) {
                throw new NotFoundError("Alert", alertId);
            }
            if (current.isAcknowledged) {
                throw new AlreadyAcknowledgedError(alertId);
            }

            const [acknowledged] = await tx.update(alertTable)
                .set({
                    isAcknowledged: true,
                    acknowledgedBy: actor.userId,
                    acknowledgedAt: new Date(),
                    actionTaken: actionTaken ?? null,
                })
                .where(and(eq(alertTable.id, alertId), eq(alertTable.isAcknowledged, false)))
                .returning();

            if (!acknowledged) {
                throw new AlreadyAcknowledgedError(alertId);
            }

            await AuditService.record(tx, actor, {
                tableName: "alert",
                recordId: alertId,
                action: "UPDATE",
                oldValues: current,
                newValues: acknowledged,
            });

            return acknowledged;
        });
    }

    /**
     * Raise expiry alerts for sellable batches expiring between today and
     * today + thresholdDays. Severity comes from `bands`, defaulting to
     * <=7 days high, <=30 days medium, otherwise low.
     */
    static async scanExpiring(
        thresholdDays: number,
        bands: readonly ExpiryBand[] = SCAN_EXPIRY_BANDS
    ): Promise<ExpiryScanResult> {
        if (!Number.isInteger(thresholdDays) || thresholdDays < 0) {
            throw new ValidationError("thresholdDays must be a non-negative integer");
        }

        return await withTransaction("AlertService.scanExpiring", async (tx) => {
            const from = today();
            const until = addDays(from, thresholdDays);

            const candidates = await tx.select({
                batchId: batchTable.id,
                batchNumber: batchTable.batchNumber,
                expiryDate: batchTable.expiryDate,
                medicineName: medicineTable.name,
            })
                .from(batchTable)
                .innerJoin(medicineTable, eq(batchTable.medicineId, medicineTable.id))
                .where(and(
                    gt(batchTable.quantity, 0),
                    eq(batchTable.isRecalled, false),
                    gte(batchTable.expiryDate, from),
                    lte(batchTable.expiryDate, until)
                ))
                .orderBy(asc(batchTable.expiryDate));

            const result: ExpiryScanResult = { scanned: candidates.length, raised: 0, suppressed: 0 };

            for (const candidate of candidates) {
                const daysRemaining = daysBetween(from, candidate.expiryDate);
                const severity = bandSeverity(daysRemaining, bands) ?? SCAN_EXPIRY_FALLBACK_SEVERITY;
                const outcome = await AlertService.raise({
                    batchId: candidate.batchId,
                    type: "expiry",
                    severity,
                    message: `${candidate.medicineName} (Batch: ${candidate.batchNumber}) expires in ${daysRemaining} days`,
                }, tx);

                if (outcome.status === "raised") {
                    result.raised++;
                } else {
                    result.suppressed++;
                }
            }

            console.log(`📅 [AlertService] Expiry scan (${thresholdDays} days): ${result.raised} raised, ${result.suppressed} suppressed`);
            return result;
        });
    }

    /**
     * Stock-level alerts for a decrement that crossed a threshold:
     * reaching zero raises out_of_stock, reaching the medicine's minimum raises low_stock.
     */
    static async evaluateStockLevel(tx: Transaction, batch: BatchTable, previousQuantity: number): Promise<RaiseResult | null> {
        const [medicine] = await tx.select({
            name: medicineTable.name,
            minimumStockLevel: medicineTable.minimumStockLevel,
        })
            .from(medicineTable)
            .where(eq(medicineTable.id, batch.medicineId));

        if (!medicine) {
            throw new NotFoundError("Medicine", batch.medicineId);
        }

        if (batch.quantity === 0 && previousQuantity > 0) {
            return await AlertService.raise({
                batchId: batch.id,
                type: "out_of_stock",
                severity: "high",
                message: `${medicine.name} (Batch: ${batch.batchNumber}) is out of stock`,
            }, tx);
        }

        if (batch.quantity <= medicine.minimumStockLevel && previousQuantity > medicine.minimumStockLevel) {
            return await AlertService.raise({
                batchId: batch.id,
                type: "low_stock",
                severity: "medium",
                message: `Low stock for ${medicine.name} (Batch: ${batch.batchNumber}). Current: ${batch.quantity}, minimum: ${medicine.minimumStockLevel}`,
            }, tx);
        }

        return null;
    }

    static async listAlerts(filter: AlertListFilter = {}) {
        return await db.select()
            .from(alertTable)
            .where(and(
                filter.type ? eq(alertTable.alertType, filter.type) : sql`true`,
                filter.batchId ? eq(alertTable.batchId, filter.batchId) : sql`true`,
                filter.includeAcknowledged ? sql`true` : eq(alertTable.isAcknowledged, false)
            ))
            .orderBy(desc(alertTable.generatedAt));
    }
}
