import { and, desc, eq, gte, lte } from "drizzle-orm";
import { db } from "../drizzle/db";
import { batchTable } from "../drizzle/schema/batch";
import { medicineTable } from "../drizzle/schema/medicine";
import { prescriptionTable } from "../drizzle/schema/prescription";
import type { PurchaseOrderTable } from "../drizzle/schema/purchaseOrder";
import { saleTable, type PaymentMethod, type SaleTable } from "../drizzle/schema/sale";
import type { AlertSeverity } from "../drizzle/schema/alert";
import { REORDER_HALF_DIVISOR } from "../config/policy";
import {
    InsufficientStockError,
    NotFoundError,
    PrescriptionRequiredError,
    RecalledOrExpiredError,
    ValidationError,
} from "../utils/AppError";
import { hasAtMostTwoDecimals, multiplyPrice } from "../utils/money";
import { today } from "../utils/timezone";
import { withTransaction } from "../utils/transaction";
import type { ActorContext } from "../types/actor";
import { AlertService, type RaiseResult } from "./alert.service";
import { AuditService } from "./audit.service";
import { ProcurementService } from "./procurement.service";
import { StockLedgerService } from "./stockLedger.service";

export interface BuyerInfo {
    customerName?: string | null;
    customerPhone?: string | null;
    customerInfo?: string | null;
}

export interface RecordSaleInput {
    batchId: string;
    quantity: number;
    salePrice: number;
    prescriptionId?: string | null;
    paymentMethod?: PaymentMethod;
    buyer?: BuyerInfo;
}

export interface SaleOutcome {
    sale: SaleTable;
    remainingQuantity: number;
    reorderAlert: RaiseResult | null;
    stockAlert: RaiseResult | null;
    purchaseOrder: PurchaseOrderTable | null;
}

export function reorderSeverity(remaining: number, reorderPoint: number): AlertSeverity {
    if (remaining === 0) {
        return "critical";
    }
    if (remaining <= Math.floor(reorderPoint / REORDER_HALF_DIVISOR)) {
        return "high";
    }
    return "medium";
}

export class SaleService {

    /**
     * Sell from one batch. Validation, the sale row, the stock decrement and
     * every follow-up (reorder alert, auto purchase order) commit together or
     * not at all.
     */
    static async recordSale(input: RecordSaleInput, actor: ActorContext): Promise<SaleOutcome> {
        if (!Number.isInteger(input.quantity) || input.quantity <= 0) {
            throw new ValidationError("Sale quantity must be a positive integer");
        }
        if (input.salePrice < 0 || !hasAtMostTwoDecimals(input.salePrice)) {
            throw new ValidationError("Sale price must be a non-negative amount with at most two decimals");
        }

        return await withTransaction("SaleService.recordSale", async (tx) => {
            const [batch] = await tx.select().from(batchTable).where(eq(batchTable.id, input.batchId)).for("update");
            if (!batch) {
                throw new NotFoundError("Batch", input.batchId);
            }
            if (batch.isRecalled) {
                throw new RecalledOrExpiredError(batch.batchNumber, "recalled");
            }
            if (batch.isExpired || batch.expiryDate < today()) {
                throw new RecalledOrExpiredError(batch.batchNumber, "expired");
            }

            const [medicine] = await tx.select().from(medicineTable).where(eq(medicineTable.id, batch.medicineId));
            if (!medicine) {
                throw new NotFoundError("Medicine", batch.medicineId);
            }

            if (medicine.requiresPrescription) {
                if (!input.prescriptionId) {
                    throw new PrescriptionRequiredError(medicine.name);
                }
                const [prescription] = await tx.select({ status: prescriptionTable.status })
                    .from(prescriptionTable)
                    .where(eq(prescriptionTable.id, input.prescriptionId));
                if (!prescription) {
                    throw new PrescriptionRequiredError(medicine.name, "prescription not found");
                }
                if (prescription.status !== "active") {
                    throw new PrescriptionRequiredError(medicine.name, `prescription is ${prescription.status}`);
                }
            }

            if (input.quantity > batch.quantity) {
                throw new InsufficientStockError(batch.quantity, input.quantity);
            }

            const [sale] = await tx.insert(saleTable).values({
                batchId: batch.id,
                prescriptionId: input.prescriptionId ?? null,
                quantitySold: input.quantity,
                salePrice: input.salePrice,
                totalAmount: multiplyPrice(input.salePrice, input.quantity),
                paymentMethod: input.paymentMethod ?? "cash",
                customerName: input.buyer?.customerName ?? null,
                customerPhone: input.buyer?.customerPhone ?? null,
                customerInfo: input.buyer?.customerInfo ?? null,
                soldBy: actor.userId,
            }).returning();

            await AuditService.record(tx, actor, {
                tableName: "sale",
                recordId: sale.id,
                action: "INSERT",
                newValues: sale,
            });

            const { batch: updatedBatch, stockAlert } = await StockLedgerService.applyAdjustment(tx, {
                batchId: batch.id,
                delta: -input.quantity,
                movementType: "sale",
                referenceId: sale.id,
                reason: `Sale of ${input.quantity} units`,
            }, actor);

            const remainingQuantity = updatedBatch.quantity;
            let reorderAlert: RaiseResult | null = null;
            let purchaseOrder: PurchaseOrderTable | null = null;

            if (remainingQuantity <= medicine.reorderPoint) {
                reorderAlert = await AlertService.raise({
                    batchId: batch.id,
                    type: "reorder",
                    severity: reorderSeverity(remainingQuantity, medicine.reorderPoint),
                    message: `Stock below reorder point for ${medicine.name}. Current: ${remainingQuantity}`,
                }, tx);
            }

            if (remainingQuantity <= Math.floor(medicine.reorderPoint / REORDER_HALF_DIVISOR)) {
                purchaseOrder = await ProcurementService.autoOrder(medicine.id, actor, tx);
            }

            console.log(`💊 [SaleService] Sold ${input.quantity} x ${medicine.name} (Batch: ${batch.batchNumber}), ${remainingQuantity} left`);
            return { sale, remainingQuantity, reorderAlert, stockAlert, purchaseOrder };
        });
    }

    static async getSaleById(saleId: string) {
        const [row] = await db.select({
            sale: saleTable,
            batchNumber: batchTable.batchNumber,
            medicineId: medicineTable.id,
            medicineName: medicineTable.name,
        })
            .from(saleTable)
            .innerJoin(batchTable, eq(saleTable.batchId, batchTable.id))
            .innerJoin(medicineTable, eq(batchTable.medicineId, medicineTable.id))
            .where(eq(saleTable.id, saleId));

        if (!row) {
            throw new NotFoundError("Sale", saleId);
        }
        return { ...row.sale, batchNumber: row.batchNumber, medicineId: row.medicineId, medicineName: row.medicineName };
    }

    static async listSales(filter: { batchId?: string; from?: Date; to?: Date } = {}) {
        return await db.select()
            .from(saleTable)
            .where(and(
                filter.batchId ? eq(saleTable.batchId, filter.batchId) : undefined,
                filter.from ? gte(saleTable.saleDate, filter.from) : undefined,
                filter.to ? lte(saleTable.saleDate, filter.to) : undefined
            ))
            .orderBy(desc(saleTable.saleDate));
    }
}
