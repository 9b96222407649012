import { and, asc, avg, count, desc, eq, gt, gte, lte, or, sql, sum } from "drizzle-orm";
import { db } from "../drizzle/db";
import { alertTable, type AlertSeverity } from "../drizzle/schema/alert";
import { batchTable } from "../drizzle/schema/batch";
import { medicineTable } from "../drizzle/schema/medicine";
import { purchaseOrderTable } from "../drizzle/schema/purchaseOrder";
import { saleTable } from "../drizzle/schema/sale";
import { supplierTable } from "../drizzle/schema/supplier";
import { supplierRatingTable } from "../drizzle/schema/supplierRating";
import { CRITICAL_EXPIRY_DAYS, NEAR_EXPIRY_DAYS, SALES_TRAILING_WINDOW_DAYS } from "../config/policy";
import { ValidationError } from "../utils/AppError";
import { fromCents, roundTo2, toCents } from "../utils/money";
import { addDays, daysBetween, today } from "../utils/timezone";

export type StockStatus = "RECALLED" | "EXPIRED" | "CRITICAL_EXPIRY" | "NEAR_EXPIRY" | "LOW_STOCK" | "OK";
export type ReorderStatus = "REORDER_NOW" | "REORDER_SOON" | "OK";

export interface StockStatusInput {
    isRecalled: boolean;
    isExpired: boolean;
    daysUntilExpiry: number;
    quantity: number;
    minimumStockLevel: number;
}

/**
 * First matching status wins, in the order of the checks below.
 */
export function deriveStockStatus(batch: StockStatusInput): StockStatus {
    if (batch.isRecalled) return "RECALLED";
    if (batch.isExpired || batch.daysUntilExpiry <= 0) return "EXPIRED";
    if (batch.daysUntilExpiry <= CRITICAL_EXPIRY_DAYS) return "CRITICAL_EXPIRY";
    if (batch.daysUntilExpiry <= NEAR_EXPIRY_DAYS) return "NEAR_EXPIRY";
    if (batch.quantity <= batch.minimumStockLevel) return "LOW_STOCK";
    return "OK";
}

export function deriveReorderStatus(totalStock: number, minimumStockLevel: number, reorderPoint: number): ReorderStatus {
    if (totalStock <= minimumStockLevel) return "REORDER_NOW";
    if (totalStock <= reorderPoint) return "REORDER_SOON";
    return "OK";
}

const SEVERITY_RANK: Record<AlertSeverity, number> = {
    critical: 1,
    high: 2,
    medium: 3,
    low: 4,
};

export class ReportService {

    /**
     * Every stocked or recalled batch of an active medicine with its derived
     * status, soonest expiry first. Recalled batches are written off to zero.
     */
    static async getStockStatus() {
        const rows = await db.select({
            medicineId: medicineTable.id,
            medicineName: medicineTable.name,
            genericName: medicineTable.genericName,
            dosageForm: medicineTable.dosageForm,
            strength: medicineTable.strength,
            requiresPrescription: medicineTable.requiresPrescription,
            minimumStockLevel: medicineTable.minimumStockLevel,
            batchId: batchTable.id,
            batchNumber: batchTable.batchNumber,
            expiryDate: batchTable.expiryDate,
            currentStock: batchTable.quantity,
            sellingPrice: batchTable.sellingPrice,
            mrp: batchTable.mrp,
            isRecalled: batchTable.isRecalled,
            isExpired: batchTable.isExpired,
            ocrVerified: batchTable.ocrVerified,
            supplierName: supplierTable.supplierName,
        })
            .from(batchTable)
            .innerJoin(medicineTable, eq(batchTable.medicineId, medicineTable.id))
            .leftJoin(supplierTable, eq(batchTable.supplierId, supplierTable.id))
            .where(and(
                or(gt(batchTable.quantity, 0), eq(batchTable.isRecalled, true)),
                eq(medicineTable.isActive, true)
            ))
            .orderBy(asc(batchTable.expiryDate));

        const now = today();
        return rows.map(({ minimumStockLevel, isExpired, ...row }) => {
            const daysUntilExpiry = daysBetween(now, row.expiryDate);
            return {
                ...row,
                daysUntilExpiry,
                stockStatus: deriveStockStatus({
                    isRecalled: row.isRecalled,
                    isExpired,
                    daysUntilExpiry,
                    quantity: row.currentStock,
                    minimumStockLevel,
                }),
            };
        });
    }

    static async getActiveAlerts() {
        return await db.select({
            alertId: alertTable.id,
            alertType: alertTable.alertType,
            alertMessage: alertTable.alertMessage,
            severity: alertTable.severity,
            generatedAt: alertTable.generatedAt,
            medicineName: medicineTable.name,
            batchId: batchTable.id,
            batchNumber: batchTable.batchNumber,
            affectedQuantity: batchTable.quantity,
        })
            .from(alertTable)
            .innerJoin(batchTable, eq(alertTable.batchId, batchTable.id))
            .innerJoin(medicineTable, eq(batchTable.medicineId, medicineTable.id))
            .where(eq(alertTable.isAcknowledged, false))
            .orderBy(
                sql`CASE ${alertTable.severity}
                    WHEN 'critical' THEN ${SEVERITY_RANK.critical}
                    WHEN 'high' THEN ${SEVERITY_RANK.high}
                    WHEN 'medium' THEN ${SEVERITY_RANK.medium}
                    ELSE ${SEVERITY_RANK.low} END`,
                desc(alertTable.generatedAt)
            );
    }

    /**
     * Stock, expiry exposure and trailing sales per active medicine.
     * Batches and sales are aggregated separately so neither multiplies the other.
     */
    static async getMedicineRollups() {
        const now = today();
        const nearExpiryLimit = addDays(now, NEAR_EXPIRY_DAYS);
        const salesSince = new Date(`${addDays(now, -SALES_TRAILING_WINDOW_DAYS)}T00:00:00`);

        const medicines = await db.select({
            medicineId: medicineTable.id,
            medicineName: medicineTable.name,
            category: medicineTable.category,
            minimumStockLevel: medicineTable.minimumStockLevel,
            reorderPoint: medicineTable.reorderPoint,
        })
            .from(medicineTable)
            .where(eq(medicineTable.isActive, true))
            .orderBy(asc(medicineTable.name));

        const batches = await db.select({
            medicineId: batchTable.medicineId,
            quantity: batchTable.quantity,
            costPrice: batchTable.costPrice,
            expiryDate: batchTable.expiryDate,
            isRecalled: batchTable.isRecalled,
        })
            .from(batchTable);

        const sales = await db.select({
            medicineId: batchTable.medicineId,
            soldQuantity: sum(saleTable.quantitySold).mapWith(Number),
            revenue: sum(saleTable.totalAmount).mapWith(Number),
        })
            .from(saleTable)
            .innerJoin(batchTable, eq(saleTable.batchId, batchTable.id))
            .where(gte(saleTable.saleDate, salesSince))
            .groupBy(batchTable.medicineId);

        const salesByMedicine = new Map(sales.map(s => [s.medicineId, s]));

        return medicines.map(medicine => {
            const all = batches.filter(b => b.medicineId === medicine.medicineId);
            const own = all.filter(b => b.quantity > 0);
            const totalStock = own.reduce((acc, b) => acc + b.quantity, 0);
            const inventoryValueCents = own.reduce((acc, b) => acc + toCents(b.costPrice ?? 0) * b.quantity, 0);
            const sold = salesByMedicine.get(medicine.medicineId);

            return {
                medicineId: medicine.medicineId,
                medicineName: medicine.medicineName,
                category: medicine.category,
                totalStock,
                inventoryValue: fromCents(inventoryValueCents),
                activeBatches: own.length,
                nearExpiryBatches: own.filter(b => b.expiryDate <= nearExpiryLimit).length,
                recalledBatches: all.filter(b => b.isRecalled).length,
                soldLast30Days: sold ? sold.soldQuantity : 0,
                revenueLast30Days: sold ? roundTo2(sold.revenue) : 0,
                reorderPoint: medicine.reorderPoint,
                reorderStatus: deriveReorderStatus(totalStock, medicine.minimumStockLevel, medicine.reorderPoint),
            };
        });
    }

    static async getSupplierPerformance() {
        const suppliers = await db.select({
            supplierId: supplierTable.id,
            supplierName: supplierTable.supplierName,
            rating: supplierTable.rating,
            totalOrders: supplierTable.totalOrders,
            onTimeDeliveryRate: supplierTable.onTimeDeliveryRate,
        })
            .from(supplierTable)
            .where(eq(supplierTable.isActive, true))
            .orderBy(sql`${supplierTable.rating} DESC NULLS LAST`, asc(supplierTable.supplierName));

        const orderCounts = await db.select({
            supplierId: purchaseOrderTable.supplierId,
            pending: sql<number>`count(*) filter (where ${purchaseOrderTable.status} = 'pending')`.mapWith(Number),
            completed: sql<number>`count(*) filter (where ${purchaseOrderTable.status} = 'delivered')`.mapWith(Number),
            cancelled: sql<number>`count(*) filter (where ${purchaseOrderTable.status} = 'cancelled')`.mapWith(Number),
        })
            .from(purchaseOrderTable)
            .groupBy(purchaseOrderTable.supplierId);

        const ratingAverages = await db.select({
            supplierId: supplierRatingTable.supplierId,
            ratings: count(),
            avgQuality: avg(supplierRatingTable.qualityRating),
            avgDelivery: avg(supplierRatingTable.deliveryRating),
            avgCommunication: avg(supplierRatingTable.communicationRating),
        })
            .from(supplierRatingTable)
            .groupBy(supplierRatingTable.supplierId);

        const ordersBySupplier = new Map(orderCounts.map(o => [o.supplierId, o]));
        const ratingsBySupplier = new Map(ratingAverages.map(r => [r.supplierId, r]));
        const toScore = (value: string | null) => value === null ? null : roundTo2(Number(value));

        return suppliers.map(supplier => {
            const orders = ordersBySupplier.get(supplier.supplierId);
            const ratings = ratingsBySupplier.get(supplier.supplierId);
            return {
                ...supplier,
                pendingOrders: orders ? orders.pending : 0,
                completedOrders: orders ? orders.completed : 0,
                cancelledOrders: orders ? orders.cancelled : 0,
                avgQuality: ratings ? toScore(ratings.avgQuality) : null,
                avgDelivery: ratings ? toScore(ratings.avgDelivery) : null,
                avgCommunication: ratings ? toScore(ratings.avgCommunication) : null,
            };
        });
    }

    /**
     * Stocked, unrecalled batches expiring within `days` from today
     */
    static async getNearExpiryBatches(days: number) {
        if (!Number.isInteger(days) || days < 0) {
            throw new ValidationError("days must be a non-negative integer");
        }
        const now = today();

        const rows = await db.select({
            batchId: batchTable.id,
            batchNumber: batchTable.batchNumber,
            expiryDate: batchTable.expiryDate,
            quantity: batchTable.quantity,
            medicineId: medicineTable.id,
            medicineName: medicineTable.name,
        })
            .from(batchTable)
            .innerJoin(medicineTable, eq(batchTable.medicineId, medicineTable.id))
            .where(and(
                gt(batchTable.quantity, 0),
                eq(batchTable.isRecalled, false),
                gte(batchTable.expiryDate, now),
                lte(batchTable.expiryDate, addDays(now, days))
            ))
            .orderBy(asc(batchTable.expiryDate));

        return rows.map(row => ({ ...row, daysUntilExpiry: daysBetween(now, row.expiryDate) }));
    }
}
