import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../drizzle/db", async () => {
    const { createTestDb } = await import("./helpers/testDb");
    return { db: await createTestDb() };
});

import { AlertService } from "../service/alert.service";
import { ProcurementService } from "../service/procurement.service";
import { RecallService } from "../service/recall.service";
import { deriveReorderStatus, deriveStockStatus, ReportService } from "../service/report.service";
import { SaleService } from "../service/sale.service";
import { ValidationError } from "../utils/AppError";
import { addDays, today } from "../utils/timezone";
import { insertBatch, insertMedicine, insertSupplier, manager, pharmacist, resetDb } from "./helpers/fixtures";

describe("deriveStockStatus", () => {
    const healthy = { isRecalled: false, isExpired: false, daysUntilExpiry: 200, quantity: 50, minimumStockLevel: 10 };

    it("ranks recall over expiry over stock level", () => {
        expect(deriveStockStatus({ ...healthy, isRecalled: true, isExpired: true, quantity: 0 })).toBe("RECALLED");
        expect(deriveStockStatus({ ...healthy, isExpired: true, quantity: 0 })).toBe("EXPIRED");
        expect(deriveStockStatus({ ...healthy, daysUntilExpiry: 0 })).toBe("EXPIRED");
        expect(deriveStockStatus({ ...healthy, daysUntilExpiry: 7, quantity: 1 })).toBe("CRITICAL_EXPIRY");
        expect(deriveStockStatus({ ...healthy, daysUntilExpiry: 8 })).toBe("NEAR_EXPIRY");
        expect(deriveStockStatus({ ...healthy, daysUntilExpiry: 30 })).toBe("NEAR_EXPIRY");
        expect(deriveStockStatus({ ...healthy, daysUntilExpiry: 31, quantity: 10 })).toBe("LOW_STOCK");
        expect(deriveStockStatus({ ...healthy, daysUntilExpiry: 31, quantity: 11 })).toBe("OK");
    });
});

describe("deriveReorderStatus", () => {
    it("compares total stock against the minimum, then the reorder point", () => {
        expect(deriveReorderStatus(10, 10, 20)).toBe("REORDER_NOW");
        expect(deriveReorderStatus(20, 10, 20)).toBe("REORDER_SOON");
        expect(deriveReorderStatus(21, 10, 20)).toBe("OK");
    });
});

describe("ReportService", () => {
    beforeEach(async () => {
        await resetDb();
    });

    it("derives a status for every stocked or recalled batch of active medicines", async () => {
        const medicine = await insertMedicine();
        const retired = await insertMedicine({ name: "Retired", isActive: false });
        const pulled = await insertBatch(medicine.id, { batchNumber: "RECALLED", expiryDate: addDays(today(), 100), quantity: 5 });
        await RecallService.addRecall({ batchId: pulled.id, reason: "Contamination", severity: "high" }, manager);
        await insertBatch(medicine.id, { batchNumber: "SOON", expiryDate: addDays(today(), 3) });
        await insertBatch(medicine.id, { batchNumber: "NEAR", expiryDate: addDays(today(), 20) });
        await insertBatch(medicine.id, { batchNumber: "LOW", expiryDate: addDays(today(), 200), quantity: 5 });
        await insertBatch(medicine.id, { batchNumber: "FINE", expiryDate: addDays(today(), 300) });
        await insertBatch(medicine.id, { batchNumber: "EMPTY", expiryDate: addDays(today(), 300), quantity: 0 });
        await insertBatch(retired.id, { batchNumber: "HIDDEN" });

        const rows = await ReportService.getStockStatus();

        expect(rows.map(r => [r.batchNumber, r.daysUntilExpiry, r.stockStatus])).toEqual([
            ["SOON", 3, "CRITICAL_EXPIRY"],
            ["NEAR", 20, "NEAR_EXPIRY"],
            ["RECALLED", 100, "RECALLED"],
            ["LOW", 200, "LOW_STOCK"],
            ["FINE", 300, "OK"],
        ]);
        expect(rows[2].currentStock).toBe(0);
    });

    it("orders open alerts by severity, then newest first", async () => {
        const medicine = await insertMedicine();
        const batch = await insertBatch(medicine.id);
        await AlertService.raise({ batchId: batch.id, type: "low_stock", severity: "medium", message: "medium" });
        await AlertService.raise({ batchId: batch.id, type: "expiry", severity: "critical", message: "critical" });
        await AlertService.raise({ batchId: batch.id, type: "reorder", severity: "low", message: "low" });
        await AlertService.raise({ batchId: batch.id, type: "out_of_stock", severity: "medium", message: "newer medium" });

        const alerts = await ReportService.getActiveAlerts();

        expect(alerts.map(a => a.alertMessage)).toEqual(["critical", "newer medium", "medium", "low"]);
        expect(alerts[0].medicineName).toBe("Paracetamol");
        expect(alerts[0].affectedQuantity).toBe(100);
    });

    it("rolls up stock, value, expiry exposure and recent sales per medicine", async () => {
        const paracetamol = await insertMedicine();
        const amoxil = await insertMedicine({ name: "Amoxil" });
        const main = await insertBatch(paracetamol.id, { batchNumber: "MAIN", quantity: 30, costPrice: 2.5 });
        await insertBatch(paracetamol.id, { batchNumber: "SHORT", quantity: 20, costPrice: 1.25, expiryDate: addDays(today(), 10) });
        const pulled = await insertBatch(paracetamol.id, { batchNumber: "PULLED", quantity: 50, costPrice: 3 });
        await RecallService.addRecall({ batchId: pulled.id, reason: "Contamination", severity: "high" }, manager);
        await SaleService.recordSale({ batchId: main.id, quantity: 5, salePrice: 4.5 }, pharmacist);

        const rollups = await ReportService.getMedicineRollups();

        expect(rollups.map(r => r.medicineName)).toEqual(["Amoxil", "Paracetamol"]);
        expect(rollups[0]).toMatchObject({
            medicineId: amoxil.id,
            totalStock: 0,
            inventoryValue: 0,
            activeBatches: 0,
            soldLast30Days: 0,
            revenueLast30Days: 0,
            reorderStatus: "REORDER_NOW",
        });
        expect(rollups[1]).toMatchObject({
            totalStock: 45,
            inventoryValue: 87.5,
            activeBatches: 2,
            nearExpiryBatches: 1,
            recalledBatches: 1,
            soldLast30Days: 5,
            revenueLast30Days: 22.5,
            reorderStatus: "OK",
        });
    });

    it("summarises supplier ratings and order counts", async () => {
        const medicine = await insertMedicine();
        const rated = await insertSupplier({ supplierName: "Rated" });
        await insertSupplier({ supplierName: "Quiet" });
        const delivered = await ProcurementService.createOrder({
            supplierId: rated.id, medicineId: medicine.id, orderNumber: "S-1", quantityOrdered: 10, expectedDeliveryDate: addDays(today(), 5),
        }, manager);
        await ProcurementService.createOrder({
            supplierId: rated.id, medicineId: medicine.id, orderNumber: "S-2", quantityOrdered: 10,
        }, manager);
        await ProcurementService.transitionOrder(delivered.id, "delivered", manager);
        await ProcurementService.rateSupplier({
            supplierId: rated.id, orderId: delivered.id, quality: 5, delivery: 4, communication: 3,
        }, manager);

        const report = await ReportService.getSupplierPerformance();

        expect(report.map(s => s.supplierName)).toEqual(["Rated", "Quiet"]);
        expect(report[0]).toMatchObject({
            rating: 4,
            totalOrders: 1,
            onTimeDeliveryRate: 100,
            pendingOrders: 1,
            completedOrders: 1,
            cancelledOrders: 0,
            avgQuality: 5,
            avgDelivery: 4,
            avgCommunication: 3,
        });
        expect(report[1]).toMatchObject({ pendingOrders: 0, avgQuality: null });
    });

    it("lists unrecalled stock expiring within the window", async () => {
        const medicine = await insertMedicine();
        await insertBatch(medicine.id, { batchNumber: "B3", expiryDate: addDays(today(), 3) });
        await insertBatch(medicine.id, { batchNumber: "B30", expiryDate: addDays(today(), 30) });
        await insertBatch(medicine.id, { batchNumber: "B45", expiryDate: addDays(today(), 45) });
        await insertBatch(medicine.id, { batchNumber: "GONE", expiryDate: addDays(today(), -2) });
        await insertBatch(medicine.id, { batchNumber: "PULLED", expiryDate: addDays(today(), 3), isRecalled: true });

        const rows = await ReportService.getNearExpiryBatches(30);

        expect(rows.map(r => [r.batchNumber, r.daysUntilExpiry])).toEqual([["B3", 3], ["B30", 30]]);
        await expect(ReportService.getNearExpiryBatches(-5)).rejects.toThrow(ValidationError);
    });
});
