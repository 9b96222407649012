import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { eq, sql } from "drizzle-orm";

vi.mock("../drizzle/db", async () => {
    const { createTestDb } = await import("./helpers/testDb");
    return { db: await createTestDb() };
});

import { db } from "../drizzle/db";
import { alertTable } from "../drizzle/schema/alert";
import { batchTable } from "../drizzle/schema/batch";
import { inventoryMovementTable } from "../drizzle/schema/inventoryMovement";
import { purchaseOrderTable } from "../drizzle/schema/purchaseOrder";
import { saleTable } from "../drizzle/schema/sale";
import { reorderSeverity, SaleService } from "../service/sale.service";
import {
    InsufficientStockError,
    NoEligibleSupplierError,
    NotFoundError,
    PrescriptionRequiredError,
    RecalledOrExpiredError,
} from "../utils/AppError";
import { addDays, today } from "../utils/timezone";
import {
    insertBatch,
    insertMedicine,
    insertPrescription,
    insertSupplier,
    pharmacist,
    raisedAlert,
    resetDb,
} from "./helpers/fixtures";

async function batchQuantity(batchId: string) {
    const [batch] = await db.select({ quantity: batchTable.quantity }).from(batchTable).where(eq(batchTable.id, batchId));
    return batch.quantity;
}

describe("reorderSeverity", () => {
    it("is critical at zero, high at or below half the reorder point, medium above", () => {
        expect(reorderSeverity(0, 80)).toBe("critical");
        expect(reorderSeverity(40, 80)).toBe("high");
        expect(reorderSeverity(41, 80)).toBe("medium");
        expect(reorderSeverity(75, 80)).toBe("medium");
        // floor(25 / 2) = 12
        expect(reorderSeverity(12, 25)).toBe("high");
        expect(reorderSeverity(13, 25)).toBe("medium");
    });
});

describe("SaleService.recordSale", () => {
    beforeEach(async () => {
        await resetDb();
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("decrements stock and raises a medium reorder alert below the reorder point", async () => {
        const medicine = await insertMedicine({ reorderPoint: 80 });
        const batch = await insertBatch(medicine.id, { quantity: 100 });

        const outcome = await SaleService.recordSale({ batchId: batch.id, quantity: 25, salePrice: 5 }, pharmacist);

        expect(outcome.remainingQuantity).toBe(75);
        expect(outcome.sale.quantitySold).toBe(25);
        expect(outcome.sale.totalAmount).toBe(125);
        expect(outcome.sale.soldBy).toBe(pharmacist.userId);
        expect(outcome.purchaseOrder).toBeNull();
        expect(outcome.stockAlert).toBeNull();

        const reorder = raisedAlert(outcome.reorderAlert);
        expect(reorder.alertType).toBe("reorder");
        expect(reorder.severity).toBe("medium");
        expect(reorder.alertMessage).toBe("Stock below reorder point for Paracetamol. Current: 75");

        expect(await batchQuantity(batch.id)).toBe(75);
        const movements = await db.select().from(inventoryMovementTable).where(eq(inventoryMovementTable.batchId, batch.id));
        expect(movements).toHaveLength(1);
        expect(movements[0].movementType).toBe("sale");
        expect(movements[0].quantity).toBe(-25);
        expect(movements[0].referenceId).toBe(outcome.sale.id);
    });

    it("computes the total in cents", async () => {
        const medicine = await insertMedicine();
        const batch = await insertBatch(medicine.id, { quantity: 100 });

        const outcome = await SaleService.recordSale({ batchId: batch.id, quantity: 3, salePrice: 0.1 }, pharmacist);

        expect(outcome.sale.totalAmount).toBe(0.3);
    });

    it("rejects a prescription-only medicine sold without a prescription and writes nothing", async () => {
        const medicine = await insertMedicine({ name: "Amoxicillin", requiresPrescription: true });
        const batch = await insertBatch(medicine.id, { quantity: 100 });

        await expect(SaleService.recordSale({ batchId: batch.id, quantity: 1, salePrice: 5, prescriptionId: null }, pharmacist))
            .rejects.toThrow(PrescriptionRequiredError);

        expect(await db.select().from(saleTable)).toHaveLength(0);
        expect(await db.select().from(inventoryMovementTable)).toHaveLength(0);
        expect(await db.select().from(alertTable)).toHaveLength(0);
        expect(await batchQuantity(batch.id)).toBe(100);
    });

    it("accepts an active prescription and refuses a fulfilled one", async () => {
        const medicine = await insertMedicine({ name: "Amoxicillin", requiresPrescription: true });
        const batch = await insertBatch(medicine.id, { quantity: 100 });
        const active = await insertPrescription({ prescriptionNumber: "RX-ACTIVE" });
        const fulfilled = await insertPrescription({ prescriptionNumber: "RX-DONE", status: "fulfilled" });

        const outcome = await SaleService.recordSale({ batchId: batch.id, quantity: 2, salePrice: 5, prescriptionId: active.id }, pharmacist);
        expect(outcome.sale.prescriptionId).toBe(active.id);

        await expect(SaleService.recordSale({ batchId: batch.id, quantity: 2, salePrice: 5, prescriptionId: fulfilled.id }, pharmacist))
            .rejects.toThrow("Prescription required for medicine: Amoxicillin (prescription is fulfilled)");
    });

    it("refuses recalled and expired batches", async () => {
        const medicine = await insertMedicine();
        const recalled = await insertBatch(medicine.id, { batchNumber: "R", isRecalled: true });
        const pastDate = await insertBatch(medicine.id, { batchNumber: "P", expiryDate: addDays(today(), -1) });
        const flagged = await insertBatch(medicine.id, { batchNumber: "F", isExpired: true });

        await expect(SaleService.recordSale({ batchId: recalled.id, quantity: 1, salePrice: 5 }, pharmacist))
            .rejects.toThrow("Batch R is recalled and cannot be sold");
        await expect(SaleService.recordSale({ batchId: pastDate.id, quantity: 1, salePrice: 5 }, pharmacist))
            .rejects.toThrow(RecalledOrExpiredError);
        await expect(SaleService.recordSale({ batchId: flagged.id, quantity: 1, salePrice: 5 }, pharmacist))
            .rejects.toThrow("Batch F is expired and cannot be sold");
    });

    it("checks recall before prescription before quantity", async () => {
        const medicine = await insertMedicine({ requiresPrescription: true });
        const batch = await insertBatch(medicine.id, { quantity: 1, isRecalled: true });

        await expect(SaleService.recordSale({ batchId: batch.id, quantity: 5, salePrice: 5 }, pharmacist))
            .rejects.toThrow(RecalledOrExpiredError);
    });

    it("refuses to oversell", async () => {
        const medicine = await insertMedicine();
        const batch = await insertBatch(medicine.id, { quantity: 100 });

        await expect(SaleService.recordSale({ batchId: batch.id, quantity: 101, salePrice: 5 }, pharmacist))
            .rejects.toThrow("Insufficient stock. Available: 100, Requested: 101");
        expect(await batchQuantity(batch.id)).toBe(100);
    });

    it("fails with NotFound for an unknown batch", async () => {
        await expect(SaleService.recordSale({
            batchId: "99999999-9999-4999-8999-999999999999",
            quantity: 1,
            salePrice: 5,
        }, pharmacist)).rejects.toThrow(NotFoundError);
    });

    it("places an auto order when stock falls to half the reorder point", async () => {
        const medicine = await insertMedicine({ reorderPoint: 80 });
        const batch = await insertBatch(medicine.id, { quantity: 100 });
        const supplier = await insertSupplier({ rating: 4.5 });

        const outcome = await SaleService.recordSale({ batchId: batch.id, quantity: 60, salePrice: 5 }, pharmacist);

        expect(outcome.remainingQuantity).toBe(40);
        expect(raisedAlert(outcome.reorderAlert).severity).toBe("high");
        expect(outcome.purchaseOrder?.orderNumber).toBe(`PO-${today().replace(/-/g, "")}-${medicine.id}`);
        expect(outcome.purchaseOrder?.supplierId).toBe(supplier.id);
        expect(outcome.purchaseOrder?.quantityOrdered).toBe(100);
        expect(outcome.purchaseOrder?.status).toBe("pending");
        expect(outcome.purchaseOrder?.autoGenerated).toBe(true);
    });

    it("rolls the whole sale back when no supplier can take the auto order", async () => {
        const medicine = await insertMedicine({ reorderPoint: 80 });
        const batch = await insertBatch(medicine.id, { quantity: 100 });

        await expect(SaleService.recordSale({ batchId: batch.id, quantity: 60, salePrice: 5 }, pharmacist))
            .rejects.toThrow(NoEligibleSupplierError);

        expect(await batchQuantity(batch.id)).toBe(100);
        expect(await db.select().from(saleTable)).toHaveLength(0);
        expect(await db.select().from(alertTable)).toHaveLength(0);
        expect(await db.select().from(purchaseOrderTable)).toHaveLength(0);
    });

    it("selling the last unit raises critical reorder and out_of_stock alerts", async () => {
        const medicine = await insertMedicine({ reorderPoint: 20 });
        const batch = await insertBatch(medicine.id, { quantity: 10 });
        await insertSupplier();

        const outcome = await SaleService.recordSale({ batchId: batch.id, quantity: 10, salePrice: 5 }, pharmacist);

        expect(outcome.remainingQuantity).toBe(0);
        expect(raisedAlert(outcome.reorderAlert).severity).toBe("critical");
        expect(raisedAlert(outcome.stockAlert).alertType).toBe("out_of_stock");
        expect(outcome.purchaseOrder).not.toBeNull();
    });

    it("never sells more than the batch held across a sequence of sales", async () => {
        const medicine = await insertMedicine({ reorderPoint: 0, minimumStockLevel: 0 });
        const batch = await insertBatch(medicine.id, { quantity: 100 });

        const results = [];
        for (const quantity of [30, 30, 30, 30]) {
            results.push(await SaleService.recordSale({ batchId: batch.id, quantity, salePrice: 1 }, pharmacist)
                .then(() => "sold", (error: unknown) => error));
        }

        expect(results.slice(0, 3)).toEqual(["sold", "sold", "sold"]);
        expect(results[3]).toBeInstanceOf(InsufficientStockError);
        expect(await batchQuantity(batch.id)).toBe(10);
    });

    it("lets exactly one of two concurrent oversized sales through", async () => {
        const medicine = await insertMedicine({ reorderPoint: 20 });
        const batch = await insertBatch(medicine.id, { quantity: 100 });

        const results = await Promise.allSettled([
            SaleService.recordSale({ batchId: batch.id, quantity: 60, salePrice: 5 }, pharmacist),
            SaleService.recordSale({ batchId: batch.id, quantity: 60, salePrice: 5 }, pharmacist),
        ]);

        const fulfilled = results.filter(r => r.status === "fulfilled");
        const rejected = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
        expect(fulfilled).toHaveLength(1);
        expect(rejected).toHaveLength(1);
        expect(rejected[0].reason).toBeInstanceOf(InsufficientStockError);
        expect(await batchQuantity(batch.id)).toBe(40);
        expect(await db.select().from(saleTable)).toHaveLength(1);
    });

    it("commits the sale even when the audit log cannot be written", async () => {
        const medicine = await insertMedicine();
        const batch = await insertBatch(medicine.id, { quantity: 100 });
        const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);

        await db.execute(sql.raw("ALTER TABLE audit_log RENAME TO audit_log_offline"));
        try {
            const outcome = await SaleService.recordSale({ batchId: batch.id, quantity: 5, salePrice: 5 }, pharmacist);
            expect(outcome.remainingQuantity).toBe(95);
        } finally {
            await db.execute(sql.raw("ALTER TABLE audit_log_offline RENAME TO audit_log"));
        }

        expect(await batchQuantity(batch.id)).toBe(95);
        expect(await db.select().from(saleTable)).toHaveLength(1);
        expect(consoleError).toHaveBeenCalledWith(
            expect.stringContaining("[AuditService] Failed to record INSERT on sale/"),
            expect.anything()
        );
    });
});

describe("SaleService.getSaleById", () => {
    beforeEach(async () => {
        await resetDb();
    });

    it("returns the sale with its batch and medicine", async () => {
        const medicine = await insertMedicine();
        const batch = await insertBatch(medicine.id, { batchNumber: "LOT-9" });
        const { sale } = await SaleService.recordSale({
            batchId: batch.id,
            quantity: 2,
            salePrice: 4.5,
            paymentMethod: "card",
            buyer: { customerName: "Walk-in" },
        }, pharmacist);

        const found = await SaleService.getSaleById(sale.id);

        expect(found.batchNumber).toBe("LOT-9");
        expect(found.medicineName).toBe("Paracetamol");
        expect(found.totalAmount).toBe(9);
        expect(found.paymentMethod).toBe("card");
        expect(found.customerName).toBe("Walk-in");
    });

    it("throws NotFound for an unknown sale", async () => {
        await expect(SaleService.getSaleById("99999999-9999-4999-8999-999999999999")).rejects.toThrow(NotFoundError);
    });
});
