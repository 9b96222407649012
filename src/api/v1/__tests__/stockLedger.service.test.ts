import { beforeEach, describe, expect, it, vi } from "vitest";
import { eq } from "drizzle-orm";

vi.mock("../drizzle/db", async () => {
    const { createTestDb } = await import("./helpers/testDb");
    return { db: await createTestDb() };
});

import { db } from "../drizzle/db";
import { alertTable } from "../drizzle/schema/alert";
import { batchTable } from "../drizzle/schema/batch";
import { inventoryMovementTable } from "../drizzle/schema/inventoryMovement";
import { saleTable } from "../drizzle/schema/sale";
import { AlertService } from "../service/alert.service";
import { AuditService } from "../service/audit.service";
import { StockLedgerService } from "../service/stockLedger.service";
import {
    DuplicateBatchError,
    NotFoundError,
    RecalledOrExpiredError,
    ReferentialIntegrityError,
    ValidationError,
} from "../utils/AppError";
import { addDays, today } from "../utils/timezone";
import { insertBatch, insertMedicine, manager, pharmacist, raisedAlert, resetDb } from "./helpers/fixtures";

describe("StockLedgerService", () => {
    beforeEach(async () => {
        await resetDb();
    });

    describe("receive", () => {
        it("creates the batch with a purchase movement and an audit entry", async () => {
            const medicine = await insertMedicine();

            const { batch, expiryAlert } = await StockLedgerService.receive({
                medicineId: medicine.id,
                batchNumber: "B-200",
                expiryDate: addDays(today(), 200),
                quantity: 50,
                costPrice: 3.25,
            }, pharmacist);

            expect(batch.quantity).toBe(50);
            expect(batch.costPrice).toBe(3.25);
            expect(expiryAlert).toBeNull();

            const movements = await StockLedgerService.getMovements(batch.id);
            expect(movements).toHaveLength(1);
            expect(movements[0].movementType).toBe("purchase");
            expect(movements[0].quantity).toBe(50);
            expect(movements[0].reason).toBe("New batch received");

            const trail = await AuditService.getTrail("batch", batch.id);
            expect(trail).toHaveLength(1);
            expect(trail[0].action).toBe("INSERT");
            expect(trail[0].changedBy).toBe(pharmacist.userId);
            expect(trail[0].ipAddress).toBe("127.0.0.1");
        });

        it("raises one critical expiry alert when the batch expires within 7 days", async () => {
            const medicine = await insertMedicine();

            const { batch, expiryAlert } = await StockLedgerService.receive({
                medicineId: medicine.id,
                batchNumber: "B7",
                expiryDate: addDays(today(), 5),
                quantity: 10,
            }, pharmacist);

            expect(expiryAlert?.status).toBe("raised");
            const alerts = await db.select().from(alertTable).where(eq(alertTable.batchId, batch.id));
            expect(alerts).toHaveLength(1);
            expect(alerts[0].alertType).toBe("expiry");
            expect(alerts[0].severity).toBe("critical");
            expect(alerts[0].alertMessage).toBe("Paracetamol (Batch: B7) expires in 5 days");
        });

        it("bands later expiries as high and medium", async () => {
            const medicine = await insertMedicine();

            const high = await StockLedgerService.receive({
                medicineId: medicine.id,
                batchNumber: "B20",
                expiryDate: addDays(today(), 20),
                quantity: 10,
            }, pharmacist);
            const medium = await StockLedgerService.receive({
                medicineId: medicine.id,
                batchNumber: "B60",
                expiryDate: addDays(today(), 60),
                quantity: 10,
            }, pharmacist);

            expect(raisedAlert(high.expiryAlert).severity).toBe("high");
            expect(raisedAlert(high.expiryAlert).alertMessage).toBe("Paracetamol (Batch: B20) expires within 30 days");
            expect(raisedAlert(medium.expiryAlert).severity).toBe("medium");
            expect(raisedAlert(medium.expiryAlert).alertMessage).toBe("Paracetamol (Batch: B60) expires within 90 days");
        });

        it("rejects a duplicate batch number for the same medicine", async () => {
            const medicine = await insertMedicine();
            const input = { medicineId: medicine.id, batchNumber: "DUP", expiryDate: addDays(today(), 200), quantity: 5 };

            await StockLedgerService.receive(input, pharmacist);

            await expect(StockLedgerService.receive(input, pharmacist)).rejects.toThrow(DuplicateBatchError);
            const batches = await db.select().from(batchTable).where(eq(batchTable.medicineId, medicine.id));
            expect(batches).toHaveLength(1);
        });

        it("rejects an unknown medicine and a non-positive quantity", async () => {
            await expect(StockLedgerService.receive({
                medicineId: "99999999-9999-4999-8999-999999999999",
                batchNumber: "X",
                expiryDate: addDays(today(), 200),
                quantity: 5,
            }, pharmacist)).rejects.toThrow(NotFoundError);

            const medicine = await insertMedicine();
            await expect(StockLedgerService.receive({
                medicineId: medicine.id,
                batchNumber: "X",
                expiryDate: addDays(today(), 200),
                quantity: 0,
            }, pharmacist)).rejects.toThrow(ValidationError);
        });
    });

    describe("adjust", () => {
        it("applies the delta and appends a signed movement", async () => {
            const medicine = await insertMedicine();
            const batch = await insertBatch(medicine.id, { quantity: 100 });

            const result = await StockLedgerService.adjust({
                batchId: batch.id,
                delta: -30,
                movementType: "adjustment",
                reason: "Damaged in storage",
            }, manager);

            expect(result.previousQuantity).toBe(100);
            expect(result.batch.quantity).toBe(70);

            const movements = await db.select().from(inventoryMovementTable).where(eq(inventoryMovementTable.batchId, batch.id));
            expect(movements).toHaveLength(1);
            expect(movements[0].movementType).toBe("adjustment");
            expect(movements[0].quantity).toBe(-30);
            expect(movements[0].movedBy).toBe(manager.userId);
        });

        it("refuses to drive quantity below zero and leaves state untouched", async () => {
            const medicine = await insertMedicine();
            const batch = await insertBatch(medicine.id, { quantity: 70 });

            await expect(StockLedgerService.adjust({
                batchId: batch.id,
                delta: -200,
                movementType: "adjustment",
            }, manager)).rejects.toThrow("Insufficient stock. Available: 70, Requested: 200");

            const [after] = await db.select().from(batchTable).where(eq(batchTable.id, batch.id));
            expect(after.quantity).toBe(70);
            const movements = await db.select().from(inventoryMovementTable).where(eq(inventoryMovementTable.batchId, batch.id));
            expect(movements).toHaveLength(0);
        });

        it("rejects zero deltas, internal movement types and unknown batches", async () => {
            const medicine = await insertMedicine();
            const batch = await insertBatch(medicine.id);

            await expect(StockLedgerService.adjust({ batchId: batch.id, delta: 0, movementType: "adjustment" }, manager))
                .rejects.toThrow(ValidationError);
            await expect(StockLedgerService.adjust({ batchId: batch.id, delta: -1, movementType: "sale" }, manager))
                .rejects.toThrow(ValidationError);
            await expect(StockLedgerService.adjust({
                batchId: "99999999-9999-4999-8999-999999999999",
                delta: -1,
                movementType: "adjustment",
            }, manager)).rejects.toThrow(NotFoundError);
        });

        it("refuses to add stock to a recalled batch", async () => {
            const medicine = await insertMedicine();
            const batch = await insertBatch(medicine.id, { quantity: 0, isRecalled: true });

            await expect(StockLedgerService.adjust({ batchId: batch.id, delta: 5, movementType: "return" }, manager))
                .rejects.toThrow(RecalledOrExpiredError);
        });

        it("raises low_stock and then out_of_stock as thresholds are crossed", async () => {
            const medicine = await insertMedicine({ minimumStockLevel: 10 });
            const batch = await insertBatch(medicine.id, { quantity: 15 });

            const low = await StockLedgerService.adjust({ batchId: batch.id, delta: -6, movementType: "adjustment" }, manager);
            expect(raisedAlert(low.stockAlert).alertType).toBe("low_stock");
            expect(raisedAlert(low.stockAlert).alertMessage).toBe("Low stock for Paracetamol (Batch: B1). Current: 9, minimum: 10");

            const still = await StockLedgerService.adjust({ batchId: batch.id, delta: -1, movementType: "adjustment" }, manager);
            expect(still.stockAlert).toBeNull();

            const out = await StockLedgerService.adjust({ batchId: batch.id, delta: -8, movementType: "adjustment" }, manager);
            expect(raisedAlert(out.stockAlert).alertType).toBe("out_of_stock");
            expect(raisedAlert(out.stockAlert).severity).toBe("high");
        });
    });

    describe("expireSweep", () => {
        it("flags past-dated batches once", async () => {
            const medicine = await insertMedicine();
            const expired = await insertBatch(medicine.id, { batchNumber: "OLD", expiryDate: addDays(today(), -1) });
            const fresh = await insertBatch(medicine.id, { batchNumber: "NEW", expiryDate: addDays(today(), 365) });

            expect(await StockLedgerService.expireSweep(manager)).toBe(1);
            expect(await StockLedgerService.expireSweep(manager)).toBe(0);

            const [oldAfter] = await db.select().from(batchTable).where(eq(batchTable.id, expired.id));
            const [freshAfter] = await db.select().from(batchTable).where(eq(batchTable.id, fresh.id));
            expect(oldAfter.isExpired).toBe(true);
            expect(freshAfter.isExpired).toBe(false);

            const trail = await AuditService.getTrail("batch", expired.id);
            expect(trail.map(entry => entry.action)).toEqual(["UPDATE"]);
        });

        it("uses the given date instead of today", async () => {
            const medicine = await insertMedicine();
            await insertBatch(medicine.id, { expiryDate: addDays(today(), 365) });

            expect(await StockLedgerService.expireSweep(manager, addDays(today(), 400))).toBe(1);
        });
    });

    describe("deleteBatch", () => {
        it("is refused while sales reference the batch", async () => {
            const medicine = await insertMedicine();
            const batch = await insertBatch(medicine.id);
            await db.insert(saleTable).values({
                batchId: batch.id,
                quantitySold: 1,
                salePrice: 5,
                totalAmount: 5,
                soldBy: pharmacist.userId,
            });

            await expect(StockLedgerService.deleteBatch(batch.id, manager)).rejects.toThrow(ReferentialIntegrityError);
            const [stillThere] = await db.select().from(batchTable).where(eq(batchTable.id, batch.id));
            expect(stillThere.id).toBe(batch.id);
        });

        it("removes the batch together with its movements and alerts", async () => {
            const medicine = await insertMedicine();
            const { batch } = await StockLedgerService.receive({
                medicineId: medicine.id,
                batchNumber: "GONE",
                expiryDate: addDays(today(), 3),
                quantity: 10,
            }, pharmacist);

            await StockLedgerService.deleteBatch(batch.id, manager);

            expect(await StockLedgerService.getBatchById(batch.id)).toBeNull();
            expect(await StockLedgerService.getMovements(batch.id)).toHaveLength(0);
            expect(await AlertService.listAlerts({ batchId: batch.id, includeAcknowledged: true })).toHaveLength(0);

            const trail = await AuditService.getTrail("batch", batch.id);
            expect(trail.map(entry => entry.action)).toEqual(["INSERT", "DELETE"]);
        });
    });

    it("lists movements newest first", async () => {
        const medicine = await insertMedicine();
        const { batch } = await StockLedgerService.receive({
            medicineId: medicine.id,
            batchNumber: "M1",
            expiryDate: addDays(today(), 365),
            quantity: 40,
        }, pharmacist);
        await StockLedgerService.adjust({ batchId: batch.id, delta: 2, movementType: "return" }, manager);

        const movements = await StockLedgerService.getMovements(batch.id);
        expect(movements.map(m => [m.movementType, m.quantity])).toEqual([["return", 2], ["purchase", 40]]);
    });
});
