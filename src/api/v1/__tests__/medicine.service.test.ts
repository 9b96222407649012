import { beforeEach, describe, expect, it, vi } from "vitest";
import { eq } from "drizzle-orm";

vi.mock("../drizzle/db", async () => {
    const { createTestDb } = await import("./helpers/testDb");
    return { db: await createTestDb() };
});

import { db } from "../drizzle/db";
import { medicineInteractionTable } from "../drizzle/schema/medicineInteraction";
import { purchaseOrderTable } from "../drizzle/schema/purchaseOrder";
import { AuditService } from "../service/audit.service";
import { MedicineService } from "../service/medicine.service";
import { NotFoundError, ReferentialIntegrityError, ValidationError } from "../utils/AppError";
import { today } from "../utils/timezone";
import { insertBatch, insertMedicine, manager, resetDb } from "./helpers/fixtures";

describe("MedicineService", () => {
    beforeEach(async () => {
        await resetDb();
    });

    it("creates a medicine with its audit entry and rejects a reused barcode", async () => {
        const medicine = await MedicineService.createMedicine({
            name: "Ibuprofen",
            genericName: "Ibuprofen",
            barcode: "8901234567890",
            requiresPrescription: false,
        }, manager);

        expect(medicine.isActive).toBe(true);
        expect(medicine.minimumStockLevel).toBe(10);
        expect(medicine.reorderPoint).toBe(20);
        const trail = await AuditService.getTrail("medicine", medicine.id);
        expect(trail.map(entry => entry.action)).toEqual(["INSERT"]);

        await expect(MedicineService.createMedicine({ name: "Copy", barcode: "8901234567890" }, manager))
            .rejects.toThrow("Barcode 8901234567890 is already assigned to another medicine");
    });

    it("searches by name or generic name and hides inactive medicines", async () => {
        await insertMedicine({ name: "Panadol", genericName: "Acetaminophen", category: "analgesic" });
        await insertMedicine({ name: "Amoxil", genericName: "Amoxicillin", category: "antibiotic" });
        await insertMedicine({ name: "Tylenol", genericName: "Acetaminophen", isActive: false });

        expect((await MedicineService.getMedicines({ search: "acetamin" })).map(m => m.name)).toEqual(["Panadol"]);
        expect((await MedicineService.getMedicines({ search: "acetamin", includeInactive: true })).map(m => m.name))
            .toEqual(["Panadol", "Tylenol"]);
        expect((await MedicineService.getMedicines({ category: "antibiotic" })).map(m => m.name)).toEqual(["Amoxil"]);
    });

    it("updates fields and throws NotFound for an unknown id", async () => {
        const medicine = await insertMedicine();

        const updated = await MedicineService.updateMedicine(medicine.id, { reorderPoint: 50 }, manager);
        expect(updated.reorderPoint).toBe(50);

        await expect(MedicineService.getMedicineById("99999999-9999-4999-8999-999999999999"))
            .rejects.toThrow(NotFoundError);
    });

    describe("deleteMedicine", () => {
        it("is refused while any batch holds stock", async () => {
            const medicine = await insertMedicine();
            await insertBatch(medicine.id, { quantity: 3 });

            await expect(MedicineService.deleteMedicine(medicine.id, manager)).rejects.toThrow(ReferentialIntegrityError);
            expect((await MedicineService.getMedicineById(medicine.id)).isActive).toBe(true);
        });

        it("deactivates a medicine that has batch or order history", async () => {
            const withBatch = await insertMedicine({ name: "Emptied" });
            await insertBatch(withBatch.id, { quantity: 0 });
            const withOrder = await insertMedicine({ name: "Ordered" });
            await db.insert(purchaseOrderTable).values({
                medicineId: withOrder.id,
                orderNumber: "HIST-1",
                quantityOrdered: 5,
                orderDate: today(),
            });

            const first = await MedicineService.deleteMedicine(withBatch.id, manager);
            const second = await MedicineService.deleteMedicine(withOrder.id, manager);

            expect(first.outcome).toBe("deactivated");
            expect(first.medicine.isActive).toBe(false);
            expect(second.outcome).toBe("deactivated");
        });

        it("removes a medicine without history along with its interactions", async () => {
            const doomed = await insertMedicine({ name: "Doomed" });
            const other = await insertMedicine({ name: "Other" });
            await MedicineService.addInteraction({
                medicineIdA: doomed.id,
                medicineIdB: other.id,
                interactionType: "minor",
                description: "Mild drowsiness",
            }, manager);

            const removal = await MedicineService.deleteMedicine(doomed.id, manager);

            expect(removal.outcome).toBe("deleted");
            await expect(MedicineService.getMedicineById(doomed.id)).rejects.toThrow(NotFoundError);
            expect(await db.select().from(medicineInteractionTable)).toHaveLength(0);
            const trail = await AuditService.getTrail("medicine", doomed.id);
            expect(trail.map(entry => entry.action)).toEqual(["DELETE"]);
        });
    });

    describe("interactions", () => {
        it("stores one ordered row per pair and updates it on repeat", async () => {
            const a = await insertMedicine({ name: "Warfarin" });
            const b = await insertMedicine({ name: "Aspirin" });

            await MedicineService.addInteraction({
                medicineIdA: a.id, medicineIdB: b.id, interactionType: "moderate", description: "Bleeding risk",
            }, manager);
            const updated = await MedicineService.addInteraction({
                medicineIdA: b.id, medicineIdB: a.id, interactionType: "severe", description: "Major bleeding risk",
            }, manager);

            const [low, high] = a.id < b.id ? [a.id, b.id] : [b.id, a.id];
            expect(updated.medicineId1).toBe(low);
            expect(updated.medicineId2).toBe(high);
            const rows = await db.select().from(medicineInteractionTable).where(eq(medicineInteractionTable.medicineId1, low));
            expect(rows).toHaveLength(1);
            expect(rows[0].interactionType).toBe("severe");
        });

        it("reports interactions among the given medicines only", async () => {
            const a = await insertMedicine({ name: "Warfarin" });
            const b = await insertMedicine({ name: "Aspirin" });
            const c = await insertMedicine({ name: "Vitamin C" });
            await MedicineService.addInteraction({
                medicineIdA: a.id, medicineIdB: b.id, interactionType: "severe", description: "Bleeding risk",
            }, manager);

            const warnings = await MedicineService.checkInteractions([a.id, b.id, c.id]);
            expect(warnings.map(w => [w.interactionType, w.description])).toEqual([["severe", "Bleeding risk"]]);
            expect(await MedicineService.checkInteractions([a.id, c.id])).toEqual([]);
            expect(await MedicineService.checkInteractions([a.id, a.id])).toEqual([]);
        });

        it("rejects a medicine paired with itself or an unknown medicine", async () => {
            const a = await insertMedicine();

            await expect(MedicineService.addInteraction({
                medicineIdA: a.id, medicineIdB: a.id, interactionType: "minor", description: "x",
            }, manager)).rejects.toThrow(ValidationError);
            await expect(MedicineService.addInteraction({
                medicineIdA: a.id, medicineIdB: "99999999-9999-4999-8999-999999999999", interactionType: "minor", description: "x",
            }, manager)).rejects.toThrow(NotFoundError);
        });
    });
});
