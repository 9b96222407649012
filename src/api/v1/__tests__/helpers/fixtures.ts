import { sql } from "drizzle-orm";
import { db } from "../../drizzle/db";
import { batchTable, type NewBatch } from "../../drizzle/schema/batch";
import { medicineTable, type NewMedicine } from "../../drizzle/schema/medicine";
import { prescriptionTable, type NewPrescription } from "../../drizzle/schema/prescription";
import { supplierTable, type NewSupplier } from "../../drizzle/schema/supplier";
import type { RaiseResult } from "../../service/alert.service";
import type { ActorContext } from "../../types/actor";
import { addDays, today } from "../../utils/timezone";

const TABLES = [
    "audit_log",
    "alert",
    "recall",
    "inventory_movement",
    "sale",
    "supplier_rating",
    "purchase_order",
    "predicted_demand",
    "medicine_interaction",
    "batch",
    "prescription",
    "supplier",
    "medicine",
];

export async function resetDb() {
    await db.execute(sql.raw(`TRUNCATE TABLE ${TABLES.join(", ")} RESTART IDENTITY CASCADE`));
}

export const pharmacist: ActorContext = {
    userId: "11111111-1111-4111-8111-111111111111",
    role: "pharmacist",
    ipAddress: "127.0.0.1",
};

export const manager: ActorContext = {
    userId: "22222222-2222-4222-8222-222222222222",
    role: "manager",
};

export async function insertMedicine(overrides: Partial<NewMedicine> = {}) {
    const [medicine] = await db.insert(medicineTable).values({
        name: "Paracetamol",
        genericName: "Acetaminophen",
        dosageForm: "tablet",
        strength: "500mg",
        minimumStockLevel: 10,
        reorderPoint: 20,
        ...overrides,
    }).returning();
    return medicine;
}

export async function insertSupplier(overrides: Partial<NewSupplier> = {}) {
    const [supplier] = await db.insert(supplierTable).values({
        supplierName: "Acme Pharma",
        ...overrides,
    }).returning();
    return supplier;
}

export async function insertBatch(medicineId: string, overrides: Partial<NewBatch> = {}) {
    const [batch] = await db.insert(batchTable).values({
        medicineId,
        batchNumber: "B1",
        expiryDate: addDays(today(), 365),
        quantity: 100,
        sellingPrice: 5,
        ...overrides,
    }).returning();
    return batch;
}

export async function insertPrescription(overrides: Partial<NewPrescription> = {}) {
    const [prescription] = await db.insert(prescriptionTable).values({
        prescriptionNumber: "RX-1",
        patientName: "Test Patient",
        doctorName: "Dr. Test",
        issueDate: today(),
        ...overrides,
    }).returning();
    return prescription;
}

export function raisedAlert(result: RaiseResult | null) {
    if (!result || result.status !== "raised") {
        throw new Error(`Expected a raised alert, got ${JSON.stringify(result)}`);
    }
    return result.alert;
}
