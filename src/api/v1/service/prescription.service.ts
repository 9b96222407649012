import { desc, eq } from "drizzle-orm";
import { db } from "../drizzle/db";
import {
    prescriptionTable,
    type NewPrescription,
    type PrescriptionStatus,
    type PrescriptionTable,
} from "../drizzle/schema/prescription";
import { InvalidTransitionError, NotFoundError, ValidationError } from "../utils/AppError";
import { getPgErrorCode, UNIQUE_VIOLATION, withTransaction } from "../utils/transaction";
import type { ActorContext } from "../types/actor";
import { AuditService } from "./audit.service";

export type PrescriptionInput = Omit<NewPrescription, "id" | "createdAt" | "createdBy" | "status">;

export class PrescriptionService {
    static async createPrescription(input: PrescriptionInput, actor: ActorContext): Promise<PrescriptionTable> {
        if (input.expiryDate && input.expiryDate < input.issueDate) {
            throw new ValidationError("Prescription cannot expire before it is issued");
        }

        try {
            return await withTransaction("PrescriptionService.createPrescription", async (tx) => {
                const [prescription] = await tx.insert(prescriptionTable)
                    .values({ ...input, status: "active", createdBy: actor.userId })
                    .returning();

                await AuditService.record(tx, actor, {
                    tableName: "prescription",
                    recordId: prescription.id,
                    action: "INSERT",
                    newValues: prescription,
                });
                return prescription;
            });
        } catch (error) {
            if (getPgErrorCode(error) === UNIQUE_VIOLATION) {
                throw new ValidationError(`Prescription number ${input.prescriptionNumber} already exists`);
            }
            throw error;
        }
    }

    /**
     * Only active prescriptions change status; fulfilled and expired are final.
     */
    static async updateStatus(id: string, status: Exclude<PrescriptionStatus, "active">, actor: ActorContext): Promise<PrescriptionTable> {
        return await withTransaction("PrescriptionService.updateStatus", async (tx) => {
            const [current] = await tx.select().from(prescriptionTable).where(eq(prescriptionTable.id, id)).for("update");
            if (!current) {
                throw new NotFoundError("Prescription", id);
            }
            if (current.status !== "active") {
                throw new InvalidTransitionError("Prescription", current.status, status);
            }

            const [updated] = await tx.update(prescriptionTable)
                .set({ status })
                .where(eq(prescriptionTable.id, id))
                .returning();

            await AuditService.record(tx, actor, {
                tableName: "prescription",
                recordId: id,
                action: "UPDATE",
                oldValues: current,
                newValues: updated,
            });
            return updated;
        });
    }

    static async getPrescriptionById(id: string) {
        const [prescription] = await db.select().from(prescriptionTable).where(eq(prescriptionTable.id, id));
        if (!prescription) {
            throw new NotFoundError("Prescription", id);
        }
        return prescription;
    }

    static async getPrescriptions(status?: PrescriptionStatus) {
        return await db.select()
            .from(prescriptionTable)
            .where(status ? eq(prescriptionTable.status, status) : undefined)
            .orderBy(desc(prescriptionTable.createdAt));
    }
}
