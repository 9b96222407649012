import { and, asc, eq, gt, ilike, inArray, or } from "drizzle-orm";
import { db } from "../drizzle/db";
import { batchTable } from "../drizzle/schema/batch";
import { medicineTable, type MedicineTable, type NewMedicine } from "../drizzle/schema/medicine";
import {
    medicineInteractionTable,
    type InteractionType,
    type MedicineInteractionTable,
} from "../drizzle/schema/medicineInteraction";
import { predictedDemandTable } from "../drizzle/schema/predictedDemand";
import { purchaseOrderTable } from "../drizzle/schema/purchaseOrder";
import { NotFoundError, ReferentialIntegrityError, ValidationError } from "../utils/AppError";
import { getPgErrorCode, UNIQUE_VIOLATION, withTransaction } from "../utils/transaction";
import type { ActorContext } from "../types/actor";
import { AuditService } from "./audit.service";

export type MedicineInput = Omit<NewMedicine, "id" | "createdAt" | "updatedAt" | "isActive">;

export interface MedicineListFilter {
    search?: string;
    category?: string;
    includeInactive?: boolean;
}

export type MedicineRemoval =
    | { outcome: "deleted"; medicine: MedicineTable }
    | { outcome: "deactivated"; medicine: MedicineTable };

export interface InteractionWarning {
    medicineId1: string;
    medicineId2: string;
    interactionType: InteractionType;
    description: string;
}

// Pairs are stored with the smaller id first
function orderedPair(a: string, b: string): [string, string] {
    return a < b ? [a, b] : [b, a];
}

export class MedicineService {
    static async createMedicine(input: MedicineInput, actor: ActorContext): Promise<MedicineTable> {
        try {
            return await withTransaction("MedicineService.createMedicine", async (tx) => {
                const [medicine] = await tx.insert(medicineTable).values(input).returning();

                await AuditService.record(tx, actor, {
                    tableName: "medicine",
                    recordId: medicine.id,
                    action: "INSERT",
                    newValues: medicine,
                });

                console.log('💊 [MedicineService] Created medicine:', medicine.name);
                return medicine;
            });
        } catch (error) {
            if (getPgErrorCode(error) === UNIQUE_VIOLATION) {
                throw new ValidationError(`Barcode ${input.barcode ?? ""} is already assigned to another medicine`);
            }
            throw error;
        }
    }

    static async updateMedicine(id: string, changes: Partial<MedicineInput>, actor: ActorContext): Promise<MedicineTable> {
        return await withTransaction("MedicineService.updateMedicine", async (tx) => {
            const [current] = await tx.select().from(medicineTable).where(eq(medicineTable.id, id)).for("update");
            if (!current) {
                throw new NotFoundError("Medicine", id);
            }

            const [updated] = await tx.update(medicineTable)
                .set({ ...changes, updatedAt: new Date() })
                .where(eq(medicineTable.id, id))
                .returning();

            await AuditService.record(tx, actor, {
                tableName: "medicine",
                recordId: id,
                action: "UPDATE",
                oldValues: current,
                newValues: updated,
            });

            return updated;
        });
    }

    static async getMedicines(filter: MedicineListFilter = {}) {
        const pattern = filter.search ? `%${filter.search}%` : null;
        return await db.select()
            .from(medicineTable)
            .where(and(
                filter.includeInactive ? undefined : eq(medicineTable.isActive, true),
                filter.category ? eq(medicineTable.category, filter.category) : undefined,
                pattern ? or(ilike(medicineTable.name, pattern), ilike(medicineTable.genericName, pattern)) : undefined
            ))
            .orderBy(asc(medicineTable.name));
    }

    static async getMedicineById(id: string) {
        const [medicine] = await db.select().from(medicineTable).where(eq(medicineTable.id, id));
        if (!medicine) {
            throw new NotFoundError("Medicine", id);
        }
        return medicine;
    }

    static async deactivateMedicine(id: string, actor: ActorContext): Promise<MedicineTable> {
        return await MedicineService.updateMedicineActive(id, false, actor);
    }

    private static async updateMedicineActive(id: string, isActive: boolean, actor: ActorContext) {
        return await withTransaction("MedicineService.updateMedicineActive", async (tx) => {
            const [current] = await tx.select().from(medicineTable).where(eq(medicineTable.id, id)).for("update");
            if (!current) {
                throw new NotFoundError("Medicine", id);
            }

            const [updated] = await tx.update(medicineTable)
                .set({ isActive, updatedAt: new Date() })
                .where(eq(medicineTable.id, id))
                .returning();

            await AuditService.record(tx, actor, {
                tableName: "medicine",
                recordId: id,
                action: "UPDATE",
                oldValues: current,
                newValues: updated,
            });
            return updated;
        });
    }

    /**
     * Batches never cascade from their medicine. With stock on hand the
     * delete is refused; with only empty batches or order history the
     * medicine is deactivated; otherwise it is removed along with its
     * interactions and forecasts.
     */
    static async deleteMedicine(id: string, actor: ActorContext): Promise<MedicineRemoval> {
        return await withTransaction("MedicineService.deleteMedicine", async (tx) => {
            const [current] = await tx.select().from(medicineTable).where(eq(medicineTable.id, id)).for("update");
            if (!current) {
                throw new NotFoundError("Medicine", id);
            }

            const [stocked] = await tx.select({ id: batchTable.id })
                .from(batchTable)
                .where(and(eq(batchTable.medicineId, id), gt(batchTable.quantity, 0)))
                .limit(1);
            if (stocked) {
                throw new ReferentialIntegrityError(`Medicine ${current.name} still has batches in stock`);
            }

            const [anyBatch] = await tx.select({ id: batchTable.id }).from(batchTable).where(eq(batchTable.medicineId, id)).limit(1);
            const [anyOrder] = await tx.select({ id: purchaseOrderTable.id }).from(purchaseOrderTable).where(eq(purchaseOrderTable.medicineId, id)).limit(1);

            if (anyBatch || anyOrder) {
                const [deactivated] = await tx.update(medicineTable)
                    .set({ isActive: false, updatedAt: new Date() })
                    .where(eq(medicineTable.id, id))
                    .returning();

                await AuditService.record(tx, actor, {
                    tableName: "medicine",
                    recordId: id,
                    action: "UPDATE",
                    oldValues: current,
                    newValues: deactivated,
                });

                console.log('📴 [MedicineService] Medicine has history, deactivated instead of deleting:', current.name);
                return { outcome: "deactivated", medicine: deactivated };
            }

            await tx.delete(medicineInteractionTable).where(or(
                eq(medicineInteractionTable.medicineId1, id),
                eq(medicineInteractionTable.medicineId2, id)
            ));
            await tx.delete(predictedDemandTable).where(eq(predictedDemandTable.medicineId, id));
            await tx.delete(medicineTable).where(eq(medicineTable.id, id));

            await AuditService.record(tx, actor, {
                tableName: "medicine",
                recordId: id,
                action: "DELETE",
                oldValues: current,
            });

            console.log('🗑️ [MedicineService] Deleted medicine:', current.name);
            return { outcome: "deleted", medicine: current };
        });
    }

    static async addInteraction(
        input: { medicineIdA: string; medicineIdB: string; interactionType: InteractionType; description: string },
        actor: ActorContext
    ): Promise<MedicineInteractionTable> {
        if (input.medicineIdA === input.medicineIdB) {
            throw new ValidationError("An interaction needs two different medicines");
        }
        const [medicineId1, medicineId2] = orderedPair(input.medicineIdA, input.medicineIdB);

        return await withTransaction("MedicineService.addInteraction", async (tx) => {
            const found = await tx.select({ id: medicineTable.id })
                .from(medicineTable)
                .where(inArray(medicineTable.id, [medicineId1, medicineId2]));
            const foundIds = new Set(found.map(m => m.id));
            for (const medicineId of [medicineId1, medicineId2]) {
                if (!foundIds.has(medicineId)) {
                    throw new NotFoundError("Medicine", medicineId);
                }
            }

            const [interaction] = await tx.insert(medicineInteractionTable)
                .values({ medicineId1, medicineId2, interactionType: input.interactionType, description: input.description })
                .onConflictDoUpdate({
                    target: [medicineInteractionTable.medicineId1, medicineInteractionTable.medicineId2],
                    set: { interactionType: input.interactionType, description: input.description },
                })
                .returning();

            await AuditService.record(tx, actor, {
                tableName: "medicine_interaction",
                recordId: interaction.id,
                action: "INSERT",
                newValues: interaction,
            });
            return interaction;
        });
    }

    /**
     * Known interactions among every pair in `medicineIds`
     */
    static async checkInteractions(medicineIds: string[]): Promise<InteractionWarning[]> {
        const unique = [...new Set(medicineIds)];
        if (unique.length < 2) {
            return [];
        }

        return await db.select({
            medicineId1: medicineInteractionTable.medicineId1,
            medicineId2: medicineInteractionTable.medicineId2,
            interactionType: medicineInteractionTable.interactionType,
            description: medicineInteractionTable.description,
        })
            .from(medicineInteractionTable)
            .where(and(
                inArray(medicineInteractionTable.medicineId1, unique),
                inArray(medicineInteractionTable.medicineId2, unique)
            ));
    }
}
