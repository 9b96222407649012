import { asc, eq } from "drizzle-orm";
import { db } from "../drizzle/db";
import { supplierTable, type NewSupplier, type SupplierTable } from "../drizzle/schema/supplier";
import { NotFoundError } from "../utils/AppError";
import { withTransaction } from "../utils/transaction";
import type { ActorContext } from "../types/actor";
import { AuditService } from "./audit.service";

// Rating, order count and on-time rate are derived; callers never set them
export type SupplierInput = Omit<NewSupplier, "id" | "createdAt" | "rating" | "totalOrders" | "onTimeDeliveryRate">;

export class SupplierService {
    static async createSupplier(input: SupplierInput, actor: ActorContext): Promise<SupplierTable> {
        return await withTransaction("SupplierService.createSupplier", async (tx) => {
            const [supplier] = await tx.insert(supplierTable).values(input).returning();

            await AuditService.record(tx, actor, {
                tableName: "supplier",
                recordId: supplier.id,
                action: "INSERT",
                newValues: supplier,
            });

            console.log('🏭 [SupplierService] Created supplier:', supplier.supplierName);
            return supplier;
        });
    }

    static async updateSupplier(id: string, changes: Partial<SupplierInput>, actor: ActorContext): Promise<SupplierTable> {
        return await withTransaction("SupplierService.updateSupplier", async (tx) => {
            const [current] = await tx.select().from(supplierTable).where(eq(supplierTable.id, id)).for("update");
            if (!current) {
                throw new NotFoundError("Supplier", id);
            }

            const [updated] = await tx.update(supplierTable)
                .set(changes)
                .where(eq(supplierTable.id, id))
                .returning();

            await AuditService.record(tx, actor, {
                tableName: "supplier",
                recordId: id,
                action: "UPDATE",
                oldValues: current,
                newValues: updated,
            });
            return updated;
        });
    }

    static async getSuppliers(includeInactive = false) {
        return await db.select()
            .from(supplierTable)
            .where(includeInactive ? undefined : eq(supplierTable.isActive, true))
            .orderBy(asc(supplierTable.supplierName));
    }

    static async getSupplierById(id: string) {
        const [supplier] = await db.select().from(supplierTable).where(eq(supplierTable.id, id));
        if (!supplier) {
            throw new NotFoundError("Supplier", id);
        }
        return supplier;
    }
}
