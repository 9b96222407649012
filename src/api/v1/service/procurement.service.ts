import { and, avg, count, desc, eq, gte, isNotNull, lte, sql } from "drizzle-orm";
import { db, type Transaction } from "../drizzle/db";
import { medicineTable } from "../drizzle/schema/medicine";
import { predictedDemandTable } from "../drizzle/schema/predictedDemand";
import {
    purchaseOrderTable,
    type PurchaseOrderStatus,
    type PurchaseOrderTable,
} from "../drizzle/schema/purchaseOrder";
import { supplierTable } from "../drizzle/schema/supplier";
import { supplierRatingTable, type SupplierRatingTable } from "../drizzle/schema/supplierRating";
import { DEFAULT_AUTO_ORDER_QUANTITY, PURCHASE_ORDER_LEAD_TIME_DAYS } from "../config/policy";
import {
    ConcurrencyConflictError,
    InvalidTransitionError,
    NoEligibleSupplierError,
    NotFoundError,
    ValidationError,
} from "../utils/AppError";
import { roundTo2 } from "../utils/money";
import { addDays, today } from "../utils/timezone";
import { withTransaction } from "../utils/transaction";
import type { ActorContext } from "../types/actor";
import { AuditService } from "./audit.service";

export interface RateSupplierInput {
    supplierId: string;
    orderId: string;
    quality: number;
    delivery: number;
    communication: number;
    comments?: string | null;
}

export interface CreateOrderInput {
    supplierId: string;
    medicineId: string;
    orderNumber: string;
    quantityOrdered: number;
    expectedPrice?: number | null;
    expectedDeliveryDate?: string | null;
}

const ORDER_FLOW: readonly PurchaseOrderStatus[] = ["pending", "approved", "shipped", "delivered"];
const TERMINAL_STATUSES: ReadonlySet<PurchaseOrderStatus> = new Set<PurchaseOrderStatus>(["delivered", "cancelled"]);

/**
 * Orders only move forward along pending → approved → shipped → delivered
 * (skipping steps is allowed). Any open order may be cancelled.
 */
export function canTransition(from: PurchaseOrderStatus, to: PurchaseOrderStatus): boolean {
    if (TERMINAL_STATUSES.has(from)) {
        return false;
    }
    if (to === "cancelled") {
        return true;
    }
    return ORDER_FLOW.indexOf(to) > ORDER_FLOW.indexOf(from);
}

export function autoOrderNumber(orderDate: string, medicineId: string): string {
    return `PO-${orderDate.replace(/-/g, "")}-${medicineId}`;
}

function assertScore(label: string, score: number) {
    if (!Number.isInteger(score) || score < 1 || score > 5) {
        throw new ValidationError(`${label} rating must be an integer between 1 and 5`);
    }
}

export class ProcurementService {

    /**
     * Raise a pending purchase order for a medicine from the best active
     * supplier. At most one auto order exists per medicine per day; a repeat
     * call returns it. Joins the caller's transaction when one is given.
     */
    static async autoOrder(medicineId: string, actor: ActorContext, tx?: Transaction): Promise<PurchaseOrderTable> {
        if (!tx) {
            return await withTransaction("ProcurementService.autoOrder", (t) => ProcurementService.autoOrder(medicineId, actor, t));
        }

        const [medicine] = await tx.select({ id: medicineTable.id, name: medicineTable.name })
            .from(medicineTable)
            .where(eq(medicineTable.id, medicineId));
        if (!medicine) {
            throw new NotFoundError("Medicine", medicineId);
        }

        const orderDate = today();
        const orderNumber = autoOrderNumber(orderDate, medicineId);

        const [existing] = await tx.select().from(purchaseOrderTable).where(eq(purchaseOrderTable.orderNumber, orderNumber));
        if (existing) {
            console.log('♻️ [ProcurementService] Auto order already placed today:', orderNumber);
            return existing;
        }

        const [supplier] = await tx.select({ id: supplierTable.id, supplierName: supplierTable.supplierName })
            .from(supplierTable)
            .where(eq(supplierTable.isActive, true))
            .orderBy(
                sql`${supplierTable.rating} DESC NULLS LAST`,
                sql`${supplierTable.onTimeDeliveryRate} DESC NULLS LAST`
            )
            .limit(1);
        if (!supplier) {
            throw new NoEligibleSupplierError(medicine.name);
        }

        const [prediction] = await tx.select({ predictedQuantity: predictedDemandTable.predictedQuantity })
            .from(predictedDemandTable)
            .where(and(
                eq(predictedDemandTable.medicineId, medicineId),
                gte(predictedDemandTable.predictedDate, orderDate)
            ))
            .orderBy(desc(predictedDemandTable.predictedDate), desc(predictedDemandTable.createdAt))
            .limit(1);

        const [order] = await tx.insert(purchaseOrderTable).values({
            supplierId: supplier.id,
            medicineId,
            orderNumber,
            quantityOrdered: prediction ? prediction.predictedQuantity : DEFAULT_AUTO_ORDER_QUANTITY,
            orderDate,
            expectedDeliveryDate: addDays(orderDate, PURCHASE_ORDER_LEAD_TIME_DAYS),
            status: "pending",
            autoGenerated: true,
            createdBy: actor.userId,
        }).onConflictDoNothing({ target: purchaseOrderTable.orderNumber }).returning();

        if (!order) {
            // Another transaction placed today's order first; the retry will find it
            throw new ConcurrencyConflictError("ProcurementService.autoOrder");
        }

        await AuditService.record(tx, actor, {
            tableName: "purchase_order",
            recordId: order.id,
            action: "INSERT",
            newValues: order,
        });

        console.log(`🛒 [ProcurementService] Auto order ${order.orderNumber}: ${order.quantityOrdered} x ${medicine.name} from ${supplier.supplierName}`);
        return order;
    }

    static async createOrder(input: CreateOrderInput, actor: ActorContext): Promise<PurchaseOrderTable> {
        if (!Number.isInteger(input.quantityOrdered) || input.quantityOrdered <= 0) {
            throw new ValidationError("Ordered quantity must be a positive integer");
        }

        return await withTransaction("ProcurementService.createOrder", async (tx) => {
            const [medicine] = await tx.select({ id: medicineTable.id }).from(medicineTable).where(eq(medicineTable.id, input.medicineId));
            if (!medicine) {
                throw new NotFoundError("Medicine", input.medicineId);
            }
            const [supplier] = await tx.select({ id: supplierTable.id, isActive: supplierTable.isActive })
                .from(supplierTable)
                .where(eq(supplierTable.id, input.supplierId));
            if (!supplier) {
                throw new NotFoundError("Supplier", input.supplierId);
            }
            if (!supplier.isActive) {
                throw new ValidationError("Cannot order from an inactive supplier");
            }

            const [duplicate] = await tx.select({ id: purchaseOrderTable.id })
                .from(purchaseOrderTable)
                .where(eq(purchaseOrderTable.orderNumber, input.orderNumber));
            if (duplicate) {
                throw new ValidationError(`Order number ${input.orderNumber} is already in use`);
            }

            const [order] = await tx.insert(purchaseOrderTable).values({
                supplierId: input.supplierId,
                medicineId: input.medicineId,
                orderNumber: input.orderNumber,
                quantityOrdered: input.quantityOrdered,
                expectedPrice: input.expectedPrice ?? null,
                orderDate: today(),
                expectedDeliveryDate: input.expectedDeliveryDate ?? null,
                status: "pending",
                autoGenerated: false,
                createdBy: actor.userId,
            }).returning();

            await AuditService.record(tx, actor, {
                tableName: "purchase_order",
                recordId: order.id,
                action: "INSERT",
                newValues: order,
            });

            return order;
        });
    }

    /**
     * Record a rating for a fulfilled order and fold it into the supplier's
     * running score.
     */
    static async rateSupplier(input: RateSupplierInput, actor: ActorContext): Promise<SupplierRatingTable> {
        assertScore("Quality", input.quality);
        assertScore("Delivery", input.delivery);
        assertScore("Communication", input.communication);

        return await withTransaction("ProcurementService.rateSupplier", async (tx) => {
            const [supplier] = await tx.select().from(supplierTable).where(eq(supplierTable.id, input.supplierId)).for("update");
            if (!supplier) {
                throw new NotFoundError("Supplier", input.supplierId);
            }

            const [order] = await tx.select({ id: purchaseOrderTable.id, supplierId: purchaseOrderTable.supplierId })
                .from(purchaseOrderTable)
                .where(eq(purchaseOrderTable.id, input.orderId));
            if (!order) {
                throw new NotFoundError("Purchase order", input.orderId);
            }
            if (order.supplierId !== input.supplierId) {
                throw new ValidationError(`Purchase order ${input.orderId} was not placed with supplier ${input.supplierId}`);
            }

            const overallRating = roundTo2((input.quality + input.delivery + input.communication) / 3);

            const [rating] = await tx.insert(supplierRatingTable).values({
                supplierId: input.supplierId,
                orderId: input.orderId,
                qualityRating: input.quality,
                deliveryRating: input.delivery,
                communicationRating: input.communication,
                overallRating,
                comments: input.comments ?? null,
                ratedBy: actor.userId,
            }).returning();

            const [aggregate] = await tx.select({ average: avg(supplierRatingTable.overallRating) })
                .from(supplierRatingTable)
                .where(eq(supplierRatingTable.supplierId, input.supplierId));

            const [updated] = await tx.update(supplierTable)
                .set({
                    rating: aggregate && aggregate.average !== null ? roundTo2(Number(aggregate.average)) : overallRating,
                    totalOrders: sql`${supplierTable.totalOrders} + 1`,
                })
                .where(eq(supplierTable.id, input.supplierId))
                .returning();

            await AuditService.record(tx, actor, {
                tableName: "supplier",
                recordId: supplier.id,
                action: "UPDATE",
                oldValues: supplier,
                newValues: updated,
            });

            console.log(`⭐ [ProcurementService] Supplier ${supplier.supplierName} rated ${overallRating}, running rating ${updated.rating}`);
            return rating;
        });
    }

    /**
     * Move a purchase order along its lifecycle. Delivery stamps the actual
     * delivery date and refreshes the supplier's on-time rate.
     */
    static async transitionOrder(
        orderId: string,
        status: PurchaseOrderStatus,
        actor: ActorContext,
        actualDeliveryDate?: string | null
    ): Promise<PurchaseOrderTable> {
        return await withTransaction("ProcurementService.transitionOrder", async (tx) => {
            const [current] = await tx.select().from(purchaseOrderTable).where(eq(purchaseOrderTable.id, orderId)).for("update");
            if (!current) {
                throw new NotFoundError("Purchase order", orderId);
            }
            if (!canTransition(current.status, status)) {
                throw new InvalidTransitionError("Purchase order", current.status, status);
            }

            const [updated] = await tx.update(purchaseOrderTable)
                .set({
                    status,
                    actualDeliveryDate: status === "delivered" ? (actualDeliveryDate ?? today()) : current.actualDeliveryDate,
                    updatedAt: new Date(),
                })
                .where(eq(purchaseOrderTable.id, orderId))
                .returning();

            await AuditService.record(tx, actor, {
                tableName: "purchase_order",
                recordId: orderId,
                action: "UPDATE",
                oldValues: current,
                newValues: updated,
            });

            if (status === "delivered" && updated.supplierId) {
                await ProcurementService.refreshOnTimeRate(tx, updated.supplierId);
            }

            console.log(`🚚 [ProcurementService] Order ${updated.orderNumber}: ${current.status} → ${updated.status}`);
            return updated;
        });
    }

    private static async refreshOnTimeRate(tx: Transaction, supplierId: string): Promise<void> {
        const [totals] = await tx.select({
            delivered: count(),
            onTime: sql<number>`count(*) filter (where ${purchaseOrderTable.actualDeliveryDate} <= ${purchaseOrderTable.expectedDeliveryDate})`.mapWith(Number),
        })
            .from(purchaseOrderTable)
            .where(and(
                eq(purchaseOrderTable.supplierId, supplierId),
                eq(purchaseOrderTable.status, "delivered"),
                isNotNull(purchaseOrderTable.actualDeliveryDate)
            ));

        if (!totals || totals.delivered === 0) {
            return;
        }

        await tx.update(supplierTable)
            .set({ onTimeDeliveryRate: roundTo2((100 * totals.onTime) / totals.delivered) })
            .where(eq(supplierTable.id, supplierId));
    }

    static async getOrderById(orderId: string) {
        const [order] = await db.select().from(purchaseOrderTable).where(eq(purchaseOrderTable.id, orderId));
        if (!order) {
            throw new NotFoundError("Purchase order", orderId);
        }
        return order;
    }

    static async listOrders(filter: { status?: PurchaseOrderStatus; medicineId?: string; from?: string; to?: string } = {}) {
        return await db.select()
            .from(purchaseOrderTable)
            .where(and(
                filter.status ? eq(purchaseOrderTable.status, filter.status) : undefined,
                filter.medicineId ? eq(purchaseOrderTable.medicineId, filter.medicineId) : undefined,
                filter.from ? gte(purchaseOrderTable.orderDate, filter.from) : undefined,
                filter.to ? lte(purchaseOrderTable.orderDate, filter.to) : undefined
            ))
            .orderBy(desc(purchaseOrderTable.createdAt));
    }
}
