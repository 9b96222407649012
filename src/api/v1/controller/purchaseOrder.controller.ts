import { Response } from "express";
import { z } from "zod";
import { purchaseOrderStatusEnum } from "../drizzle/schema/purchaseOrder";
import { AuthRequest } from "../middleware/auth";
import { ProcurementService } from "../service/procurement.service";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import { dateOnlySchema, getActor, moneySchema, parseIdParam } from "../utils/validation";

const statusValues = purchaseOrderStatusEnum.enumValues;

const createSchema = z.object({
    supplierId: z.string().uuid(),
    medicineId: z.string().uuid(),
    orderNumber: z.string().min(1).max(80),
    quantityOrdered: z.number().int().positive(),
    expectedPrice: moneySchema.nullish(),
    expectedDeliveryDate: dateOnlySchema.nullish(),
});

const autoOrderSchema = z.object({
    medicineId: z.string().uuid(),
});

const transitionSchema = z.object({
    status: z.enum(statusValues),
    actualDeliveryDate: dateOnlySchema.nullish(),
});

const listQuerySchema = z.object({
    status: z.enum(statusValues).optional(),
    medicineId: z.string().uuid().optional(),
    from: dateOnlySchema.optional(),
    to: dateOnlySchema.optional(),
});

export class PurchaseOrderController {
    static createOrder = requestHandler(async (req: AuthRequest, res: Response) => {
        const input = createSchema.parse(req.body);
        const order = await ProcurementService.createOrder(input, getActor(req));
        sendResponse(res, 201, 'Purchase order created successfully', order);
    })

    static autoOrder = requestHandler(async (req: AuthRequest, res: Response) => {
        const { medicineId } = autoOrderSchema.parse(req.body);
        const order = await ProcurementService.autoOrder(medicineId, getActor(req));
        sendResponse(res, 201, 'Purchase order generated successfully', order);
    })

    static getOrders = requestHandler(async (req: AuthRequest, res: Response) => {
        const filter = listQuerySchema.parse(req.query);
        const orders = await ProcurementService.listOrders(filter);
        sendResponse(res, 200, 'Purchase orders fetched successfully', orders);
    })

    static getOrderById = requestHandler(async (req: AuthRequest, res: Response) => {
        const order = await ProcurementService.getOrderById(parseIdParam(req));
        sendResponse(res, 200, 'Purchase order fetched successfully', order);
    })

    static transitionOrder = requestHandler(async (req: AuthRequest, res: Response) => {
        const { status, actualDeliveryDate } = transitionSchema.parse(req.body);
        const order = await ProcurementService.transitionOrder(parseIdParam(req), status, getActor(req), actualDeliveryDate);
        sendResponse(res, 200, `Purchase order moved to ${order.status}`, order);
    })
}
