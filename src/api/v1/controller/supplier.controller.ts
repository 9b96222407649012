import { Response } from "express";
import { z } from "zod";
import { AuthRequest } from "../middleware/auth";
import { ProcurementService } from "../service/procurement.service";
import { SupplierService } from "../service/supplier.service";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import { booleanQuerySchema, getActor, parseIdParam } from "../utils/validation";

const supplierSchema = z.object({
    supplierName: z.string().min(1).max(100),
    contactPerson: z.string().max(100).nullish(),
    email: z.string().email().max(100).nullish(),
    phone: z.string().max(20).nullish(),
    address: z.string().nullish(),
    city: z.string().max(50).nullish(),
    country: z.string().max(50).nullish(),
    isActive: z.boolean().optional(),
});

const score = z.number().int().min(1).max(5);
const ratingSchema = z.object({
    orderId: z.string().uuid(),
    quality: score,
    delivery: score,
    communication: score,
    comments: z.string().nullish(),
});

export class SupplierController {
    static createSupplier = requestHandler(async (req: AuthRequest, res: Response) => {
        const input = supplierSchema.parse(req.body);
        const supplier = await SupplierService.createSupplier(input, getActor(req));
        sendResponse(res, 201, 'Supplier created successfully', supplier);
    })

    static getSuppliers = requestHandler(async (req: AuthRequest, res: Response) => {
        const { includeInactive } = z.object({ includeInactive: booleanQuerySchema.optional() }).parse(req.query);
        const suppliers = await SupplierService.getSuppliers(includeInactive ?? false);
        sendResponse(res, 200, 'Suppliers fetched successfully', suppliers);
    })

    static getSupplierById = requestHandler(async (req: AuthRequest, res: Response) => {
        const supplier = await SupplierService.getSupplierById(parseIdParam(req));
        sendResponse(res, 200, 'Supplier fetched successfully', supplier);
    })

    static updateSupplier = requestHandler(async (req: AuthRequest, res: Response) => {
        const changes = supplierSchema.partial().parse(req.body);
        const supplier = await SupplierService.updateSupplier(parseIdParam(req), changes, getActor(req));
        sendResponse(res, 200, 'Supplier updated successfully', supplier);
    })

    static rateSupplier = requestHandler(async (req: AuthRequest, res: Response) => {
        const input = ratingSchema.parse(req.body);
        const rating = await ProcurementService.rateSupplier({ ...input, supplierId: parseIdParam(req) }, getActor(req));
        sendResponse(res, 201, 'Supplier rated successfully', rating);
    })
}
