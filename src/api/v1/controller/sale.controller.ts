import { Response } from "express";
import { z } from "zod";
import { paymentMethodEnum } from "../drizzle/schema/sale";
import { AuthRequest } from "../middleware/auth";
import { SaleService } from "../service/sale.service";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import { getActor, moneySchema, parseIdParam } from "../utils/validation";

const saleSchema = z.object({
    batchId: z.string().uuid(),
    quantity: z.number().int().positive(),
    salePrice: moneySchema,
    prescriptionId: z.string().uuid().nullish(),
    paymentMethod: z.enum(paymentMethodEnum.enumValues).optional(),
    buyer: z.object({
        customerName: z.string().max(100).nullish(),
        customerPhone: z.string().max(20).nullish(),
        customerInfo: z.string().nullish(),
    }).optional(),
});

const listQuerySchema = z.object({
    batchId: z.string().uuid().optional(),
    from: z.coerce.date().optional(),
    to: z.coerce.date().optional(),
});

export class SaleController {
    static recordSale = requestHandler(async (req: AuthRequest, res: Response) => {
        const input = saleSchema.parse(req.body);
        const outcome = await SaleService.recordSale(input, getActor(req));
        sendResponse(res, 201, 'Sale recorded successfully', outcome);
    })

    static getSaleById = requestHandler(async (req: AuthRequest, res: Response) => {
        const sale = await SaleService.getSaleById(parseIdParam(req));
        sendResponse(res, 200, 'Sale fetched successfully', sale);
    })

    static getSales = requestHandler(async (req: AuthRequest, res: Response) => {
        const filter = listQuerySchema.parse(req.query);
        const sales = await SaleService.listSales(filter);
        sendResponse(res, 200, 'Sales fetched successfully', sales);
    })
}
