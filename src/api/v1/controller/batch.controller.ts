import { Response } from "express";
import { z } from "zod";
import { AuthRequest } from "../middleware/auth";
import { StockLedgerService } from "../service/stockLedger.service";
import { NotFoundError } from "../utils/AppError";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import { dateOnlySchema, getActor, moneySchema, parseIdParam } from "../utils/validation";

const receiveSchema = z.object({
    medicineId: z.string().uuid(),
    supplierId: z.string().uuid().nullish(),
    purchaseOrderId: z.string().uuid().nullish(),
    batchNumber: z.string().min(1).max(50),
    expiryDate: dateOnlySchema,
    manufactureDate: dateOnlySchema.nullish(),
    quantity: z.number().int().positive(),
    costPrice: moneySchema.nullish(),
    sellingPrice: moneySchema.nullish(),
    mrp: moneySchema.nullish(),
    barcode: z.string().max(100).nullish(),
    storageLocation: z.string().max(50).nullish(),
    ocrVerified: z.boolean().optional(),
});

const adjustmentSchema = z.object({
    delta: z.number().int(),
    movementType: z.enum(['adjustment', 'return']),
    reason: z.string().nullish(),
    referenceId: z.string().uuid().nullish(),
});

const sweepSchema = z.object({
    asOfDate: dateOnlySchema.optional(),
});

export class BatchController {
    static receiveBatch = requestHandler(async (req: AuthRequest, res: Response) => {
        const input = receiveSchema.parse(req.body);
        const received = await StockLedgerService.receive(input, getActor(req));
        sendResponse(res, 201, 'Batch received successfully', received);
    })

    static getBatchById = requestHandler(async (req: AuthRequest, res: Response) => {
        const id = parseIdParam(req);
        const batch = await StockLedgerService.getBatchById(id);
        if (!batch) {
            throw new NotFoundError('Batch', id);
        }
        sendResponse(res, 200, 'Batch fetched successfully', batch);
    })

    static adjustBatch = requestHandler(async (req: AuthRequest, res: Response) => {
        const input = adjustmentSchema.parse(req.body);
        const adjusted = await StockLedgerService.adjust({ ...input, batchId: parseIdParam(req) }, getActor(req));
        sendResponse(res, 200, 'Batch quantity adjusted successfully', adjusted);
    })

    static getMovements = requestHandler(async (req: AuthRequest, res: Response) => {
        const movements = await StockLedgerService.getMovements(parseIdParam(req));
        sendResponse(res, 200, 'Movements fetched successfully', movements);
    })

    static deleteBatch = requestHandler(async (req: AuthRequest, res: Response) => {
        const id = parseIdParam(req);
        await StockLedgerService.deleteBatch(id, getActor(req));
        sendResponse(res, 200, 'Batch deleted successfully', { id });
    })

    static expireSweep = requestHandler(async (req: AuthRequest, res: Response) => {
        const { asOfDate } = sweepSchema.parse(req.body ?? {});
        const flagged = await StockLedgerService.expireSweep(getActor(req), asOfDate);
        sendResponse(res, 200, `${flagged} batches flagged as expired`, { flagged });
    })
}
