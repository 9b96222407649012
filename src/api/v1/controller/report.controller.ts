import { Response } from "express";
import { z } from "zod";
import { AuthRequest } from "../middleware/auth";
import { AuditService } from "../service/audit.service";
import { ReportService } from "../service/report.service";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";

const nearExpiryQuerySchema = z.object({
    days: z.coerce.number().int().nonnegative().default(30),
});

const auditParamsSchema = z.object({
    tableName: z.string().min(1).max(50),
    recordId: z.string().min(1).max(100),
});

export class ReportController {
    static getStockStatus = requestHandler(async (req: AuthRequest, res: Response) => {
        const rows = await ReportService.getStockStatus();
        sendResponse(res, 200, 'Stock status fetched successfully', rows);
    })

    static getActiveAlerts = requestHandler(async (req: AuthRequest, res: Response) => {
        const rows = await ReportService.getActiveAlerts();
        sendResponse(res, 200, 'Active alerts fetched successfully', rows);
    })

    static getMedicineRollups = requestHandler(async (req: AuthRequest, res: Response) => {
        const rows = await ReportService.getMedicineRollups();
        sendResponse(res, 200, 'Medicine analytics fetched successfully', rows);
    })

    static getSupplierPerformance = requestHandler(async (req: AuthRequest, res: Response) => {
        const rows = await ReportService.getSupplierPerformance();
        sendResponse(res, 200, 'Supplier performance fetched successfully', rows);
    })

    static getNearExpiryBatches = requestHandler(async (req: AuthRequest, res: Response) => {
        const { days } = nearExpiryQuerySchema.parse(req.query);
        const rows = await ReportService.getNearExpiryBatches(days);
        sendResponse(res, 200, `Batches expiring within ${days} days`, rows);
    })

    static getAuditTrail = requestHandler(async (req: AuthRequest, res: Response) => {
        const { tableName, recordId } = auditParamsSchema.parse(req.params);
        const trail = await AuditService.getTrail(tableName, recordId);
        sendResponse(res, 200, 'Audit trail fetched successfully', trail);
    })
}
