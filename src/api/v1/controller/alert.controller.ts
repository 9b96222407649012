import { Response } from "express";
import { z } from "zod";
import { alertTypeEnum } from "../drizzle/schema/alert";
import { severityEnum } from "../drizzle/schema/enums";
import { AuthRequest } from "../middleware/auth";
import { AlertService } from "../service/alert.service";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import { booleanQuerySchema, getActor, parseIdParam } from "../utils/validation";

const listQuerySchema = z.object({
    type: z.enum(alertTypeEnum.enumValues).optional(),
    batchId: z.string().uuid().optional(),
    includeAcknowledged: booleanQuerySchema.optional(),
});

const acknowledgeSchema = z.object({
    actionTaken: z.string().nullish(),
});

const scanSchema = z.object({
    thresholdDays: z.number().int().nonnegative(),
    // Ascending by maxDays; omitted means the default scan bands
    bands: z.array(z.object({
        maxDays: z.number().int().nonnegative(),
        severity: z.enum(severityEnum.enumValues),
    })).min(1).optional(),
});

export class AlertController {
    static getAlerts = requestHandler(async (req: AuthRequest, res: Response) => {
        const filter = listQuerySchema.parse(req.query);
        const alerts = await AlertService.listAlerts(filter);
        sendResponse(res, 200, 'Alerts fetched successfully', alerts);
    })

    static acknowledgeAlert = requestHandler(async (req: AuthRequest, res: Response) => {
        const { actionTaken } = acknowledgeSchema.parse(req.body ?? {});
        const alert = await AlertService.acknowledge(parseIdParam(req), getActor(req), actionTaken);
        sendResponse(res, 200, 'Alert acknowledged successfully', alert);
    })

    static scanExpiring = requestHandler(async (req: AuthRequest, res: Response) => {
        const { thresholdDays, bands } = scanSchema.parse(req.body);
        const sorted = bands ? [...bands].sort((a, b) => a.maxDays - b.maxDays) : undefined;
        const result = await AlertService.scanExpiring(thresholdDays, sorted);
        sendResponse(res, 200, 'Expiry scan completed', result);
    })
}
