import { Response } from "express";
import { z } from "zod";
import { severityEnum } from "../drizzle/schema/enums";
import { recallStatusEnum } from "../drizzle/schema/recall";
import { AuthRequest } from "../middleware/auth";
import { RecallService } from "../service/recall.service";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import { dateOnlySchema, getActor, parseIdParam } from "../utils/validation";

const recallSchema = z.object({
    batchId: z.string().uuid(),
    reason: z.string().min(1),
    recallDate: dateOnlySchema.optional(),
    announcedBy: z.string().max(100).nullish(),
    severity: z.enum(severityEnum.enumValues),
    instructions: z.string().nullish(),
});

const statusSchema = z.object({
    status: z.enum(['resolved', 'cancelled']),
    returnedQuantity: z.number().int().nonnegative().optional(),
});

export class RecallController {
    static addRecall = requestHandler(async (req: AuthRequest, res: Response) => {
        const input = recallSchema.parse(req.body);
        const outcome = await RecallService.addRecall(input, getActor(req));
        sendResponse(res, 201, 'Recall recorded successfully', outcome);
    })

    static getRecalls = requestHandler(async (req: AuthRequest, res: Response) => {
        const { status } = z.object({ status: z.enum(recallStatusEnum.enumValues).optional() }).parse(req.query);
        const recalls = await RecallService.listRecalls(status);
        sendResponse(res, 200, 'Recalls fetched successfully', recalls);
    })

    static getRecallById = requestHandler(async (req: AuthRequest, res: Response) => {
        const recall = await RecallService.getRecallById(parseIdParam(req));
        sendResponse(res, 200, 'Recall fetched successfully', recall);
    })

    static updateRecallStatus = requestHandler(async (req: AuthRequest, res: Response) => {
        const { status, returnedQuantity } = statusSchema.parse(req.body);
        const recall = await RecallService.updateRecallStatus(parseIdParam(req), status, getActor(req), returnedQuantity);
        sendResponse(res, 200, 'Recall status updated successfully', recall);
    })
}
