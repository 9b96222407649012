import { Response } from "express";
import { z } from "zod";
import { interactionTypeEnum } from "../drizzle/schema/medicineInteraction";
import { AuthRequest } from "../middleware/auth";
import { MedicineService } from "../service/medicine.service";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import { booleanQuerySchema, getActor, parseIdParam } from "../utils/validation";

const medicineSchema = z.object({
    name: z.string().min(1).max(100),
    genericName: z.string().max(100).nullish(),
    composition: z.string().nullish(),
    manufacturer: z.string().max(100).nullish(),
    dosageForm: z.string().max(50).nullish(),
    strength: z.string().max(50).nullish(),
    barcode: z.string().max(100).nullish(),
    category: z.string().max(50).nullish(),
    storageConditions: z.string().nullish(),
    requiresPrescription: z.boolean().optional(),
    minimumStockLevel: z.number().int().nonnegative().optional(),
    reorderPoint: z.number().int().nonnegative().optional(),
});

const listQuerySchema = z.object({
    search: z.string().optional(),
    category: z.string().optional(),
    includeInactive: booleanQuerySchema.optional(),
});

const interactionSchema = z.object({
    medicineIdA: z.string().uuid(),
    medicineIdB: z.string().uuid(),
    interactionType: z.enum(interactionTypeEnum.enumValues),
    description: z.string().min(1),
});

const interactionCheckSchema = z.object({
    medicineIds: z.array(z.string().uuid()).min(1),
});

export class MedicineController {
    static createMedicine = requestHandler(async (req: AuthRequest, res: Response) => {
        const input = medicineSchema.parse(req.body);
        const medicine = await MedicineService.createMedicine(input, getActor(req));
        sendResponse(res, 201, 'Medicine created successfully', medicine);
    })

    static getMedicines = requestHandler(async (req: AuthRequest, res: Response) => {
        const filter = listQuerySchema.parse(req.query);
        const medicines = await MedicineService.getMedicines(filter);
        sendResponse(res, 200, 'Medicines fetched successfully', medicines);
    })

    static getMedicineById = requestHandler(async (req: AuthRequest, res: Response) => {
        const medicine = await MedicineService.getMedicineById(parseIdParam(req));
        sendResponse(res, 200, 'Medicine fetched successfully', medicine);
    })

    static updateMedicine = requestHandler(async (req: AuthRequest, res: Response) => {
        const changes = medicineSchema.partial().parse(req.body);
        const medicine = await MedicineService.updateMedicine(parseIdParam(req), changes, getActor(req));
        sendResponse(res, 200, 'Medicine updated successfully', medicine);
    })

    static deactivateMedicine = requestHandler(async (req: AuthRequest, res: Response) => {
        const medicine = await MedicineService.deactivateMedicine(parseIdParam(req), getActor(req));
        sendResponse(res, 200, 'Medicine deactivated successfully', medicine);
    })

    static deleteMedicine = requestHandler(async (req: AuthRequest, res: Response) => {
        const removal = await MedicineService.deleteMedicine(parseIdParam(req), getActor(req));
        const message = removal.outcome === 'deleted'
            ? 'Medicine deleted successfully'
            : 'Medicine has stock history and was deactivated instead';
        sendResponse(res, 200, message, removal);
    })

    static addInteraction = requestHandler(async (req: AuthRequest, res: Response) => {
        const input = interactionSchema.parse(req.body);
        const interaction = await MedicineService.addInteraction(input, getActor(req));
        sendResponse(res, 201, 'Interaction recorded successfully', interaction);
    })

    static checkInteractions = requestHandler(async (req: AuthRequest, res: Response) => {
        const { medicineIds } = interactionCheckSchema.parse(req.body);
        const warnings = await MedicineService.checkInteractions(medicineIds);
        sendResponse(res, 200, warnings.length > 0 ? 'Interactions found' : 'No known interactions', warnings);
    })
}
