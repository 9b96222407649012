import { Response } from "express";
import { z } from "zod";
import { prescriptionStatusEnum } from "../drizzle/schema/prescription";
import { AuthRequest } from "../middleware/auth";
import { PrescriptionService } from "../service/prescription.service";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import { dateOnlySchema, getActor, parseIdParam } from "../utils/validation";

const prescriptionSchema = z.object({
    prescriptionNumber: z.string().min(1).max(50),
    patientName: z.string().min(1).max(100),
    patientPhone: z.string().max(20).nullish(),
    doctorName: z.string().min(1).max(100),
    doctorLicense: z.string().max(50).nullish(),
    issueDate: dateOnlySchema,
    expiryDate: dateOnlySchema.nullish(),
    notes: z.string().nullish(),
});

const statusSchema = z.object({
    status: z.enum(['fulfilled', 'expired']),
});

export class PrescriptionController {
    static createPrescription = requestHandler(async (req: AuthRequest, res: Response) => {
        const input = prescriptionSchema.parse(req.body);
        const prescription = await PrescriptionService.createPrescription(input, getActor(req));
        sendResponse(res, 201, 'Prescription created successfully', prescription);
    })

    static getPrescriptions = requestHandler(async (req: AuthRequest, res: Response) => {
        const { status } = z.object({ status: z.enum(prescriptionStatusEnum.enumValues).optional() }).parse(req.query);
        const prescriptions = await PrescriptionService.getPrescriptions(status);
        sendResponse(res, 200, 'Prescriptions fetched successfully', prescriptions);
    })

    static getPrescriptionById = requestHandler(async (req: AuthRequest, res: Response) => {
        const prescription = await PrescriptionService.getPrescriptionById(parseIdParam(req));
        sendResponse(res, 200, 'Prescription fetched successfully', prescription);
    })

    static updateStatus = requestHandler(async (req: AuthRequest, res: Response) => {
        const { status } = statusSchema.parse(req.body);
        const prescription = await PrescriptionService.updateStatus(parseIdParam(req), status, getActor(req));
        sendResponse(res, 200, 'Prescription status updated successfully', prescription);
    })
}
