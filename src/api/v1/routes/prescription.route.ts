import { Router } from 'express';
import { PrescriptionController } from '../controller/prescription.controller';
import { isStaff } from '../middleware/role';

const router = Router();

router
    .post('/', isStaff, PrescriptionController.createPrescription)
    .get('/', isStaff, PrescriptionController.getPrescriptions)
    .get('/:id', isStaff, PrescriptionController.getPrescriptionById)
    .patch('/:id/status', isStaff, PrescriptionController.updateStatus);

export default router;
