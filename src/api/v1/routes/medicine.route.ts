import { Router } from 'express';
import { MedicineController } from '../controller/medicine.controller';
import { isAdmin, isManager, isStaff } from '../middleware/role';

const router = Router();

router
    .post('/', isManager, MedicineController.createMedicine)
    .get('/', isStaff, MedicineController.getMedicines)
    .post('/interactions', isManager, MedicineController.addInteraction)
    .post('/interactions/check', isStaff, MedicineController.checkInteractions)
    .get('/:id', isStaff, MedicineController.getMedicineById)
    .put('/:id', isManager, MedicineController.updateMedicine)
    .post('/:id/deactivate', isManager, MedicineController.deactivateMedicine)
    .delete('/:id', isAdmin, MedicineController.deleteMedicine);

export default router;
