import { Router } from 'express';
import { SupplierController } from '../controller/supplier.controller';
import { isManager, isStaff } from '../middleware/role';

const router = Router();

router
    .post('/', isManager, SupplierController.createSupplier)
    .get('/', isStaff, SupplierController.getSuppliers)
    .get('/:id', isStaff, SupplierController.getSupplierById)
    .put('/:id', isManager, SupplierController.updateSupplier)
    .post('/:id/ratings', isManager, SupplierController.rateSupplier);

export default router;
