import { Router } from 'express';
import { SaleController } from '../controller/sale.controller';
import { isStaff } from '../middleware/role';

const router = Router();

router
    .post('/', isStaff, SaleController.recordSale)
    .get('/', isStaff, SaleController.getSales)
    .get('/:id', isStaff, SaleController.getSaleById);

export default router;
