import { Router } from 'express';
import { PurchaseOrderController } from '../controller/purchaseOrder.controller';
import { isManager } from '../middleware/role';

const router = Router();

router
    .post('/', isManager, PurchaseOrderController.createOrder)
    .post('/auto', isManager, PurchaseOrderController.autoOrder)
    .get('/', isManager, PurchaseOrderController.getOrders)
    .get('/:id', isManager, PurchaseOrderController.getOrderById)
    .patch('/:id/status', isManager, PurchaseOrderController.transitionOrder);

export default router;
