import { Router } from 'express';
import { BatchController } from '../controller/batch.controller';
import { isAdmin, isManager, isStaff } from '../middleware/role';

const router = Router();

router
    .post('/', isStaff, BatchController.receiveBatch)
    .post('/expire-sweep', isManager, BatchController.expireSweep)
    .get('/:id', isStaff, BatchController.getBatchById)
    .get('/:id/movements', isStaff, BatchController.getMovements)
    .post('/:id/adjustments', isManager, BatchController.adjustBatch)
    .delete('/:id', isAdmin, BatchController.deleteBatch);

export default router;
