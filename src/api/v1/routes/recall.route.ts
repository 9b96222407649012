import { Router } from 'express';
import { RecallController } from '../controller/recall.controller';
import { isManager, isStaff } from '../middleware/role';

const router = Router();

router
    .post('/', isManager, RecallController.addRecall)
    .get('/', isStaff, RecallController.getRecalls)
    .get('/:id', isStaff, RecallController.getRecallById)
    .patch('/:id/status', isManager, RecallController.updateRecallStatus);

export default router;
