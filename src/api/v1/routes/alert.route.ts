import { Router } from 'express';
import { AlertController } from '../controller/alert.controller';
import { isManager, isStaff } from '../middleware/role';

const router = Router();

router
    .get('/', isStaff, AlertController.getAlerts)
    .post('/scan-expiring', isManager, AlertController.scanExpiring)
    .post('/:id/acknowledge', isStaff, AlertController.acknowledgeAlert);

export default router;
