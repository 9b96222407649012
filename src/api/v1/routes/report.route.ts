import { Router } from 'express';
import { ReportController } from '../controller/report.controller';
import { isAdmin, isManager, isStaff } from '../middleware/role';

const router = Router();

router
    .get('/stock-status', isStaff, ReportController.getStockStatus)
    .get('/active-alerts', isStaff, ReportController.getActiveAlerts)
    .get('/near-expiry', isStaff, ReportController.getNearExpiryBatches)
    .get('/medicines', isManager, ReportController.getMedicineRollups)
    .get('/suppliers', isManager, ReportController.getSupplierPerformance)
    .get('/audit/:tableName/:recordId', isAdmin, ReportController.getAuditTrail);

export default router;
