import { Router } from 'express';
import { authMiddleware } from '../middleware/auth';
import medicineRoutes from './medicine.route'
import supplierRoutes from './supplier.route'
import prescriptionRoutes from './prescription.route'
import batchRoutes from './batch.route'
import saleRoutes from './sale.route'
import recallRoutes from './recall.route'
import alertRoutes from './alert.route'
import purchaseOrderRoutes from './purchaseOrder.route'
import reportRoutes from './report.route'

const router = Router();

router.use("/medicines", [authMiddleware], medicineRoutes);
router.use("/suppliers", [authMiddleware], supplierRoutes);
router.use("/prescriptions", [authMiddleware], prescriptionRoutes);
router.use("/batches", [authMiddleware], batchRoutes);
router.use("/sales", [authMiddleware], saleRoutes);
router.use("/recalls", [authMiddleware], recallRoutes);
router.use("/alerts", [authMiddleware], alertRoutes);
router.use("/purchase-orders", [authMiddleware], purchaseOrderRoutes);
router.use("/reports", [authMiddleware], reportRoutes);

export default router;
