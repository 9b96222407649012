import swaggerJSDoc from 'swagger-jsdoc';

const idParam = { name: 'id', in: 'path', required: true, schema: { type: 'string', format: 'uuid' } };
const secured = [{ bearerAuth: [] }];
const jsonBody = (schema: string) => ({
  required: true,
  content: { 'application/json': { schema: { $ref: `#/components/schemas/${schema}` } } },
});

// Base Swagger/OpenAPI configuration
const options: swaggerJSDoc.Options = {
  definition: {
    openapi: '3.0.3',
    info: {
      title: 'Pharmacy Inventory API',
      version: '1.0.0',
      description:
        'Batch-level pharmacy stock: receipts, sales, expiry and recall handling, alerts, purchase orders and audit trail.\n\nEvery endpoint requires a Bearer JWT carrying `id`, `username` and `role` (pharmacist, manager or admin).',
      contact: { name: 'API Support' },
    },
    servers: [
      { url: '/api/v1', description: 'API v1 base path' },
    ],
    tags: [
      { name: 'Medicines', description: 'Medicine catalog and interactions' },
      { name: 'Suppliers', description: 'Suppliers and their ratings' },
      { name: 'Prescriptions', description: 'Prescriptions used to authorise sales' },
      { name: 'Batches', description: 'Stock ledger: receipts, adjustments, expiry sweep' },
      { name: 'Sales', description: 'Point-of-sale transactions' },
      { name: 'Recalls', description: 'Batch recalls' },
      { name: 'Alerts', description: 'Expiry, stock, reorder and recall alerts' },
      { name: 'PurchaseOrders', description: 'Manual and automatic purchase orders' },
      { name: 'Reports', description: 'Read projections and audit trail' },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
      schemas: {
        ApiResponse: {
          type: 'object',
          properties: {
            success: { type: 'boolean' },
            message: { type: 'string' },
            statusCode: { type: 'integer' },
            data: { type: 'object' },
          },
        },
        ErrorData: {
          type: 'object',
          properties: {
            code: {
              type: 'string',
              enum: [
                'INSUFFICIENT_STOCK', 'PRESCRIPTION_REQUIRED', 'RECALLED_OR_EXPIRED', 'NO_ELIGIBLE_SUPPLIER',
                'ALREADY_ACKNOWLEDGED', 'NOT_FOUND', 'CONCURRENCY_CONFLICT', 'VALIDATION', 'DUPLICATE_BATCH',
                'REFERENTIAL_INTEGRITY', 'INVALID_TRANSITION', 'UNAUTHORIZED', 'FORBIDDEN', 'INTERNAL',
              ],
            },
          },
        },
        MedicineInput: {
          type: 'object',
          required: ['name'],
          properties: {
            name: { type: 'string' },
            genericName: { type: 'string' },
            manufacturer: { type: 'string' },
            dosageForm: { type: 'string' },
            strength: { type: 'string' },
            barcode: { type: 'string' },
            category: { type: 'string' },
            requiresPrescription: { type: 'boolean' },
            minimumStockLevel: { type: 'integer', example: 10 },
            reorderPoint: { type: 'integer', example: 20 },
          },
        },
        SupplierInput: {
          type: 'object',
          required: ['supplierName'],
          properties: {
            supplierName: { type: 'string' },
            contactPerson: { type: 'string' },
            email: { type: 'string', format: 'email' },
            phone: { type: 'string' },
          },
        },
        SupplierRatingInput: {
          type: 'object',
          required: ['orderId', 'quality', 'delivery', 'communication'],
          properties: {
            orderId: { type: 'string', format: 'uuid' },
            quality: { type: 'integer', minimum: 1, maximum: 5 },
            delivery: { type: 'integer', minimum: 1, maximum: 5 },
            communication: { type: 'integer', minimum: 1, maximum: 5 },
            comments: { type: 'string' },
          },
        },
        PrescriptionInput: {
          type: 'object',
          required: ['prescriptionNumber', 'patientName', 'doctorName', 'issueDate'],
          properties: {
            prescriptionNumber: { type: 'string' },
            patientName: { type: 'string' },
            doctorName: { type: 'string' },
            issueDate: { type: 'string', format: 'date' },
            expiryDate: { type: 'string', format: 'date' },
          },
        },
        ReceiveBatchInput: {
          type: 'object',
          required: ['medicineId', 'batchNumber', 'expiryDate', 'quantity'],
          properties: {
            medicineId: { type: 'string', format: 'uuid' },
            supplierId: { type: 'string', format: 'uuid' },
            batchNumber: { type: 'string', example: 'B1' },
            expiryDate: { type: 'string', format: 'date' },
            quantity: { type: 'integer', example: 100 },
            costPrice: { type: 'number', example: 3.5 },
            sellingPrice: { type: 'number', example: 5 },
          },
        },
        AdjustmentInput: {
          type: 'object',
          required: ['delta', 'movementType'],
          properties: {
            delta: { type: 'integer', example: -2 },
            movementType: { type: 'string', enum: ['adjustment', 'return'] },
            reason: { type: 'string' },
          },
        },
        SaleInput: {
          type: 'object',
          required: ['batchId', 'quantity', 'salePrice'],
          properties: {
            batchId: { type: 'string', format: 'uuid' },
            quantity: { type: 'integer', example: 10 },
            salePrice: { type: 'number', example: 5 },
            prescriptionId: { type: 'string', format: 'uuid' },
            paymentMethod: { type: 'string', enum: ['cash', 'card', 'upi', 'insurance'] },
            buyer: {
              type: 'object',
              properties: {
                customerName: { type: 'string' },
                customerPhone: { type: 'string' },
              },
            },
          },
        },
        RecallInput: {
          type: 'object',
          required: ['batchId', 'reason', 'severity'],
          properties: {
            batchId: { type: 'string', format: 'uuid' },
            reason: { type: 'string', example: 'contamination' },
            recallDate: { type: 'string', format: 'date' },
            severity: { type: 'string', enum: ['low', 'medium', 'high', 'critical'] },
            instructions: { type: 'string' },
          },
        },
        PurchaseOrderInput: {
          type: 'object',
          required: ['supplierId', 'medicineId', 'orderNumber', 'quantityOrdered'],
          properties: {
            supplierId: { type: 'string', format: 'uuid' },
            medicineId: { type: 'string', format: 'uuid' },
            orderNumber: { type: 'string' },
            quantityOrdered: { type: 'integer' },
            expectedPrice: { type: 'number' },
            expectedDeliveryDate: { type: 'string', format: 'date' },
          },
        },
      },
    },
    security: secured,
    paths: {
      '/medicines': {
        get: { tags: ['Medicines'], summary: 'List medicines', parameters: [{ name: 'search', in: 'query', schema: { type: 'string' } }, { name: 'category', in: 'query', schema: { type: 'string' } }, { name: 'includeInactive', in: 'query', schema: { type: 'string', enum: ['true', 'false'] } }], responses: { 200: { description: 'Medicines' } } },
        post: { tags: ['Medicines'], summary: 'Create medicine', requestBody: jsonBody('MedicineInput'), responses: { 201: { description: 'Created' } } },
      },
      '/medicines/{id}': {
        get: { tags: ['Medicines'], summary: 'Get medicine', parameters: [idParam], responses: { 200: { description: 'Medicine' }, 404: { description: 'Not found' } } },
        put: { tags: ['Medicines'], summary: 'Update medicine', parameters: [idParam], requestBody: jsonBody('MedicineInput'), responses: { 200: { description: 'Updated' } } },
        delete: { tags: ['Medicines'], summary: 'Delete medicine, or deactivate it when it has stock history', parameters: [idParam], responses: { 200: { description: 'Deleted or deactivated' }, 409: { description: 'Batches still in stock' } } },
      },
      '/medicines/{id}/deactivate': {
        post: { tags: ['Medicines'], summary: 'Deactivate medicine', parameters: [idParam], responses: { 200: { description: 'Deactivated' } } },
      },
      '/medicines/interactions': {
        post: { tags: ['Medicines'], summary: 'Record an interaction between two medicines', responses: { 201: { description: 'Recorded' } } },
      },
      '/medicines/interactions/check': {
        post: { tags: ['Medicines'], summary: 'Check a set of medicines for known interactions', responses: { 200: { description: 'Interaction warnings' } } },
      },
      '/suppliers': {
        get: { tags: ['Suppliers'], summary: 'List suppliers', responses: { 200: { description: 'Suppliers' } } },
        post: { tags: ['Suppliers'], summary: 'Create supplier', requestBody: jsonBody('SupplierInput'), responses: { 201: { description: 'Created' } } },
      },
      '/suppliers/{id}': {
        get: { tags: ['Suppliers'], summary: 'Get supplier', parameters: [idParam], responses: { 200: { description: 'Supplier' } } },
        put: { tags: ['Suppliers'], summary: 'Update supplier', parameters: [idParam], requestBody: jsonBody('SupplierInput'), responses: { 200: { description: 'Updated' } } },
      },
      '/suppliers/{id}/ratings': {
        post: { tags: ['Suppliers'], summary: 'Rate a supplier for an order', parameters: [idParam], requestBody: jsonBody('SupplierRatingInput'), responses: { 201: { description: 'Rated' } } },
      },
      '/prescriptions': {
        get: { tags: ['Prescriptions'], summary: 'List prescriptions', responses: { 200: { description: 'Prescriptions' } } },
        post: { tags: ['Prescriptions'], summary: 'Create prescription', requestBody: jsonBody('PrescriptionInput'), responses: { 201: { description: 'Created' } } },
      },
      '/prescriptions/{id}': {
        get: { tags: ['Prescriptions'], summary: 'Get prescription', parameters: [idParam], responses: { 200: { description: 'Prescription' } } },
      },
      '/prescriptions/{id}/status': {
        patch: { tags: ['Prescriptions'], summary: 'Mark prescription fulfilled or expired', parameters: [idParam], responses: { 200: { description: 'Updated' } } },
      },
      '/batches': {
        post: { tags: ['Batches'], summary: 'Receive a batch', requestBody: jsonBody('ReceiveBatchInput'), responses: { 201: { description: 'Received' }, 409: { description: 'Duplicate batch number' } } },
      },
      '/batches/expire-sweep': {
        post: { tags: ['Batches'], summary: 'Flag batches past their expiry date', responses: { 200: { description: 'Count of flagged batches' } } },
      },
      '/batches/{id}': {
        get: { tags: ['Batches'], summary: 'Get batch', parameters: [idParam], responses: { 200: { description: 'Batch' } } },
        delete: { tags: ['Batches'], summary: 'Delete batch with its alerts, recalls and movements', parameters: [idParam], responses: { 200: { description: 'Deleted' }, 409: { description: 'Batch has sales' } } },
      },
      '/batches/{id}/movements': {
        get: { tags: ['Batches'], summary: 'Movement trail, newest first', parameters: [idParam], responses: { 200: { description: 'Movements' } } },
      },
      '/batches/{id}/adjustments': {
        post: { tags: ['Batches'], summary: 'Adjust quantity or record a return', parameters: [idParam], requestBody: jsonBody('AdjustmentInput'), responses: { 200: { description: 'Adjusted' }, 409: { description: 'Insufficient stock' } } },
      },
      '/sales': {
        get: { tags: ['Sales'], summary: 'List sales', responses: { 200: { description: 'Sales' } } },
        post: { tags: ['Sales'], summary: 'Record a sale', requestBody: jsonBody('SaleInput'), responses: { 201: { description: 'Sale with remaining stock, reorder alert and purchase order' }, 409: { description: 'Insufficient stock, recalled or expired batch' }, 422: { description: 'Prescription required' } } },
      },
      '/sales/{id}': {
        get: { tags: ['Sales'], summary: 'Get sale', parameters: [idParam], responses: { 200: { description: 'Sale' } } },
      },
      '/recalls': {
        get: { tags: ['Recalls'], summary: 'List recalls', responses: { 200: { description: 'Recalls' } } },
        post: { tags: ['Recalls'], summary: 'Recall a batch', requestBody: jsonBody('RecallInput'), responses: { 201: { description: 'Recall and its alert' } } },
      },
      '/recalls/{id}': {
        get: { tags: ['Recalls'], summary: 'Get recall', parameters: [idParam], responses: { 200: { description: 'Recall' } } },
      },
      '/recalls/{id}/status': {
        patch: { tags: ['Recalls'], summary: 'Resolve or cancel a recall', parameters: [idParam], responses: { 200: { description: 'Updated' } } },
      },
      '/alerts': {
        get: { tags: ['Alerts'], summary: 'List alerts', responses: { 200: { description: 'Alerts' } } },
      },
      '/alerts/scan-expiring': {
        post: { tags: ['Alerts'], summary: 'Raise expiry alerts for batches expiring soon', responses: { 200: { description: 'Raised and suppressed counts' } } },
      },
      '/alerts/{id}/acknowledge': {
        post: { tags: ['Alerts'], summary: 'Acknowledge an alert', parameters: [idParam], responses: { 200: { description: 'Acknowledged' }, 409: { description: 'Already acknowledged' } } },
      },
      '/purchase-orders': {
        get: { tags: ['PurchaseOrders'], summary: 'List purchase orders', responses: { 200: { description: 'Orders' } } },
        post: { tags: ['PurchaseOrders'], summary: 'Create a manual purchase order', requestBody: jsonBody('PurchaseOrderInput'), responses: { 201: { description: 'Created' } } },
      },
      '/purchase-orders/auto': {
        post: { tags: ['PurchaseOrders'], summary: 'Generate an order from the best supplier', responses: { 201: { description: 'Created or existing order for today' }, 409: { description: 'No eligible supplier' } } },
      },
      '/purchase-orders/{id}': {
        get: { tags: ['PurchaseOrders'], summary: 'Get purchase order', parameters: [idParam], responses: { 200: { description: 'Order' } } },
      },
      '/purchase-orders/{id}/status': {
        patch: { tags: ['PurchaseOrders'], summary: 'Move an order along its lifecycle', parameters: [idParam], responses: { 200: { description: 'Updated' }, 409: { description: 'Invalid transition' } } },
      },
      '/reports/stock-status': {
        get: { tags: ['Reports'], summary: 'Per-batch stock status', responses: { 200: { description: 'Rows' } } },
      },
      '/reports/active-alerts': {
        get: { tags: ['Reports'], summary: 'Unacknowledged alerts by severity', responses: { 200: { description: 'Rows' } } },
      },
      '/reports/near-expiry': {
        get: { tags: ['Reports'], summary: 'Batches expiring within N days', parameters: [{ name: 'days', in: 'query', schema: { type: 'integer', default: 30 } }], responses: { 200: { description: 'Rows' } } },
      },
      '/reports/medicines': {
        get: { tags: ['Reports'], summary: 'Per-medicine stock and sales rollup', responses: { 200: { description: 'Rows' } } },
      },
      '/reports/suppliers': {
        get: { tags: ['Reports'], summary: 'Supplier performance', responses: { 200: { description: 'Rows' } } },
      },
      '/reports/audit/{tableName}/{recordId}': {
        get: { tags: ['Reports'], summary: 'Audit trail of one record', parameters: [{ name: 'tableName', in: 'path', required: true, schema: { type: 'string' } }, { name: 'recordId', in: 'path', required: true, schema: { type: 'string' } }], responses: { 200: { description: 'Entries oldest first' } } },
      },
    },
  },
  apis: [],
};

export const openapiSpec = swaggerJSDoc(options);
