export * from './enums';
export * from './medicine';
export * from './supplier';
export * from './batch';
export * from './prescription';
export * from './sale';
export * from './recall';
export * from './alert';
export * from './purchaseOrder';
export * from './supplierRating';
export * from './inventoryMovement';
export * from './auditLog';
export * from './predictedDemand';
export * from './medicineInteraction';
