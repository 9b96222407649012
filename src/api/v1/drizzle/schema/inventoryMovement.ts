import { index, integer, pgEnum, pgTable, text, timestamp, uuid } from 'drizzle-orm/pg-core';
import { batchTable } from './batch';

export const movementTypeEnum = pgEnum('movement_type', [
    'purchase',
    'sale',
    'return',
    'adjustment',
    'disposal',
]);

// Append-only: rows are never updated
export const inventoryMovementTable = pgTable('inventory_movement', {
    id: uuid('id').defaultRandom().primaryKey(),
    movementDate: timestamp('movement_date', { withTimezone: true }).defaultNow().notNull(),
    movedBy: uuid('moved_by').notNull(),
    batchId: uuid('batch_id').references(() => batchTable.id).notNull(),
    movementType: movementTypeEnum('movement_type').notNull(),
    // Signed delta applied to batch.quantity
    quantity: integer('quantity').notNull(),
    // Sale, purchase order or recall that caused the movement
    referenceId: uuid('reference_id'),
    reason: text('reason'),
}, (table) => [
    index('idx_inventory_movement_batch').on(table.batchId),
]);

export type MovementType = (typeof movementTypeEnum.enumValues)[number];
export type InventoryMovementTable = typeof inventoryMovementTable.$inferSelect;
export type NewInventoryMovement = typeof inventoryMovementTable.$inferInsert;
