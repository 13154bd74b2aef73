/**
 * Inventory Domain
 */

export { InventoryLedger } from './inventory-ledger.js';
export { planMovement } from './movement.js';
export type { MovementPlan } from './movement.js';
export { MovementInputSchema, BatchLineSchema, BatchMovementSchema } from './inventory-types.js';
export type { MovementInput, BatchLine, InventoryEntry } from './inventory-types.js';
