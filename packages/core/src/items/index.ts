/**
 * Items Domain
 */

export { ItemRegistry } from './item-registry.js';
export { UpsertItemSchema } from './item-types.js';
export type {
  UpsertItemInput,
  Item,
  ItemSummary,
  ListItemsOptions,
  HardDeleteOptions,
} from './item-types.js';
