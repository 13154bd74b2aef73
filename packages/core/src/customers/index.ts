/**
 * Customers Domain
 */

export { CustomerRegistry } from './customer-registry.js';
export { UpsertCustomerSchema } from './customer-types.js';
export type { UpsertCustomerInput, Customer, ListCustomersOptions } from './customer-types.js';
