/**
 * Aggregation Domain
 */

export { AggregationService } from './aggregation-service.js';
export type { SalesSumFilter, CustomerSalesTotal, StockPoint } from './aggregation-service.js';
export { computeInventoryValuation } from './valuation.js';
export { dayRange, withinRange } from './date-range.js';
export type { TimestampRange } from './date-range.js';
