/**
 * Customer Domain Types
 */

import { z } from 'zod';
import type { CustomerRecord } from '@stockbook/types';

export const UpsertCustomerSchema = z.object({
  cid: z.string().trim().min(1, 'Customer ID is required'),
  name: z.string().trim().min(1, 'Customer name is required'),
});

export type UpsertCustomerInput = z.input<typeof UpsertCustomerSchema>;

export interface Customer extends CustomerRecord {
  cid: string;
}

export interface ListCustomersOptions {
  includeDisabled?: boolean;
}
