/**
 * Persisted Layout Zod Schemas
 *
 * Shape of a durable layout record. Only identity and order are stored;
 * sort and tracked values are recomputed from a fresh fetch.
 */

import { z } from 'zod';

export const PERSISTED_LAYOUT_VERSION = 1;

export const PersistedSectionSchema = z.object({
  name: z.string().nullable().describe('Section key, null for the untitled section'),
  rowIds: z.array(z.union([z.string(), z.number()])).describe('Row ids in order'),
});

export const PersistedLayoutSchema = z.object({
  version: z.literal(PERSISTED_LAYOUT_VERSION),
  signature: z.string().describe('Configuration signature the layout was built for'),
  storedAt: z.number().describe('Epoch milliseconds of the write'),
  sections: z.array(PersistedSectionSchema),
});

export type PersistedSection = z.infer<typeof PersistedSectionSchema>;
export type PersistedLayout = z.infer<typeof PersistedLayoutSchema>;
