/**
 * Fetch Request Zod Schemas
 *
 * Declarative query configuration: entity, filter conditions, sort order and
 * the key paths whose changes count as row updates.
 */

import { z } from 'zod';

// ===== VALUES =====

export const SortValueSchema = z.union([z.string(), z.number(), z.boolean(), z.date(), z.null()]);

const KeyPathSchema = z
  .string()
  .min(1)
  .regex(/^[^.]+(\.[^.]+)*$/, 'Key path segments must be non-empty')
  .describe('Dotted key path into an object');

// ===== SORT DESCRIPTORS =====

export const SortDescriptorSchema = z.object({
  keyPath: KeyPathSchema,
  ascending: z.boolean().optional().default(true).describe('Sort direction'),
});

// ===== CONDITIONS =====

export const ConditionOperatorSchema = z.enum(['eq', 'neq', 'lt', 'lte', 'gt', 'gte', 'in', 'contains']);

export const ConditionSchema = z
  .object({
    keyPath: KeyPathSchema,
    op: ConditionOperatorSchema,
    value: z.union([SortValueSchema, z.array(SortValueSchema)]),
  })
  .refine((condition) => (condition.op === 'in') === Array.isArray(condition.value), {
    message: 'Operator "in" takes an array value and only "in" does',
  });

// ===== FETCH REQUEST =====

export const FetchRequestSchema = z.object({
  entityName: z.string().min(1).describe('Entity (object type) to query'),
  primaryKey: KeyPathSchema.describe('Key path of the stable identity field'),
  sortDescriptors: z
    .array(SortDescriptorSchema)
    .min(1, 'At least one sort descriptor is required')
    .describe('Sort order of the results'),
  predicate: z
    .array(ConditionSchema)
    .optional()
    .default([])
    .describe('Conditions that all must hold for an object to match'),
  trackedKeyPaths: z
    .array(KeyPathSchema)
    .optional()
    .default([])
    .describe('Non-sort key paths whose changes are reported as row updates'),
});

export type SortDescriptor = z.infer<typeof SortDescriptorSchema>;
export type ConditionOperator = z.infer<typeof ConditionOperatorSchema>;
export type Condition = z.infer<typeof ConditionSchema>;
export type FetchRequest = z.infer<typeof FetchRequestSchema>;
export type FetchRequestInput = z.input<typeof FetchRequestSchema>;
