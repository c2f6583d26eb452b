import { z } from 'zod';
import { InvalidInputError } from '../errors/packing.errors';

const dimension = z.number().finite().positive();

export const partSchema = z.object({
  id: z.string().min(1),
  length: dimension,
  height: dimension,
  quantity: z.number().int().positive(),
  material: z.string().min(1).optional(),
});

export const stockTypeSchema = z.object({
  length: dimension,
  width: dimension,
  quantity: z.number().int().nonnegative().optional(),
  name: z.string().optional(),
  material: z.string().min(1).optional(),
});

export const refineConfigSchema = z.object({
  populationSize: z.number().int().min(1).max(200).optional(),
  generations: z.number().int().min(0).max(1000).optional(),
  seed: z.number().int().optional(),
  mutationRate: z.number().min(0).max(1).optional(),
  topK: z.number().int().min(1).optional(),
  jitter: z.number().min(0).max(1).optional(),
  patience: z.number().int().min(1).optional(),
  crossover: z.enum(['sequence', 'sheet-splice']).optional(),
});

export const packingOptionsSchema = z.object({
  gap: z.number().finite().nonnegative().optional(),
  allowRotation: z.boolean().optional(),
  stockSelection: z.enum(['in-order', 'smallest-area']).optional(),
  refine: refineConfigSchema.optional(),
});

export const packInputSchema = z.object({
  parts: z.array(partSchema),
  stockTypes: z.array(stockTypeSchema).min(1, 'At least one stock type is required'),
});

export const optimizeRequestSchema = packInputSchema.merge(packingOptionsSchema).extend({
  background: z.boolean().optional(),
  socketId: z.string().optional(),
});

const rectSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  width: z.number().finite().nonnegative(),
  height: z.number().finite().nonnegative(),
});

const placementSchema = rectSchema.extend({
  partId: z.string(),
  instanceId: z.string(),
  rotated: z.boolean(),
  partLength: dimension,
  partHeight: dimension,
  material: z.string().optional(),
});

const sheetSchema = z.object({
  index: z.number().int().nonnegative(),
  stockIndex: z.number().int().nonnegative(),
  length: dimension,
  width: dimension,
  stockName: z.string().optional(),
  material: z.string().optional(),
  placements: z.array(placementSchema),
  freeRegions: z.array(rectSchema),
  closed: z.boolean(),
});

const unplacedSchema = z.object({
  partId: z.string(),
  instanceId: z.string(),
  length: z.number(),
  height: z.number(),
  reason: z.enum(['part-exceeds-all-stock', 'stock-exhausted', 'dropped-by-refinement']),
});

export const solutionSchema = z.object({
  sheets: z.array(sheetSchema),
  unplaced: z.array(unplacedSchema),
  stockExhausted: z.boolean(),
});

export const reportRequestSchema = z.object({
  solution: solutionSchema,
});

export type PackInput = z.infer<typeof packInputSchema>;
export type PackingOptionsInput = z.infer<typeof packingOptionsSchema>;
export type OptimizeRequest = z.infer<typeof optimizeRequestSchema>;

/**
 * Parse or throw InvalidInputError carrying the flattened zod issues
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, message = 'Invalid payload'): z.infer<T> {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new InvalidInputError(message, parsed.error.flatten());
  }
  return parsed.data;
}
