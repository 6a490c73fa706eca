import { z } from 'zod';
import { ProductionRequest } from '../products/production-request';
import { InvalidRequestError, formatIssues } from '../shared/errors';

export const DEFAULT_QUANTITY_RANGE = { min: 50, max: 300 } as const;

const rangeSchema = z
  .object({
    min: z.number().int().nonnegative(),
    max: z.number().int().nonnegative(),
  })
  .refine((range) => range.min <= range.max, { message: 'min cannot exceed max' });

export type QuantityRange = z.infer<typeof rangeSchema>;

// Returns a value in [0, 1), like Math.random
export type RandomSource = () => number;

/**
 * Draws one whole quantity per product, uniformly within the inclusive range.
 */
export function generateRandomQuantities(
  productKeys: Iterable<string>,
  range: Partial<QuantityRange> = {},
  random: RandomSource = Math.random
): ProductionRequest {
  const parsed = rangeSchema.safeParse({ ...DEFAULT_QUANTITY_RANGE, ...range });
  if (!parsed.success) {
    throw new InvalidRequestError(`Invalid quantity range: ${formatIssues(parsed.error.issues)}`, { ...range });
  }

  const { min, max } = parsed.data;
  const span = max - min + 1;
  const quantities: Record<string, number> = {};
  for (const productKey of productKeys) {
    quantities[productKey] = min + Math.min(Math.floor(random() * span), span - 1);
  }
  return ProductionRequest.create(quantities);
}
