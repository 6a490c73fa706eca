import { readFileSync } from 'node:fs';
import { z } from 'zod';
import defaultFacility from '../../config/facility.default.json';
import { createProductCatalog, createProductSpec, type ProductCatalog } from '../products/product-spec';
import { isProductKey } from '../products/value-objects';
import { createSequences, type SequenceDefinition } from '../sequences/sequence';
import { ConfigurationError, describeError, formatIssues } from '../shared/errors';
import { env } from '../shared/env';
import { logger } from '../shared/logger';

const productKeySchema = z
  .string()
  .refine(isProductKey, 'Product key must be non-blank without surrounding whitespace');

// Shape of a facility configuration file
const productSchema = z.object({
  key: productKeySchema,
  name: z.string().trim().min(1),
  processingHoursPerUnit: z.number().positive(),
  dailyCapacity: z.number().positive(),
  unit: z.string().trim().min(1).default('kg'),
});

const sequenceSchema = z.object({
  id: z.string().trim().min(1),
  // An empty sequence is valid and aggregates to a degenerate report
  productKeys: z.array(productKeySchema),
});

export const facilityConfigSchema = z.object({
  products: z.array(productSchema).min(1),
  sequences: z.array(sequenceSchema),
  overallDailyCapacity: z.number().positive().nullable().default(null),
});

export interface FacilityConfig {
  products: ProductCatalog;
  sequences: readonly SequenceDefinition[];
  overallDailyCapacity: number | null;
}

/**
 * Validates a raw facility description and builds the typed tables.
 * @throws ConfigurationError listing every invalid field
 */
export function parseFacilityConfig(raw: unknown): FacilityConfig {
  const result = facilityConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid facility configuration: ${formatIssues(result.error.issues)}`);
  }

  const { products, sequences, overallDailyCapacity } = result.data;
  return {
    products: createProductCatalog(products.map((product) => createProductSpec(product))),
    sequences: createSequences(sequences),
    overallDailyCapacity,
  };
}

export function loadFacilityConfig(path: string): FacilityConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read facility configuration from ${path}: ${describeError(error)}`, {
      path,
    });
  }
  const config = parseFacilityConfig(raw);
  logger.info('Facility configuration loaded', {
    path,
    products: config.products.size,
    sequences: config.sequences.length,
  });
  return config;
}

export function defaultFacilityConfig(): FacilityConfig {
  return parseFacilityConfig(defaultFacility);
}

// FACILITY_CONFIG_PATH when set, the bundled facility otherwise
export function resolveFacilityConfig(path: string | undefined = env.FACILITY_CONFIG_PATH): FacilityConfig {
  return path ? loadFacilityConfig(path) : defaultFacilityConfig();
}
