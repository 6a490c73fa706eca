import { ConfigurationError } from '../shared/errors';
import { DailyCapacity, ProcessingRate, ProductKey, UnitLabel } from './value-objects';

/**
 * Reference data for one product line. Immutable once created; configuration
 * updates replace the whole record.
 */
export interface ProductSpec {
  readonly key: string;
  readonly name: string;
  readonly processingHoursPerUnit: number;
  readonly dailyCapacity: number;
  readonly unit: string;
}

export interface CreateProductSpecData {
  key: string;
  name: string;
  processingHoursPerUnit: number;
  dailyCapacity: number;
  unit?: string;
}

export type ProductCatalog = ReadonlyMap<string, ProductSpec>;

export const DEFAULT_UNIT = 'kg';

export function createProductSpec(data: CreateProductSpecData): ProductSpec {
  const key = ProductKey.create(data.key);
  if (!data.name || data.name.trim().length === 0) {
    throw new ConfigurationError(`Product '${data.key}' needs a name`, { productKey: data.key });
  }
  const rate = ProcessingRate.create(data.processingHoursPerUnit);
  const capacity = DailyCapacity.create(data.dailyCapacity);
  const unit = UnitLabel.create(data.unit ?? DEFAULT_UNIT);

  return Object.freeze({
    key: key.toString(),
    name: data.name,
    processingHoursPerUnit: rate.hoursPerUnit,
    dailyCapacity: capacity.unitsPerDay,
    unit: unit.toString(),
  });
}

export function withProcessingRate(spec: ProductSpec, hoursPerUnit: number): ProductSpec {
  return createProductSpec({ ...spec, processingHoursPerUnit: hoursPerUnit });
}

export function withDailyCapacity(spec: ProductSpec, dailyCapacity: number): ProductSpec {
  return createProductSpec({ ...spec, dailyCapacity });
}

export function createProductCatalog(specs: Iterable<ProductSpec>): ProductCatalog {
  const catalog = new Map<string, ProductSpec>();
  for (const spec of specs) {
    if (catalog.has(spec.key)) {
      throw new ConfigurationError(`Duplicate product key '${spec.key}'`, { productKey: spec.key });
    }
    catalog.set(spec.key, spec);
  }
  return catalog;
}

export function findProduct(catalog: ProductCatalog, productKey: string): ProductSpec {
  const spec = catalog.get(productKey);
  if (!spec) {
    throw ConfigurationError.unknownProduct(productKey);
  }
  return spec;
}
