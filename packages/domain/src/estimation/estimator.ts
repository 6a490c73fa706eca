import { InvalidRequestError } from '../shared/errors';
import { findProduct, type ProductCatalog, type ProductSpec } from '../products/product-spec';
import { DailyCapacity, ProcessingRate } from '../products/value-objects';

// Fixed working day used to express whole production days in hours
export const WORKING_HOURS_PER_DAY = 8;

export interface ProductEstimate {
  readonly productKey: string;
  readonly productName: string;
  readonly unit: string;
  readonly quantity: number;
  // quantity × hours per unit, total labour/machine time
  readonly processingHours: number;
  // exact quantity / daily capacity
  readonly capacityDays: number;
  // whole production days, at least 1
  readonly effectiveDays: number;
  readonly totalAvailableHours: number;
}

function assertQuantity(productKey: string, quantity: number): void {
  if (!Number.isFinite(quantity) || quantity < 0) {
    throw new InvalidRequestError(`Quantity for '${productKey}' must be a non-negative number`, {
      productKey,
      quantity,
    });
  }
}

/**
 * Converts a requested quantity into a production estimate for one product.
 *
 * Any quantity that fits within one day's capacity still occupies a full day;
 * the excess spreads over whole additional days with no partial-day credit.
 * Processing hours are not clamped by the available hours.
 *
 * @throws ConfigurationError when the product carries a non-positive rate or capacity
 * @throws InvalidRequestError when the quantity is negative or not finite
 */
export function estimate(spec: ProductSpec, quantity: number): ProductEstimate {
  const rate = ProcessingRate.create(spec.processingHoursPerUnit);
  const capacity = DailyCapacity.create(spec.dailyCapacity);
  assertQuantity(spec.key, quantity);

  const effectiveDays = capacity.wholeDaysFor(quantity);

  return Object.freeze({
    productKey: spec.key,
    productName: spec.name,
    unit: spec.unit,
    quantity,
    processingHours: rate.hoursFor(quantity),
    capacityDays: capacity.daysFor(quantity),
    effectiveDays,
    totalAvailableHours: effectiveDays * WORKING_HOURS_PER_DAY,
  });
}

/**
 * Direct estimate by product key.
 *
 * @throws ConfigurationError with code UNKNOWN_PRODUCT when the key is not configured
 */
export function estimateProduct(catalog: ProductCatalog, productKey: string, quantity: number): ProductEstimate {
  return estimate(findProduct(catalog, productKey), quantity);
}
