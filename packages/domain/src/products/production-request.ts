import { z } from 'zod';
import { InvalidRequestError, formatIssues } from '../shared/errors';
import { isProductKey } from './value-objects';

const quantityRecordSchema = z.record(
  z.string().refine(isProductKey, 'Product key must be non-blank without surrounding whitespace'),
  z.number().finite('Quantity must be finite').nonnegative('Quantity cannot be negative')
);

/**
 * Point-in-time snapshot of requested quantities keyed by product.
 * A product without an entry is skipped by the aggregator, never read as zero.
 */
export class ProductionRequest {
  private readonly quantities: ReadonlyMap<string, number>;

  private constructor(quantities: Map<string, number>) {
    this.quantities = quantities;
  }

  static create(record: Record<string, number> = {}): ProductionRequest {
    const result = quantityRecordSchema.safeParse(record);
    if (!result.success) {
      throw new InvalidRequestError(`Invalid production request: ${formatIssues(result.error.issues)}`);
    }
    // Entries come from the caller's record: zod's rebuilt object drops a '__proto__' key
    return new ProductionRequest(new Map(Object.entries(record)));
  }

  static empty(): ProductionRequest {
    return new ProductionRequest(new Map());
  }

  has(productKey: string): boolean {
    return this.quantities.has(productKey);
  }

  quantityOf(productKey: string): number | undefined {
    return this.quantities.get(productKey);
  }

  get size(): number {
    return this.quantities.size;
  }

  get productKeys(): string[] {
    return [...this.quantities.keys()];
  }

  // Every requested quantity, including products that belong to no sequence
  get totalQuantity(): number {
    let total = 0;
    for (const quantity of this.quantities.values()) {
      total += quantity;
    }
    return total;
  }

  toRecord(): Record<string, number> {
    return Object.fromEntries(this.quantities);
  }
}
