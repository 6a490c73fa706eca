import { ConfigurationError } from '../shared/errors';

// Product keys are matched verbatim across catalog, sequences and requests,
// so they are never trimmed: padded keys are rejected instead.
export function productKeyIssue(value: string): string | null {
  if (value.trim().length === 0) return 'ProductKey cannot be empty';
  if (value.trim() !== value) return 'ProductKey cannot start or end with whitespace';
  return null;
}

export function isProductKey(value: string): boolean {
  return productKeyIssue(value) === null;
}

// Product-related value objects
export class ProductKey {
  constructor(private readonly value: string) {
    const issue = productKeyIssue(value);
    if (issue) {
      throw new ConfigurationError(issue, { productKey: value });
    }
  }

  toString(): string {
    return this.value;
  }

  equals(other: ProductKey): boolean {
    return this.value === other.value;
  }

  static create(value: string): ProductKey {
    return new ProductKey(value);
  }
}

export class ProcessingRate {
  constructor(public readonly hoursPerUnit: number) {
    if (!Number.isFinite(hoursPerUnit) || hoursPerUnit <= 0) {
      throw new ConfigurationError('Processing rate must be a positive number of hours per unit', {
        hoursPerUnit,
      });
    }
  }

  hoursFor(quantity: number): number {
    return quantity * this.hoursPerUnit;
  }

  equals(other: ProcessingRate): boolean {
    return this.hoursPerUnit === other.hoursPerUnit;
  }

  static create(hoursPerUnit: number): ProcessingRate {
    return new ProcessingRate(hoursPerUnit);
  }
}

export class DailyCapacity {
  constructor(public readonly unitsPerDay: number) {
    if (!Number.isFinite(unitsPerDay) || unitsPerDay <= 0) {
      throw new ConfigurationError('Daily capacity must be a positive quantity', { unitsPerDay });
    }
  }

  // Fractional days, reporting only
  daysFor(quantity: number): number {
    return quantity / this.unitsPerDay;
  }

  // Whole production days: anything within one day's capacity still takes a full day
  wholeDaysFor(quantity: number): number {
    if (quantity <= this.unitsPerDay) return 1;
    return Math.ceil(quantity / this.unitsPerDay);
  }

  equals(other: DailyCapacity): boolean {
    return this.unitsPerDay === other.unitsPerDay;
  }

  static create(unitsPerDay: number): DailyCapacity {
    return new DailyCapacity(unitsPerDay);
  }
}

export class UnitLabel {
  constructor(private readonly value: string) {
    if (!value || value.trim().length === 0) {
      throw new ConfigurationError('Unit label cannot be empty');
    }
  }

  toString(): string {
    return this.value;
  }

  static create(value: string): UnitLabel {
    return new UnitLabel(value);
  }
}
