import { describe, it, expect } from 'vitest';
import {
  createProductCatalog,
  createProductSpec,
  findProduct,
  withDailyCapacity,
  withProcessingRate,
} from '../product-spec';
import { DailyCapacity, ProcessingRate, ProductKey } from '../value-objects';
import { ConfigurationError } from '../../shared/errors';

const pork = { key: 'pork', name: 'Pork', processingHoursPerUnit: 0.12, dailyCapacity: 400 };

describe('createProductSpec', () => {
  it('builds a frozen spec with the default unit', () => {
    const spec = createProductSpec(pork);

    expect(spec).toEqual({ ...pork, unit: 'kg' });
    expect(Object.isFrozen(spec)).toBe(true);
  });

  it.each([
    ['a zero rate', { processingHoursPerUnit: 0 }],
    ['a negative capacity', { dailyCapacity: -1 }],
    ['a NaN capacity', { dailyCapacity: Number.NaN }],
    ['an empty key', { key: '  ' }],
    ['an empty name', { name: '' }],
    ['an empty unit', { unit: '' }],
  ])('rejects %s', (_label, override) => {
    expect(() => createProductSpec({ ...pork, ...override })).toThrow(ConfigurationError);
  });

  it('returns new specs on update and keeps the previous one', () => {
    const spec = createProductSpec(pork);

    const faster = withProcessingRate(spec, 0.1);
    const larger = withDailyCapacity(spec, 450);

    expect(faster.processingHoursPerUnit).toBe(0.1);
    expect(larger.dailyCapacity).toBe(450);
    expect(spec.processingHoursPerUnit).toBe(0.12);
    expect(spec.dailyCapacity).toBe(400);
  });

  it('validates updated values', () => {
    expect(() => withDailyCapacity(createProductSpec(pork), 0)).toThrow(ConfigurationError);
  });
});

describe('ProductCatalog', () => {
  it('finds products by key', () => {
    const catalog = createProductCatalog([createProductSpec(pork)]);

    expect(findProduct(catalog, 'pork').name).toBe('Pork');
    expect(() => findProduct(catalog, 'lamb')).toThrow("Product 'lamb' not found");
  });

  it('rejects duplicate keys', () => {
    expect(() => createProductCatalog([createProductSpec(pork), createProductSpec(pork)])).toThrow(
      ConfigurationError
    );
  });
});

describe('value objects', () => {
  it('counts whole production days', () => {
    const capacity = DailyCapacity.create(100);

    expect(capacity.wholeDaysFor(0)).toBe(1);
    expect(capacity.wholeDaysFor(100)).toBe(1);
    expect(capacity.wholeDaysFor(100.5)).toBe(2);
    expect(capacity.wholeDaysFor(250)).toBe(3);
    expect(capacity.daysFor(250)).toBe(2.5);
  });

  it('computes hours from the rate', () => {
    expect(ProcessingRate.create(0.5).hoursFor(30)).toBe(15);
  });

  it('compares keys by value', () => {
    expect(ProductKey.create('beef').equals(ProductKey.create('beef'))).toBe(true);
    expect(() => ProductKey.create('')).toThrow('ProductKey cannot be empty');
    expect(() => ProductKey.create(' beef ')).toThrow('ProductKey cannot start or end with whitespace');
  });
});
