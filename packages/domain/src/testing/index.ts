import { Configuration, Products, Sequences } from '..';

// Factory: createMockProductSpec
export function createMockProductSpec(
  overrides: Partial<Products.CreateProductSpecData> = {}
): Products.ProductSpec {
  return Products.createProductSpec({
    key: overrides.key ?? 'product-mock-001',
    name: overrides.name ?? 'Mock Product',
    processingHoursPerUnit: overrides.processingHoursPerUnit ?? 0.1,
    dailyCapacity: overrides.dailyCapacity ?? 100,
    unit: overrides.unit ?? 'kg',
  });
}

// Factory: createMockCatalog (one mock product by default)
export function createMockCatalog(
  specs: Products.ProductSpec[] = [createMockProductSpec()]
): Products.ProductCatalog {
  return Products.createProductCatalog(specs);
}

// Factory: createMockSequence
export function createMockSequence(
  overrides: Partial<Sequences.CreateSequenceData> = {}
): Sequences.SequenceDefinition {
  return Sequences.createSequence({
    id: overrides.id ?? 'sequence-mock-001',
    productKeys: overrides.productKeys ?? ['product-mock-001'],
  });
}

// Factory: createMockConfigStore (bundled facility unless overridden)
export function createMockConfigStore(
  overrides: Partial<Configuration.FacilityConfig> = {}
): Configuration.FacilityConfigStore {
  const base = Configuration.defaultFacilityConfig();
  return Configuration.createFacilityConfigStore({
    products: overrides.products ?? base.products,
    sequences: overrides.sequences ?? base.sequences,
    overallDailyCapacity: overrides.overallDailyCapacity ?? base.overallDailyCapacity,
  });
}

// Deterministic random source cycling through the given values
export function createSequenceRandom(values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[index % values.length] ?? 0;
    index += 1;
    return value;
  };
}
