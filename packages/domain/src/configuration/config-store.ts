import { createStore, type StoreApi } from 'zustand/vanilla';
import {
  findProduct,
  withDailyCapacity,
  withProcessingRate,
  type ProductCatalog,
  type ProductSpec,
} from '../products/product-spec';
import type { SequenceDefinition } from '../sequences/sequence';
import { ConfigurationError } from '../shared/errors';
import { logger } from '../shared/logger';
import type { FacilityConfig } from './facility-config';

export interface FacilityConfigState {
  products: ProductCatalog;
  sequences: readonly SequenceDefinition[];
  // Facility-wide ceiling across all lines, informational only
  overallDailyCapacity: number | null;

  // Actions
  updateProcessingRate: (productKey: string, hoursPerUnit: number) => ProductSpec;
  updateDailyCapacity: (productKey: string, dailyCapacity: number) => ProductSpec;
  setOverallDailyCapacity: (capacity: number) => void;
}

export type FacilityConfigStore = StoreApi<FacilityConfigState>;

function replaceProduct(catalog: ProductCatalog, spec: ProductSpec): ProductCatalog {
  const next = new Map(catalog);
  next.set(spec.key, spec);
  return next;
}

/**
 * Configuration store handed to the estimator and aggregator. Single writer:
 * every update is validated before it is applied and takes effect for the
 * next computation.
 */
export function createFacilityConfigStore(config: FacilityConfig): FacilityConfigStore {
  return createStore<FacilityConfigState>()((set, get) => ({
    products: config.products,
    sequences: config.sequences,
    overallDailyCapacity: config.overallDailyCapacity,

    updateProcessingRate: (productKey, hoursPerUnit) => {
      const updated = withProcessingRate(findProduct(get().products, productKey), hoursPerUnit);
      set((state) => ({ products: replaceProduct(state.products, updated) }));
      logger.logConfigurationChange(productKey, 'processingHoursPerUnit', hoursPerUnit);
      return updated;
    },

    updateDailyCapacity: (productKey, dailyCapacity) => {
      const updated = withDailyCapacity(findProduct(get().products, productKey), dailyCapacity);
      set((state) => ({ products: replaceProduct(state.products, updated) }));
      logger.logConfigurationChange(productKey, 'dailyCapacity', dailyCapacity);
      return updated;
    },

    setOverallDailyCapacity: (capacity) => {
      if (!Number.isFinite(capacity) || capacity <= 0) {
        throw new ConfigurationError('Overall daily capacity must be a positive quantity', { capacity });
      }
      set({ overallDailyCapacity: capacity });
      logger.info('Overall daily capacity updated', { value: capacity, event: 'configuration_change' });
    },
  }));
}
