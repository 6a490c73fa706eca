import { describe, it, expect, beforeEach } from 'vitest';
import { createFacilityConfigStore, type FacilityConfigStore } from '../config-store';
import { defaultFacilityConfig } from '../facility-config';
import { estimateProduct } from '../../estimation/estimator';
import { ConfigurationError } from '../../shared/errors';

describe('FacilityConfigStore', () => {
  let store: FacilityConfigStore;

  beforeEach(() => {
    store = createFacilityConfigStore(defaultFacilityConfig());
  });

  it('starts from the supplied configuration', () => {
    const state = store.getState();

    expect([...state.products.keys()]).toEqual(['beef', 'pork', 'cured_meats', 'cheese']);
    expect(state.sequences.map((sequence) => sequence.id)).toEqual(['slaughter', 'processing']);
    expect(state.overallDailyCapacity).toBeNull();
  });

  it('replaces the product spec when the processing rate changes', () => {
    const previous = store.getState().products.get('beef');

    const updated = store.getState().updateProcessingRate('beef', 0.18);

    expect(updated.processingHoursPerUnit).toBe(0.18);
    expect(store.getState().products.get('beef')).toBe(updated);
    expect(previous?.processingHoursPerUnit).toBe(0.15);
    expect(Object.isFrozen(updated)).toBe(true);
  });

  it('applies a capacity change to the next estimate', () => {
    expect(estimateProduct(store.getState().products, 'cured_meats', 210).effectiveDays).toBe(2);

    store.getState().updateDailyCapacity('cured_meats', 220);

    expect(estimateProduct(store.getState().products, 'cured_meats', 210).effectiveDays).toBe(1);
  });

  it('notifies subscribers of updates', () => {
    const seen: number[] = [];
    const unsubscribe = store.subscribe((state) => {
      seen.push(state.products.get('pork')?.dailyCapacity ?? -1);
    });

    store.getState().updateDailyCapacity('pork', 450);
    unsubscribe();

    expect(seen).toEqual([450]);
  });

  it('rejects an unknown product and leaves the state untouched', () => {
    const before = store.getState().products;

    expect(() => store.getState().updateProcessingRate('venison', 0.3)).toThrow(ConfigurationError);
    expect(store.getState().products).toBe(before);
  });

  it('rejects a non-positive capacity and leaves the state untouched', () => {
    const before = store.getState().products;

    try {
      store.getState().updateDailyCapacity('cheese', 0);
      expect.unreachable('updateDailyCapacity should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ code: 'INVALID_CONFIGURATION' });
    }
    expect(store.getState().products).toBe(before);
    expect(store.getState().products.get('cheese')?.dailyCapacity).toBe(150);
  });

  it('sets the overall daily capacity', () => {
    store.getState().setOverallDailyCapacity(1200);

    expect(store.getState().overallDailyCapacity).toBe(1200);
    expect(() => store.getState().setOverallDailyCapacity(-5)).toThrow(ConfigurationError);
    expect(store.getState().overallDailyCapacity).toBe(1200);
  });
});
