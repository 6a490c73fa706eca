import type { FacilityConfigStore } from '../configuration/config-store';
import { estimateProduct, type ProductEstimate } from '../estimation/estimator';
import { ProductionRequest } from '../products/production-request';
import {
  generateRandomQuantities,
  type QuantityRange,
  type RandomSource,
} from '../quantities/quantity-generator';
import { aggregateFacility, aggregateSequence } from '../reporting/aggregator';
import type { FacilityReport, SequenceReport } from '../reporting/report';
import { findSequence } from '../sequences/sequence';
import { ConfigurationError, InvalidRequestError } from '../shared/errors';
import { logger, measurePerformance } from '../shared/logger';
import type { IFacilityUseCases } from '../use-cases/interfaces';

export interface FacilitySimulationDeps {
  clock?: () => Date;
  random?: RandomSource;
}

/**
 * Configure-then-compute workflow over the pure estimator and aggregator.
 * Holds the current quantity snapshot; configuration lives in the store.
 */
export class FacilitySimulation
  implements IFacilityUseCases<ProductEstimate, SequenceReport, FacilityReport, ProductionRequest, Partial<QuantityRange>>
{
  private request: ProductionRequest = ProductionRequest.empty();
  private readonly clock: () => Date;
  private readonly random: RandomSource;

  constructor(
    private readonly store: FacilityConfigStore,
    deps: FacilitySimulationDeps = {}
  ) {
    this.clock = deps.clock ?? (() => new Date());
    this.random = deps.random ?? Math.random;
  }

  get quantities(): ProductionRequest {
    return this.request;
  }

  generateQuantities(range: Partial<QuantityRange> = {}): ProductionRequest {
    const { products } = this.store.getState();
    this.request = generateRandomQuantities(products.keys(), range, this.random);
    logger.info('Production quantities generated', {
      products: this.request.size,
      totalQuantity: this.request.totalQuantity,
    });
    return this.request;
  }

  setQuantities(quantities: Record<string, number>): ProductionRequest {
    this.request = ProductionRequest.create(quantities);
    return this.request;
  }

  configureProcessingRate(productKey: string, hoursPerUnit: number): void {
    this.store.getState().updateProcessingRate(productKey, hoursPerUnit);
  }

  configureDailyCapacity(productKey: string, dailyCapacity: number): void {
    this.store.getState().updateDailyCapacity(productKey, dailyCapacity);
  }

  configureOverallDailyCapacity(capacity: number): void {
    this.store.getState().setOverallDailyCapacity(capacity);
  }

  estimate(productKey: string, quantity?: number): ProductEstimate {
    const resolved = quantity ?? this.request.quantityOf(productKey);
    if (resolved === undefined) {
      throw new InvalidRequestError(`No quantity requested for '${productKey}'`, { productKey });
    }
    return estimateProduct(this.store.getState().products, productKey, resolved);
  }

  simulateSequence(sequenceId: string): SequenceReport | null {
    const { products, sequences } = this.store.getState();
    const sequence = findSequence(sequences, sequenceId);
    if (!sequence) {
      const error = ConfigurationError.unknownSequence(sequenceId);
      logger.warn(error.message, { sequenceId, code: error.code });
      return null;
    }
    return aggregateSequence(sequence, products, this.request);
  }

  generateReport(): FacilityReport {
    const { products, sequences, overallDailyCapacity } = this.store.getState();
    return measurePerformance('facility report', () =>
      aggregateFacility(sequences, products, this.request, {
        generatedAt: this.clock(),
        overallDailyCapacity,
      })
    );
  }
}
