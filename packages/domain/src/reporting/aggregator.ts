import { estimateProduct, type ProductEstimate } from '../estimation/estimator';
import type { ProductCatalog } from '../products/product-spec';
import type { ProductionRequest } from '../products/production-request';
import type { SequenceDefinition } from '../sequences/sequence';
import { ConfigurationError } from '../shared/errors';
import { logger } from '../shared/logger';
import {
  WarningKind,
  averageHoursPerDay,
  utilizationPercent,
  type AggregationWarning,
  type FacilityReport,
  type SequenceReport,
} from './report';

export interface FacilityAggregationOptions {
  generatedAt?: Date;
  overallDailyCapacity?: number | null;
}

/**
 * Folds the estimates of one sequence's members into sequence totals.
 *
 * Members without a requested quantity are skipped with a warning. A member
 * whose estimate fails on configuration is skipped on its own and the pass
 * continues. When nothing resolves, the report is marked degenerate.
 */
export function aggregateSequence(
  sequence: SequenceDefinition,
  catalog: ProductCatalog,
  request: ProductionRequest
): SequenceReport {
  const estimates: ProductEstimate[] = [];
  const warnings: AggregationWarning[] = [];

  for (const productKey of sequence.productKeys) {
    const quantity = request.quantityOf(productKey);
    if (quantity === undefined) {
      const message = `No quantity requested for '${productKey}'`;
      warnings.push({ kind: WarningKind.IncompleteRequest, sequenceId: sequence.id, productKey, message });
      logger.logSkippedProduct(sequence.id, productKey, 'quantity not defined');
      continue;
    }

    try {
      estimates.push(estimateProduct(catalog, productKey, quantity));
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      warnings.push({
        kind: WarningKind.ConfigurationError,
        sequenceId: sequence.id,
        productKey,
        code: error.code,
        message: error.message,
      });
      logger.logSkippedProduct(sequence.id, productKey, error.message);
    }
  }

  if (estimates.length === 0) {
    warnings.push({
      kind: WarningKind.DegenerateSequence,
      sequenceId: sequence.id,
      message: `Sequence '${sequence.id}' has no computable products`,
    });
    logger.warn(`Sequence ${sequence.id} produced an empty report`, {
      sequenceId: sequence.id,
      event: 'degenerate_sequence',
    });
    return Object.freeze({
      sequenceId: sequence.id,
      estimates: Object.freeze([]),
      totalProcessingHours: 0,
      totalDays: 0,
      averageHoursPerDay: 0,
      utilizationPercent: 0,
      degenerate: true,
      warnings: Object.freeze(warnings),
    });
  }

  const totalProcessingHours = estimates.reduce((sum, item) => sum + item.processingHours, 0);
  const totalDays = Math.max(...estimates.map((item) => item.effectiveDays));
  const average = averageHoursPerDay(totalProcessingHours, totalDays);

  return Object.freeze({
    sequenceId: sequence.id,
    estimates: Object.freeze(estimates),
    totalProcessingHours,
    totalDays,
    averageHoursPerDay: average,
    utilizationPercent: utilizationPercent(average),
    degenerate: false,
    warnings: Object.freeze(warnings),
  });
}

/**
 * Aggregates every configured sequence, in configured order, into a facility
 * report. Facility duration is the slowest sequence (parallel lines).
 */
export function aggregateFacility(
  sequences: readonly SequenceDefinition[],
  catalog: ProductCatalog,
  request: ProductionRequest,
  options: FacilityAggregationOptions = {}
): FacilityReport {
  const reports = sequences.map((sequence) => aggregateSequence(sequence, catalog, request));

  const totalProcessingHours = reports.reduce((sum, report) => sum + report.totalProcessingHours, 0);
  const totalDays = reports.reduce((max, report) => Math.max(max, report.totalDays), 0);
  const average = averageHoursPerDay(totalProcessingHours, totalDays);

  return Object.freeze({
    generatedAt: options.generatedAt ?? new Date(),
    quantities: Object.freeze(request.toRecord()),
    sequences: Object.freeze(reports),
    totalProcessingHours,
    totalDays,
    averageHoursPerDay: average,
    utilizationPercent: utilizationPercent(average),
    totalQuantity: request.totalQuantity,
    overallDailyCapacity: options.overallDailyCapacity ?? null,
    warnings: Object.freeze(reports.flatMap((report) => report.warnings)),
  });
}
