import type { ProductEstimate } from '../estimation/estimator';
import { WORKING_HOURS_PER_DAY } from '../estimation/estimator';
import type { FacilityErrorCode } from '../shared/errors';

export enum WarningKind {
  IncompleteRequest = 'incomplete_request',
  ConfigurationError = 'configuration_error',
  DegenerateSequence = 'degenerate_sequence',
}

export interface IncompleteRequestWarning {
  kind: WarningKind.IncompleteRequest;
  sequenceId: string;
  productKey: string;
  message: string;
}

export interface ConfigurationErrorWarning {
  kind: WarningKind.ConfigurationError;
  sequenceId: string;
  productKey: string;
  code: FacilityErrorCode;
  message: string;
}

export interface DegenerateSequenceWarning {
  kind: WarningKind.DegenerateSequence;
  sequenceId: string;
  message: string;
}

export type AggregationWarning = IncompleteRequestWarning | ConfigurationErrorWarning | DegenerateSequenceWarning;

export interface SequenceReport {
  readonly sequenceId: string;
  readonly estimates: readonly ProductEstimate[];
  readonly totalProcessingHours: number;
  // max of member effective days: members run on parallel lines
  readonly totalDays: number;
  readonly averageHoursPerDay: number;
  // share of the working day used on average, in percent
  readonly utilizationPercent: number;
  // true when no member could be computed; every total is then 0
  readonly degenerate: boolean;
  readonly warnings: readonly AggregationWarning[];
}

export interface FacilityReport {
  readonly generatedAt: Date;
  readonly quantities: Readonly<Record<string, number>>;
  readonly sequences: readonly SequenceReport[];
  readonly totalProcessingHours: number;
  readonly totalDays: number;
  readonly averageHoursPerDay: number;
  readonly utilizationPercent: number;
  readonly totalQuantity: number;
  readonly overallDailyCapacity: number | null;
  readonly warnings: readonly AggregationWarning[];
}

export function averageHoursPerDay(totalProcessingHours: number, totalDays: number): number {
  return totalProcessingHours / Math.max(totalDays, 1);
}

export function utilizationPercent(hoursPerDay: number): number {
  return (hoursPerDay / WORKING_HOURS_PER_DAY) * 100;
}
