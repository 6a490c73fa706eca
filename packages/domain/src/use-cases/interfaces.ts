// Shared use-case interfaces for the facility simulation.
// Technology-agnostic; the simulation facade is the in-process implementation.

// Optional CQRS split: Query and Command interfaces

export interface IFacilityQueries<TEstimate, TSequenceReport, TFacilityReport> {
  estimate(productKey: string, quantity?: number): TEstimate
  simulateSequence(sequenceId: string): TSequenceReport | null
  generateReport(): TFacilityReport
}

export interface IFacilityCommands<TRequest, TRange = unknown> {
  generateQuantities(range?: TRange): TRequest
  setQuantities(quantities: Record<string, number>): TRequest
  configureProcessingRate(productKey: string, hoursPerUnit: number): void
  configureDailyCapacity(productKey: string, dailyCapacity: number): void
  configureOverallDailyCapacity(capacity: number): void
}

export type IFacilityUseCases<TEstimate, TSequenceReport, TFacilityReport, TRequest, TRange = unknown> =
  IFacilityQueries<TEstimate, TSequenceReport, TFacilityReport> & IFacilityCommands<TRequest, TRange>
