// Domain boundaries - Public API
// Expose each context via a namespace to keep internals private
export * as Products from './products';
export * as Estimation from './estimation';
export * as Sequences from './sequences';
export * as Reporting from './reporting';
export * as Configuration from './configuration';
export * as Quantities from './quantities';
export * as Simulation from './simulation';

// Cross-cutting interfaces and infrastructure
export * as UseCases from './use-cases/interfaces';
export * as Shared from './shared';

// Testing utilities (factories/builders) - exposed for test code
export * as Testing from './testing';
