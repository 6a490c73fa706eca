export * from './value-objects';
export * from './product-spec';
export * from './production-request';
