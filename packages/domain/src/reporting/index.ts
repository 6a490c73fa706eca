export * from './report';
export * from './aggregator';
