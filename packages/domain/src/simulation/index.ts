export * from './facility-simulation';
