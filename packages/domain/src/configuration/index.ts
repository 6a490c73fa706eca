export * from './facility-config';
export * from './config-store';
