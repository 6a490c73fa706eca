export * from './errors';
export * from './logger';
export { env, loadEnv, LOG_LEVELS } from './env';
export type { FacilityEnv, LogLevelSetting } from './env';
