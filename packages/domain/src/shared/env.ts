import { z } from 'zod';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'critical', 'silent'] as const;

export type LogLevelSetting = (typeof LOG_LEVELS)[number];

// Environment variables read by the facility runtime
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  // Optional JSON file replacing the bundled facility configuration
  FACILITY_CONFIG_PATH: z
    .string()
    .trim()
    .optional()
    .transform((val) => (val && val.length > 0 ? val : undefined)),
});

export type FacilityEnv = z.infer<typeof envSchema>;

type EnvSource = Record<string, string | undefined>;

const warned = new Set<string>();

function warnOnce(msg: string) {
  if (!warned.has(msg)) {
    warned.add(msg);
    // eslint-disable-next-line no-console
    console.warn(msg);
  }
}

/**
 * Validates the environment. Strict in production, lenient elsewhere so a
 * mistyped LOG_LEVEL does not stop a local run.
 */
export function loadEnv(source: EnvSource = process.env): FacilityEnv {
  const result = envSchema.safeParse(source);
  if (result.success) return result.data;

  const nodeEnv = source.NODE_ENV;
  if (nodeEnv === 'production') {
    // eslint-disable-next-line no-console
    console.error('❌ Invalid environment variables:', result.error.flatten().fieldErrors);
    throw new Error('Invalid environment variables');
  }

  warnOnce('⚠️ Invalid environment variables, falling back to defaults for the invalid entries.');
  const fallback = envSchema.safeParse({
    NODE_ENV: nodeEnv === 'test' ? 'test' : 'development',
    FACILITY_CONFIG_PATH: source.FACILITY_CONFIG_PATH,
  });
  if (fallback.success) return fallback.data;
  return { NODE_ENV: 'development', LOG_LEVEL: 'info', FACILITY_CONFIG_PATH: undefined };
}

export const env = loadEnv();
