import { z, ZodError } from 'zod';
import { ConfigError } from '../domain/errors.js';
import { toFieldIssues } from '../domain/validation.js';

const DEFAULT_SHOP_NAMES = 'Wonderjoy,Ttushop,Cosbla,Only,Yeojin,Soyeon';

/**
 * Environment variable schema with strict validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(3000),

  // Data storage
  SQLITE_DB_PATH: z.string().min(1).default('./data/lending.db'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),

  // Counterparties offered by entry forms (comma separated)
  SHOP_NAMES: z
    .string()
    .default(DEFAULT_SHOP_NAMES)
    .transform((value) =>
      value
        .split(',')
        .map((name) => name.trim())
        .filter((name) => name.length > 0)
    )
    .pipe(z.array(z.string()).min(1, { message: 'SHOP_NAMES must list at least one shop' })),

  CURRENCY_SYMBOL: z.string().min(1).default('₩'),

  RECENT_TRANSACTIONS_LIMIT: z.coerce
    .number()
    .int()
    .min(1, { message: 'RECENT_TRANSACTIONS_LIMIT must be at least 1' })
    .default(10),

  // CSV uploads
  MAX_UPLOAD_BYTES: z.coerce
    .number()
    .int()
    .min(1024, { message: 'MAX_UPLOAD_BYTES must be at least 1024' })
    .default(5 * 1024 * 1024),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses a set of environment variables, throwing ConfigError with every issue
 */
export function loadEnv(source: NodeJS.ProcessEnv): Env {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError('Environment validation failed', toFieldIssues(error));
    }
    throw error;
  }
}

/**
 * Validates process.env
 * Exits process with code 1 if validation fails (fail-fast principle)
 */
export function validateEnv(): Env {
  try {
    return loadEnv(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((issue) => {
        console.error(`  - ${issue.field}: ${issue.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
