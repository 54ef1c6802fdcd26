import { z } from 'zod';

/** Matches `#rgb` or `#rrggbb` */
const HEX_COLOR_PATTERN = /^#(?:[0-9a-fA-F]{3}){1,2}$/;

/**
 * Environment variable schema validation using Zod
 */
export const envSchema = z.object({
  // Runtime
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Batch layout
  INPUT_DIR: z.string().min(1).default('images/inputs'),
  BACKGROUND_DIR: z.string().min(1).default('images/backgrounds'),
  OUTPUT_DIR: z.string().min(1).default('images/outputs'),

  // Worker pool
  MAX_WORKERS: z.coerce.number().int().positive().default(4),
  WORKER_MODE: z.enum(['process', 'inline']).default('process'),

  // Subject extraction
  SUBJECT_EXTRACTION_PROVIDER: z.enum(['stability', 'photoroom']).default('stability'),
  STABILITY_API_KEY: z.string().optional(),
  STABILITY_API_BASE: z.string().url().default('https://api.stability.ai'),
  PHOTOROOM_API_KEY: z.string().optional(),
  PHOTOROOM_API_BASE: z.string().url().default('https://sdk.photoroom.com'),
  EXTRACTION_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  EXTRACTION_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2000),

  // Compositing
  FLATTEN_COLOR: z.string().regex(HEX_COLOR_PATTERN, 'Expected a hex color such as #ffffff').default('#ffffff'),

  // Background resize tool
  RESIZE_MIN_DIMENSION: z.coerce.number().int().positive().default(350),
  RESIZED_FOLDER_NAME: z.string().min(1).default('resized_backgrounds'),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables
 */
export function parseEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.format();
    // Logger depends on config, so validation errors go straight to stderr
    process.stderr.write('Environment validation failed:\n');
    process.stderr.write(JSON.stringify(errors, null, 2) + '\n');
    throw new Error('Invalid environment configuration');
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * Get validated environment (parses on first use)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    return parseEnv();
  }
  return cachedEnv;
}
