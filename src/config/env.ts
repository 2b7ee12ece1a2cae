import { z } from 'zod';

/**
 * Comma-separated list helper
 */
const csvList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) => val.split(',').map((item) => item.trim()).filter(Boolean));

/**
 * Environment variable schema validation using Zod
 */
export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  HOST: z.string().default('0.0.0.0'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024), // 20MB

  // Database
  DATABASE_URL: z.string().url(),
  DB_POOL_MAX: z.coerce.number().default(10),
  DB_POOL_IDLE_TIMEOUT_MS: z.coerce.number().default(30000),
  DB_POOL_CONNECTION_TIMEOUT_MS: z.coerce.number().default(2000),

  // Redis
  REDIS_URL: z.string().url().default('redis://localhost:6379'),

  // S3/Storage (S3-compatible storage - MinIO, AWS S3, DigitalOcean Spaces, etc.)
  S3_BUCKET: z.string(),
  S3_REGION: z.string().default('us-east-1'),
  S3_ENDPOINT: z.string().url(),
  S3_ACCESS_KEY_ID: z.string(),
  S3_SECRET_ACCESS_KEY: z.string(),
  S3_FORCE_PATH_STYLE: z
    .enum(['true', 'false'])
    .default('false')
    .transform((val) => val === 'true'),
  OUTPUT_URL_EXPIRY_SECONDS: z.coerce.number().min(60).max(604800).default(3600),

  // Background removal
  BACKGROUND_REMOVAL_PROVIDER: z.enum(['replicate', 'stability']).default('replicate'),
  REPLICATE_API_TOKEN: z.string().optional(),
  REPLICATE_API_BASE: z.string().url().default('https://api.replicate.com'),
  REPLICATE_MODEL: z.string().regex(/^[\w.-]+\/[\w.-]+$/).default('cjwbw/rembg'),
  REPLICATE_MODEL_VERSION: z.string().optional(),
  STABILITY_API_KEY: z.string().optional(),
  STABILITY_API_BASE: z.string().url().default('https://api.stability.ai'),
  API_RETRY_DELAY_MS: z.coerce.number().default(1000),
  API_POLL_INTERVAL_MS: z.coerce.number().default(1500),
  API_MAX_POLL_ATTEMPTS: z.coerce.number().default(80),

  // Worker / queue
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(2),
  QUEUE_COMPLETED_COUNT: z.coerce.number().default(100),
  QUEUE_FAILED_COUNT: z.coerce.number().default(1000),
  QUEUE_COMPLETED_AGE_SECONDS: z.coerce.number().default(86400), // 24 hours
  QUEUE_FAILED_AGE_SECONDS: z.coerce.number().default(604800), // 7 days

  // Collage layout
  CANVAS_WIDTH: z.coerce.number().int().positive().default(1920),
  CANVAS_HEIGHT: z.coerce.number().int().positive().default(1080),
  BORDER_THICKNESS: z.coerce.number().int().min(0).default(25),
  GAP_THICKNESS: z.coerce.number().int().min(0).default(10),
  PRODUCT_WIDTH_RATIO: z.coerce.number().gt(0).lt(1).default(0.25),
  VARIANTS_WIDTH_RATIO: z.coerce.number().gt(0).lt(1).default(0.75),
  AUTO_ROTATE_VARIANTS: z
    .enum(['true', 'false'])
    .default('false')
    .transform((val) => val === 'true'),

  // Background templates
  BACKGROUNDS_DIR: z.string().default('assets/backgrounds'),
  BACKGROUND_NAMES: csvList(
    'base_light_pink.png,base_mint_green.png,base_powder_blue.png,base_lavender.png,base_cream.png'
  ),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // CORS
  CORS_ALLOWED_DOMAINS: csvList(''),
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
    // Use stderr for pre-logger initialization errors
    process.stderr.write('Environment validation failed:\n');
    process.stderr.write(JSON.stringify(errors, null, 2) + '\n');
    throw new Error('Invalid environment configuration');
  }

  cachedEnv = result.data;
  return cachedEnv;
}

/**
 * Get validated environment (throws if not initialized)
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    return parseEnv();
  }
  return cachedEnv;
}
