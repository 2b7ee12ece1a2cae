import { getEnv, parseEnv, type Env } from './env.js';
import { DEFAULT_COLLAGE_CONFIG } from '../utils/constants.js';
import type { CollageConfig } from '../types/collage.types.js';

export { getEnv, parseEnv, type Env };

/**
 * Application configuration derived from environment
 */
export interface AppConfig {
  server: {
    port: number;
    host: string;
    env: 'development' | 'production' | 'test';
    maxUploadBytes: number;
  };
  database: {
    url: string;
    poolMax: number;
    poolIdleTimeoutMs: number;
    poolConnectionTimeoutMs: number;
  };
  redis: {
    url: string;
  };
  cors: {
    allowedDomains: string[];
  };
  storage: {
    bucket: string;
    region: string;
    endpoint: string;
    accessKeyId: string;
    secretAccessKey: string;
    forcePathStyle: boolean;
    outputUrlExpirySeconds: number;
  };
  backgroundRemoval: {
    provider: 'replicate' | 'stability';
    retryDelayMs: number;
    pollIntervalMs: number;
    maxPollAttempts: number;
  };
  apis: {
    replicate?: string;
    replicateBase: string;
    replicateModel: string;
    replicateModelVersion?: string;
    stability?: string;
    stabilityBase: string;
  };
  worker: {
    concurrency: number;
  };
  queue: {
    completedCount: number;
    failedCount: number;
    completedAgeSeconds: number;
    failedAgeSeconds: number;
  };
  assets: {
    backgroundsDir: string;
    backgroundNames: string[];
  };
  collage: CollageConfig;
  logging: {
    level: string;
  };
}

/**
 * Build application config from validated environment
 */
export function buildConfig(env: Env): AppConfig {
  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      env: env.NODE_ENV,
      maxUploadBytes: env.MAX_UPLOAD_BYTES,
    },
    database: {
      url: env.DATABASE_URL,
      poolMax: env.DB_POOL_MAX,
      poolIdleTimeoutMs: env.DB_POOL_IDLE_TIMEOUT_MS,
      poolConnectionTimeoutMs: env.DB_POOL_CONNECTION_TIMEOUT_MS,
    },
    redis: {
      url: env.REDIS_URL,
    },
    cors: {
      allowedDomains: env.CORS_ALLOWED_DOMAINS,
    },
    storage: {
      bucket: env.S3_BUCKET,
      region: env.S3_REGION,
      endpoint: env.S3_ENDPOINT,
      accessKeyId: env.S3_ACCESS_KEY_ID,
      secretAccessKey: env.S3_SECRET_ACCESS_KEY,
      forcePathStyle: env.S3_FORCE_PATH_STYLE,
      outputUrlExpirySeconds: env.OUTPUT_URL_EXPIRY_SECONDS,
    },
    backgroundRemoval: {
      provider: env.BACKGROUND_REMOVAL_PROVIDER,
      retryDelayMs: env.API_RETRY_DELAY_MS,
      pollIntervalMs: env.API_POLL_INTERVAL_MS,
      maxPollAttempts: env.API_MAX_POLL_ATTEMPTS,
    },
    apis: {
      replicate: env.REPLICATE_API_TOKEN,
      replicateBase: env.REPLICATE_API_BASE,
      replicateModel: env.REPLICATE_MODEL,
      replicateModelVersion: env.REPLICATE_MODEL_VERSION,
      stability: env.STABILITY_API_KEY,
      stabilityBase: env.STABILITY_API_BASE,
    },
    worker: {
      concurrency: env.WORKER_CONCURRENCY,
    },
    queue: {
      completedCount: env.QUEUE_COMPLETED_COUNT,
      failedCount: env.QUEUE_FAILED_COUNT,
      completedAgeSeconds: env.QUEUE_COMPLETED_AGE_SECONDS,
      failedAgeSeconds: env.QUEUE_FAILED_AGE_SECONDS,
    },
    assets: {
      backgroundsDir: env.BACKGROUNDS_DIR,
      backgroundNames: env.BACKGROUND_NAMES,
    },
    collage: {
      ...DEFAULT_COLLAGE_CONFIG,
      canvas: {
        width: env.CANVAS_WIDTH,
        height: env.CANVAS_HEIGHT,
        border: env.BORDER_THICKNESS,
        gap: env.GAP_THICKNESS,
        widthRatios: [env.PRODUCT_WIDTH_RATIO, env.VARIANTS_WIDTH_RATIO],
      },
      autoRotateVariants: env.AUTO_ROTATE_VARIANTS,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Get application configuration
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    const env = getEnv();
    cachedConfig = buildConfig(env);
  }
  return cachedConfig;
}
