import { envSchema } from '../config/env.js';
import { buildConfig, type AppConfig } from '../config/index.js';

/**
 * A complete AppConfig for tests, built through the real schema
 */
export function createTestConfig(overrides: Record<string, string> = {}): AppConfig {
  return buildConfig(
    envSchema.parse({
      NODE_ENV: 'test',
      DATABASE_URL: 'postgres://localhost/collage_test',
      S3_BUCKET: 'test-bucket',
      S3_ENDPOINT: 'http://localhost:9000',
      S3_ACCESS_KEY_ID: 'test-access-key',
      S3_SECRET_ACCESS_KEY: 'test-secret',
      S3_FORCE_PATH_STYLE: 'true',
      REPLICATE_API_TOKEN: 'test-token',
      STABILITY_API_KEY: 'test-secret',
      API_RETRY_DELAY_MS: '0',
      API_POLL_INTERVAL_MS: '0',
      API_MAX_POLL_ATTEMPTS: '3',
      ...overrides,
    })
  );
}
