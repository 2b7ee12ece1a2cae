/**
 * HTTP helpers shared by the hosted background-removal providers.
 */

import { ExternalApiError } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';

const logger = createChildLogger({ service: 'api-request' });

/**
 * Request defaults
 */
export const API_REQUEST_CONSTANTS = {
  /** Maximum attempts per request */
  MAX_RETRIES: 3,
  /** Base delay; attempt n waits n times this */
  RETRY_DELAY_MS: 1000,
} as const;

export interface ApiRequestOptions {
  /** Service name used in ExternalApiError messages, e.g. "Replicate" */
  service: string;
  url: string;
  init: RequestInit;
  /** Current attempt number (for retries) */
  attempt?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  /** Operation name for logging */
  operationName?: string;
}

/**
 * Delay helper
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return `HTTP ${response.status}`;
  }
}

/**
 * fetch with linear backoff on rate limits, server errors and network failures.
 * Resolves with a 2xx response; anything else ends in ExternalApiError.
 */
export async function requestWithRetry(options: ApiRequestOptions): Promise<Response> {
  const {
    service,
    url,
    init,
    attempt = 1,
    maxRetries = API_REQUEST_CONSTANTS.MAX_RETRIES,
    retryDelayMs = API_REQUEST_CONSTANTS.RETRY_DELAY_MS,
    operationName = 'api-request',
  } = options;

  let response: Response;
  try {
    logger.debug({ service, operationName, attempt }, 'Calling external API');
    response = await fetch(url, init);
  } catch (error) {
    if (attempt < maxRetries) {
      logger.warn({ service, operationName, attempt, error: errorMessage(error) }, 'Request failed, retrying...');
      await delay(retryDelayMs * attempt);
      return requestWithRetry({ ...options, attempt: attempt + 1 });
    }
    throw new ExternalApiError(
      service,
      `Request failed: ${errorMessage(error)}`,
      error instanceof Error ? error : undefined
    );
  }

  if (response.ok) {
    return response;
  }

  const details = await readErrorBody(response);
  logger.error(
    { service, operationName, status: response.status, error: details.slice(0, 500), attempt },
    'External API error'
  );

  if (isRetryableStatus(response.status) && attempt < maxRetries) {
    logger.warn({ service, operationName, status: response.status, attempt }, 'External API error, retrying...');
    await delay(retryDelayMs * attempt);
    return requestWithRetry({ ...options, attempt: attempt + 1 });
  }

  throw new ExternalApiError(service, `API error (HTTP ${response.status}): ${details.slice(0, 500)}`);
}

/**
 * Read a successful response body into a Buffer
 */
export async function readBuffer(response: Response): Promise<Buffer> {
  return Buffer.from(await response.arrayBuffer());
}
