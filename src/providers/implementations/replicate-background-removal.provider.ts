/**
 * Replicate Background Removal Provider
 *
 * Runs a rembg-style model on Replicate. The image goes up as a data URI,
 * the prediction is awaited (Prefer: wait, then polling) and the output URL downloaded.
 *
 * API Reference: https://replicate.com/docs/reference/http#predictions.create
 */

import { z } from 'zod';

import { createChildLogger } from '../../utils/logger.js';
import { ExternalApiError } from '../../utils/errors.js';
import { getConfig } from '../../config/index.js';
import { detectImageMimeType } from '../../utils/image-utils.js';
import { delay, readBuffer, requestWithRetry } from '../utils/api-request.js';
import type {
  BackgroundRemovalProvider,
  BackgroundRemovalOptions,
} from '../interfaces/background-removal.provider.js';

const logger = createChildLogger({ service: 'replicate-bg-removal' });

const SERVICE = 'Replicate';

const TERMINAL_STATUSES = new Set(['succeeded', 'failed', 'canceled']);

const predictionSchema = z.object({
  id: z.string(),
  status: z.enum(['starting', 'processing', 'succeeded', 'failed', 'canceled']),
  output: z.union([z.string(), z.array(z.string())]).nullish(),
  error: z.unknown().optional(),
  urls: z.object({ get: z.string().optional() }).optional(),
});

export type ReplicatePrediction = z.infer<typeof predictionSchema>;

/**
 * The model returns either a single URL or a list; the last entry is the final image
 */
export function coerceOutputUrl(output: ReplicatePrediction['output']): string | null {
  if (typeof output === 'string') return output;
  if (Array.isArray(output) && output.length > 0) return output[output.length - 1];
  return null;
}

export class ReplicateBackgroundRemovalProvider implements BackgroundRemovalProvider {
  readonly providerId = 'replicate';

  async removeBackground(image: Buffer, options: BackgroundRemovalOptions = {}): Promise<Buffer> {
    const config = getConfig();
    const token = config.apis.replicate;

    if (!token) {
      throw new ExternalApiError(SERVICE, 'API token not configured (REPLICATE_API_TOKEN)');
    }

    const mimeType = options.mimeType ?? detectImageMimeType(image) ?? 'image/png';
    const dataUri = `data:${mimeType};base64,${image.toString('base64')}`;

    logger.info(
      { requestId: options.requestId, model: config.apis.replicateModel, bytes: image.length },
      'Removing background with Replicate'
    );

    const created = await this.createPrediction(token, dataUri);
    const finished = await this.waitForPrediction(token, created);

    if (finished.status !== 'succeeded') {
      const reason = typeof finished.error === 'string' ? finished.error : 'no error message';
      throw new ExternalApiError(SERVICE, `Prediction ${finished.id} ${finished.status}: ${reason}`);
    }

    const outputUrl = coerceOutputUrl(finished.output);
    if (!outputUrl) {
      throw new ExternalApiError(SERVICE, `Prediction ${finished.id} returned no output`);
    }

    const response = await requestWithRetry({
      service: SERVICE,
      url: outputUrl,
      init: { method: 'GET' },
      retryDelayMs: config.backgroundRemoval.retryDelayMs,
      operationName: 'replicate-download',
    });
    const result = await readBuffer(response);

    logger.info(
      { requestId: options.requestId, predictionId: finished.id, size: result.length },
      'Background removed successfully with Replicate'
    );

    return result;
  }

  private async createPrediction(token: string, dataUri: string): Promise<ReplicatePrediction> {
    const config = getConfig();
    const { replicateBase, replicateModel, replicateModelVersion } = config.apis;

    const url = replicateModelVersion
      ? `${replicateBase}/v1/predictions`
      : `${replicateBase}/v1/models/${replicateModel}/predictions`;
    const body = replicateModelVersion
      ? { version: replicateModelVersion, input: { image: dataUri } }
      : { input: { image: dataUri } };

    const response = await requestWithRetry({
      service: SERVICE,
      url,
      init: {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
          Prefer: 'wait',
        },
        body: JSON.stringify(body),
      },
      retryDelayMs: config.backgroundRemoval.retryDelayMs,
      operationName: 'replicate-create',
    });

    return this.parsePrediction(response);
  }

  private async waitForPrediction(token: string, prediction: ReplicatePrediction): Promise<ReplicatePrediction> {
    const config = getConfig();
    const { pollIntervalMs, maxPollAttempts, retryDelayMs } = config.backgroundRemoval;
    const pollUrl = prediction.urls?.get ?? `${config.apis.replicateBase}/v1/predictions/${prediction.id}`;

    let current = prediction;
    for (let attempt = 0; !TERMINAL_STATUSES.has(current.status); attempt++) {
      if (attempt >= maxPollAttempts) {
        throw new ExternalApiError(SERVICE, `Prediction ${prediction.id} timed out after polling`);
      }

      await delay(pollIntervalMs);
      logger.debug({ predictionId: prediction.id, status: current.status, attempt }, 'Polling prediction');

      const response = await requestWithRetry({
        service: SERVICE,
        url: pollUrl,
        init: { method: 'GET', headers: { Authorization: `Bearer ${token}` } },
        retryDelayMs,
        operationName: 'replicate-poll',
      });
      current = await this.parsePrediction(response);
    }

    return current;
  }

  private async parsePrediction(response: Response): Promise<ReplicatePrediction> {
    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new ExternalApiError(SERVICE, 'Response was not JSON', error instanceof Error ? error : undefined);
    }

    const parsed = predictionSchema.safeParse(json);
    if (!parsed.success) {
      throw new ExternalApiError(SERVICE, `Unexpected prediction payload: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  isAvailable(): boolean {
    try {
      const config = getConfig();
      return !!config.apis.replicate;
    } catch {
      return false;
    }
  }
}

export const replicateBackgroundRemovalProvider = new ReplicateBackgroundRemovalProvider();
