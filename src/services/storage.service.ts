import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
  HeadObjectCommand,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { randomBytes } from 'crypto';

import { createChildLogger } from '../utils/logger.js';
import { getConfig } from '../config/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { DEFAULT_IMAGE_EXTENSION } from '../utils/image-utils.js';

const logger = createChildLogger({ service: 'storage' });

export interface UploadResult {
  key: string;
  url: string;
  size: number;
}

/**
 * StorageService - S3-compatible object storage for uploads and rendered collages
 */
export class StorageService {
  private client: S3Client | null = null;

  /**
   * Initialize S3 client
   */
  init(): S3Client {
    if (this.client) {
      return this.client;
    }

    const config = getConfig();

    // Validate required S3 configuration
    const missingConfig: string[] = [];
    if (!config.storage.bucket) missingConfig.push('bucket');
    if (!config.storage.region) missingConfig.push('region');
    if (!config.storage.endpoint) missingConfig.push('endpoint');
    if (!config.storage.accessKeyId) missingConfig.push('accessKeyId');
    if (!config.storage.secretAccessKey) missingConfig.push('secretAccessKey');

    if (missingConfig.length > 0) {
      const errorMsg = `Missing required S3 configuration: ${missingConfig.join(', ')}`;
      logger.error({ missingConfig }, errorMsg);
      throw new ConfigurationError(errorMsg);
    }

    this.client = new S3Client({
      region: config.storage.region,
      endpoint: config.storage.endpoint,
      credentials: {
        accessKeyId: config.storage.accessKeyId,
        secretAccessKey: config.storage.secretAccessKey,
      },
      forcePathStyle: config.storage.forcePathStyle,
    });

    logger.info(
      {
        region: config.storage.region,
        endpoint: config.storage.endpoint,
        bucket: config.storage.bucket,
        forcePathStyle: config.storage.forcePathStyle,
      },
      'S3 client initialized'
    );

    return this.client;
  }

  /**
   * Get bucket name
   */
  private getBucket(): string {
    return getConfig().storage.bucket;
  }

  /**
   * Upload a buffer to S3
   */
  async uploadBuffer(buffer: Buffer, s3Key: string, contentType = 'application/octet-stream'): Promise<UploadResult> {
    const client = this.init();
    const bucket = this.getBucket();

    await client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: s3Key,
        Body: buffer,
        ContentType: contentType,
      })
    );

    const url = this.getPublicUrl(s3Key);
    logger.info({ key: s3Key, size: buffer.length }, 'Buffer uploaded to S3');

    return {
      key: s3Key,
      url,
      size: buffer.length,
    };
  }

  /**
   * Download an object into memory
   */
  async downloadBuffer(s3Key: string): Promise<Buffer> {
    const client = this.init();
    const bucket = this.getBucket();

    const response = await client.send(
      new GetObjectCommand({
        Bucket: bucket,
        Key: s3Key,
      })
    );

    if (!response.Body) {
      throw new Error(`No body in S3 response for ${s3Key}`);
    }

    const bytes = await response.Body.transformToByteArray();
    logger.debug({ key: s3Key, size: bytes.length }, 'Object downloaded from S3');
    return Buffer.from(bytes);
  }

  /**
   * Check if file exists in S3
   */
  async exists(s3Key: string): Promise<boolean> {
    const client = this.init();
    const bucket = this.getBucket();

    try {
      await client.send(
        new HeadObjectCommand({
          Bucket: bucket,
          Key: s3Key,
        })
      );
      return true;
    } catch (error) {
      if (error instanceof Error && error.name === 'NotFound') {
        return false;
      }
      throw error;
    }
  }

  /**
   * Delete a file from S3
   */
  async deleteFile(s3Key: string): Promise<void> {
    const client = this.init();
    const bucket = this.getBucket();

    await client.send(
      new DeleteObjectCommand({
        Bucket: bucket,
        Key: s3Key,
      })
    );

    logger.info({ key: s3Key }, 'File deleted from S3');
  }

  /**
   * Get a presigned URL for download
   */
  async getPresignedUrl(s3Key: string, expiresIn = getConfig().storage.outputUrlExpirySeconds): Promise<string> {
    const client = this.init();
    const bucket = this.getBucket();

    const command = new GetObjectCommand({
      Bucket: bucket,
      Key: s3Key,
    });

    return getSignedUrl(client, command, { expiresIn });
  }

  /**
   * Get public URL for a key
   * Works with any S3-compatible storage (MinIO, AWS S3, DigitalOcean Spaces, etc.)
   */
  getPublicUrl(s3Key: string): string {
    const config = getConfig();
    const endpoint = config.storage.endpoint.replace(/\/$/, '');

    if (config.storage.forcePathStyle) {
      // Path-style URL: http://endpoint/bucket/key (required for MinIO and some S3-compatible services)
      return `${endpoint}/${config.storage.bucket}/${s3Key}`;
    }

    // Virtual-hosted-style URL: endpoint/key (for AWS S3, set endpoint to https://bucket.s3.region.amazonaws.com)
    return `${endpoint}/${s3Key}`;
  }

  /**
   * Sanitize a path segment for S3 key usage
   * Removes path traversal attempts and invalid characters
   */
  private sanitizeKeySegment(segment: string): string {
    return segment
      // Remove path traversal attempts
      .replace(/\.\./g, '')
      // Remove leading/trailing slashes
      .replace(/^\/+|\/+$/g, '')
      // Keep alphanumeric, dash, underscore, dot
      .replace(/[^a-zA-Z0-9\-_.]/g, '_');
  }

  /**
   * Key for an uploaded input image: inputs/{sessionId}_{n}_{revision}{ext}
   * The revision is random unless given, so every upload lands on its own object.
   */
  getInputKey(
    sessionId: string,
    imageNum: number,
    extension = DEFAULT_IMAGE_EXTENSION,
    revision = randomBytes(4).toString('hex')
  ): string {
    const ext = /^\.[a-z0-9]+$/i.test(extension) ? extension.toLowerCase() : DEFAULT_IMAGE_EXTENSION;
    return `inputs/${this.sanitizeKeySegment(sessionId)}_${imageNum}_${this.sanitizeKeySegment(revision)}${ext}`;
  }

  /**
   * Key for the rendered collage: outputs/{sessionId}.png
   */
  getOutputKey(sessionId: string): string {
    return `outputs/${this.sanitizeKeySegment(sessionId)}.png`;
  }
}

export const storageService = new StorageService();
