import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as Minio from 'minio';
import { extname } from 'path';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { ObjectStoreClient } from './interfaces/object-store.interface';
import { ObjectStoreException } from './storage.exceptions';

/** S3 error codes that mean the bucket is already there */
const BUCKET_EXISTS_CODES = new Set(['BucketAlreadyOwnedByYou', 'BucketAlreadyExists']);

const CONTENT_TYPES: Record<string, string> = {
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
  '.mkv': 'video/x-matroska',
  '.txt': 'text/plain; charset=utf-8',
  '.vtt': 'text/vtt; charset=utf-8',
};

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * MinioObjectStore — ObjectStoreClient backed by MinIO (S3-compatible).
 *
 * Object keys are used verbatim: `series/{series}/{file}`.
 * References returned by put() have the form
 *   {http|https}://{endpoint}:{port}/{bucket}/{key}
 *
 * Prefixes are implicit in S3, so mkdir() only has to make sure the bucket
 * exists. The check is done once per process.
 */
@Injectable()
export class MinioObjectStore implements ObjectStoreClient {
  private readonly logger = new Logger(MinioObjectStore.name);
  private readonly client: Minio.Client;
  private readonly bucket: string;
  private readonly endpoint: string;
  private readonly port: number;
  private readonly useSSL: boolean;
  private bucketReady = false;

  constructor(
    configService: ConfigService,

    @Inject(pipelineConfig.KEY)
    config: PipelineConfig,
  ) {
    this.endpoint = configService.get<string>('MINIO_ENDPOINT', 'localhost');
    this.port = Number(configService.get<string>('MINIO_PORT', '9000'));
    this.useSSL = configService.get<string>('MINIO_USE_SSL', 'false') === 'true';
    this.bucket = config.contentBucket;

    this.client = new Minio.Client({
      endPoint: this.endpoint,
      port: this.port,
      useSSL: this.useSSL,
      accessKey: configService.get<string>('MINIO_ACCESS_KEY', 'minioadmin'),
      secretKey: configService.get<string>('MINIO_SECRET_KEY', 'minioadmin'),
    });
  }

  async mkdir(remotePath: string): Promise<void> {
    if (this.bucketReady) return;

    try {
      const exists = await this.client.bucketExists(this.bucket);
      if (!exists) {
        await this.client.makeBucket(this.bucket);
        this.logger.log(`Created bucket "${this.bucket}"`);
      }
    } catch (error) {
      const code = errorCode(error);
      if (!code || !BUCKET_EXISTS_CODES.has(code)) {
        throw new ObjectStoreException('mkdir', `${this.bucket}/${remotePath}`, error);
      }
    }

    this.bucketReady = true;
  }

  async put(localPath: string, remoteKey: string): Promise<string> {
    const contentType =
      CONTENT_TYPES[extname(localPath).toLowerCase()] ?? 'application/octet-stream';

    try {
      await this.client.fPutObject(this.bucket, remoteKey, localPath, {
        'Content-Type': contentType,
      });
    } catch (error) {
      throw new ObjectStoreException('put', remoteKey, error);
    }

    this.logger.debug(`Uploaded ${localPath} → ${this.bucket}/${remoteKey}`);
    return this.referenceFor(remoteKey);
  }

  private referenceFor(remoteKey: string): string {
    const scheme = this.useSSL ? 'https' : 'http';
    const key = remoteKey.split('/').map(encodeURIComponent).join('/');
    return `${scheme}://${this.endpoint}:${this.port}/${this.bucket}/${key}`;
  }
}
