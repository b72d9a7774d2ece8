import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import { dirname, join, posix, resolve } from 'path';
import { pathToFileURL } from 'url';
import { firstValueFrom, from, throwError, timeout } from 'rxjs';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { OBJECT_STORE_CLIENT } from './storage.constants';
import { ObjectStoreClient } from './interfaces/object-store.interface';

/**
 * RemoteStoreService — best-effort durable storage for episode artifacts.
 *
 * upload() resolves to:
 *   - the object store reference, when the upload succeeds
 *   - a file:// reference into FALLBACK_DIR, when the object store fails or
 *     is not configured and REQUIRE_REMOTE_STORE is off
 *   - null, when REQUIRE_REMOTE_STORE is on and the object store failed,
 *     or when the local fallback copy itself failed
 *
 * Each object store call is limited to UPLOAD_TIMEOUT_MS; a call that runs
 * over counts as a failed upload. Never throws.
 */
@Injectable()
export class RemoteStoreService {
  private readonly logger = new Logger(RemoteStoreService.name);

  constructor(
    @Inject(OBJECT_STORE_CLIENT)
    private readonly client: ObjectStoreClient | null,

    @Inject(pipelineConfig.KEY)
    private readonly config: PipelineConfig,
  ) {}

  /** True when an object store is configured (uploads are not local-only) */
  get isRemoteEnabled(): boolean {
    return this.client !== null;
  }

  async upload(localPath: string, remotePath: string): Promise<string | null> {
    if (this.client) {
      try {
        await this.bounded(this.client.mkdir(posix.dirname(remotePath)), 'mkdir');
        const reference = await this.bounded(
          this.client.put(localPath, remotePath),
          'put',
        );
        this.logger.log(`Stored ${remotePath}`);
        return reference;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        if (this.config.requireRemoteStore) {
          this.logger.error(`Upload of ${remotePath} failed: ${message}`);
          return null;
        }
        this.logger.warn(
          `Upload of ${remotePath} failed, keeping a local copy instead: ${message}`,
        );
      }
    } else if (this.config.requireRemoteStore) {
      this.logger.error(
        `Remote storage is required but no object store is configured (${remotePath})`,
      );
      return null;
    }

    return this.copyToFallback(localPath, remotePath);
  }

  /** Stops waiting after the limit; the underlying request is not aborted */
  private bounded<T>(work: Promise<T>, operation: string): Promise<T> {
    const limit = this.config.uploadTimeoutMs;
    if (limit <= 0) return work;
    return firstValueFrom(
      from(work).pipe(
        timeout({
          first: limit,
          with: () =>
            throwError(() => new Error(`object store ${operation} timed out after ${limit}ms`)),
        }),
      ),
    );
  }

  private async copyToFallback(
    localPath: string,
    remotePath: string,
  ): Promise<string | null> {
    const target = resolve(join(this.config.fallbackDir, ...remotePath.split('/')));
    try {
      await fs.mkdir(dirname(target), { recursive: true });
      await fs.copyFile(localPath, target);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Local fallback copy of ${localPath} failed: ${message}`);
      return null;
    }

    this.logger.log(`Stored ${remotePath} locally at ${target}`);
    return pathToFileURL(target).href;
  }
}
