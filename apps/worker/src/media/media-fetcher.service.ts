import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import { basename, dirname, extname, join } from 'path';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { MEDIA_EXTRACTOR } from './media.constants';
import { MediaExtractor } from './interfaces/media-extractor.interface';

const FORMAT_SIBLING_SUFFIX = /^\.(f[\w-]+|temp)\.\w+(\.part|\.ytdl)?$/;

/**
 * MediaFetcherService — bounded-retry wrapper around the external extractor.
 *
 * An attempt counts as successful only if the extractor reports success
 * AND the destination file exists with a nonzero size. After a failed
 * attempt n the fetcher waits `fetchBaseDelayMs × n` before trying again.
 *
 * When every attempt fails, the destination and any extractor temp files
 * next to it are removed so that no partial artifact survives.
 */
@Injectable()
export class MediaFetcherService {
  private readonly logger = new Logger(MediaFetcherService.name);

  constructor(
    @Inject(MEDIA_EXTRACTOR)
    private readonly extractor: MediaExtractor,

    @Inject(pipelineConfig.KEY)
    private readonly config: PipelineConfig,
  ) {}

  async fetch(sourceUrl: string, destinationPath: string): Promise<boolean> {
    await fs.mkdir(dirname(destinationPath), { recursive: true });

    const maxAttempts = this.config.fetchMaxAttempts;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const failure = await this.attempt(sourceUrl, destinationPath);

      if (failure === null) {
        if (attempt > 1) {
          this.logger.log(`Fetched ${sourceUrl} on attempt ${attempt}`);
        }
        return true;
      }

      this.logger.warn(
        `Download attempt ${attempt}/${maxAttempts} failed for ${sourceUrl}: ${failure}`,
      );
      await this.discardPartial(destinationPath);

      if (attempt < maxAttempts) {
        await this.sleep(this.config.fetchBaseDelayMs * attempt);
      }
    }

    this.logger.error(
      `Giving up on ${sourceUrl} after ${maxAttempts} attempt(s)`,
    );
    return false;
  }

  /** Returns null on success, or a reason string */
  private async attempt(
    sourceUrl: string,
    destinationPath: string,
  ): Promise<string | null> {
    try {
      const result = await this.extractor.extract({
        url: sourceUrl,
        outputPath: destinationPath,
        formatPreference: this.config.formatPreference,
      });
      if (!result.ok) {
        return result.detail ?? 'extractor reported failure';
      }
    } catch (error) {
      return error instanceof Error ? error.message : String(error);
    }

    const size = await this.fileSize(destinationPath);
    if (size === null) return 'extractor reported success but no file was written';
    if (size === 0) return 'extractor reported success but the file is empty';
    return null;
  }

  private async fileSize(path: string): Promise<number | null> {
    try {
      const stats = await fs.stat(path);
      return stats.isFile() ? stats.size : null;
    } catch {
      return null;
    }
  }

  private async discardPartial(destinationPath: string): Promise<void> {
    const candidates = [
      destinationPath,
      `${destinationPath}.part`,
      `${destinationPath}.ytdl`,
      ...(await this.formatSiblings(destinationPath)),
    ];
    for (const candidate of candidates) {
      await fs.rm(candidate, { force: true }).catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn(`Could not remove partial file ${candidate}: ${message}`);
      });
    }
  }

  /**
   * Per-format downloads yt-dlp leaves next to the destination when a merge
   * does not finish: `<stem>.f<format_id>.<ext>` and `<stem>.temp.<ext>`.
   */
  private async formatSiblings(destinationPath: string): Promise<string[]> {
    const directory = dirname(destinationPath);
    const file = basename(destinationPath);
    const stem = file.slice(0, file.length - extname(file).length);

    let entries: string[];
    try {
      entries = await fs.readdir(directory);
    } catch {
      return [];
    }

    return entries
      .filter(
        (entry) =>
          entry.startsWith(stem) &&
          FORMAT_SIBLING_SUFFIX.test(entry.slice(stem.length)),
      )
      .map((entry) => join(directory, entry));
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
