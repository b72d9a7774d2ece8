import { Inject, Injectable } from '@nestjs/common';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { lastLine, ProcessResult, runYtDlp } from '../media/ytdlp-process';
import { CatalogResolver } from './interfaces/catalog-resolver.interface';
import { CatalogResolutionException } from './catalog.exceptions';

/**
 * Lists playlist entries with `yt-dlp --flat-playlist`, which reads the
 * playlist page only and downloads nothing.
 */
@Injectable()
export class YtDlpCatalogResolver implements CatalogResolver {
  constructor(
    @Inject(pipelineConfig.KEY)
    private readonly config: PipelineConfig,
  ) {}

  async resolve(playlistUrl: string): Promise<string[]> {
    let result: ProcessResult;
    try {
      result = await runYtDlp(
        this.config.ytDlpPath,
        ['--flat-playlist', '--ignore-errors', '--print', 'url', playlistUrl],
        this.config.extractorTimeoutMs,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CatalogResolutionException(playlistUrl, message, error);
    }

    const urls = parsePlaylistOutput(result.stdout);

    // --ignore-errors makes yt-dlp exit non-zero on a single broken entry;
    // keep whatever it did list
    if (result.code !== 0 && urls.length === 0) {
      throw new CatalogResolutionException(
        playlistUrl,
        `exit code ${result.code ?? 'null'}: ${lastLine(result.stderr) || 'no output'}`,
      );
    }

    return urls;
  }
}

/** One URL per line; anything else (warnings, "NA") is ignored */
export function parsePlaylistOutput(stdout: string): string[] {
  return stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => /^https?:\/\//i.test(line));
}
