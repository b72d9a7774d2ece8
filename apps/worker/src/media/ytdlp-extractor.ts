import { Inject, Injectable, Logger } from '@nestjs/common';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import {
  ExtractRequest,
  ExtractResult,
  MediaExtractor,
} from './interfaces/media-extractor.interface';
import { lastLine, runYtDlp } from './ytdlp-process';

/**
 * MediaExtractor backed by the yt-dlp command line tool.
 */
@Injectable()
export class YtDlpExtractor implements MediaExtractor {
  private readonly logger = new Logger(YtDlpExtractor.name);

  constructor(
    @Inject(pipelineConfig.KEY)
    private readonly config: PipelineConfig,
  ) {}

  async extract(request: ExtractRequest): Promise<ExtractResult> {
    const args = [
      request.url,
      '--no-playlist',
      '--newline',
      // Avoids merge failures when the container timestamps are odd
      '--no-mtime',
      '--no-part',
      '-f',
      request.formatPreference,
      '--merge-output-format',
      'mp4',
      '-o',
      request.outputPath,
    ];

    this.logger.debug(`Running ${this.config.ytDlpPath} ${args.join(' ')}`);

    const result = await runYtDlp(
      this.config.ytDlpPath,
      args,
      this.config.extractorTimeoutMs,
    );

    if (result.code === 0) {
      return { ok: true };
    }

    return {
      ok: false,
      detail: `exit code ${result.code ?? 'null'}: ${lastLine(result.stderr) || 'no output'}`,
    };
  }
}
