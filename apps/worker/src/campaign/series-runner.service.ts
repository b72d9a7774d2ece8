import { Inject, Injectable, Logger } from '@nestjs/common';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { SeriesDefinition } from '../config/catalog.config';
import { EpisodeEnumeratorService } from '../catalog/episode-enumerator.service';
import { EpisodeRef } from '../catalog/interfaces/episode-ref.interface';
import { EpisodePipelineService } from '../pipeline/episode-pipeline.service';
import { EpisodeState } from '../pipeline/enums/episode-state.enum';
import { EpisodeOutcome } from '../pipeline/interfaces/episode-outcome.interface';
import { runBounded, schedulePlan } from './schedule';
import { SeriesReport } from './interfaces/series-report.interface';

type EpisodeResult =
  | { kind: 'outcome'; outcome: EpisodeOutcome }
  | { kind: 'error'; episode: EpisodeRef; message: string };

/**
 * SeriesRunnerService — drives every episode of one series through the
 * pipeline, in pool or sequential mode depending on configuration.
 *
 * An episode that throws is caught here, logged and counted as failed; it
 * never aborts the rest of the series.
 */
@Injectable()
export class SeriesRunnerService {
  private readonly logger = new Logger(SeriesRunnerService.name);

  constructor(
    private readonly enumerator: EpisodeEnumeratorService,
    private readonly pipeline: EpisodePipelineService,

    @Inject(pipelineConfig.KEY)
    private readonly config: PipelineConfig,
  ) {}

  async run(series: SeriesDefinition): Promise<SeriesReport> {
    const episodes = await this.enumerator.enumerate(series);

    if (episodes.length === 0) {
      this.logger.warn(`Series "${series.name}" has no episodes, skipping`);
      return this.tally(series.name, []);
    }

    const plan = schedulePlan(this.config);
    this.logger.log(
      `Processing ${episodes.length} episode(s) of "${series.name}" ` +
        `(${this.config.schedulingMode}, ${plan.concurrency} worker(s))`,
    );

    const results = await runBounded(episodes, plan, (episode) =>
      this.processSafely(episode),
    );

    const report = this.tally(series.name, results);
    this.logger.log(
      `Series "${series.name}": ${report.succeeded}/${report.total} completed this run, ` +
        `${report.alreadyDone} already done, ${report.inProgressElsewhere} held elsewhere, ` +
        `${report.failed} failed`,
    );
    return report;
  }

  private async processSafely(episode: EpisodeRef): Promise<EpisodeResult> {
    try {
      return { kind: 'outcome', outcome: await this.pipeline.process(episode) };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Episode ${episode.index} of "${episode.series}" failed unexpectedly: ${message}`,
      );
      return { kind: 'error', episode, message };
    }
  }

  private tally(series: string, results: EpisodeResult[]): SeriesReport {
    const report: SeriesReport = {
      series,
      total: results.length,
      succeeded: 0,
      alreadyDone: 0,
      inProgressElsewhere: 0,
      failed: 0,
      outcomes: [],
    };

    for (const result of results) {
      if (result.kind === 'error') {
        report.failed++;
        continue;
      }

      const { outcome } = result;
      report.outcomes.push(outcome);

      switch (outcome.state) {
        case EpisodeState.COMPLETED:
          report.succeeded++;
          break;
        case EpisodeState.SKIPPED:
          if (outcome.claim.reason === 'complete') {
            report.alreadyDone++;
          } else {
            report.inProgressElsewhere++;
          }
          break;
        case EpisodeState.DOWNLOAD_FAILED:
        case EpisodeState.STORE_FAILED:
          report.failed++;
          break;
      }
    }

    return report;
  }
}
