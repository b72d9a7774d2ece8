import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { promises as fs } from 'fs';
import { join } from 'path';
import { Observable, Subject } from 'rxjs';
import { jobId } from '@serialvault/jobs';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { EpisodeRef } from '../catalog/interfaces/episode-ref.interface';
import { JobLedgerService } from '../ledger/job-ledger.service';
import { MediaFetcherService } from '../media/media-fetcher.service';
import { RemoteStoreService } from '../storage/remote-store.service';
import { SidecarAttacherService } from '../sidecars/sidecar-attacher.service';
import { EpisodeState, TerminalEpisodeState } from './enums/episode-state.enum';
import { EpisodeTransition } from './interfaces/episode-transition.interface';
import { EpisodeOutcome } from './interfaces/episode-outcome.interface';

/**
 * Local and remote locations of an episode's artifact.
 *
 * The local path is unique per (series, index), so two concurrent pipeline
 * instances never write the same scratch file.
 */
export function artifactPaths(
  downloadDir: string,
  episode: Pick<EpisodeRef, 'series' | 'index'>,
): { localPath: string; remotePath: string } {
  const filename = `${episode.series}_Ep_${episode.index}.mp4`;
  return {
    localPath: join(downloadDir, episode.series, filename),
    remotePath: `series/${episode.series}/${filename}`,
  };
}

/**
 * EpisodePipelineService — runs one episode through
 * claim → download → store → cleanup → sidecars → complete.
 *
 * Failure handling per phase:
 *   - claim denied          → SKIPPED, nothing else happens
 *   - download exhausted    → DOWNLOAD_FAILED, claim left `processing`
 *   - store returned null   → STORE_FAILED, local artifact and claim kept
 *   - local cleanup fails   → logged, no state change
 *   - sidecar problems      → logged, no state change
 *   - markComplete fails    → logged, episode still COMPLETED
 *
 * A `processing` claim left behind by a failure becomes reclaimable once it
 * is older than the staleness threshold, which is how a later run retries it.
 */
@Injectable()
export class EpisodePipelineService implements OnModuleDestroy {
  private readonly logger = new Logger(EpisodePipelineService.name);
  private readonly transitions = new Subject<EpisodeTransition>();

  /** Every state change of every episode, in the order they happen */
  readonly transitions$: Observable<EpisodeTransition> =
    this.transitions.asObservable();

  constructor(
    private readonly ledger: JobLedgerService,
    private readonly fetcher: MediaFetcherService,
    private readonly remoteStore: RemoteStoreService,
    private readonly sidecars: SidecarAttacherService,

    @Inject(pipelineConfig.KEY)
    private readonly config: PipelineConfig,
  ) {}

  async process(episode: EpisodeRef): Promise<EpisodeOutcome> {
    const ref = { series: episode.series, episodeIndex: episode.index };

    const claim = await this.ledger.evaluateClaim(ref);
    if (!claim.granted) {
      const holder = claim.heldBy ? ` by ${claim.heldBy}` : '';
      this.enter(episode, null, EpisodeState.SKIPPED, `${claim.reason}${holder}`);
      return this.outcome(episode, EpisodeState.SKIPPED, claim);
    }

    // ── Download ────────────────────────────────────────────
    const { localPath, remotePath } = artifactPaths(this.config.downloadDir, episode);
    this.enter(episode, null, EpisodeState.DOWNLOADING, `claim: ${claim.reason}`);

    const downloaded = await this.fetcher.fetch(episode.sourceUrl, localPath);
    if (!downloaded) {
      this.enter(episode, EpisodeState.DOWNLOADING, EpisodeState.DOWNLOAD_FAILED);
      return this.outcome(episode, EpisodeState.DOWNLOAD_FAILED, claim);
    }

    // ── Store ───────────────────────────────────────────────
    this.enter(episode, EpisodeState.DOWNLOADING, EpisodeState.STORING);

    const artifactReference = await this.remoteStore.upload(localPath, remotePath);
    if (artifactReference === null) {
      this.enter(
        episode,
        EpisodeState.STORING,
        EpisodeState.STORE_FAILED,
        `artifact kept at ${localPath}`,
      );
      return this.outcome(episode, EpisodeState.STORE_FAILED, claim);
    }

    await fs.rm(localPath, { force: true }).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Failed to delete local artifact ${localPath}: ${message}`);
    });

    // ── Sidecars ────────────────────────────────────────────
    this.enter(episode, EpisodeState.STORING, EpisodeState.ATTACHING_SIDECARS);

    let sidecarCount = 0;
    try {
      sidecarCount = await this.sidecars.findAndAttach(episode.series, episode.index);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Sidecar attachment failed for ${jobId(ref)}: ${message}`);
    }

    // ── Complete ────────────────────────────────────────────
    const recorded = await this.ledger.markComplete(episode.series, episode.index);
    if (!recorded) {
      this.logger.warn(
        `${jobId(ref)} finished but its completion could not be recorded durably`,
      );
    }

    this.enter(
      episode,
      EpisodeState.ATTACHING_SIDECARS,
      EpisodeState.COMPLETED,
      `${sidecarCount} sidecar(s), stored at ${artifactReference}`,
    );

    return {
      episode,
      state: EpisodeState.COMPLETED,
      claim,
      artifactReference,
      sidecars: sidecarCount,
    };
  }

  onModuleDestroy(): void {
    this.transitions.complete();
  }

  // ── Helpers ──────────────────────────────────────────────

  private enter(
    episode: EpisodeRef,
    from: EpisodeState | null,
    to: EpisodeState,
    detail?: string,
  ): void {
    const transition: EpisodeTransition = {
      jobId: jobId({ series: episode.series, episodeIndex: episode.index }),
      series: episode.series,
      episodeIndex: episode.index,
      from,
      to,
      detail,
      at: new Date().toISOString(),
    };

    const suffix = detail ? ` (${detail})` : '';
    const line = `${transition.jobId}: ${from ?? 'start'} → ${to}${suffix}`;
    if (to === EpisodeState.DOWNLOAD_FAILED || to === EpisodeState.STORE_FAILED) {
      this.logger.error(line);
    } else {
      this.logger.log(line);
    }

    this.transitions.next(transition);
  }

  private outcome(
    episode: EpisodeRef,
    state: TerminalEpisodeState,
    claim: EpisodeOutcome['claim'],
  ): EpisodeOutcome {
    return { episode, state, claim, artifactReference: null, sidecars: 0 };
  }
}
