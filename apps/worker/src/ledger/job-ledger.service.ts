import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  JobRecord,
  JobRef,
  JobStatus,
  decodeJobRecord,
  encodeJobRecord,
  jobId,
  jobKey,
} from '@serialvault/jobs';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { LEDGER_BACKEND } from './ledger.constants';
import { LedgerBackend } from './interfaces/ledger-backend.interface';
import { ClaimDecision } from './interfaces/claim-decision.interface';
import { LedgerBackendException } from './ledger.exceptions';

/**
 * JobLedgerService — claim/complete policy for (series, episode) jobs.
 *
 * Responsibilities:
 * 1. tryClaim()     — grant a `processing` claim when no entry exists, or the
 *                     existing claim is older than the staleness threshold
 * 2. markComplete() — write a `complete` entry (idempotent, non-fatal)
 * 3. Session set    — remember jobs completed by this process; with no
 *                     durable backend this is the only deduplication
 *
 * Failure policy:
 *   Backend errors deny the claim (fail closed) so two workers do not
 *   duplicate work while the ledger is unreadable. A backend that is not
 *   configured at all grants every claim (fail open, single worker).
 *
 * Known limitation:
 *   get() followed by put() is not atomic. Two workers that read "no entry"
 *   at the same moment both claim the job and both process it. The backend
 *   offers no conditional write, so exclusivity is best-effort only.
 */
@Injectable()
export class JobLedgerService {
  private readonly logger = new Logger(JobLedgerService.name);

  /** Job ids that reached Completed during this process lifetime */
  private readonly processed = new Set<string>();

  constructor(
    @Inject(LEDGER_BACKEND)
    private readonly backend: LedgerBackend | null,

    @Inject(pipelineConfig.KEY)
    private readonly config: PipelineConfig,
  ) {
    if (!backend) {
      this.logger.warn(
        'No ledger backend configured, coordination is limited to this process',
      );
    }
  }

  get isDurable(): boolean {
    return this.backend !== null;
  }

  async tryClaim(series: string, episodeIndex: number): Promise<boolean> {
    const decision = await this.evaluateClaim({ series, episodeIndex });
    return decision.granted;
  }

  /**
   * Same policy as tryClaim(), but reports why the claim was granted or
   * denied so callers can tell "already done" from "someone else has it".
   */
  async evaluateClaim(ref: JobRef): Promise<ClaimDecision> {
    if (this.processed.has(jobId(ref))) {
      return { granted: false, reason: 'complete', heldBy: this.config.workerId };
    }

    if (!this.backend) {
      return { granted: true, reason: 'backend-absent' };
    }

    const key = jobKey(this.config.ledgerKeyPrefix, ref);

    let existing: JobRecord | null;
    try {
      existing = await this.readRecord(this.backend, key);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Claim denied for ${jobId(ref)}: ${message}`);
      return { granted: false, reason: 'backend-error' };
    }

    let reason: ClaimDecision['reason'] = 'new';
    if (existing) {
      if (existing.status === JobStatus.COMPLETE) {
        return { granted: false, reason: 'complete', heldBy: existing.owner };
      }

      const ageSeconds = this.nowSeconds() - (existing.start_time ?? 0);
      if (ageSeconds < this.config.claimStaleAfterSeconds) {
        return { granted: false, reason: 'held', heldBy: existing.owner };
      }

      this.logger.warn(
        `Reclaiming ${jobId(ref)} from ${existing.owner || 'unknown owner'} ` +
          `(claim is ${Math.round(ageSeconds)}s old)`,
      );
      reason = 'stale';
    }

    const record: JobRecord = {
      status: JobStatus.PROCESSING,
      owner: this.config.workerId,
      start_time: this.nowSeconds(),
      series: ref.series,
      episode_index: ref.episodeIndex,
    };

    try {
      await this.writeRecord(this.backend, key, record);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Claim denied for ${jobId(ref)}: ${message}`);
      return { granted: false, reason: 'backend-error' };
    }

    this.logger.debug(`Claimed ${jobId(ref)} (${reason})`);
    return { granted: true, reason };
  }

  /**
   * Unconditionally records the job as complete. Returns false when the
   * durable write failed; the job still counts as done for this process.
   */
  async markComplete(series: string, episodeIndex: number): Promise<boolean> {
    const ref: JobRef = { series, episodeIndex };
    this.processed.add(jobId(ref));

    if (!this.backend) return true;

    const key = jobKey(this.config.ledgerKeyPrefix, ref);
    try {
      await this.writeRecord(this.backend, key, {
        status: JobStatus.COMPLETE,
        owner: this.config.workerId,
        completed_time: this.nowSeconds(),
        series,
        episode_index: episodeIndex,
      });
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to mark ${jobId(ref)} complete: ${message}`);
      return false;
    }
  }

  hasProcessed(ref: JobRef): boolean {
    return this.processed.has(jobId(ref));
  }

  processedJobIds(): ReadonlySet<string> {
    return this.processed;
  }

  // ── Backend access ───────────────────────────────────────

  private async readRecord(
    backend: LedgerBackend,
    key: string,
  ): Promise<JobRecord | null> {
    let raw: string | null;
    try {
      raw = await backend.get(key);
    } catch (error) {
      throw new LedgerBackendException('get', key, error);
    }
    if (raw === null) return null;

    try {
      return decodeJobRecord(raw);
    } catch (error) {
      throw new LedgerBackendException('get', key, error);
    }
  }

  private async writeRecord(
    backend: LedgerBackend,
    key: string,
    record: JobRecord,
  ): Promise<void> {
    try {
      await backend.put(key, encodeJobRecord(record));
    } catch (error) {
      throw new LedgerBackendException('put', key, error);
    }
  }

  private nowSeconds(): number {
    return Date.now() / 1000;
  }
}
