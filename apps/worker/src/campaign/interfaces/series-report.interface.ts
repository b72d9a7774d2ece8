import { EpisodeOutcome } from '../../pipeline/interfaces/episode-outcome.interface';

/**
 * Aggregate result of one SeriesRunner pass.
 *
 * Counting convention:
 *   succeeded           — reached Completed during this run
 *   alreadyDone         — skipped because the ledger says complete
 *   inProgressElsewhere — skipped because another claim is fresh, or the
 *                         ledger could not be read
 *   failed              — DownloadFailed, StoreFailed or an unexpected error
 *
 * succeeded + alreadyDone + inProgressElsewhere + failed === total
 */
export interface SeriesReport {
  series: string;
  total: number;
  succeeded: number;
  alreadyDone: number;
  inProgressElsewhere: number;
  failed: number;
  outcomes: EpisodeOutcome[];
}

export interface CampaignReport {
  series: SeriesReport[];
  /** Series whose run threw before producing a report */
  erroredSeries: string[];
  totals: Omit<SeriesReport, 'series' | 'outcomes'>;
}
