import { JobStatus } from '../enums/job-status.enum';

/**
 * Identity of a unit of work. Unique per campaign.
 */
export interface JobRef {
  series: string;
  episodeIndex: number;
}

/**
 * JobRecord — the flat record persisted by the ledger backend.
 *
 * Field names match the stored JSON (snake_case) so records written by
 * earlier workers stay readable.
 *
 * Invariants:
 *   - status is never UNCLAIMED in a stored record
 *   - start_time is set on PROCESSING records
 *   - completed_time is set on COMPLETE records
 *   - timestamps are epoch seconds (fractional allowed)
 */
export interface JobRecord {
  status: JobStatus.PROCESSING | JobStatus.COMPLETE;
  owner: string;
  start_time?: number;
  completed_time?: number;
  series: string;
  episode_index: number;
}
