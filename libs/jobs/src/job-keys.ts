import { JobRef } from './interfaces/job-record.interface';

/**
 * Ledger key for a job.
 * Pattern: {prefix}{series}/episode_{index}.json
 */
export function jobKey(prefix: string, ref: JobRef): string {
  return `${prefix}${ref.series}/episode_${ref.episodeIndex}.json`;
}

/** Stable in-memory identifier, e.g. `demo#3` */
export function jobId(ref: JobRef): string {
  return `${ref.series}#${ref.episodeIndex}`;
}
