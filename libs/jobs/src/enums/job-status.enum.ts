/**
 * Status of a (series, episode) job as recorded in the ledger.
 *
 * Transitions:
 *   UNCLAIMED → PROCESSING → COMPLETE
 *
 * A PROCESSING claim older than the staleness threshold is treated as
 * abandoned and behaves like UNCLAIMED for the next claimant.
 */
export enum JobStatus {
  /** No ledger entry exists yet. Never persisted. */
  UNCLAIMED = 'unclaimed',

  /** A worker has claimed the job and may still be working on it */
  PROCESSING = 'processing',

  /** The episode reached the Completed pipeline state */
  COMPLETE = 'complete',
}
