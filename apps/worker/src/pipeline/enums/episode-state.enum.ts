/**
 * States of the per-episode pipeline.
 *
 * Transitions:
 *   (claim) → SKIPPED
 *           → DOWNLOADING → DOWNLOAD_FAILED
 *                         → STORING → STORE_FAILED
 *                                   → ATTACHING_SIDECARS → COMPLETED
 *
 * SKIPPED, DOWNLOAD_FAILED, STORE_FAILED and COMPLETED are terminal.
 * Only COMPLETED counts as success.
 */
export enum EpisodeState {
  SKIPPED = 'skipped',
  DOWNLOADING = 'downloading',
  DOWNLOAD_FAILED = 'download_failed',
  STORING = 'storing',
  STORE_FAILED = 'store_failed',
  ATTACHING_SIDECARS = 'attaching_sidecars',
  COMPLETED = 'completed',
}

export type TerminalEpisodeState =
  | EpisodeState.SKIPPED
  | EpisodeState.DOWNLOAD_FAILED
  | EpisodeState.STORE_FAILED
  | EpisodeState.COMPLETED;
