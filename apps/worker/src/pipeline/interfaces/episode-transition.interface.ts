import { EpisodeState } from '../enums/episode-state.enum';

/**
 * EpisodeTransition — emitted on EpisodePipelineService.transitions$ for
 * every state change.
 *
 * Invariants:
 *   - `from` is null only for the first transition of an episode
 *   - `at` is an ISO 8601 UTC string
 */
export interface EpisodeTransition {
  jobId: string;
  series: string;
  episodeIndex: number;
  from: EpisodeState | null;
  to: EpisodeState;
  detail?: string;
  at: string;
}
