/** An episode of a series as listed by its playlist. Immutable. */
export interface EpisodeRef {
  readonly series: string;
  /** 1-based position in the playlist */
  readonly index: number;
  readonly sourceUrl: string;
}
