import { EpisodeRef } from '../../catalog/interfaces/episode-ref.interface';
import { ClaimDecision } from '../../ledger/interfaces/claim-decision.interface';
import { TerminalEpisodeState } from '../enums/episode-state.enum';

export interface EpisodeOutcome {
  episode: EpisodeRef;
  state: TerminalEpisodeState;
  claim: ClaimDecision;
  /** Where the artifact ended up; set once Storing succeeded */
  artifactReference: string | null;
  /** Sidecars found; 0 unless the pipeline got to AttachingSidecars */
  sidecars: number;
}
