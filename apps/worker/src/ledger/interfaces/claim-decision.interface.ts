/**
 * Why a claim was granted or denied.
 *
 * Granted: `new` (no entry), `stale` (abandoned claim taken over),
 *          `backend-absent` (no durable ledger, session dedup only)
 * Denied:  `complete`, `held` (fresh claim by someone), `backend-error`
 */
export type ClaimReason =
  | 'new'
  | 'stale'
  | 'backend-absent'
  | 'complete'
  | 'held'
  | 'backend-error';

export interface ClaimDecision {
  granted: boolean;
  reason: ClaimReason;
  /** Owner of the existing claim, when one was found */
  heldBy?: string;
}
