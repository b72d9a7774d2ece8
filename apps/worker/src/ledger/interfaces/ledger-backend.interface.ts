/**
 * Storage contract the JobLedger layers its claim policy on.
 *
 * - get() resolves null for a missing key and rejects for every other failure
 * - put() overwrites unconditionally; no compare-and-swap is assumed
 */
export interface LedgerBackend {
  get(key: string): Promise<string | null>;
  put(key: string, value: string): Promise<void>;
}
