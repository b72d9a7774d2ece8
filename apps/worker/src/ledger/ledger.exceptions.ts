/**
 * Thrown internally when the ledger backend fails for a reason other than
 * a missing key. JobLedgerService converts it into a denied claim; it never
 * escapes the ledger.
 */
export class LedgerBackendException extends Error {
  constructor(operation: 'get' | 'put', key: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Ledger ${operation} failed for "${key}": ${reason}`, { cause });
    this.name = 'LedgerBackendException';
  }
}
