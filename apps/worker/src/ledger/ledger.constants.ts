/**
 * Injection token for the ledger's key-value backend.
 * Resolves to `null` when the deployment runs without a durable ledger.
 */
export const LEDGER_BACKEND = 'LEDGER_BACKEND';
