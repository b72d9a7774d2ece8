/**
 * Injection token for the object store client.
 * Resolves to `null` when REMOTE_STORE=none.
 */
export const OBJECT_STORE_CLIENT = 'OBJECT_STORE_CLIENT';
