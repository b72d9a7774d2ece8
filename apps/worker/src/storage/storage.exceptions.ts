/**
 * Thrown when an object store operation fails.
 *
 * RemoteStoreService catches it and decides between local fallback and
 * failing the upload, so callers outside the storage module never see it.
 */
export class ObjectStoreException extends Error {
  constructor(operation: 'mkdir' | 'put', target: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Object store ${operation} failed for "${target}": ${reason}`, {
      cause,
    });
    this.name = 'ObjectStoreException';
  }
}
