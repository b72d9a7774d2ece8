/**
 * Durable remote storage as seen by RemoteStoreService.
 *
 * - mkdir() creates the container for `remotePath`; "already exists" resolves
 * - put() uploads, overwriting an existing object, and resolves to an
 *   addressable reference (URL or equivalent)
 */
export interface ObjectStoreClient {
  mkdir(remotePath: string): Promise<void>;
  put(localPath: string, remoteKey: string): Promise<string>;
}
