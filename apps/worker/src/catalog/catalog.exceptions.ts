export class CatalogResolutionException extends Error {
  constructor(playlistUrl: string, reason: string, cause?: unknown) {
    super(`Could not resolve playlist ${playlistUrl}: ${reason}`, { cause });
    this.name = 'CatalogResolutionException';
  }
}
