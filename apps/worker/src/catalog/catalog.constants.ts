/** Injection token for the playlist resolver behind EpisodeEnumeratorService */
export const CATALOG_RESOLVER = 'CATALOG_RESOLVER';
