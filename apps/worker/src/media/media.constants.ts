/** Injection token for the external extractor behind MediaFetcherService */
export const MEDIA_EXTRACTOR = 'MEDIA_EXTRACTOR';
