export interface ExtractRequest {
  url: string;
  outputPath: string;
  formatPreference: string;
}

export interface ExtractResult {
  ok: boolean;
  /** Short reason for a failed extraction, for logs */
  detail?: string;
}

/**
 * External capability that writes a source URL's media to a local file.
 * Implementations may also reject; the fetcher treats both as a failed attempt.
 */
export interface MediaExtractor {
  extract(request: ExtractRequest): Promise<ExtractResult>;
}
