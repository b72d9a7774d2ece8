/**
 * External capability that lists a playlist's episode URLs in playlist order.
 * May reject or resolve to a partial or empty list.
 */
export interface CatalogResolver {
  resolve(playlistUrl: string): Promise<string[]>;
}
