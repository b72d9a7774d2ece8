import { Inject, Injectable, Logger } from '@nestjs/common';
import { SeriesDefinition } from '../config/catalog.config';
import { CATALOG_RESOLVER } from './catalog.constants';
import { CatalogResolver } from './interfaces/catalog-resolver.interface';
import { EpisodeRef } from './interfaces/episode-ref.interface';

/**
 * EpisodeEnumeratorService — turns a series' playlist into episode refs.
 *
 * Indexes are assigned 1..n in playlist order. A resolver failure is logged
 * and yields an empty list; enumeration never throws.
 */
@Injectable()
export class EpisodeEnumeratorService {
  private readonly logger = new Logger(EpisodeEnumeratorService.name);

  constructor(
    @Inject(CATALOG_RESOLVER)
    private readonly resolver: CatalogResolver,
  ) {}

  async enumerate(series: SeriesDefinition): Promise<EpisodeRef[]> {
    let urls: string[];
    try {
      urls = await this.resolver.resolve(series.playlistUrl);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Enumeration failed for "${series.name}": ${message}`);
      return [];
    }

    this.logger.log(`Found ${urls.length} episode(s) for "${series.name}"`);

    return urls.map((sourceUrl, position) =>
      Object.freeze({ series: series.name, index: position + 1, sourceUrl }),
    );
  }
}
