import { Module } from '@nestjs/common';
import { CATALOG_RESOLVER } from './catalog.constants';
import { EpisodeEnumeratorService } from './episode-enumerator.service';
import { YtDlpCatalogResolver } from './ytdlp-catalog.resolver';

@Module({
  providers: [
    YtDlpCatalogResolver,
    { provide: CATALOG_RESOLVER, useExisting: YtDlpCatalogResolver },
    EpisodeEnumeratorService,
  ],
  exports: [EpisodeEnumeratorService],
})
export class CatalogModule {}
