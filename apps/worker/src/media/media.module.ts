import { Module } from '@nestjs/common';
import { MEDIA_EXTRACTOR } from './media.constants';
import { MediaFetcherService } from './media-fetcher.service';
import { YtDlpExtractor } from './ytdlp-extractor';

@Module({
  providers: [
    YtDlpExtractor,
    { provide: MEDIA_EXTRACTOR, useExisting: YtDlpExtractor },
    MediaFetcherService,
  ],
  exports: [MediaFetcherService],
})
export class MediaModule {}
