import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { MediaModule } from '../media/media.module';
import { StorageModule } from '../storage/storage.module';
import { SidecarAttacherService } from '../sidecars/sidecar-attacher.service';
import { EpisodePipelineService } from './episode-pipeline.service';

/**
 * Module for the per-episode state machine.
 *
 * Composes the ledger, the media fetcher and remote storage, and owns the
 * sidecar attacher since nothing else uses it.
 */
@Module({
  imports: [LedgerModule, MediaModule, StorageModule],
  providers: [SidecarAttacherService, EpisodePipelineService],
  exports: [EpisodePipelineService, LedgerModule],
})
export class PipelineModule {}
