import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { PipelineModule } from '../pipeline/pipeline.module';
import { SeriesRunnerService } from './series-runner.service';
import { CampaignRunnerService } from './campaign-runner.service';

@Module({
  imports: [CatalogModule, PipelineModule],
  providers: [SeriesRunnerService, CampaignRunnerService],
  exports: [CampaignRunnerService],
})
export class CampaignModule {}
