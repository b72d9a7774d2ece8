import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { pipelineConfig } from './config/pipeline.config';
import { catalogConfig } from './config/catalog.config';
import { CampaignModule } from './campaign/campaign.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
      load: [pipelineConfig, catalogConfig],
    }),

    // ── Feature Modules ───────────────────────────────────
    CampaignModule,
  ],
})
export class AppModule {}
