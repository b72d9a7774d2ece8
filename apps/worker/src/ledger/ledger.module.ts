import { Module } from '@nestjs/common';
import { RedisKeyValueStore, RedisModule } from '@serialvault/redis';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { LEDGER_BACKEND } from './ledger.constants';
import { LedgerBackend } from './interfaces/ledger-backend.interface';
import { JobLedgerService } from './job-ledger.service';

/**
 * Module for job coordination.
 *
 * LEDGER_BACKEND resolves to the Redis key-value store, or to null when
 * LEDGER_BACKEND=none, in which case the ledger degrades to in-process
 * deduplication.
 */
@Module({
  imports: [RedisModule.forRoot()],
  providers: [
    {
      provide: LEDGER_BACKEND,
      inject: [pipelineConfig.KEY, RedisKeyValueStore],
      useFactory: (
        config: PipelineConfig,
        store: RedisKeyValueStore,
      ): LedgerBackend | null => (config.ledgerBackend === 'redis' ? store : null),
    },
    JobLedgerService,
  ],
  exports: [JobLedgerService],
})
export class LedgerModule {}
