import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { OBJECT_STORE_CLIENT } from './storage.constants';
import { ObjectStoreClient } from './interfaces/object-store.interface';
import { MinioObjectStore } from './minio-object-store';
import { RemoteStoreService } from './remote-store.service';

/**
 * StorageModule — provides RemoteStoreService.
 *
 * OBJECT_STORE_CLIENT is a MinIO client, or null when REMOTE_STORE=none.
 * The MinIO client is only constructed when it will be used.
 */
@Module({
  providers: [
    {
      provide: OBJECT_STORE_CLIENT,
      inject: [ConfigService, pipelineConfig.KEY],
      useFactory: (
        configService: ConfigService,
        config: PipelineConfig,
      ): ObjectStoreClient | null =>
        config.remoteStore === 'minio'
          ? new MinioObjectStore(configService, config)
          : null,
    },
    RemoteStoreService,
  ],
  exports: [RemoteStoreService],
})
export class StorageModule {}
