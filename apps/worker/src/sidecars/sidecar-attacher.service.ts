import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import { basename, join } from 'path';
import { pipelineConfig, PipelineConfig } from '../config/pipeline.config';
import { RemoteStoreService } from '../storage/remote-store.service';

/**
 * SidecarAttacherService — attaches pre-existing transcript files to an
 * episode's stored artifact.
 *
 * Candidates are a fixed list derived from (series, index):
 *   {transcriptDir}/{series}_Ep_{index}_{Language}{Variant}.txt
 * for every configured language and variant, in that order. The directory
 * is never scanned.
 *
 * Missing files and failed uploads are logged and otherwise ignored; the
 * return value is the number of sidecars found.
 */
@Injectable()
export class SidecarAttacherService {
  private readonly logger = new Logger(SidecarAttacherService.name);

  constructor(
    private readonly remoteStore: RemoteStoreService,

    @Inject(pipelineConfig.KEY)
    private readonly config: PipelineConfig,
  ) {}

  candidatePaths(series: string, episodeIndex: number): string[] {
    const paths: string[] = [];
    for (const language of this.config.sidecarLanguages) {
      for (const variant of this.config.sidecarVariants) {
        paths.push(
          join(
            this.config.transcriptDir,
            `${series}_Ep_${episodeIndex}_${language}${variant}.txt`,
          ),
        );
      }
    }
    return paths;
  }

  async findAndAttach(series: string, episodeIndex: number): Promise<number> {
    let found = 0;

    for (const candidate of this.candidatePaths(series, episodeIndex)) {
      if (!(await this.isFile(candidate))) continue;
      found++;

      if (!this.remoteStore.isRemoteEnabled) continue;

      const remotePath = `transcripts/${series}/${basename(candidate)}`;
      try {
        const reference = await this.remoteStore.upload(candidate, remotePath);
        if (reference) {
          this.logger.log(`Attached transcript ${basename(candidate)}`);
        } else {
          this.logger.warn(`Transcript ${basename(candidate)} was not stored`);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Transcript ${basename(candidate)} failed: ${message}`);
      }
    }

    return found;
  }

  private async isFile(path: string): Promise<boolean> {
    try {
      return (await fs.stat(path)).isFile();
    } catch {
      return false;
    }
  }
}
