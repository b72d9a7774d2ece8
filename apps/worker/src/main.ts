import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { parseLogLevels } from './config/log-levels';
import { CampaignRunnerService } from './campaign/campaign-runner.service';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  // Standalone context: the worker runs the campaign and exits, no listeners.
  // Logs are buffered until LOG_LEVELS is known, which may come from .env
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(parseLogLevels(app.get(ConfigService).get<string>('LOG_LEVELS')));
  app.enableShutdownHooks();

  try {
    const report = await app.get(CampaignRunnerService).run();
    logger.log(
      `Done: ${report.totals.succeeded} completed, ${report.totals.alreadyDone} already done, ` +
        `${report.totals.failed} failed across ${report.series.length} series`,
    );
  } finally {
    await app.close();
  }
}

bootstrap().catch((err: unknown) => {
  const message = err instanceof Error ? err.stack ?? err.message : String(err);
  new Logger('Bootstrap').error(`Worker failed to start: ${message}`);
  process.exitCode = 1;
});
