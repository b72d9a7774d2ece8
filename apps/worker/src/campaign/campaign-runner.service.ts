import { Inject, Injectable, Logger } from '@nestjs/common';
import { catalogConfig, CatalogConfig } from '../config/catalog.config';
import { SeriesRunnerService } from './series-runner.service';
import {
  CampaignReport,
  SeriesReport,
} from './interfaces/series-report.interface';

/**
 * CampaignRunnerService — runs every series in the catalog, one after another.
 *
 * The isolation boundary is the series: an exception escaping one series is
 * logged and the campaign moves on to the next.
 */
@Injectable()
export class CampaignRunnerService {
  private readonly logger = new Logger(CampaignRunnerService.name);

  constructor(
    private readonly seriesRunner: SeriesRunnerService,

    @Inject(catalogConfig.KEY)
    private readonly catalog: CatalogConfig,
  ) {}

  async run(): Promise<CampaignReport> {
    this.logger.log(`Starting campaign over ${this.catalog.series.length} series`);

    const reports: SeriesReport[] = [];
    const erroredSeries: string[] = [];

    for (const series of this.catalog.series) {
      try {
        reports.push(await this.seriesRunner.run(series));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Series "${series.name}" aborted: ${message}`);
        erroredSeries.push(series.name);
      }
    }

    const totals = reports.reduce(
      (sum, report) => ({
        total: sum.total + report.total,
        succeeded: sum.succeeded + report.succeeded,
        alreadyDone: sum.alreadyDone + report.alreadyDone,
        inProgressElsewhere: sum.inProgressElsewhere + report.inProgressElsewhere,
        failed: sum.failed + report.failed,
      }),
      { total: 0, succeeded: 0, alreadyDone: 0, inProgressElsewhere: 0, failed: 0 },
    );

    this.logger.log(
      `Campaign finished: ${totals.succeeded}/${totals.total} episode(s) completed this run, ` +
        `${totals.alreadyDone} already done, ${totals.failed} failed` +
        (erroredSeries.length ? `; aborted series: ${erroredSeries.join(', ')}` : ''),
    );

    return { series: reports, erroredSeries, totals };
  }
}
