import 'reflect-metadata';
import { Test, TestingModule } from '@nestjs/testing';
import { promises as fs } from 'fs';
import { join } from 'path';
import { AppModule } from '../src/app.module';
import { pipelineConfig, PipelineConfig } from '../src/config/pipeline.config';
import { catalogConfig, CatalogConfig } from '../src/config/catalog.config';
import { LEDGER_BACKEND } from '../src/ledger/ledger.constants';
import { MEDIA_EXTRACTOR } from '../src/media/media.constants';
import { CATALOG_RESOLVER } from '../src/catalog/catalog.constants';
import { OBJECT_STORE_CLIENT } from '../src/storage/storage.constants';
import { CampaignRunnerService } from '../src/campaign/campaign-runner.service';
import { SeriesRunnerService } from '../src/campaign/series-runner.service';
import { JobLedgerService } from '../src/ledger/job-ledger.service';
import {
  FakeCatalogResolver,
  FakeExtractor,
  FakeObjectStore,
  InMemoryLedgerBackend,
  makeTempRoot,
  removeTempRoot,
  testConfig,
} from './fakes';

const DEMO_PLAYLIST = 'https://media.example.test/playlist?list=demo';
const DEMO_URLS = [
  'https://media.example.test/watch?v=demo1',
  'https://media.example.test/watch?v=demo2',
];

describe('Campaign (e2e)', () => {
  let root: string;
  let config: Readonly<PipelineConfig>;
  let backend: InMemoryLedgerBackend;
  let store: FakeObjectStore;
  let resolver: FakeCatalogResolver;
  const opened: TestingModule[] = [];

  beforeEach(async () => {
    root = await makeTempRoot();
    config = testConfig(root, { workerId: 'worker-e2e' });
    backend = new InMemoryLedgerBackend();
    store = new FakeObjectStore();
    resolver = new FakeCatalogResolver().set(DEMO_PLAYLIST, DEMO_URLS);
  });

  afterEach(async () => {
    while (opened.length) {
      const moduleRef = opened.pop();
      await moduleRef?.close();
    }
    await removeTempRoot(root);
  });

  async function startWorker(
    catalog: CatalogConfig,
    extractor = new FakeExtractor(),
  ): Promise<TestingModule> {
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(pipelineConfig.KEY)
      .useValue(config)
      .overrideProvider(catalogConfig.KEY)
      .useValue(catalog)
      .overrideProvider(LEDGER_BACKEND)
      .useValue(backend)
      .overrideProvider(MEDIA_EXTRACTOR)
      .useValue(extractor)
      .overrideProvider(CATALOG_RESOLVER)
      .useValue(resolver)
      .overrideProvider(OBJECT_STORE_CLIENT)
      .useValue(store)
      .compile();
    opened.push(moduleRef);
    return moduleRef;
  }

  const demoCatalog: CatalogConfig = {
    series: [{ name: 'demo', playlistUrl: DEMO_PLAYLIST }],
  };

  test('archives every episode of a series', async () => {
    const moduleRef = await startWorker(demoCatalog);

    const report = await moduleRef.get(CampaignRunnerService).run();

    expect(report.erroredSeries).toEqual([]);
    expect(report.totals).toEqual({
      total: 2,
      succeeded: 2,
      alreadyDone: 0,
      inProgressElsewhere: 0,
      failed: 0,
    });
    expect([...store.objects.keys()].sort()).toEqual([
      'series/demo/demo_Ep_1.mp4',
      'series/demo/demo_Ep_2.mp4',
    ]);
    expect(backend.record('job_status/demo/episode_1.json')?.status).toBe('complete');
    expect(backend.record('job_status/demo/episode_2.json')?.status).toBe('complete');
    expect([...moduleRef.get(JobLedgerService).processedJobIds()].sort()).toEqual([
      'demo#1',
      'demo#2',
    ]);
    await expect(fs.readdir(join(config.downloadDir, 'demo'))).resolves.toEqual([]);
  });

  test('a second worker over the same ledger finds nothing left to do', async () => {
    await (await startWorker(demoCatalog)).get(CampaignRunnerService).run();

    const extractor = new FakeExtractor();
    const second = await startWorker(demoCatalog, extractor);
    const report = await second.get(CampaignRunnerService).run();

    expect(report.totals).toEqual({
      total: 2,
      succeeded: 0,
      alreadyDone: 2,
      inProgressElsewhere: 0,
      failed: 0,
    });
    expect(extractor.calls).toHaveLength(0);
  });

  test('a series that cannot be listed does not affect the next one', async () => {
    resolver.set('https://media.example.test/playlist?list=gone', new Error('HTTP 410'));
    const moduleRef = await startWorker({
      series: [
        { name: 'gone', playlistUrl: 'https://media.example.test/playlist?list=gone' },
        { name: 'demo', playlistUrl: DEMO_PLAYLIST },
      ],
    });

    const report = await moduleRef.get(CampaignRunnerService).run();

    expect(report.series.map((s) => [s.series, s.total, s.succeeded])).toEqual([
      ['gone', 0, 0],
      ['demo', 2, 2],
    ]);
  });

  test('a series that throws is reported and the campaign continues', async () => {
    const moduleRef = await startWorker({
      series: [
        { name: 'broken', playlistUrl: 'https://media.example.test/playlist?list=broken' },
        { name: 'demo', playlistUrl: DEMO_PLAYLIST },
      ],
    });
    const runner = moduleRef.get(SeriesRunnerService);
    const original = runner.run.bind(runner);
    jest.spyOn(runner, 'run').mockImplementation(async (series) => {
      if (series.name === 'broken') throw new Error('disk unavailable');
      return original(series);
    });

    const report = await moduleRef.get(CampaignRunnerService).run();

    expect(report.erroredSeries).toEqual(['broken']);
    expect(report.totals.succeeded).toBe(2);
  });
});
