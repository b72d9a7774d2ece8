import { encodeJobRecord, JobStatus } from '@serialvault/jobs';
import { buildPipelineConfig } from '../config/pipeline.config';
import { InMemoryLedgerBackend } from '../../test/fakes';
import { JobLedgerService } from './job-ledger.service';

const KEY = 'job_status/demo/episode_1.json';

function makeLedger(
  backend: InMemoryLedgerBackend | null,
  workerId = 'worker-a',
): JobLedgerService {
  return new JobLedgerService(
    backend,
    buildPipelineConfig({ workerId, claimStaleAfterSeconds: 3600 }),
  );
}

function seedProcessing(
  backend: InMemoryLedgerBackend,
  owner: string,
  ageSeconds: number,
): void {
  backend.entries.set(
    KEY,
    encodeJobRecord({
      status: JobStatus.PROCESSING,
      owner,
      start_time: Date.now() / 1000 - ageSeconds,
      series: 'demo',
      episode_index: 1,
    }),
  );
}

describe('JobLedgerService', () => {
  let backend: InMemoryLedgerBackend;

  beforeEach(() => {
    backend = new InMemoryLedgerBackend();
  });

  describe('tryClaim', () => {
    test('grants an unclaimed job and records the claim', async () => {
      const ledger = makeLedger(backend);

      await expect(ledger.tryClaim('demo', 1)).resolves.toBe(true);

      const record = backend.record(KEY);
      expect(record?.status).toBe('processing');
      expect(record?.owner).toBe('worker-a');
      expect(record?.series).toBe('demo');
      expect(record?.episode_index).toBe(1);
      expect(typeof record?.start_time).toBe('number');
    });

    test('grants exactly one of several serialized claims', async () => {
      const ledger = makeLedger(backend);
      const other = makeLedger(backend, 'worker-b');

      const results: boolean[] = [];
      results.push(await ledger.tryClaim('demo', 1));
      results.push(await other.tryClaim('demo', 1));
      results.push(await ledger.tryClaim('demo', 1));

      expect(results).toEqual([true, false, false]);
    });

    test('grants at least one of two concurrent claims', async () => {
      const a = makeLedger(backend, 'worker-a');
      const b = makeLedger(backend, 'worker-b');

      const results = await Promise.all([a.tryClaim('demo', 1), b.tryClaim('demo', 1)]);

      expect(results.filter(Boolean).length).toBeGreaterThanOrEqual(1);
    });

    test('denies a job that is complete', async () => {
      const ledger = makeLedger(backend);
      await ledger.markComplete('demo', 1);

      await expect(makeLedger(backend, 'worker-b').tryClaim('demo', 1)).resolves.toBe(
        false,
      );
    });

    test('denies a fresh claim held by another worker', async () => {
      seedProcessing(backend, 'worker-b', 3599);

      const decision = await makeLedger(backend).evaluateClaim({
        series: 'demo',
        episodeIndex: 1,
      });

      expect(decision).toEqual({ granted: false, reason: 'held', heldBy: 'worker-b' });
      expect(backend.record(KEY)?.owner).toBe('worker-b');
    });

    test('reclaims a claim older than the staleness threshold', async () => {
      seedProcessing(backend, 'worker-b', 3601);

      const decision = await makeLedger(backend).evaluateClaim({
        series: 'demo',
        episodeIndex: 1,
      });

      expect(decision).toEqual({ granted: true, reason: 'stale' });
      expect(backend.record(KEY)?.owner).toBe('worker-a');
    });

    test('denies when the backend cannot be read', async () => {
      backend.getError = new Error('connection refused');

      const decision = await makeLedger(backend).evaluateClaim({
        series: 'demo',
        episodeIndex: 1,
      });

      expect(decision).toEqual({ granted: false, reason: 'backend-error' });
      expect(backend.puts).toBe(0);
    });

    test('denies when the claim cannot be written', async () => {
      backend.putError = new Error('read-only replica');

      await expect(makeLedger(backend).tryClaim('demo', 1)).resolves.toBe(false);
    });

    test('denies a malformed record without overwriting it', async () => {
      backend.entries.set(KEY, '{"status":"archived"}');

      const decision = await makeLedger(backend).evaluateClaim({
        series: 'demo',
        episodeIndex: 1,
      });

      expect(decision.granted).toBe(false);
      expect(decision.reason).toBe('backend-error');
      expect(backend.entries.get(KEY)).toBe('{"status":"archived"}');
    });
  });

  describe('markComplete', () => {
    test('is idempotent', async () => {
      const ledger = makeLedger(backend);
      await ledger.tryClaim('demo', 1);

      await expect(ledger.markComplete('demo', 1)).resolves.toBe(true);
      await expect(ledger.markComplete('demo', 1)).resolves.toBe(true);

      const record = backend.record(KEY);
      expect(record?.status).toBe('complete');
      expect(record?.owner).toBe('worker-a');
      expect(typeof record?.completed_time).toBe('number');
    });

    test('reports a failed write but still remembers the job locally', async () => {
      const ledger = makeLedger(backend);
      backend.putError = new Error('disk full');

      await expect(ledger.markComplete('demo', 1)).resolves.toBe(false);
      expect(ledger.hasProcessed({ series: 'demo', episodeIndex: 1 })).toBe(true);
      await expect(ledger.tryClaim('demo', 1)).resolves.toBe(false);
    });
  });

  describe('without a backend', () => {
    test('grants every claim until the job completes in this process', async () => {
      const ledger = makeLedger(null);

      expect(ledger.isDurable).toBe(false);
      await expect(ledger.tryClaim('demo', 1)).resolves.toBe(true);
      await expect(ledger.tryClaim('demo', 1)).resolves.toBe(true);

      await expect(ledger.markComplete('demo', 1)).resolves.toBe(true);

      await expect(
        ledger.evaluateClaim({ series: 'demo', episodeIndex: 1 }),
      ).resolves.toEqual({ granted: false, reason: 'complete', heldBy: 'worker-a' });
      expect([...ledger.processedJobIds()]).toEqual(['demo#1']);
    });
  });
});
