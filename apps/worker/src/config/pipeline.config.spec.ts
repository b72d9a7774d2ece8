import { buildPipelineConfig, DEFAULT_PIPELINE_CONFIG } from './pipeline.config';
import { parseCatalog } from './catalog.config';

describe('buildPipelineConfig', () => {
  test('applies the documented defaults', () => {
    const config = buildPipelineConfig({ workerId: 'worker-test' });

    expect(config.workerId).toBe('worker-test');
    expect(config.concurrency).toBe(4);
    expect(config.interEpisodeDelayMs).toBe(2000);
    expect(config.fetchMaxAttempts).toBe(5);
    expect(config.fetchBaseDelayMs).toBe(2000);
    expect(config.claimStaleAfterSeconds).toBe(3600);
    expect(config.requireRemoteStore).toBe(false);
    expect(config.uploadTimeoutMs).toBe(600000);
    expect(config.sidecarLanguages).toEqual(['English', 'Urdu']);
  });

  test('derives a worker id when none is given', () => {
    expect(buildPipelineConfig().workerId).toMatch(/^worker-.+-\d+$/);
  });

  test('returns a frozen object', () => {
    const config = buildPipelineConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.sidecarVariants)).toBe(true);
  });

  test('does not share arrays with the defaults', () => {
    const config = buildPipelineConfig();
    expect(config.sidecarVariants).not.toBe(DEFAULT_PIPELINE_CONFIG.sidecarVariants);
  });

  test('rejects a zero worker pool', () => {
    expect(() => buildPipelineConfig({ concurrency: 0 })).toThrow(
      'concurrency must be a positive integer, got 0',
    );
  });

  test('rejects a negative delay', () => {
    expect(() => buildPipelineConfig({ fetchBaseDelayMs: -1 })).toThrow(
      'fetchBaseDelayMs must be a non-negative number, got -1',
    );
  });
});

describe('parseCatalog', () => {
  test('reads the keyed form', () => {
    const catalog = parseCatalog({
      demo: { link: 'https://videos.example/playlist?list=demo' },
    });
    expect(catalog.series).toEqual([
      { name: 'demo', playlistUrl: 'https://videos.example/playlist?list=demo' },
    ]);
  });

  test('reads the array form and keeps order', () => {
    const catalog = parseCatalog([
      { name: 'b', playlistUrl: 'https://videos.example/b' },
      { name: 'a', playlistUrl: 'https://videos.example/a' },
    ]);
    expect(catalog.series.map((s) => s.name)).toEqual(['b', 'a']);
  });

  test('rejects names that cannot be used as path segments', () => {
    expect(() =>
      parseCatalog([{ name: '../etc', playlistUrl: 'https://videos.example/x' }]),
    ).toThrow('Invalid series name "../etc"');
  });

  test('rejects duplicate names', () => {
    expect(() =>
      parseCatalog([
        { name: 'demo', playlistUrl: 'https://videos.example/1' },
        { name: 'demo', playlistUrl: 'https://videos.example/2' },
      ]),
    ).toThrow('Duplicate series name "demo"');
  });

  test('rejects a series without a link', () => {
    expect(() => parseCatalog({ demo: {} })).toThrow(
      'Catalog series "demo" has no playlist link',
    );
  });
});
