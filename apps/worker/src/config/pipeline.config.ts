import { registerAs } from '@nestjs/config';
import { hostname } from 'os';

/** How a series' episodes are scheduled onto workers */
export type SchedulingMode = 'pool' | 'sequential';

export type LedgerBackendKind = 'redis' | 'none';
export type RemoteStoreKind = 'minio' | 'none';

/**
 * PipelineConfig — every tunable of the worker, resolved once at startup.
 *
 * The object is frozen; components receive it through DI and never mutate it.
 */
export interface PipelineConfig {
  /** Identity written as `owner` on every ledger record */
  workerId: string;

  schedulingMode: SchedulingMode;
  /** Worker count for `pool` mode */
  concurrency: number;
  /** Pause between episodes in `sequential` mode */
  interEpisodeDelayMs: number;

  fetchMaxAttempts: number;
  /** Backoff unit: attempt n waits n × this before attempt n+1 */
  fetchBaseDelayMs: number;
  /** Hard limit for a single extractor or resolver process */
  extractorTimeoutMs: number;
  formatPreference: string;
  ytDlpPath: string;

  /** A processing claim older than this is considered abandoned */
  claimStaleAfterSeconds: number;
  ledgerBackend: LedgerBackendKind;
  ledgerKeyPrefix: string;

  remoteStore: RemoteStoreKind;
  /** When true an upload failure fails the episode instead of falling back */
  requireRemoteStore: boolean;
  /** Limit for one object store call; 0 disables it */
  uploadTimeoutMs: number;
  contentBucket: string;

  downloadDir: string;
  transcriptDir: string;
  fallbackDir: string;
  sidecarLanguages: readonly string[];
  sidecarVariants: readonly string[];
}

export const DEFAULT_PIPELINE_CONFIG: Readonly<Omit<PipelineConfig, 'workerId'>> =
  {
    schedulingMode: 'pool',
    concurrency: 4,
    interEpisodeDelayMs: 2_000,
    fetchMaxAttempts: 5,
    fetchBaseDelayMs: 2_000,
    extractorTimeoutMs: 30 * 60 * 1_000,
    formatPreference: 'best[ext=mp4]/bestvideo[ext=mp4]+bestaudio/best',
    ytDlpPath: 'yt-dlp',
    claimStaleAfterSeconds: 3_600,
    ledgerBackend: 'redis',
    ledgerKeyPrefix: 'job_status/',
    remoteStore: 'minio',
    requireRemoteStore: false,
    uploadTimeoutMs: 10 * 60 * 1_000,
    contentBucket: 'serial-content',
    downloadDir: 'downloads',
    transcriptDir: 'transcripts',
    fallbackDir: 'archive',
    sidecarLanguages: ['English', 'Urdu'],
    sidecarVariants: ['_T', ''],
  };

export function defaultWorkerId(): string {
  return `worker-${hostname()}-${process.pid}`;
}

/**
 * Merges overrides onto the defaults and freezes the result.
 * Rejects values no component can work with.
 */
export function buildPipelineConfig(
  overrides: Partial<PipelineConfig> = {},
): Readonly<PipelineConfig> {
  const config: PipelineConfig = {
    ...DEFAULT_PIPELINE_CONFIG,
    workerId: defaultWorkerId(),
    ...overrides,
  };

  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    throw new Error(`concurrency must be a positive integer, got ${config.concurrency}`);
  }
  if (!Number.isInteger(config.fetchMaxAttempts) || config.fetchMaxAttempts < 1) {
    throw new Error(
      `fetchMaxAttempts must be a positive integer, got ${config.fetchMaxAttempts}`,
    );
  }
  for (const field of [
    'interEpisodeDelayMs',
    'fetchBaseDelayMs',
    'extractorTimeoutMs',
    'uploadTimeoutMs',
    'claimStaleAfterSeconds',
  ] as const) {
    if (!Number.isFinite(config[field]) || config[field] < 0) {
      throw new Error(`${field} must be a non-negative number, got ${config[field]}`);
    }
  }

  return Object.freeze({
    ...config,
    sidecarLanguages: Object.freeze([...config.sidecarLanguages]),
    sidecarVariants: Object.freeze([...config.sidecarVariants]),
  });
}

// ── Environment parsing ───────────────────────────────────

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${name} must be numeric, got "${raw}"`);
  }
  return value;
}

function envString(name: string): string | undefined {
  const raw = process.env[name];
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

function envBoolean(name: string): boolean | undefined {
  const raw = envString(name);
  if (raw === undefined) return undefined;
  return raw.toLowerCase() === 'true' || raw === '1';
}

function envChoice<T extends string>(
  name: string,
  choices: readonly T[],
): T | undefined {
  const raw = envString(name);
  if (raw === undefined) return undefined;
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new Error(
      `Environment variable ${name} must be one of ${choices.join(', ')}, got "${raw}"`,
    );
  }
  return match;
}

/**
 * `pipeline` config namespace. Inject with
 * `@Inject(pipelineConfig.KEY) config: PipelineConfig`.
 */
export const pipelineConfig = registerAs('pipeline', (): Readonly<PipelineConfig> =>
  buildPipelineConfig({
    workerId: envString('WORKER_ID') ?? defaultWorkerId(),
    schedulingMode:
      envChoice('SCHEDULING_MODE', ['pool', 'sequential'] as const) ??
      DEFAULT_PIPELINE_CONFIG.schedulingMode,
    concurrency:
      envNumber('WORKER_CONCURRENCY') ?? DEFAULT_PIPELINE_CONFIG.concurrency,
    interEpisodeDelayMs:
      envNumber('INTER_EPISODE_DELAY_MS') ??
      DEFAULT_PIPELINE_CONFIG.interEpisodeDelayMs,
    fetchMaxAttempts:
      envNumber('FETCH_MAX_ATTEMPTS') ?? DEFAULT_PIPELINE_CONFIG.fetchMaxAttempts,
    fetchBaseDelayMs:
      envNumber('FETCH_BASE_DELAY_MS') ?? DEFAULT_PIPELINE_CONFIG.fetchBaseDelayMs,
    extractorTimeoutMs:
      envNumber('EXTRACTOR_TIMEOUT_MS') ??
      DEFAULT_PIPELINE_CONFIG.extractorTimeoutMs,
    formatPreference:
      envString('FORMAT_PREFERENCE') ?? DEFAULT_PIPELINE_CONFIG.formatPreference,
    ytDlpPath: envString('YTDLP_PATH') ?? DEFAULT_PIPELINE_CONFIG.ytDlpPath,
    claimStaleAfterSeconds:
      envNumber('CLAIM_STALE_AFTER_SECONDS') ??
      DEFAULT_PIPELINE_CONFIG.claimStaleAfterSeconds,
    ledgerBackend:
      envChoice('LEDGER_BACKEND', ['redis', 'none'] as const) ??
      DEFAULT_PIPELINE_CONFIG.ledgerBackend,
    ledgerKeyPrefix:
      envString('LEDGER_KEY_PREFIX') ?? DEFAULT_PIPELINE_CONFIG.ledgerKeyPrefix,
    remoteStore:
      envChoice('REMOTE_STORE', ['minio', 'none'] as const) ??
      DEFAULT_PIPELINE_CONFIG.remoteStore,
    requireRemoteStore:
      envBoolean('REQUIRE_REMOTE_STORE') ??
      DEFAULT_PIPELINE_CONFIG.requireRemoteStore,
    uploadTimeoutMs:
      envNumber('UPLOAD_TIMEOUT_MS') ?? DEFAULT_PIPELINE_CONFIG.uploadTimeoutMs,
    contentBucket:
      envString('MINIO_BUCKET') ?? DEFAULT_PIPELINE_CONFIG.contentBucket,
    downloadDir: envString('DOWNLOAD_DIR') ?? DEFAULT_PIPELINE_CONFIG.downloadDir,
    transcriptDir:
      envString('TRANSCRIPT_DIR') ?? DEFAULT_PIPELINE_CONFIG.transcriptDir,
    fallbackDir: envString('FALLBACK_DIR') ?? DEFAULT_PIPELINE_CONFIG.fallbackDir,
  }),
);
