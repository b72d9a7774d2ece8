import { JobStatus } from './enums/job-status.enum';
import { JobRecord } from './interfaces/job-record.interface';

export class MalformedJobRecordError extends Error {
  constructor(reason: string) {
    super(`Malformed job record: ${reason}`);
    this.name = 'MalformedJobRecordError';
  }
}

export function encodeJobRecord(record: JobRecord): string {
  return JSON.stringify(record);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStoredStatus(
  value: unknown,
): value is JobStatus.PROCESSING | JobStatus.COMPLETE {
  return value === JobStatus.PROCESSING || value === JobStatus.COMPLETE;
}

function optionalNumber(
  source: Record<string, unknown>,
  field: string,
): number | undefined {
  const value = source[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new MalformedJobRecordError(`"${field}" is not a number`);
  }
  return value;
}

/**
 * Parses a stored record, rejecting anything that does not carry a usable
 * status. A PROCESSING record must have a start_time, otherwise staleness
 * cannot be judged.
 */
export function decodeJobRecord(raw: string): JobRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new MalformedJobRecordError('not valid JSON');
  }

  if (!isRecord(parsed)) {
    throw new MalformedJobRecordError('not an object');
  }
  const source = parsed;

  if (!isStoredStatus(source.status)) {
    throw new MalformedJobRecordError(`unknown status "${String(source.status)}"`);
  }

  const startTime = optionalNumber(source, 'start_time');
  const completedTime = optionalNumber(source, 'completed_time');
  if (source.status === JobStatus.PROCESSING && startTime === undefined) {
    throw new MalformedJobRecordError('processing record without start_time');
  }

  return {
    status: source.status,
    owner: typeof source.owner === 'string' ? source.owner : '',
    start_time: startTime,
    completed_time: completedTime,
    series: typeof source.series === 'string' ? source.series : '',
    episode_index:
      typeof source.episode_index === 'number' ? source.episode_index : 0,
  };
}
