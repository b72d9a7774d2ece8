// ── Enums ───────────────────────────────────────────────────
export { JobStatus } from './enums/job-status.enum';

// ── Interfaces ──────────────────────────────────────────────
export { JobRef, JobRecord } from './interfaces/job-record.interface';

// ── Keys & Codec ────────────────────────────────────────────
export { jobKey, jobId } from './job-keys';
export {
  encodeJobRecord,
  decodeJobRecord,
  MalformedJobRecordError,
} from './job-record.codec';
