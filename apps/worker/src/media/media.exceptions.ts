/**
 * Thrown when the extractor binary cannot be started or is killed for
 * exceeding its time budget. A non-zero exit code is a normal result,
 * not this exception.
 */
export class ExtractorProcessException extends Error {
  constructor(binary: string, reason: string, cause?: unknown) {
    super(`Extractor process "${binary}" failed: ${reason}`, { cause });
    this.name = 'ExtractorProcessException';
  }
}
