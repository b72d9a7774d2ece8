import { spawn } from 'child_process';
import { ExtractorProcessException } from './media.exceptions';

export interface ProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

/** Keeps the tail of a stream; yt-dlp progress output can be very long */
const MAX_CAPTURED_CHARS = 64 * 1024;

function appendCapped(buffer: string, chunk: Buffer): string {
  const next = buffer + chunk.toString();
  return next.length > MAX_CAPTURED_CHARS
    ? next.slice(next.length - MAX_CAPTURED_CHARS)
    : next;
}

/**
 * Runs yt-dlp to completion and captures its output.
 *
 * Rejects with ExtractorProcessException when the binary cannot be spawned
 * or runs past `timeoutMs` (the process is killed first). Resolves with the
 * exit code otherwise, including non-zero codes.
 */
export function runYtDlp(
  binary: string,
  args: readonly string[],
  timeoutMs: number,
): Promise<ProcessResult> {
  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(binary, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            if (settled) return;
            settled = true;
            child.kill('SIGKILL');
            reject(
              new ExtractorProcessException(binary, `timed out after ${timeoutMs}ms`),
            );
          }, timeoutMs)
        : undefined;

    child.stdout?.on('data', (data: Buffer) => {
      stdout = appendCapped(stdout, data);
    });
    child.stderr?.on('data', (data: Buffer) => {
      stderr = appendCapped(stderr, data);
    });

    child.on('error', (error: Error) => {
      if (timer) clearTimeout(timer);
      if (settled) return;
      settled = true;
      reject(new ExtractorProcessException(binary, error.message, error));
    });

    child.on('close', (code: number | null) => {
      if (timer) clearTimeout(timer);
      if (settled) return;
      settled = true;
      resolve({ code, stdout, stderr });
    });
  });
}

/** Last non-empty line of process output, for log messages */
export function lastLine(output: string): string {
  const lines = output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines[lines.length - 1] ?? '';
}
