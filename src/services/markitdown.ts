/**
 * src/services/markitdown.ts
 * What: Convert a PDF or DOCX file to Markdown using Python microsoft/markitdown.
 * How: Spawns the configured interpreter with "-m markitdown <file>", overlays the venv environment when one was
 *      selected, enforces a timeout and a max stdout size, captures stdout as Markdown,
 *      and throws a typed error including a stderr excerpt on failures.
 */

import { spawn } from 'child_process';

export type MarkitDownErrorCode = 'EXIT_NON_ZERO' | 'TIMEOUT' | 'SIZE_EXCEEDED';

export class MarkitDownError extends Error {
  code: MarkitDownErrorCode;
  stderr?: string;
  constructor(code: MarkitDownErrorCode, message: string, stderr?: string) {
    super(message);
    this.name = 'MarkitDownError';
    this.code = code;
    this.stderr = stderr;
  }
}

export interface MarkitDownOptions {
  pythonBin: string;
  pythonEnv?: Record<string, string>;
  timeoutMs?: number; // default 300_000
  maxBytes?: number; // default 50MB
}

export async function convertToMarkdown(filePath: string, opts: MarkitDownOptions): Promise<string> {
  const timeoutMs = opts.timeoutMs ?? 300_000; // 5 minutes
  const maxBytes = opts.maxBytes ?? 50 * 1024 * 1024; // 50 MB
  return new Promise((resolve, reject) => {
    const proc = spawn(opts.pythonBin, ['-m', 'markitdown', filePath], {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: { ...process.env, ...(opts.pythonEnv ?? {}) },
    });

    let settled = false;
    let stdoutBytes = 0;
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    const fail = (err: MarkitDownError): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(err);
    };

    const timer = setTimeout(() => {
      proc.kill('SIGKILL');
      fail(new MarkitDownError('TIMEOUT', `markitdown timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    proc.stdout.on('data', (chunk: Buffer) => {
      stdoutBytes += chunk.length;
      if (stdoutBytes > maxBytes) {
        proc.kill('SIGKILL');
        fail(new MarkitDownError('SIZE_EXCEEDED', `markitdown output exceeded ${maxBytes} bytes`));
        return;
      }
      stdoutChunks.push(chunk);
    });

    proc.stderr.on('data', (chunk: Buffer) => {
      stderrChunks.push(chunk);
    });

    proc.on('error', (err: Error) => {
      fail(new MarkitDownError('EXIT_NON_ZERO', `Failed to spawn markitdown: ${err.message}`));
    });

    proc.on('close', (code: number | null) => {
      const stderrText = Buffer.concat(stderrChunks).toString('utf8');
      if (code !== 0) {
        fail(new MarkitDownError('EXIT_NON_ZERO', `markitdown exited with code ${code}`, stderrText.slice(0, 2000)));
        return;
      }
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve(Buffer.concat(stdoutChunks).toString('utf8'));
    });
  });
}
