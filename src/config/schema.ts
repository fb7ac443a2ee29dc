/**
 * src/config/schema.ts
 * What: Environment configuration validator with venv-aware Python interpreter resolution.
 * How: Validates an env record with zod (one aggregated error listing every bad key), then computes the Python
 *      interpreter and optional environment overlay used for markitdown child processes:
 *        - If PYTHON_BIN is set and non-empty: use it exactly. Do NOT set VIRTUAL_ENV or modify PATH.
 *        - Else if VENV_DIR points to a valid venv (platform-aware python path exists): use it and set
 *          PYTHON_ENV overlay with VIRTUAL_ENV and PATH (venv bin dir prepended). We do not "activate" a shell.
 *        - Else default to "python3" and rely on PATH resolution at spawn time.
 *      Relative DATA_DIR and VENV_DIR are resolved against the given cwd.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';

const intWithDefault = (def: number, min = 1) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v === '' ? undefined : v),
    z.number().int().min(min).default(def),
  );

const numberWithDefault = (def: number) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v === '' ? undefined : v),
    z.number().finite().default(def),
  );

const onOff = (def: boolean) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' ? !['0', 'false', 'off', 'no'].includes(v.trim().toLowerCase()) : v),
    z.boolean().default(def),
  );

const schema = z
  .object({
    OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
    OPENAI_EMBED_MODEL: z.string().min(1).default('text-embedding-3-small'),
    EMBEDDING_DIMENSIONS: intWithDefault(1536),
    EMBED_BATCH_SIZE: intWithDefault(32),
    EMBED_CONCURRENCY: intWithDefault(2),
    EMBED_RETRY_BACKOFF_MS: intWithDefault(500, 0),
    EMBEDDING_CACHE: onOff(true),
    INDEX_BACKEND: z.enum(['flat', 'document']).default('document'),
    DATA_DIR: z.string().min(1).default('./data'),
    CHUNK_SIZE: intWithDefault(1000),
    CHUNK_OVERLAP: intWithDefault(200, 0),
    MAX_SNAPSHOTS: intWithDefault(10),
    SNAPSHOT_MAX_AGE_DAYS: intWithDefault(0, 0), // 0 disables the age cap
    HEALTH_THRESHOLD: numberWithDefault(0.8),
    UPLOAD_MAX_BYTES: intWithDefault(50 * 1024 * 1024),
    SESSION_HISTORY_LIMIT: intWithDefault(20),
    MARKITDOWN_TIMEOUT_MS: intWithDefault(300_000),
    MARKITDOWN_MAX_BYTES: intWithDefault(50 * 1024 * 1024),
    PORT: intWithDefault(3000, 0),
    // Consumed by src/logging.ts at import time.
    LOG_LEVEL: z.preprocess(
      (v: unknown) => (v === '' ? undefined : v),
      z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    ),
    NODE_ENV: z.enum(['production', 'development', 'test']).optional().default('development'),
  })
  .refine((c) => c.CHUNK_OVERLAP < c.CHUNK_SIZE, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['CHUNK_OVERLAP'],
  })
  .refine((c) => c.HEALTH_THRESHOLD >= -1 && c.HEALTH_THRESHOLD <= 1, {
    message: 'HEALTH_THRESHOLD must be between -1 and 1',
    path: ['HEALTH_THRESHOLD'],
  });

export type ParsedEnv = z.infer<typeof schema>;

export interface AppConfig extends ParsedEnv {
  DATA_DIR: string; // absolute
  PYTHON_BIN: string; // Final resolved Python interpreter used for markitdown
  // Optional environment overlay applied only when a venv interpreter is selected from VENV_DIR.
  PYTHON_ENV?: Record<string, string>;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid environment configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  opts: { cwd?: string; platform?: NodeJS.Platform } = {},
): AppConfig {
  const cwd = opts.cwd ?? process.cwd();
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }
  const base = parsed.data;
  const python = resolvePython(env, cwd, opts.platform ?? process.platform);
  return {
    ...base,
    DATA_DIR: path.resolve(cwd, base.DATA_DIR),
    PYTHON_BIN: python.bin,
    PYTHON_ENV: python.env,
  };
}

function resolvePython(
  env: NodeJS.ProcessEnv,
  cwd: string,
  platform: NodeJS.Platform,
): { bin: string; env?: Record<string, string> } {
  const rawPythonBin = (env.PYTHON_BIN ?? '').trim();
  const rawVenvDir = (env.VENV_DIR ?? '').trim();

  // Explicit interpreter provided; use as-is without any environment overlay.
  if (rawPythonBin) return { bin: rawPythonBin };
  if (!rawVenvDir) return { bin: 'python3' };

  const isWin = platform === 'win32';
  const venvDirAbs = path.isAbsolute(rawVenvDir) ? rawVenvDir : path.resolve(cwd, rawVenvDir);
  const venvBinDir = isWin ? path.join(venvDirAbs, 'Scripts') : path.join(venvDirAbs, 'bin');
  const candidates = isWin
    ? [path.join(venvBinDir, 'python.exe')]
    : [path.join(venvBinDir, 'python3'), path.join(venvBinDir, 'python')];

  const found = candidates.find((p) => fs.existsSync(p));
  // If not found, fall through to default "python3" with no overlay.
  if (!found) return { bin: 'python3' };
  return {
    bin: found,
    env: {
      VIRTUAL_ENV: venvDirAbs,
      PATH: `${venvBinDir}${path.delimiter}${env.PATH ?? ''}`,
    },
  };
}
