/**
 * Startup configuration, read from the environment.
 *
 * Two connection secrets are required: where the database lives and the key the
 * storage bucket signs download URLs with. Missing either is fatal; callers should
 * report the ConfigError and stop before touching the store.
 */

import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export const DEFAULT_BUCKET_NAME = 'todo-attachments';
export const DEFAULT_SIGNED_URL_TTL_SECONDS = 3600;
export const DEFAULT_MAX_FILE_SIZE_MB = 10;

const envSchema = z.object({
  TICKBOX_DATABASE_URL: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  TICKBOX_ACCESS_KEY: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  TICKBOX_STORAGE_DIR: z.string().trim().min(1, 'must not be empty').optional(),
  TICKBOX_STORAGE_BUCKET: z.string().trim().regex(/^[a-z0-9][a-z0-9-]*$/, 'must be lowercase letters, digits and hyphens').default(DEFAULT_BUCKET_NAME),
  TICKBOX_MAX_FILE_SIZE_MB: z.coerce.number().positive('must be a positive number').default(DEFAULT_MAX_FILE_SIZE_MB),
  TICKBOX_SIGNED_URL_TTL: z.coerce.number().int('must be a whole number of seconds').positive('must be positive').default(DEFAULT_SIGNED_URL_TTL_SECONDS),
});

export interface TickboxConfig {
  /** Filesystem path of the SQLite database, or ':memory:' */
  readonly databasePath: string;
  /** Secret used to sign storage download URLs */
  readonly accessKey: string;
  readonly storageDir: string;
  readonly bucketName: string;
  readonly maxFileSizeBytes: number;
  readonly signedUrlTtlSeconds: number;
}

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Accepts a plain path, a file: URL, or ':memory:' */
export function resolveDatabasePath(url: string, cwd: string = process.cwd()): string {
  if (url === ':memory:') return url;
  if (url.startsWith('file:')) {
    try {
      return fileURLToPath(url);
    } catch {
      throw new ConfigError([`TICKBOX_DATABASE_URL is not a valid file URL: ${url}`]);
    }
  }
  return resolve(cwd, url);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): TickboxConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const { fieldErrors } = parsed.error.flatten();
    const issues = Object.entries(fieldErrors).map(([key, messages]) => `${key} ${(messages ?? []).join(', ')}`);
    throw new ConfigError(issues);
  }

  const vars = parsed.data;
  const databasePath = resolveDatabasePath(vars.TICKBOX_DATABASE_URL, cwd);
  const storageDir = vars.TICKBOX_STORAGE_DIR
    ? resolve(cwd, vars.TICKBOX_STORAGE_DIR)
    : databasePath === ':memory:'
      ? join(cwd, 'storage')
      : join(dirname(databasePath), 'storage');

  return {
    databasePath,
    accessKey: vars.TICKBOX_ACCESS_KEY,
    storageDir,
    bucketName: vars.TICKBOX_STORAGE_BUCKET,
    maxFileSizeBytes: Math.floor(vars.TICKBOX_MAX_FILE_SIZE_MB * 1024 * 1024),
    signedUrlTtlSeconds: vars.TICKBOX_SIGNED_URL_TTL,
  };
}
