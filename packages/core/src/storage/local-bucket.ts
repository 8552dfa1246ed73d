/**
 * Directory-backed StorageBucket.
 *
 * Objects live under `{rootDir}/{bucket}/{path}`; the content type of each object is
 * kept in a JSON sidecar under `{rootDir}/.meta/{bucket}/{path}.json`. Signed URLs are
 * `file://` URLs carrying an expiry and an HMAC-SHA256 signature over bucket, path and
 * expiry, keyed with the access key.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { z } from 'zod';
import { createLogger } from '../logger.js';
import type { DataResult, TodoResult } from '../types/results.js';
import { attemptAsync, invalid } from '../types/results.js';
import type { StorageBucket, StoredObject } from './storage-bucket.js';
import { DEFAULT_MIME_TYPE } from './file-types.js';

const log = createLogger('STORAGE');

const metaSchema = z.object({
  contentType: z.string(),
  size: z.number(),
  uploadedAt: z.string(),
});

type ObjectMeta = z.infer<typeof metaSchema>;

export interface LocalBucketOptions {
  /** Clock for signed-URL expiry; tests pin it */
  now?: () => Date;
}

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

export class LocalBucket implements StorageBucket {
  readonly name: string;
  private readonly root: string;
  private readonly metaRoot: string;
  private readonly signingKey: string;
  private readonly now: () => Date;

  constructor(rootDir: string, name: string, signingKey: string, options: LocalBucketOptions = {}) {
    this.name = name;
    this.root = resolve(rootDir, name);
    this.metaRoot = resolve(rootDir, '.meta', name);
    this.signingKey = signingKey;
    this.now = options.now ?? (() => new Date());
  }

  /** Absolute location of an object, or null when the path would leave the bucket */
  resolveObject(path: string): string | null {
    return this.within(this.root, path);
  }

  async upload(path: string, bytes: Uint8Array, contentType: string): Promise<DataResult<string>> {
    const target = this.resolveObject(path);
    if (!target) return invalid(`Invalid object path '${path}'`);

    return attemptAsync(async (): Promise<DataResult<string>> => {
      await mkdir(dirname(target), { recursive: true });
      try {
        await writeFile(target, bytes, { flag: 'wx' });
      } catch (err: unknown) {
        if (hasErrorCode(err, 'EEXIST')) {
          return { type: 'error', message: `Object '${path}' already exists in bucket '${this.name}'` };
        }
        throw err;
      }

      await this.writeMeta(path, {
        contentType,
        size: bytes.byteLength,
        uploadedAt: this.now().toISOString(),
      });
      log(`uploaded ${this.name}/${path} (${bytes.byteLength} bytes)`);
      return { type: 'success', data: path, message: `Uploaded ${path}` };
    });
  }

  async download(path: string): Promise<DataResult<StoredObject>> {
    const target = this.resolveObject(path);
    if (!target) return invalid(`Invalid object path '${path}'`);

    return attemptAsync(async (): Promise<DataResult<StoredObject>> => {
      let bytes: Buffer;
      try {
        bytes = await readFile(target);
      } catch (err: unknown) {
        if (hasErrorCode(err, 'ENOENT')) return { type: 'error', message: `Object '${path}' not found` };
        throw err;
      }
      const meta = await this.readMeta(path);
      return {
        type: 'success',
        data: { bytes, contentType: meta?.contentType ?? DEFAULT_MIME_TYPE },
        message: `Downloaded ${path}`,
      };
    });
  }

  async createSignedUrl(path: string, ttlSeconds: number): Promise<DataResult<string>> {
    const target = this.resolveObject(path);
    if (!target) return invalid(`Invalid object path '${path}'`);
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      return invalid('Signed URL lifetime must be a positive whole number of seconds');
    }

    return attemptAsync(async (): Promise<DataResult<string>> => {
      if (!(await this.exists(target))) {
        return { type: 'error', message: `Failed to generate signed URL: object '${path}' not found` };
      }

      const expires = Math.floor(this.now().getTime() / 1000) + ttlSeconds;
      const url = pathToFileURL(target);
      url.searchParams.set('expires', String(expires));
      url.searchParams.set('signature', this.sign(path, expires));
      return { type: 'success', data: url.toString(), message: `Signed URL valid for ${ttlSeconds}s` };
    });
  }

  /** True when the URL was signed by this bucket and has not expired */
  verifySignedUrl(url: string, now: Date = this.now()): boolean {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }
    if (parsed.protocol !== 'file:') return false;

    const expires = Number(parsed.searchParams.get('expires'));
    const signature = parsed.searchParams.get('signature');
    if (!signature || !Number.isInteger(expires)) return false;
    if (expires * 1000 <= now.getTime()) return false;

    const target = fileURLToPath(parsed);
    const path = relative(this.root, target).split(sep).join('/');
    if (!this.resolveObject(path)) return false;

    const expected = Buffer.from(this.sign(path, expires), 'hex');
    const given = Buffer.from(signature, 'hex');
    return expected.length === given.length && timingSafeEqual(expected, given);
  }

  async remove(path: string): Promise<TodoResult> {
    const target = this.resolveObject(path);
    const metaTarget = this.within(this.metaRoot, `${path}.json`);
    if (!target || !metaTarget) return invalid(`Invalid object path '${path}'`);

    return attemptAsync(async (): Promise<TodoResult> => {
      await rm(target, { force: true });
      await rm(metaTarget, { force: true });
      log(`removed ${this.name}/${path}`);
      return { type: 'success', message: `Removed ${path}` };
    });
  }

  private within(base: string, path: string): string | null {
    if (!path || isAbsolute(path)) return null;
    const target = resolve(base, path);
    return target.startsWith(base + sep) ? target : null;
  }

  private sign(path: string, expires: number): string {
    return createHmac('sha256', this.signingKey).update(`${this.name}/${path}:${expires}`).digest('hex');
  }

  private async exists(target: string): Promise<boolean> {
    try {
      return (await stat(target)).isFile();
    } catch (err: unknown) {
      if (hasErrorCode(err, 'ENOENT')) return false;
      throw err;
    }
  }

  private async writeMeta(path: string, meta: ObjectMeta): Promise<void> {
    const metaTarget = this.within(this.metaRoot, `${path}.json`);
    if (!metaTarget) throw new Error(`Invalid object path '${path}'`);
    await mkdir(dirname(metaTarget), { recursive: true });
    await writeFile(metaTarget, JSON.stringify(meta));
  }

  private async readMeta(path: string): Promise<ObjectMeta | null> {
    const metaTarget = this.within(this.metaRoot, `${path}.json`);
    if (!metaTarget) return null;
    try {
      const parsed = metaSchema.safeParse(JSON.parse(await readFile(metaTarget, 'utf8')));
      return parsed.success ? parsed.data : null;
    } catch (err: unknown) {
      if (hasErrorCode(err, 'ENOENT') || err instanceof SyntaxError) return null;
      throw err;
    }
  }
}

