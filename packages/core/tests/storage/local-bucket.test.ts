import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LocalBucket } from '../../src/storage/local-bucket.js';

const NOW = new Date('2026-10-18T00:00:00Z');
const NOW_SECONDS = Math.floor(NOW.getTime() / 1000);

let tmpDir: string;
let bucket: LocalBucket;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'tickbox-bucket-test-'));
  bucket = new LocalBucket(tmpDir, 'todo-attachments', 'test-secret', { now: () => NOW });
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('upload and download', () => {
  it('stores bytes under the bucket directory', async () => {
    const result = await bucket.upload('1/20261018_000000_notes.txt', Buffer.from('hello'), 'text/plain');
    expect(result).toEqual({ type: 'success', data: '1/20261018_000000_notes.txt', message: 'Uploaded 1/20261018_000000_notes.txt' });
    expect(existsSync(join(tmpDir, 'todo-attachments', '1', '20261018_000000_notes.txt'))).toBe(true);
  });

  it('returns bytes and content type on download', async () => {
    await bucket.upload('1/a.txt', Buffer.from('hello'), 'text/plain');
    const result = await bucket.download('1/a.txt');
    expect(result.type).toBe('success');
    if (result.type !== 'success') return;
    expect(result.data.bytes.toString('utf8')).toBe('hello');
    expect(result.data.contentType).toBe('text/plain');
  });

  it('refuses to overwrite an existing object', async () => {
    await bucket.upload('1/a.txt', Buffer.from('one'), 'text/plain');
    const result = await bucket.upload('1/a.txt', Buffer.from('two'), 'text/plain');
    expect(result).toEqual({ type: 'error', message: "Object '1/a.txt' already exists in bucket 'todo-attachments'" });
  });

  it('rejects paths that leave the bucket', async () => {
    const result = await bucket.upload('../escape.txt', Buffer.from('x'), 'text/plain');
    expect(result).toEqual({ type: 'invalid', reason: "Invalid object path '../escape.txt'" });
    expect(existsSync(join(tmpDir, 'escape.txt'))).toBe(false);
  });

  it('reports a missing object on download', async () => {
    expect(await bucket.download('1/missing.txt')).toEqual({ type: 'error', message: "Object '1/missing.txt' not found" });
  });
});

describe('signed URLs', () => {
  it('fails when the object does not exist', async () => {
    expect(await bucket.createSignedUrl('1/missing.txt', 60)).toEqual({
      type: 'error',
      message: "Failed to generate signed URL: object '1/missing.txt' not found",
    });
  });

  it('rejects a non-positive lifetime', async () => {
    await bucket.upload('1/a.txt', Buffer.from('x'), 'text/plain');
    expect((await bucket.createSignedUrl('1/a.txt', 0)).type).toBe('invalid');
  });

  it('carries the expiry and verifies until it passes', async () => {
    await bucket.upload('1/a.txt', Buffer.from('x'), 'text/plain');
    const result = await bucket.createSignedUrl('1/a.txt', 60);
    expect(result.type).toBe('success');
    if (result.type !== 'success') return;

    const url = new URL(result.data);
    expect(url.protocol).toBe('file:');
    expect(url.searchParams.get('expires')).toBe(String(NOW_SECONDS + 60));
    expect(bucket.verifySignedUrl(result.data, new Date((NOW_SECONDS + 59) * 1000))).toBe(true);
    expect(bucket.verifySignedUrl(result.data, new Date((NOW_SECONDS + 60) * 1000))).toBe(false);
  });

  it('rejects a URL signed with another key', async () => {
    await bucket.upload('1/a.txt', Buffer.from('x'), 'text/plain');
    const other = new LocalBucket(tmpDir, 'todo-attachments', 'other-secret', { now: () => NOW });
    const result = await other.createSignedUrl('1/a.txt', 60);
    if (result.type !== 'success') throw new Error('expected a signed URL');
    expect(bucket.verifySignedUrl(result.data)).toBe(false);
  });

  it('rejects a URL whose path was changed', async () => {
    await bucket.upload('1/a.txt', Buffer.from('x'), 'text/plain');
    await bucket.upload('1/b.txt', Buffer.from('y'), 'text/plain');
    const result = await bucket.createSignedUrl('1/a.txt', 60);
    if (result.type !== 'success') throw new Error('expected a signed URL');
    expect(bucket.verifySignedUrl(result.data.replace('/1/a.txt', '/1/b.txt'))).toBe(false);
  });

  it('rejects garbage', () => {
    expect(bucket.verifySignedUrl('not a url')).toBe(false);
    expect(bucket.verifySignedUrl('https://example.com/1/a.txt?expires=1&signature=00')).toBe(false);
  });
});

describe('remove', () => {
  it('deletes the object', async () => {
    await bucket.upload('1/a.txt', Buffer.from('x'), 'text/plain');
    expect(await bucket.remove('1/a.txt')).toEqual({ type: 'success', message: 'Removed 1/a.txt' });
    expect((await bucket.download('1/a.txt')).type).toBe('error');
  });

  it('succeeds when the object is already gone', async () => {
    expect((await bucket.remove('1/never.txt')).type).toBe('success');
  });
});
