import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig, resolveDatabasePath } from '../src/config.js';

const base = { TICKBOX_DATABASE_URL: 'data/todos.db', TICKBOX_ACCESS_KEY: 'test-secret' };

function configIssues(env: NodeJS.ProcessEnv): readonly string[] {
  try {
    loadConfig(env, '/work');
  } catch (err: unknown) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  it('applies defaults around the required values', () => {
    expect(loadConfig(base, '/work')).toEqual({
      databasePath: '/work/data/todos.db',
      accessKey: 'test-secret',
      storageDir: '/work/data/storage',
      bucketName: 'todo-attachments',
      maxFileSizeBytes: 10 * 1024 * 1024,
      signedUrlTtlSeconds: 3600,
    });
  });

  it('reads the optional values', () => {
    const config = loadConfig({
      ...base,
      TICKBOX_STORAGE_DIR: 'files',
      TICKBOX_STORAGE_BUCKET: 'uploads',
      TICKBOX_MAX_FILE_SIZE_MB: '2.5',
      TICKBOX_SIGNED_URL_TTL: '600',
    }, '/work');
    expect(config.storageDir).toBe('/work/files');
    expect(config.bucketName).toBe('uploads');
    expect(config.maxFileSizeBytes).toBe(2621440);
    expect(config.signedUrlTtlSeconds).toBe(600);
  });

  it('puts storage under the working directory for an in-memory database', () => {
    const config = loadConfig({ ...base, TICKBOX_DATABASE_URL: ':memory:' }, '/work');
    expect(config.databasePath).toBe(':memory:');
    expect(config.storageDir).toBe('/work/storage');
  });

  it('names every missing required variable', () => {
    const issues = configIssues({});
    expect(issues).toContain('TICKBOX_DATABASE_URL is required');
    expect(issues).toContain('TICKBOX_ACCESS_KEY is required');
  });

  it('treats a blank access key as missing', () => {
    expect(configIssues({ ...base, TICKBOX_ACCESS_KEY: '   ' })).toEqual(['TICKBOX_ACCESS_KEY is required']);
  });

  it('rejects a non-numeric TTL', () => {
    const issues = configIssues({ ...base, TICKBOX_SIGNED_URL_TTL: 'soon' });
    expect(issues).toHaveLength(1);
    expect(issues[0]?.startsWith('TICKBOX_SIGNED_URL_TTL ')).toBe(true);
  });

  it('includes the issues in the error message', () => {
    expect(() => loadConfig({ TICKBOX_DATABASE_URL: 'x.db' }, '/work'))
      .toThrow('Invalid configuration: TICKBOX_ACCESS_KEY is required');
  });
});

describe('resolveDatabasePath', () => {
  it('resolves relative paths against the working directory', () => {
    expect(resolveDatabasePath('todos.db', '/work')).toBe('/work/todos.db');
  });

  it('accepts file URLs', () => {
    expect(resolveDatabasePath('file:///var/lib/tickbox/todos.db', '/work')).toBe('/var/lib/tickbox/todos.db');
  });

  it('keeps :memory:', () => {
    expect(resolveDatabasePath(':memory:', '/work')).toBe(':memory:');
  });
});
