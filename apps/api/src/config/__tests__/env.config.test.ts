import { describe, it, expect } from 'vitest';
import { validateEnv } from '../env.config';

const BASE = { AUTH_USERS: 'admin:test-secret:ADMIN' };

describe('validateEnv', () => {
  it('applies defaults', () => {
    const env = validateEnv(BASE);

    expect(env).toMatchObject({
      DATABASE_PATH: './data/gridsearch.sqlite',
      DATABASE_SYNCHRONIZE: true,
      STORAGE_DRIVER: 'local',
      STORAGE_BASE_DIR: './data/spreadsheets',
      S3_PREFIX: '',
      MAX_UPLOAD_SIZE_MB: 10,
      CLEANUP_INTERVAL_MINUTES: 60,
      ORPHAN_GRACE_MINUTES: 60,
      PORT: 4000,
      NODE_ENV: 'development',
    });
  });

  it('coerces numbers and flags from strings', () => {
    const env = validateEnv({
      ...BASE,
      MAX_UPLOAD_SIZE_MB: '25',
      PORT: '8080',
      DATABASE_SYNCHRONIZE: 'false',
    });

    expect(env.MAX_UPLOAD_SIZE_MB).toBe(25);
    expect(env.PORT).toBe(8080);
    expect(env.DATABASE_SYNCHRONIZE).toBe(false);
  });

  describe('AUTH_USERS', () => {
    it('parses several users with multiple roles', () => {
      const env = validateEnv({
        AUTH_USERS: 'admin:test-secret:ADMIN, op:p:w:d:OPERATOR|USER',
      });

      expect(env.AUTH_USERS).toEqual([
        { username: 'admin', password: 'test-secret', roles: ['ADMIN'] },
        { username: 'op', password: 'p:w:d', roles: ['OPERATOR', 'USER'] },
      ]);
    });

    it('is required', () => {
      expect(() => validateEnv({})).toThrow('Environment validation failed:\n  AUTH_USERS: Required');
    });

    it('rejects malformed entries', () => {
      expect(() => validateEnv({ AUTH_USERS: 'admin:ADMIN' })).toThrow(
        'Environment validation failed:\n  AUTH_USERS: Entry 1 must look like user:password:ROLE[|ROLE]',
      );
    });

    it('rejects unknown roles', () => {
      expect(() => validateEnv({ AUTH_USERS: 'admin:test-secret:ROOT' })).toThrow(
        'AUTH_USERS: Unknown role "ROOT" for user "admin"',
      );
    });

    it('rejects a list with no entries', () => {
      expect(() => validateEnv({ AUTH_USERS: ' , ' })).toThrow('AUTH_USERS: At least one user is required');
    });
  });

  it('requires S3 settings for the s3 driver', () => {
    let message = '';
    try {
      validateEnv({ ...BASE, STORAGE_DRIVER: 's3', S3_BUCKET: 'sheets' });
    } catch (err) {
      message = err instanceof Error ? err.message : '';
    }

    expect(message).toBe(
      [
        'Environment validation failed:',
        '  S3_REGION: Required when STORAGE_DRIVER is s3',
        '  S3_ACCESS_KEY_ID: Required when STORAGE_DRIVER is s3',
        '  S3_SECRET_ACCESS_KEY: Required when STORAGE_DRIVER is s3',
      ].join('\n'),
    );
  });

  it('rejects upload limits out of range', () => {
    expect(() => validateEnv({ ...BASE, MAX_UPLOAD_SIZE_MB: '500' })).toThrow(/MAX_UPLOAD_SIZE_MB/);
  });
});
