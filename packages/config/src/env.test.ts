import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  describeEnv,
  findRootDir,
  loadEnv,
  maskValue,
  readEnv,
  readEnvFlag,
  readEnvNumber,
  requireEnv,
  requireEnvMultiple,
} from './env.js';

const TOUCHED_KEYS = [
  'ENV_FILE',
  'AP_TEST_REGION',
  'AP_TEST_BUCKET',
  'AP_TEST_KEEP',
  'AP_TEST_SECRET_KEY',
  'AP_TEST_FLAG',
  'AP_TEST_NUMBER',
];

describe('env', () => {
  let rootDir: string;
  let saved: Record<string, string | undefined>;

  beforeEach(() => {
    saved = {};
    for (const key of TOUCHED_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    rootDir = mkdtempSync(join(tmpdir(), 'archive-probe-env-'));
    writeFileSync(join(rootDir, 'package.json'), JSON.stringify({ name: 'root', workspaces: ['packages/*'] }));
    mkdirSync(join(rootDir, 'packages', 'storage'), { recursive: true });
  });

  afterEach(() => {
    for (const key of TOUCHED_KEYS) {
      if (saved[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = saved[key];
      }
    }
    rmSync(rootDir, { recursive: true, force: true });
  });

  describe('findRootDir', () => {
    it('walks up to the package.json declaring workspaces', () => {
      expect(findRootDir(join(rootDir, 'packages', 'storage'))).toBe(rootDir);
    });
  });

  describe('loadEnv', () => {
    it('loads .env and lets .env.local override it', () => {
      writeFileSync(join(rootDir, '.env'), 'AP_TEST_REGION=us-west-2\nAP_TEST_BUCKET=from-env\n');
      writeFileSync(join(rootDir, '.env.local'), 'AP_TEST_BUCKET=from-local\n');

      const result = loadEnv({ cwd: join(rootDir, 'packages', 'storage') });

      expect(result.rootDir).toBe(rootDir);
      expect(result.loaded).toBe(true);
      expect(result.localLoaded).toBe(true);
      expect(result.keysLoaded).toEqual(['AP_TEST_REGION', 'AP_TEST_BUCKET']);
      expect(result.keySources).toEqual({ AP_TEST_REGION: '.env', AP_TEST_BUCKET: '.env.local' });
      expect(process.env.AP_TEST_REGION).toBe('us-west-2');
      expect(process.env.AP_TEST_BUCKET).toBe('from-local');
    });

    it('keeps an existing value that a file would blank out', () => {
      process.env.AP_TEST_KEEP = 'kept';
      writeFileSync(join(rootDir, '.env'), 'AP_TEST_KEEP=\n');

      const result = loadEnv({ cwd: rootDir });

      expect(result.keysLoaded).toEqual([]);
      expect(process.env.AP_TEST_KEEP).toBe('kept');
    });

    it('reports a missing .env file', () => {
      const result = loadEnv({ cwd: rootDir });
      expect(result.loaded).toBe(false);
      expect(result.localLoaded).toBe(false);
      expect(result.envFilePath).toBe(join(rootDir, '.env'));
    });

    it('honours an explicit env file', () => {
      const custom = join(rootDir, 'ci.env');
      writeFileSync(custom, 'AP_TEST_REGION=eu-central-1\n');

      const result = loadEnv({ cwd: rootDir, envFile: custom });

      expect(result.envFilePath).toBe(custom);
      expect(process.env.AP_TEST_REGION).toBe('eu-central-1');
    });
  });

  describe('describeEnv', () => {
    it('masks secrets and reports lengths', () => {
      process.env.AP_TEST_SECRET_KEY = 'test-secret-value';
      process.env.AP_TEST_REGION = 'us-east-1';

      const diagnostics = describeEnv(['AP_TEST_SECRET_KEY', 'AP_TEST_REGION', 'AP_TEST_BUCKET']);

      expect(diagnostics.requiredKeys).toEqual([
        { key: 'AP_TEST_SECRET_KEY', present: true, length: 17, maskedValue: 'test...alue' },
        { key: 'AP_TEST_REGION', present: true, length: 9, maskedValue: undefined },
        { key: 'AP_TEST_BUCKET', present: false },
      ]);
      expect(diagnostics.warnings).toEqual([]);
    });

    it('warns about quoted secrets', () => {
      process.env.AP_TEST_SECRET_KEY = '"test-secret"';
      const diagnostics = describeEnv(['AP_TEST_SECRET_KEY']);
      expect(diagnostics.warnings).toEqual([
        'AP_TEST_SECRET_KEY contains quotes or leading/trailing whitespace (may cause issues)',
      ]);
    });
  });

  describe('readers', () => {
    it('masks short values completely', () => {
      expect(maskValue('abc')).toBe('***');
    });

    it('trims values and treats blank as unset', () => {
      process.env.AP_TEST_REGION = '  us-east-1 ';
      process.env.AP_TEST_BUCKET = '   ';
      expect(readEnv('AP_TEST_REGION')).toBe('us-east-1');
      expect(readEnv('AP_TEST_BUCKET')).toBeUndefined();
    });

    it('throws for a missing required variable', () => {
      expect(() => requireEnv('AP_TEST_BUCKET')).toThrow(
        'Missing or empty required environment variable: AP_TEST_BUCKET'
      );
    });

    it('lists every missing variable at once', () => {
      process.env.AP_TEST_REGION = 'us-east-1';
      expect(() => requireEnvMultiple(['AP_TEST_REGION', 'AP_TEST_BUCKET', 'AP_TEST_KEEP'])).toThrow(
        'Missing required environment variables: AP_TEST_BUCKET, AP_TEST_KEEP'
      );
    });

    it('parses flags', () => {
      expect(readEnvFlag('AP_TEST_FLAG', true)).toBe(true);
      process.env.AP_TEST_FLAG = 'off';
      expect(readEnvFlag('AP_TEST_FLAG', true)).toBe(false);
      process.env.AP_TEST_FLAG = 'maybe';
      expect(() => readEnvFlag('AP_TEST_FLAG', true)).toThrow(
        'Environment variable AP_TEST_FLAG must be a boolean, got: maybe'
      );
    });

    it('parses numbers', () => {
      expect(readEnvNumber('AP_TEST_NUMBER', 4)).toBe(4);
      process.env.AP_TEST_NUMBER = '2.5';
      expect(readEnvNumber('AP_TEST_NUMBER', 4)).toBe(2.5);
      process.env.AP_TEST_NUMBER = 'four';
      expect(() => readEnvNumber('AP_TEST_NUMBER', 4)).toThrow(
        'Environment variable AP_TEST_NUMBER must be a number, got: four'
      );
    });
  });
});
