import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { stringify as stringifyYaml } from 'yaml';
import { loadConfig, getSecret, requireSecret, mergeConfigs } from './loader.js';

describe('loadConfig', () => {
  it('should load defaults when no file or env vars are set', () => {
    const config = loadConfig({ skipEnv: true, skipFileDiscovery: true });

    expect(config.version).toBe('1.0');
    expect(config.core.environment).toBe('development');
    expect(config.structuring.enabled).toBe(true);
    expect(config.structuring.maxContextSizeOverride).toBe(0);
    expect(config.host.maxContextSize).toBe(30);
    expect(config.diagnostics.port).toBe(10030);
  });

  it('should read the stdout log format from logging.format', () => {
    const config = loadConfig({ skipEnv: true, skipFileDiscovery: true, overrides: { logging: { format: 'json' } } });

    expect(config.logging.format).toBe('json');
    expect(config.logging.output).toEqual([{ type: 'stdout' }]);
  });

  it('should apply programmatic overrides', () => {
    const config = loadConfig({
      skipEnv: true,
      skipFileDiscovery: true,
      overrides: { structuring: { mergeConsecutive: false }, host: { botNickname: 'Mai' } },
    });

    expect(config.structuring.mergeConsecutive).toBe(false);
    expect(config.structuring.applyGroup).toBe(true);
    expect(config.host.botNickname).toBe('Mai');
  });

  it('should read TURNWEAVER_* variables', () => {
    const config = loadConfig({
      skipFileDiscovery: true,
      env: {
        TURNWEAVER_ENV: 'staging',
        TURNWEAVER_LOG_LEVEL: 'debug',
        TURNWEAVER_ENABLED: 'false',
        TURNWEAVER_MERGE_CONSECUTIVE: 'no',
        TURNWEAVER_MAX_CONTEXT_OVERRIDE: '12',
        TURNWEAVER_FALLBACK: '0',
        TURNWEAVER_VERBOSE: 'true',
        TURNWEAVER_MODEL: 'test-model',
        TURNWEAVER_MODEL_BASE_URL: 'http://127.0.0.1:10030/v1',
      },
    });

    expect(config.core.environment).toBe('staging');
    expect(config.logging.level).toBe('debug');
    expect(config.structuring).toMatchObject({
      enabled: false,
      mergeConsecutive: false,
      maxContextSizeOverride: 12,
      fallbackToOriginal: false,
      verbose: true,
    });
    expect(config.model.model).toBe('test-model');
    expect(config.model.baseUrl).toBe('http://127.0.0.1:10030/v1');
  });

  it('should ignore unparseable boolean and number variables', () => {
    const config = loadConfig({
      skipFileDiscovery: true,
      env: { TURNWEAVER_ENABLED: 'maybe', TURNWEAVER_MAX_CONTEXT_OVERRIDE: 'lots' },
    });

    expect(config.structuring.enabled).toBe(true);
    expect(config.structuring.maxContextSizeOverride).toBe(0);
  });

  it('should let overrides win over env vars', () => {
    const config = loadConfig({
      skipFileDiscovery: true,
      env: { TURNWEAVER_VERBOSE: 'true' },
      overrides: { structuring: { verbose: false } },
    });

    expect(config.structuring.verbose).toBe(false);
  });

  it('should throw on invalid configuration values', () => {
    expect(() =>
      loadConfig({
        skipFileDiscovery: true,
        env: { TURNWEAVER_MAX_CONTEXT_OVERRIDE: '5000' },
      })
    ).toThrow(/Invalid configuration:\n {2}structuring\.maxContextSizeOverride/);
  });

  describe('config files', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'turnweaver-config-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should load a YAML file from an explicit path', () => {
      const path = join(dir, 'turnweaver.yaml');
      writeFileSync(
        path,
        stringifyYaml({ host: { botNickname: 'Mai', timeLocale: 'zh' }, structuring: { applyPrivate: false } })
      );

      const config = loadConfig({ configPath: path, skipEnv: true });

      expect(config.host.botNickname).toBe('Mai');
      expect(config.host.timeLocale).toBe('zh');
      expect(config.host.maxContextSize).toBe(30);
      expect(config.structuring.applyPrivate).toBe(false);
    });

    it('should let env vars win over the file', () => {
      const path = join(dir, 'turnweaver.yaml');
      writeFileSync(path, stringifyYaml({ model: { model: 'file-model' } }));

      const config = loadConfig({ configPath: path, env: { TURNWEAVER_MODEL: 'env-model' } });

      expect(config.model.model).toBe('env-model');
    });

    it('should fill section defaults the file leaves out after env vars are merged', () => {
      const path = join(dir, 'turnweaver.yaml');
      writeFileSync(path, stringifyYaml({ structuring: { applyPrivate: false } }));

      const config = loadConfig({ configPath: path, env: { TURNWEAVER_VERBOSE: 'true' } });

      expect(config.structuring).toMatchObject({ applyPrivate: false, verbose: true, mergeConsecutive: true });
    });

    it('should accept an empty file', () => {
      const path = join(dir, 'empty.yaml');
      writeFileSync(path, '');

      expect(loadConfig({ configPath: path, skipEnv: true }).version).toBe('1.0');
    });

    it('should throw when an explicit path is missing', () => {
      const path = join(dir, 'missing.yaml');
      expect(() => loadConfig({ configPath: path })).toThrow(`Config file not found: ${path}`);
    });

    it('should reject an unknown time zone', () => {
      const path = join(dir, 'turnweaver.yaml');
      writeFileSync(path, stringifyYaml({ host: { timezone: 'Mars/Olympus' } }));

      expect(() => loadConfig({ configPath: path, skipEnv: true })).toThrow(/^Invalid configuration in /);
    });

    it('should reject a file that fails validation', () => {
      const path = join(dir, 'bad.yaml');
      writeFileSync(path, stringifyYaml({ diagnostics: { port: 'not-a-port' } }));

      expect(() => loadConfig({ configPath: path, skipEnv: true })).toThrow(/^Invalid configuration in /);
    });
  });
});

describe('mergeConfigs', () => {
  it('merges nested objects and replaces arrays', () => {
    expect(
      mergeConfigs(
        { logging: { level: 'info', output: [{ type: 'stdout' }] }, core: { name: 'a' } },
        { logging: { output: [] }, core: undefined }
      )
    ).toEqual({ logging: { level: 'info', output: [] }, core: { name: 'a' } });
  });
});

describe('secrets', () => {
  const KEY = 'TURNWEAVER_TEST_SECRET';

  afterEach(() => {
    delete process.env[KEY];
  });

  it('reads secrets from the environment', () => {
    process.env[KEY] = 'test-secret';
    expect(getSecret(KEY)).toBe('test-secret');
    expect(requireSecret(KEY)).toBe('test-secret');
  });

  it('throws for a missing required secret', () => {
    expect(getSecret(KEY)).toBeUndefined();
    expect(() => requireSecret(KEY)).toThrow(`Required secret not set: ${KEY}`);
  });
});
