import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { CONFIG_FILENAME, deepMerge, loadConfig, writeConfig } from '../../../src/config/loader.js';
import { ConfigError } from '../../../src/utils/errors.js';

const TEST_DIR = join(tmpdir(), `buildstat-test-${process.pid}-${Date.now()}`);

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('returns defaults when no config file exists', () => {
    const config = loadConfig({ projectDir: TEST_DIR });
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.resolver.onMissingTryBuilds).toBe('fail');
  });

  it('merges .buildstat.yml over defaults', () => {
    writeFileSync(
      join(TEST_DIR, CONFIG_FILENAME),
      'resolver:\n  triggerJobs: false\nadvanced:\n  logLevel: debug\n',
      'utf-8',
    );
    const config = loadConfig({ projectDir: TEST_DIR });
    expect(config.resolver.triggerJobs).toBe(false);
    expect(config.advanced.logLevel).toBe('debug');
    // Defaults still present for unspecified fields
    expect(config.resolver.ioConcurrency).toBe(DEFAULT_CONFIG.resolver.ioConcurrency);
    expect(config.buildbucket.host).toBe('cr-buildbucket.appspot.com');
  });

  it('respects precedence: overrides > file > defaults', () => {
    writeFileSync(
      join(TEST_DIR, CONFIG_FILENAME),
      'resolver:\n  ioConcurrency: 2\n  onMissingTryBuilds: mark-missing\n',
      'utf-8',
    );
    const config = loadConfig({
      projectDir: TEST_DIR,
      overrides: { resolver: { ioConcurrency: 16 } },
    });
    expect(config.resolver.ioConcurrency).toBe(16);
    expect(config.resolver.onMissingTryBuilds).toBe('mark-missing');
  });

  it('skips the file when asked', () => {
    writeFileSync(join(TEST_DIR, CONFIG_FILENAME), 'resolver:\n  triggerJobs: false\n', 'utf-8');
    expect(loadConfig({ projectDir: TEST_DIR, skipFile: true }).resolver.triggerJobs).toBe(true);
  });

  it('treats an empty file as no settings', () => {
    writeFileSync(join(TEST_DIR, CONFIG_FILENAME), '', 'utf-8');
    expect(loadConfig({ projectDir: TEST_DIR })).toEqual(DEFAULT_CONFIG);
  });

  it('throws ConfigError on unparsable YAML', () => {
    writeFileSync(join(TEST_DIR, CONFIG_FILENAME), 'resolver: [unclosed\n', 'utf-8');
    expect(() => loadConfig({ projectDir: TEST_DIR })).toThrow(ConfigError);
  });

  it('throws ConfigError when the top level is not a mapping', () => {
    writeFileSync(join(TEST_DIR, CONFIG_FILENAME), '- a\n- b\n', 'utf-8');
    expect(() => loadConfig({ projectDir: TEST_DIR })).toThrow('must contain a mapping');
  });

  it('throws ConfigError on invalid values', () => {
    writeFileSync(join(TEST_DIR, CONFIG_FILENAME), 'resolver:\n  ioConcurrency: 0\n', 'utf-8');
    expect(() => loadConfig({ projectDir: TEST_DIR })).toThrow(/resolver\.ioConcurrency/);
  });
});

describe('writeConfig', () => {
  it('writes a file that loads back to the same config', () => {
    const config = loadConfig({ projectDir: TEST_DIR, overrides: { gerrit: { project: 'v8/v8' } } });
    const path = writeConfig(config, TEST_DIR);
    expect(path).toBe(join(TEST_DIR, CONFIG_FILENAME));
    expect(existsSync(path)).toBe(true);
    expect(readFileSync(path, 'utf-8')).toContain('project: v8/v8');
    expect(loadConfig({ projectDir: TEST_DIR })).toEqual(config);
  });
});

describe('deepMerge', () => {
  it('merges nested objects, replaces arrays and skips undefined', () => {
    expect(
      deepMerge({ a: { x: 1, y: 2 }, list: [1, 2], keep: 'yes' }, { a: { y: 3 }, list: [9], keep: undefined }),
    ).toEqual({ a: { x: 1, y: 3 }, list: [9], keep: 'yes' });
  });
});
