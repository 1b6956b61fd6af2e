// packages/core/src/config/loader.ts

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { BuildstatConfig } from '../types/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import type { BuildstatConfigInput } from './schema.js';
import { validateConfig } from './schema.js';

export const CONFIG_FILENAME = '.buildstat.yml';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged. `undefined` source values are skipped so
 * partially filled CLI overrides do not erase file settings.
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const [key, srcVal] of Object.entries(source)) {
    if (srcVal === undefined) {
      continue;
    }
    const tgtVal = result[key];
    result[key] = isPlainObject(srcVal) && isPlainObject(tgtVal) ? deepMerge(tgtVal, srcVal) : srcVal;
  }
  return result;
}

/**
 * Load config with precedence: overrides > .buildstat.yml > defaults.
 *
 * 1. Start with hardcoded defaults
 * 2. Merge .buildstat.yml from projectDir on top
 * 3. Merge programmatic overrides on top
 * 4. Validate the final result
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: BuildstatConfigInput;
  skipFile?: boolean;
}): BuildstatConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: PlainObject = structuredClone({ ...DEFAULT_CONFIG });

  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(
        `Failed to parse ${CONFIG_FILENAME}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (isPlainObject(fileConfig)) {
      merged = deepMerge(merged, fileConfig);
    } else if (fileConfig !== null && fileConfig !== undefined) {
      throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping at the top level`);
    }
  }

  if (options?.overrides) {
    merged = deepMerge(merged, { ...options.overrides });
  }

  return validateConfig(merged);
}

/**
 * Write a config to .buildstat.yml in the given directory. Returns the path written.
 */
export function writeConfig(config: BuildstatConfig, dir: string): string {
  const configPath = join(dir, CONFIG_FILENAME);
  writeFileSync(configPath, stringifyYaml(config, { lineWidth: 100 }), 'utf-8');
  return configPath;
}

export { deepMerge };
