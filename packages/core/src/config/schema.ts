// packages/core/src/config/schema.ts

import { z } from 'zod';
import type { BuildstatConfig } from '../types/config.js';
import { DEFAULT_IO_CONCURRENCY } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_SUMMARY_LOG_NAME, DEFAULT_TEST_STEP_PATTERN } from './defaults.js';

const hostSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9.-]+(:\d+)?$/, 'must be a bare host name, without scheme or path');

const buildbucketConfigSchema = z.object({
  host: hostSchema.default('cr-buildbucket.appspot.com'),
  project: z.string().min(1).default('chromium'),
});

const gerritConfigSchema = z.object({
  host: hostSchema.default('chromium-review.googlesource.com'),
  project: z.string().min(1).default('chromium/src'),
});

const resolverConfigSchema = z.object({
  triggerJobs: z.boolean().default(true),
  onMissingTryBuilds: z.enum(['fail', 'mark-missing']).default('fail'),
  ioConcurrency: z.number().int().positive().max(64).default(DEFAULT_IO_CONCURRENCY),
});

const classifierConfigSchema = z.object({
  testStepPattern: z
    .string()
    .min(1)
    .default(DEFAULT_TEST_STEP_PATTERN)
    .refine(isValidPattern, { message: 'must be a valid regular expression' }),
  summaryLogName: z.string().min(1).default(DEFAULT_SUMMARY_LOG_NAME),
});

const advancedConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const buildstatConfigSchema = z.object({
  buildbucket: buildbucketConfigSchema.default({}),
  gerrit: gerritConfigSchema.default({}),
  resolver: resolverConfigSchema.default({}),
  classifier: classifierConfigSchema.default({}),
  advanced: advancedConfigSchema.default({}),
});

export type BuildstatConfigInput = z.input<typeof buildstatConfigSchema>;

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): BuildstatConfig {
  const result = buildstatConfigSchema.safeParse(config);
  if (!result.success) {
    const first = result.error.issues[0];
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`, first?.path.join('.'));
  }
  return result.data;
}
