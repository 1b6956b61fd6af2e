// packages/core/src/types/config.ts — Configuration types

import type { LogLevel } from '../utils/logger.js';

/** What to do when try builders have no build and triggering is disabled. */
export type MissingTryBuildPolicy = 'fail' | 'mark-missing';

export interface BuildbucketConfig {
  host: string;
  project: string;
}

export interface GerritConfig {
  host: string;
  project: string;
}

export interface ResolverConfig {
  triggerJobs: boolean;
  onMissingTryBuilds: MissingTryBuildPolicy;
  ioConcurrency: number;
}

export interface ClassifierConfig {
  testStepPattern: string;
  summaryLogName: string;
}

export interface AdvancedConfig {
  logLevel: LogLevel;
}

export interface BuildstatConfig {
  buildbucket: BuildbucketConfig;
  gerrit: GerritConfig;
  resolver: ResolverConfig;
  classifier: ClassifierConfig;
  advanced: AdvancedConfig;
}
