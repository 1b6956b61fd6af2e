// packages/core/src/builds/status-map.ts

import type { BuildIdentifier } from '../types/build.js';
import type { TryJobStatus } from '../types/status.js';
import { buildKey, compareBuilds } from './identifier.js';

export interface BuildStatusEntry {
  readonly build: BuildIdentifier;
  readonly status: TryJobStatus;
}

/**
 * Statuses keyed by resolved build. Keys compare by value (see `buildKey`),
 * so a freshly constructed identifier finds the entry for an equal one.
 * Iteration order is insertion order but callers should not rely on it;
 * use `sorted()` for display.
 */
export class BuildStatusMap implements Iterable<BuildStatusEntry> {
  private readonly entries = new Map<string, BuildStatusEntry>();

  constructor(entries: Iterable<readonly [BuildIdentifier, TryJobStatus]> = []) {
    for (const [build, status] of entries) {
      this.set(build, status);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  set(build: BuildIdentifier, status: TryJobStatus): this {
    this.entries.set(buildKey(build), { build, status });
    return this;
  }

  get(build: BuildIdentifier): TryJobStatus | undefined {
    return this.entries.get(buildKey(build))?.status;
  }

  has(build: BuildIdentifier): boolean {
    return this.entries.has(buildKey(build));
  }

  delete(build: BuildIdentifier): boolean {
    return this.entries.delete(buildKey(build));
  }

  /** Copy every entry of `other` into this map, overwriting equal keys. */
  merge(other: BuildStatusMap): this {
    for (const { build, status } of other) {
      this.set(build, status);
    }
    return this;
  }

  builds(): BuildIdentifier[] {
    return [...this.entries.values()].map((entry) => entry.build);
  }

  statuses(): TryJobStatus[] {
    return [...this.entries.values()].map((entry) => entry.status);
  }

  builderNames(): Set<string> {
    return new Set(this.builds().map((build) => build.builderName));
  }

  filter(predicate: (status: TryJobStatus, build: BuildIdentifier) => boolean): BuildStatusMap {
    const result = new BuildStatusMap();
    for (const { build, status } of this) {
      if (predicate(status, build)) {
        result.set(build, status);
      }
    }
    return result;
  }

  some(predicate: (status: TryJobStatus, build: BuildIdentifier) => boolean): boolean {
    for (const { build, status } of this) {
      if (predicate(status, build)) {
        return true;
      }
    }
    return false;
  }

  sorted(): BuildStatusEntry[] {
    return [...this.entries.values()].sort((a, b) => compareBuilds(a.build, b.build));
  }

  [Symbol.iterator](): Iterator<BuildStatusEntry> {
    return this.entries.values();
  }

  toJSON(): Array<BuildIdentifier & { status: TryJobStatus['status']; result?: string | null }> {
    return this.sorted().map(({ build, status }) => ({
      ...build,
      status: status.status,
      ...(status.status === 'COMPLETED' ? { result: status.result } : {}),
    }));
  }
}
