// tests/helpers.ts — Shared builders for raw builds, pRPC responses and loggers

import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { RawBuild } from '../src/buildbucket/schema.js';
import { BuildStatusMap } from '../src/builds/status-map.js';
import type { ClRevision, CodeReview } from '../src/review/types.js';
import type { Logger, LogLevel } from '../src/utils/logger.js';

export function rawBuild(overrides: Partial<RawBuild> & { builderName?: string; bucket?: string } = {}): RawBuild {
  const { builderName = 'linux-rel', bucket = 'try', ...rest } = overrides;
  return {
    id: '8800000000000001',
    number: 100,
    builder: { project: 'chromium', bucket, builder: builderName },
    status: 'SUCCESS',
    ...rest,
  };
}

export function prpcResponse(body: unknown, status = 200): Response {
  return new Response(`)]}'\n${JSON.stringify(body)}`, {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** fetch stand-in answering successive calls with the given pRPC bodies. */
export function prpcFetch(...bodies: unknown[]): Mock<typeof fetch> {
  const fetchMock = vi.fn<typeof fetch>();
  for (const body of bodies) {
    fetchMock.mockResolvedValueOnce(prpcResponse(body));
  }
  return fetchMock;
}

export function requestBody(fetchMock: Mock<typeof fetch>, call = 0): unknown {
  const init = fetchMock.mock.calls[call][1];
  return JSON.parse(String(init?.body));
}

export interface RecordingLogger extends Logger {
  lines: Array<{ level: LogLevel; message: string }>;
  messages(level?: LogLevel): string[];
}

export function recordingLogger(): RecordingLogger {
  const lines: Array<{ level: LogLevel; message: string }> = [];
  const record = (level: LogLevel) => (message: string) => {
    lines.push({ level, message });
  };
  return {
    lines,
    messages: (level) => lines.filter((line) => !level || line.level === level).map((line) => line.message),
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}

export interface FakeCodeReview extends CodeReview {
  getIssueNumber: Mock<() => Promise<string | undefined>>;
  latestTryBuilds: Mock<(cl: ClRevision, builderNames: readonly string[]) => Promise<BuildStatusMap>>;
  triggerTryBuilds: Mock<(cl: ClRevision, builderNames: readonly string[]) => Promise<void>>;
}

export function fakeCodeReview(
  options: { issue?: string; builds?: BuildStatusMap } = {},
): FakeCodeReview {
  const issue = 'issue' in options ? options.issue : '1234';
  return {
    getIssueNumber: vi.fn<() => Promise<string | undefined>>(async () => issue),
    latestTryBuilds: vi.fn<(cl: ClRevision, builderNames: readonly string[]) => Promise<BuildStatusMap>>(
      async () => options.builds ?? new BuildStatusMap(),
    ),
    triggerTryBuilds: vi.fn<(cl: ClRevision, builderNames: readonly string[]) => Promise<void>>(async () => {}),
  };
}
