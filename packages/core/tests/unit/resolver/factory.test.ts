import { describe, expect, it } from 'vitest';
import { createBuild } from '../../../src/builds/identifier.js';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import { createResolver } from '../../../src/resolver/factory.js';
import type { GitRunner } from '../../../src/review/git-cl.js';
import { UnresolvedBuildError } from '../../../src/utils/errors.js';
import { prpcFetch, requestBody } from '../../helpers.js';

describe('createResolver', () => {
  it('wires the git branch config and Buildbucket host from config', async () => {
    const git: GitRunner = async (args) => {
      if (args[0] === 'symbolic-ref') return 'feature';
      return args[2] === 'branch.feature.gerritissue' ? '555' : '2';
    };
    const fetchMock = prpcFetch(
      { responses: [{ searchBuilds: {} }] },
      { responses: [{ scheduleBuild: { id: '1', builder: { bucket: 'try', builder: 'linux-rel' } } }] },
    );
    const resolver = createResolver(
      { ...DEFAULT_CONFIG, buildbucket: { host: 'buildbucket.test', project: 'chromium' } },
      { fetch: fetchMock, git },
    );

    await expect(resolver.resolveBuilds([createBuild('linux-rel')])).rejects.toThrow(UnresolvedBuildError);

    expect(String(fetchMock.mock.calls[0][0])).toBe('https://buildbucket.test/prpc/buildbucket.v2.Builds/Batch');
    expect(requestBody(fetchMock, 0)).toMatchObject({
      requests: [
        {
          searchBuilds: {
            predicate: {
              gerritChanges: [
                { host: 'chromium-review.googlesource.com', project: 'chromium/src', change: 555, patchset: 2 },
              ],
            },
          },
        },
      ],
    });
    expect(requestBody(fetchMock, 1)).toMatchObject({
      requests: [{ scheduleBuild: { builder: { project: 'chromium', bucket: 'try', builder: 'linux-rel' } } }],
    });
  });

  it('honours the trigger setting', async () => {
    const resolver = createResolver(
      { ...DEFAULT_CONFIG, resolver: { ...DEFAULT_CONFIG.resolver, triggerJobs: false } },
      {
        fetch: prpcFetch({ responses: [{ searchBuilds: {} }] }),
        git: async (args) => (args[0] === 'symbolic-ref' ? 'feature' : '555'),
      },
    );
    await expect(resolver.resolveBuilds([createBuild('linux-rel')], 1)).rejects.toThrow(
      'Aborted: no try jobs and triggering is disabled.',
    );
  });
});
