import { describe, expect, it, vi } from 'vitest';
import type { RawStep } from '../../../src/buildbucket/schema.js';
import { INFRA_FAILURE, SCHEDULED, completed } from '../../../src/builds/status.js';
import { InterruptionClassifier } from '../../../src/resolver/classifier.js';
import type { JsonFetcher } from '../../../src/resolver/summary.js';
import { rawBuild } from '../../helpers.js';

const SUMMARY_URL = 'https://logs.test/step/summary';

function testStep(name = 'blink_web_tests (with patch)'): RawStep {
  return {
    name,
    logs: [
      { name: 'stdout', viewUrl: 'https://logs.test/step/stdout' },
      { name: 'chromium_swarming.summary', viewUrl: SUMMARY_URL },
    ],
  };
}

function classifier(summary: unknown = { shards: [] }) {
  const fetchJson = vi.fn<JsonFetcher>(async () => summary);
  return { fetchJson, classifier: new InterruptionClassifier({ fetchJson }) };
}

describe('InterruptionClassifier.isTestStep', () => {
  const { classifier: subject } = classifier();

  it.each([
    'blink_web_tests (with patch)',
    'blink_wpt_tests (with patch) on Ubuntu-22.04',
    'headless_shell_wpt_webdriver_tests (with patch)',
    'not_site_per_process_blink_web_tests (with patch) (retry shards)',
  ])('matches %s', (name) => {
    expect(subject.isTestStep(name)).toBe(true);
  });

  it.each([
    'blink_web_tests (without patch)',
    'compile (with patch)',
    'blink_web_tests (with patch) | shard 1',
  ])('does not match %s', (name) => {
    expect(subject.isTestStep(name)).toBe(false);
  });

  it('accepts a custom pattern that must match the whole name', () => {
    const custom = new InterruptionClassifier({ fetchJson: async () => ({}), testStepPattern: 'unit_tests' });
    expect(custom.isTestStep('unit_tests')).toBe(true);
    expect(custom.isTestStep('browser_unit_tests')).toBe(false);
  });
});

describe('InterruptionClassifier.classify', () => {
  it('maps the Buildbucket status when nothing was interrupted', async () => {
    const { classifier: subject } = classifier({ shards: [{ exit_code: 1 }] });
    await expect(subject.classify(rawBuild({ status: 'FAILURE', steps: [testStep()] }))).resolves.toEqual(
      completed('FAILURE'),
    );
    await expect(subject.classify(rawBuild({ status: 'SCHEDULED' }))).resolves.toBe(SCHEDULED);
  });

  it('reports a non-test failure_type as an infra failure', async () => {
    const { classifier: subject, fetchJson } = classifier();
    const build = rawBuild({ status: 'FAILURE', output: { properties: { failure_type: 'COMPILE_FAILURE' } } });
    await expect(subject.classify(build)).resolves.toBe(INFRA_FAILURE);
    expect(fetchJson).not.toHaveBeenCalled();
  });

  it('keeps test failures as they are', async () => {
    const { classifier: subject } = classifier();
    const build = rawBuild({ status: 'FAILURE', output: { properties: { failure_type: 'TEST_FAILURE' } } });
    await expect(subject.classify(build)).resolves.toEqual(completed('FAILURE'));
  });

  it.each([130, 251, 252, 253, 255])('reports a shard exiting with %i as an infra failure', async (code) => {
    const { classifier: subject, fetchJson } = classifier({ shards: [{ exit_code: 0 }, { exit_code: code }] });
    await expect(subject.classify(rawBuild({ status: 'FAILURE', steps: [testStep()] }))).resolves.toBe(
      INFRA_FAILURE,
    );
    expect(fetchJson).toHaveBeenCalledWith(SUMMARY_URL);
  });

  it('ignores shards that never reported', async () => {
    const { classifier: subject } = classifier({ shards: [null, { exit_code: 0 }] });
    await expect(subject.classify(rawBuild({ steps: [testStep()] }))).resolves.toEqual(completed('SUCCESS'));
  });

  it('only reads summaries of test steps', async () => {
    const { classifier: subject, fetchJson } = classifier({ shards: [{ exit_code: 255 }] });
    const build = rawBuild({ status: 'FAILURE', steps: [testStep('compile (with patch)')] });
    await expect(subject.classify(build)).resolves.toEqual(completed('FAILURE'));
    expect(fetchJson).not.toHaveBeenCalled();
  });

  it('skips summary logs without a URL', async () => {
    const { classifier: subject, fetchJson } = classifier({ shards: [{ exit_code: 255 }] });
    const step: RawStep = {
      name: 'blink_web_tests (with patch)',
      logs: [{ name: 'chromium_swarming.summary' }],
    };
    const build = rawBuild({ status: 'FAILURE', steps: [step] });
    await expect(subject.classify(build)).resolves.toEqual(completed('FAILURE'));
    expect(fetchJson).not.toHaveBeenCalled();
  });

  it('falls back to the Buildbucket status when the summary cannot be read', async () => {
    const fetchJson = vi.fn<JsonFetcher>(async () => {
      throw new Error('HTTP 500');
    });
    const subject = new InterruptionClassifier({ fetchJson });
    await expect(subject.classify(rawBuild({ status: 'FAILURE', steps: [testStep()] }))).resolves.toEqual(
      completed('FAILURE'),
    );
  });

  it('gives the same answer for the same build', async () => {
    const { classifier: subject } = classifier({ shards: [{ exit_code: 253 }] });
    const build = rawBuild({ status: 'FAILURE', steps: [testStep()] });
    expect(await subject.classify(build)).toBe(await subject.classify(build));
  });
});
