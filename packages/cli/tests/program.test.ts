import type { Command } from 'commander';
import { describe, expect, it, vi } from 'vitest';
import type { ProgramActions } from '../src/program.js';
import { createProgram } from '../src/program.js';

function setup() {
  const actions = {
    resolve: vi.fn<ProgramActions['resolve']>(async () => {}),
    init: vi.fn<ProgramActions['init']>(async () => {}),
  };
  const program = createProgram(actions);
  const silence = (command: Command) =>
    command.exitOverride().configureOutput({ writeOut: () => {}, writeErr: () => {} });
  silence(program);
  program.commands.forEach(silence);
  return { program, actions };
}

const argv = (...args: string[]) => ['node', 'buildstat', ...args];

describe('buildstat program', () => {
  it('registers resolve and init', () => {
    const { program } = setup();
    expect(program.commands.map((c) => c.name())).toEqual(['resolve', 'init']);
    const resolve = program.commands.find((c) => c.name() === 'resolve');
    expect(resolve?.options.map((o) => o.long)).toEqual([
      '--patchset',
      '--no-trigger',
      '--json',
      '--concurrency',
      '--config-dir',
    ]);
  });

  it('passes builds and parsed options to resolve', async () => {
    const { program, actions } = setup();
    await program.parseAsync(
      argv('--verbose', 'resolve', 'linux-rel', 'ci/mac-rel:7', '--patchset', '3', '--no-trigger', '--json'),
    );
    expect(actions.resolve).toHaveBeenCalledWith(['linux-rel', 'ci/mac-rel:7'], {
      patchset: 3,
      trigger: false,
      json: true,
      verbose: true,
    });
  });

  it('leaves triggering on by default', async () => {
    const { program, actions } = setup();
    await program.parseAsync(argv('resolve', 'linux-rel'));
    expect(actions.resolve).toHaveBeenCalledWith(['linux-rel'], { trigger: true, verbose: false });
  });

  it('rejects a bad patchset before resolving', async () => {
    const { program, actions } = setup();
    await expect(program.parseAsync(argv('resolve', 'linux-rel', '--patchset', '0'))).rejects.toThrow(
      'Patchset must be a positive integer',
    );
    expect(actions.resolve).not.toHaveBeenCalled();
  });

  it('requires at least one build', async () => {
    const { program } = setup();
    await expect(program.parseAsync(argv('resolve'))).rejects.toThrow("missing required argument 'builds'");
  });

  it('passes --force to init', async () => {
    const { program, actions } = setup();
    await program.parseAsync(argv('init', '--force'));
    expect(actions.init).toHaveBeenCalledWith({ force: true }, expect.anything());
  });
});
