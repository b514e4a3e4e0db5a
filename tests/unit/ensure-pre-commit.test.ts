import { describe, it, expect } from '@jest/globals';
import { ensurePreCommit } from '../../src/tasks/pre-commit/ensure-pre-commit.js';
import { CommandFailedError } from '../../src/core/errors.js';
import { FakeCommandRunner, createTestContext } from '../helpers/fake-runner.js';

describe('ensurePreCommit', () => {
  it('should install the hooks with output hidden', async () => {
    const runner = new FakeCommandRunner();

    await ensurePreCommit(createTestContext(runner));

    expect(runner.calls).toEqual([
      { command: 'pre-commit install', options: { pty: true, hide: 'both' } },
    ]);
  });

  it('should propagate a failed install', async () => {
    const runner = new FakeCommandRunner().fail('pre-commit install');

    await expect(ensurePreCommit(createTestContext(runner))).rejects.toBeInstanceOf(
      CommandFailedError
    );
  });
});
