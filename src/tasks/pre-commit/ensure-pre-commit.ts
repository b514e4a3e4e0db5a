import type { TaskContext } from '../../core/context.js';

/**
 * Install the pre-commit git hooks. Output is hidden; failures propagate.
 */
export async function ensurePreCommit(ctx: TaskContext): Promise<void> {
  await ctx.runner.run('pre-commit install', { pty: true, hide: 'both' });
}
