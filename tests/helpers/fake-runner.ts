import { CommandFailedError } from '../../src/core/errors.js';
import { DEFAULT_CONFIG } from '../../src/core/config.js';
import { createProjectInfo } from '../../src/core/project-info.js';
import type { TaskContext } from '../../src/core/context.js';
import type {
  CommandResult,
  CommandRunner,
  DevtasksConfig,
  RunOptions,
} from '../../src/core/types.js';

export interface RecordedCall {
  command: string;
  options: RunOptions;
}

/**
 * In-process CommandRunner: records calls, answers with scripted stdout and
 * fails the commands it is told to.
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private stdoutByCommand = new Map<string, string>();
  private failing = new Set<string>();

  respond(command: string, stdout: string): this {
    this.stdoutByCommand.set(command, stdout);
    return this;
  }

  fail(command: string): this {
    this.failing.add(command);
    return this;
  }

  get commands(): string[] {
    return this.calls.map((call) => call.command);
  }

  async run(command: string, options: RunOptions = {}): Promise<CommandResult> {
    this.calls.push({ command, options });
    const result: CommandResult = {
      command,
      stdout: this.stdoutByCommand.get(command) ?? '',
      stderr: '',
      exitCode: this.failing.has(command) ? 1 : 0,
    };
    if (result.exitCode !== 0 && !options.warn) {
      throw new CommandFailedError(result);
    }
    return result;
  }
}

export function createTestContext(
  runner: CommandRunner,
  overrides: Partial<DevtasksConfig> = {}
): TaskContext {
  const config: DevtasksConfig = { ...DEFAULT_CONFIG, ...overrides };
  return {
    projectRoot: '/tmp/devtasks-project',
    projectInfo: createProjectInfo(config.layout),
    config,
    runner,
  };
}
