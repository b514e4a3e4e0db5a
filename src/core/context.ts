import { ConfigManager } from './config.js';
import { ShellCommandRunner } from './command-runner.js';
import { createProjectInfo } from './project-info.js';
import type { CommandRunner, DevtasksConfig, ProjectInfo } from './types.js';

/**
 * Everything a task needs, built once per invocation and passed down.
 */
export interface TaskContext {
  projectRoot: string;
  projectInfo: ProjectInfo;
  config: DevtasksConfig;
  runner: CommandRunner;
}

export interface TaskContextOptions {
  projectRoot?: string;
  configPath?: string;
  verbose?: boolean;
  runner?: CommandRunner;
}

export function createTaskContext(options: TaskContextOptions = {}): TaskContext {
  const projectRoot = options.projectRoot || process.cwd();
  const configManager = new ConfigManager(projectRoot, options.configPath);
  if (options.verbose !== undefined) {
    configManager.update({ verbose: options.verbose });
  }
  const config = configManager.get();

  return {
    projectRoot,
    projectInfo: createProjectInfo(config.layout),
    config,
    runner:
      options.runner ??
      new ShellCommandRunner({
        cwd: projectRoot,
        shell: config.shell,
        verbose: config.verbose,
      }),
  };
}
