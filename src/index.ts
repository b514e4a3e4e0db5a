/**
 * devtasks - helpers for a project's build/test automation layer
 */

export { ConfigManager, DEFAULT_CONFIG, CONFIG_FILE_NAME } from './core/config.js';
export { ShellCommandRunner } from './core/command-runner.js';
export { createTaskContext } from './core/context.js';
export type { TaskContext, TaskContextOptions } from './core/context.js';
export {
  CommandFailedError,
  StepFailedError,
  TaskExit,
  UnknownHeaderLevelError,
} from './core/errors.js';
export {
  createProjectInfo,
  ensureReportsDir,
  resolveProjectPath,
} from './core/project-info.js';
export type {
  CommandResult,
  CommandRunner,
  DevtasksConfig,
  HeaderConfig,
  ProjectInfo,
  ProjectLayout,
  RunOptions,
} from './core/types.js';
export { readContents, formatMessages } from './utils/text.js';
export { printHeader, renderHeader, headerWidth, center } from './utils/header.js';
export type { HeaderLevel, HeaderOptions } from './utils/header.js';
export * from './tasks/index.js';
