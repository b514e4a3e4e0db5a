/**
 * Core type definitions for devtasks
 */

/**
 * Well-known project directories, relative to the project root.
 */
export interface ProjectInfo {
  readonly sourceDirectory: string;
  readonly testsDirectory: string;
  readonly unitTestsDirectory: string;
  readonly integrationTestsDirectory: string;
  readonly tasksDirectory: string;
  readonly reportsDirectory: string;
}

export interface ProjectLayout {
  sourceDirectory: string;
  testsDirectory: string;
  tasksDirectory: string;
  reportsDirectory: string;
}

export interface HeaderConfig {
  ciEnvVar: string;
  ciWidth: number;
  fallbackColumns: number;
}

export interface DevtasksConfig {
  layout: ProjectLayout;
  header: HeaderConfig;
  python: {
    venvDirectory: string;
  };
  shell: string;
  verbose: boolean;
}

export type HiddenStreams = 'stdout' | 'both';

export interface RunOptions {
  /**
   * Attach the command to the current terminal so output is live
   */
  pty?: boolean;

  /**
   * Streams to capture without echoing
   */
  hide?: HiddenStreams;

  /**
   * Resolve instead of rejecting on a non-zero exit
   */
  warn?: boolean;

  /**
   * Environment for the child; the runner's own environment when omitted
   */
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  command: string;
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandRunner {
  run(command: string, options?: RunOptions): Promise<CommandResult>;
}
