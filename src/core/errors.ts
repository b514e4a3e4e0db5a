import type { CommandResult } from './types.js';

/**
 * Raised when an external command exits with a non-zero code.
 */
export class CommandFailedError extends Error {
  public readonly result: CommandResult;

  constructor(result: CommandResult) {
    super(`Command failed with exit code ${result.exitCode}: ${result.command}`);
    this.name = 'CommandFailedError';
    this.result = result;
  }
}

/**
 * One named step of a multi-step task failed.
 */
export class StepFailedError extends Error {
  public readonly step: string;
  public readonly failure: CommandFailedError;

  constructor(step: string, cause: CommandFailedError) {
    super(`Step "${step}" failed: ${cause.message}`);
    this.name = 'StepFailedError';
    this.step = step;
    this.failure = cause;
  }
}

/**
 * Controlled task termination. The user has already been told why,
 * so the CLI only sets the exit code.
 */
export class TaskExit extends Error {
  public readonly code: number;

  constructor(message: string, code = 1) {
    super(message);
    this.name = 'TaskExit';
    this.code = code;
  }
}

export class UnknownHeaderLevelError extends Error {
  public readonly level: number;

  constructor(level: number) {
    super(`Unknown header level: ${level}. Use 1, 2 or 3.`);
    this.name = 'UnknownHeaderLevelError';
    this.level = level;
  }
}
