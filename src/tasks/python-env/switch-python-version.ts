/**
 * Switch Python Version Task
 *
 * Points the local virtual environment at a different pyenv-managed Python:
 * - Finds the newest installed pyenv version matching MAJOR.MINOR
 * - Prints install guidance when none matches
 * - Rebuilds the virtual environment with poetry
 *
 * Use this to test against another Python locally; CI checks every
 * supported version on its own.
 */

import chalk from 'chalk';
import { delimiter, join } from 'path';
import type { TaskContext } from '../../core/context.js';
import { CommandFailedError, StepFailedError, TaskExit } from '../../core/errors.js';
import type { RunOptions } from '../../core/types.js';
import { printHeader } from '../../utils/header.js';
import { PythonVersionSchema } from '../../validation/task-schemas.js';

export const PYTHON_ICON = '🐍';

export interface SwitchStep {
  name: string;
  command: string;
  /**
   * Failure is expected and ignored
   */
  optional?: boolean;
}

function versionComponents(value: string): number[] | null {
  if (!/^\d+(\.\d+)*$/.test(value)) {
    return null;
  }
  return value.split('.').map((part) => parseInt(part, 10));
}

function compareVersions(a: string, b: string): number {
  const left = versionComponents(a);
  const right = versionComponents(b);

  // Names like "system" sort ahead of every numeric version
  if (!left || !right) {
    if (left) return 1;
    if (right) return -1;
    return a < b ? -1 : a > b ? 1 : 0;
  }

  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    if (left[i] !== right[i]) {
      return left[i] - right[i];
    }
  }
  return left.length - right.length;
}

/**
 * Sort by integer components, so 3.10 comes after 3.9.
 */
export function sortVersionsNumerically(versions: readonly string[]): string[] {
  return [...versions].sort(compareVersions);
}

export function parsePyenvVersions(stdout: string): string[] {
  return sortVersionsNumerically(
    stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
  );
}

/**
 * Scan sorted versions for ones starting with `version`. Later matches
 * replace earlier ones, so the numerically greatest wins.
 */
export function findMatchingVersion(
  versions: readonly string[],
  version: string,
  onMatch?: (match: string) => void
): string | undefined {
  let match: string | undefined;
  for (const candidate of versions) {
    if (candidate.startsWith(version)) {
      match = candidate;
      onMatch?.(match);
    }
  }
  return match;
}

const VIRTUALENV_VARIABLES = [
  'VIRTUAL_ENV',
  'VIRTUAL_ENV_PROMPT',
  'CONDA_PREFIX',
  'CONDA_DEFAULT_ENV',
  'CONDA_PROMPT_MODIFIER',
];

/**
 * The environment a shell would have after `deactivate`: virtualenv and
 * conda variables unset, their `bin` directories taken off `PATH`.
 */
export function deactivatedEnv(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const binDirectories = [env.VIRTUAL_ENV, env.CONDA_PREFIX]
    .filter((prefix): prefix is string => Boolean(prefix))
    .flatMap((prefix) => [join(prefix, 'bin'), join(prefix, 'Scripts')]);

  const result: NodeJS.ProcessEnv = { ...env };
  for (const name of VIRTUALENV_VARIABLES) {
    delete result[name];
  }
  if (result.PATH !== undefined && binDirectories.length > 0) {
    result.PATH = result.PATH.split(delimiter)
      .filter((entry) => !binDirectories.includes(entry))
      .join(delimiter);
  }
  return result;
}

export function buildSwitchSteps(
  pythonVersion: string,
  venvDirectory: string
): SwitchStep[] {
  return [
    // Precaution for when the task is called from an active virtual environment
    { name: 'deactivate', command: 'source deactivate', optional: true },
    { name: 'clean', command: `git clean -fxd ${venvDirectory}` },
    { name: 'pin', command: `pyenv local ${pythonVersion}` },
    { name: 'install', command: 'poetry install' },
  ];
}

/**
 * Run steps in order. Every step after `deactivate` gets the deactivated
 * environment, as it would in a single chained shell.
 */
async function runSteps(
  ctx: TaskContext,
  steps: SwitchStep[],
  env: NodeJS.ProcessEnv
): Promise<void> {
  let stepEnv = env;
  for (const step of steps) {
    const options: RunOptions = { pty: true, warn: step.optional, env: stepEnv };
    try {
      await ctx.runner.run(step.command, options);
    } catch (error) {
      if (error instanceof CommandFailedError) {
        throw new StepFailedError(step.name, error);
      }
      throw error;
    }
    if (step.name === 'deactivate') {
      stepEnv = deactivatedEnv(stepEnv);
    }
  }
}

function printNotFound(version: string, available: string[]): void {
  const availableVersions = available.map((v) => `'${v}'`).join(', ');
  console.log(
    chalk.red(`❌ No pyenv Python version matching Python ${version} found.\n`)
  );
  console.log(
    `Available versions: ${availableVersions}.\n` +
      `See all installable versions with:\n` +
      `\tpyenv install --list\n` +
      `and install it with:\n` +
      `\tpyenv install <PYTHON_VERSION>`
  );
}

/**
 * Switch the local virtual environment to the given Python version.
 * @param version - MAJOR.MINOR, e.g. 3.6
 * @param env - Environment the steps start from
 * @returns The full pyenv version switched to
 * @throws {TaskExit} When no installed pyenv version matches
 */
export async function switchPythonVersion(
  ctx: TaskContext,
  version: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string> {
  const requested = PythonVersionSchema.parse(version);

  printHeader(`Switching to Python ${requested}`, 1, PYTHON_ICON, ctx.config.header);

  const { stdout } = await ctx.runner.run('pyenv versions --bare', {
    hide: 'stdout',
  });
  const pythonVersions = parsePyenvVersions(stdout);

  const pyenvPythonVersion = findMatchingVersion(
    pythonVersions,
    requested,
    (match) => {
      console.log(chalk.green(`✔ Found pyenv Python version '${match}'.\n`));
    }
  );

  if (!pyenvPythonVersion) {
    printNotFound(requested, pythonVersions);
    throw new TaskExit(`No pyenv Python version matching ${requested}`);
  }

  await runSteps(
    ctx,
    buildSwitchSteps(pyenvPythonVersion, ctx.config.python.venvDirectory),
    env
  );
  return pyenvPythonVersion;
}
