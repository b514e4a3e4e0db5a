/**
 * Shell command execution for tasks
 *
 * Commands run through a real shell so tasks can chain and source things
 * the way they would at a prompt.
 */

import { spawn, type StdioOptions } from 'child_process';
import chalk from 'chalk';
import { CommandFailedError } from './errors.js';
import type { CommandResult, CommandRunner, RunOptions } from './types.js';

export interface ShellCommandRunnerOptions {
  cwd?: string;
  shell?: string;
  verbose?: boolean;
}

interface StdioPlan {
  stdio: StdioOptions;
  echo: boolean;
}

export class ShellCommandRunner implements CommandRunner {
  private cwd: string;
  private shell: string;
  private verbose: boolean;

  constructor(options: ShellCommandRunnerOptions = {}) {
    this.cwd = options.cwd || process.cwd();
    this.shell = options.shell || '/bin/bash';
    this.verbose = options.verbose ?? false;
  }

  async run(command: string, options: RunOptions = {}): Promise<CommandResult> {
    const { pty = false, hide, warn = false, env } = options;

    if (this.verbose) {
      console.error(chalk.dim(`[devtasks] $ ${command}`));
    }

    const result = await this.spawnCommand(
      command,
      this.planStdio(pty, hide),
      env
    );

    if (result.exitCode !== 0 && !warn) {
      throw new CommandFailedError(result);
    }
    return result;
  }

  /**
   * Map pty/hide onto stdio. Streams that are neither inherited nor hidden
   * are captured and echoed.
   */
  private planStdio(pty: boolean, hide: RunOptions['hide']): StdioPlan {
    if (pty && !hide) {
      return { stdio: 'inherit', echo: false };
    }
    const stdin = pty ? 'inherit' : 'ignore';
    if (hide === 'stdout') {
      return { stdio: [stdin, 'pipe', 'inherit'], echo: false };
    }
    return { stdio: [stdin, 'pipe', 'pipe'], echo: hide !== 'both' };
  }

  private spawnCommand(
    command: string,
    { stdio, echo }: StdioPlan,
    env: NodeJS.ProcessEnv | undefined
  ): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';

      const child = spawn(command, {
        cwd: this.cwd,
        shell: this.shell,
        stdio,
        env: env ?? process.env,
      });

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
        if (echo) process.stdout.write(data);
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
        if (echo) process.stderr.write(data);
      });

      child.on('close', (code) => {
        resolve({
          command,
          stdout,
          stderr,
          exitCode: code ?? 1,
        });
      });

      child.on('error', (err) => {
        reject(err);
      });
    });
  }
}
