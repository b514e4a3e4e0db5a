#!/usr/bin/env node

import chalk from 'chalk';
import { resolve } from 'path';
import { createTaskContext, type TaskContext } from '../core/context.js';
import { TaskExit } from '../core/errors.js';
import { ensureReportsDir } from '../core/project-info.js';
import { ensurePreCommit } from '../tasks/pre-commit/ensure-pre-commit.js';
import { switchPythonVersion } from '../tasks/python-env/switch-python-version.js';
import { formatMessages, readContents } from '../utils/text.js';
import { printHeader } from '../utils/header.js';
import { assertTaskName, validateTaskArgs } from '../validation/validator.js';
import { parseArgs, showHelp, type CliArgs } from './args.js';

export const VERSION = '0.1.0';

export async function runTask(ctx: TaskContext, args: CliArgs): Promise<void> {
  const task = assertTaskName(args.command ?? '');

  switch (task) {
    case 'switch-python-version': {
      const { version } = validateTaskArgs(task, {
        version: args.positionals[0],
      });
      await switchPythonVersion(ctx, version);
      return;
    }
    case 'ensure-pre-commit':
      validateTaskArgs(task, {});
      await ensurePreCommit(ctx);
      return;
    case 'ensure-reports-dir':
      validateTaskArgs(task, {});
      ensureReportsDir(ctx.projectInfo, ctx.projectRoot);
      return;
    case 'show-layout': {
      validateTaskArgs(task, {});
      printHeader('Project layout', 2, '', ctx.config.header);
      for (const [name, path] of Object.entries(ctx.projectInfo)) {
        console.log(`  ${name}: ${path}`);
      }
      return;
    }
    case 'format-messages': {
      const { file, pattern } = validateTaskArgs(task, {
        file: args.positionals[0],
        pattern: args.pattern,
      });
      formatMessages(readContents(resolve(ctx.projectRoot, file)), pattern);
      return;
    }
  }
}

export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);

  if (args.version) {
    console.log(`devtasks v${VERSION}`);
    return 0;
  }
  if (args.help || !args.command) {
    showHelp();
    return args.help ? 0 : 1;
  }

  try {
    const ctx = createTaskContext({
      projectRoot: args.cwd ? resolve(args.cwd) : undefined,
      verbose: args.debug,
    });
    await runTask(ctx, args);
    return 0;
  } catch (error) {
    if (error instanceof TaskExit) {
      return error.code;
    }
    console.error(
      chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`)
    );
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
