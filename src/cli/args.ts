export interface CliArgs {
  command?: string;
  positionals: string[];
  cwd?: string;
  pattern?: string;
  help?: boolean;
  version?: boolean;
  debug?: boolean;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = { positionals: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '-h':
      case '--help':
        result.help = true;
        break;
      case '-v':
      case '--version':
        result.version = true;
        break;
      case '-C':
      case '--cwd':
        result.cwd = nextArg;
        i++;
        break;
      case '-p':
      case '--pattern':
        result.pattern = nextArg;
        i++;
        break;
      case '-d':
      case '--debug':
        result.debug = true;
        break;
      default:
        if (result.command === undefined) {
          result.command = arg;
        } else {
          result.positionals.push(arg);
        }
    }
  }

  return result;
}

export function showHelp(): void {
  console.log(`
devtasks - build/test automation helpers

Usage: devtasks [options] <command> [args]

Commands:
  switch-python-version <MAJOR.MINOR>  Rebuild the virtualenv on another pyenv Python
  ensure-pre-commit                    Install the pre-commit git hooks
  ensure-reports-dir                   Create the reports directory
  show-layout                          Print the project directory layout
  format-messages <file>               Print a file of tool output, or a success notice

Options:
  -h, --help              Show this help message
  -v, --version           Show version number
  -C, --cwd <dir>         Project root (default: current directory)
  -p, --pattern <regex>   Success pattern for format-messages (default: ^$)
  -d, --debug             Log every command before it runs

Config:
  <project root>/devtasks.config.json
`);
}
