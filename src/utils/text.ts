import { readFileSync } from 'fs';
import chalk from 'chalk';

/**
 * Read a UTF-8 text file with line endings normalised to `\n`. Trailing
 * newlines are dropped unless `stripNewline` is false; interior ones are
 * left alone.
 */
export function readContents(fpath: string, stripNewline = true): string {
  const contents = readFileSync(fpath, 'utf-8').replace(/\r\n?/g, '\n');
  return stripNewline ? contents.replace(/\n+$/, '') : contents;
}

/**
 * Print a green success notice when `successPattern` matches the whole of
 * `messages`, otherwise print `messages` as they are.
 */
export function formatMessages(messages: string, successPattern = '^$'): void {
  const success = new RegExp(`^(?:${successPattern})$`, 's');
  if (success.test(messages)) {
    console.log(chalk.green('✔ No issues found.'));
  } else {
    console.log(messages);
  }
}
