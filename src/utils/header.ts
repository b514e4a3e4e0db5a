import { DEFAULT_CONFIG } from '../core/config.js';
import { UnknownHeaderLevelError } from '../core/errors.js';
import type { HeaderConfig } from '../core/types.js';

export type HeaderLevel = 1 | 2 | 3;

const HEADER_LEVEL_CHARACTERS: Record<HeaderLevel, string> = {
  1: '#',
  2: '=',
  3: '-',
};

export interface HeaderOptions extends Partial<HeaderConfig> {
  /**
   * Terminal width; detected from stdout when omitted
   */
  columns?: number;
  env?: NodeJS.ProcessEnv;
}

function isHeaderLevel(level: number): level is HeaderLevel {
  return level === 1 || level === 2 || level === 3;
}

// Code points, so an emoji icon counts once.
function displayLength(value: string): number {
  return Array.from(value).length;
}

/**
 * Center `value` in `width` columns. The odd fill character goes right;
 * values wider than `width` are returned unchanged.
 */
export function center(value: string, width: number, fill: string): string {
  const padding = width - displayLength(value);
  if (padding <= 0) {
    return value;
  }
  const left = Math.floor(padding / 2);
  return fill.repeat(left) + value + fill.repeat(padding - left);
}

// COLUMNS wins over the detected size when it holds a positive integer.
function envColumns(env: NodeJS.ProcessEnv): number | undefined {
  const value = env.COLUMNS;
  if (!value || !/^\d+$/.test(value)) {
    return undefined;
  }
  const columns = parseInt(value, 10);
  return columns > 0 ? columns : undefined;
}

export function headerWidth(icon: string, options: HeaderOptions = {}): number {
  const {
    ciEnvVar = DEFAULT_CONFIG.header.ciEnvVar,
    ciWidth = DEFAULT_CONFIG.header.ciWidth,
    fallbackColumns = DEFAULT_CONFIG.header.fallbackColumns,
    env = process.env,
  } = options;

  if (env[ciEnvVar]) {
    return ciWidth;
  }
  const columns =
    options.columns ??
    envColumns(env) ??
    process.stdout.columns ??
    fallbackColumns;
  return Math.max(columns - displayLength(icon) * 2, 0);
}

export function renderHeader(
  text: string,
  level: number = 1,
  icon = '',
  options: HeaderOptions = {}
): string {
  if (!isHeaderLevel(level)) {
    throw new UnknownHeaderLevelError(level);
  }
  const paddingCharacter = HEADER_LEVEL_CHARACTERS[level];

  if (icon) {
    icon += ' ';
  }
  const width = headerWidth(icon, options);
  if (level === 1) {
    text = text.toUpperCase();
  }

  return `\n${center(` ${icon}${text} ${icon}`, width, paddingCharacter)}\n`;
}

export function printHeader(
  text: string,
  level: number = 1,
  icon = '',
  options: HeaderOptions = {}
): void {
  console.log(renderHeader(text, level, icon, options));
}
