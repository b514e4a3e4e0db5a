/**
 * Configuration management for devtasks
 *
 * Settings live in `devtasks.config.json` at the project root. Anything the
 * file leaves out falls back to the defaults below.
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type { DevtasksConfig } from './types.js';

export const CONFIG_FILE_NAME = 'devtasks.config.json';

export const DEFAULT_CONFIG: DevtasksConfig = {
  layout: {
    sourceDirectory: 'src',
    testsDirectory: 'tests',
    tasksDirectory: 'tasks',
    reportsDirectory: 'reports',
  },
  header: {
    ciEnvVar: 'CIRCLECI',
    ciWidth: 80,
    fallbackColumns: 80,
  },
  python: {
    venvDirectory: '.venv',
  },
  shell: '/bin/bash',
  verbose: false,
};

const nonEmpty = z.string().min(1);

export const UserConfigSchema = z
  .object({
    layout: z
      .object({
        sourceDirectory: nonEmpty,
        testsDirectory: nonEmpty,
        tasksDirectory: nonEmpty,
        reportsDirectory: nonEmpty,
      })
      .partial(),
    header: z
      .object({
        ciEnvVar: nonEmpty,
        ciWidth: z.number().int().min(0),
        fallbackColumns: z.number().int().min(1),
      })
      .partial(),
    python: z.object({ venvDirectory: nonEmpty }).partial(),
    shell: nonEmpty,
    verbose: z.boolean(),
  })
  .partial()
  .strict();

export type UserConfig = z.infer<typeof UserConfigSchema>;

export class ConfigManager {
  private config: DevtasksConfig;
  private configPath: string;

  constructor(projectRoot: string, configPath?: string) {
    this.configPath = configPath || join(projectRoot, CONFIG_FILE_NAME);
    this.config = this.loadConfig();
  }

  private loadConfig(): DevtasksConfig {
    if (!existsSync(this.configPath)) {
      return this.mergeConfig(DEFAULT_CONFIG, {});
    }

    try {
      const fileContent = readFileSync(this.configPath, 'utf-8');
      const userConfig = UserConfigSchema.parse(JSON.parse(fileContent));
      return this.mergeConfig(DEFAULT_CONFIG, userConfig);
    } catch (error) {
      console.warn(
        `Failed to load ${this.configPath}, using defaults:`,
        error instanceof Error ? error.message : error
      );
      return this.mergeConfig(DEFAULT_CONFIG, {});
    }
  }

  private mergeConfig(
    defaults: DevtasksConfig,
    user: UserConfig
  ): DevtasksConfig {
    return {
      layout: { ...defaults.layout, ...user.layout },
      header: { ...defaults.header, ...user.header },
      python: { ...defaults.python, ...user.python },
      shell: user.shell ?? defaults.shell,
      verbose: user.verbose ?? defaults.verbose,
    };
  }

  /**
   * Fresh copy of every section; callers may mutate it freely.
   */
  get(): DevtasksConfig {
    return this.mergeConfig(this.config, {});
  }

  update(updates: UserConfig): void {
    this.config = this.mergeConfig(this.config, updates);
  }

  getConfigPath(): string {
    return this.configPath;
  }
}
