import { mkdirSync } from 'fs';
import { join, resolve } from 'path';
import { DEFAULT_CONFIG } from './config.js';
import type { ProjectInfo, ProjectLayout } from './types.js';

/**
 * Build the project layout once. Unit and integration test directories are
 * always derived from the tests directory.
 */
export function createProjectInfo(
  layout: ProjectLayout = DEFAULT_CONFIG.layout
): ProjectInfo {
  return Object.freeze({
    sourceDirectory: layout.sourceDirectory,
    testsDirectory: layout.testsDirectory,
    unitTestsDirectory: join(layout.testsDirectory, 'unit'),
    integrationTestsDirectory: join(layout.testsDirectory, 'integration'),
    tasksDirectory: layout.tasksDirectory,
    reportsDirectory: layout.reportsDirectory,
  });
}

export function resolveProjectPath(projectRoot: string, relative: string): string {
  return resolve(projectRoot, relative);
}

/**
 * Create the reports directory (and parents). No-op when it already exists.
 */
export function ensureReportsDir(
  info: ProjectInfo,
  projectRoot: string = process.cwd()
): void {
  mkdirSync(resolveProjectPath(projectRoot, info.reportsDirectory), {
    recursive: true,
  });
}
