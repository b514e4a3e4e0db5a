import { z } from 'zod';
import { taskSchemaMap, type TaskArgs, type TaskName } from './task-schemas.js';

export function isTaskName(name: string): name is TaskName {
  return Object.prototype.hasOwnProperty.call(taskSchemaMap, name);
}

/**
 * @throws {Error} If no task is registered under `name`
 */
export function assertTaskName(name: string): TaskName {
  if (!isTaskName(name)) {
    throw new Error(`Unknown task: ${name}. No validation schema available.`);
  }
  return name;
}

function parseWith<S extends z.ZodTypeAny>(
  taskName: string,
  schema: S,
  args: unknown
): z.output<S> {
  try {
    return schema.parse(args);
  } catch (error) {
    if (error instanceof z.ZodError) {
      // Format Zod validation errors into one line per issue
      const errorMessages = error.errors
        .map((err) => {
          const path = err.path.join('.');
          return `  - ${path || 'root'}: ${err.message}`;
        })
        .join('\n');

      throw new Error(
        `Validation failed for task "${taskName}":\n${errorMessages}`
      );
    }

    throw error;
  }
}

/**
 * Validates task arguments against the task's Zod schema
 * @returns The validated and type-safe arguments
 * @throws {Error} If validation fails with descriptive error message
 */
export function validateTaskArgs<T extends TaskName>(
  taskName: T,
  args: unknown
): TaskArgs<T> {
  return parseWith(taskName, taskSchemaMap[taskName], args);
}

export function getTaskNames(): TaskName[] {
  return Object.keys(taskSchemaMap).filter(isTaskName);
}
