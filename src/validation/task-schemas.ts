import { z } from 'zod';

// Dot-separated integers, e.g. 3.6 or 3.11.4
export const PythonVersionSchema = z
  .string()
  .regex(/^\d+(\.\d+)*$/, 'Expected a version such as 3.6');

// 1. switch-python-version
export const SwitchPythonVersionSchema = z.object({
  version: PythonVersionSchema.describe('Desired Python version (MAJOR.MINOR)'),
});

// 2. ensure-pre-commit
export const EnsurePreCommitSchema = z.object({});

// 3. ensure-reports-dir
export const EnsureReportsDirSchema = z.object({});

// 4. show-layout
export const ShowLayoutSchema = z.object({});

// 5. format-messages
export const FormatMessagesSchema = z.object({
  file: z.string().min(1).describe('File holding the command output'),
  pattern: z
    .string()
    .optional()
    .describe('Pattern that means "no issues" (default ^$)'),
});

export const taskSchemaMap = {
  'switch-python-version': SwitchPythonVersionSchema,
  'ensure-pre-commit': EnsurePreCommitSchema,
  'ensure-reports-dir': EnsureReportsDirSchema,
  'show-layout': ShowLayoutSchema,
  'format-messages': FormatMessagesSchema,
} as const;

export type TaskName = keyof typeof taskSchemaMap;

export type TaskArgs<T extends TaskName> = z.infer<(typeof taskSchemaMap)[T]>;
