/**
 * Tool declarations offered to the model, and the argument schemas the
 * registry validates each call against
 */

import { z } from 'zod';
import type { ToolDefinition, ToolName } from './types.js';

export const RunShellArgsSchema = z
  .object({
    command: z.string().min(1, 'command must not be empty'),
    cwd: z.string().default('.'),
  })
  .strict();

export const ReadFileArgsSchema = z
  .object({
    path: z.string().min(1, 'path must not be empty'),
  })
  .strict();

export const WriteFileArgsSchema = z
  .object({
    path: z.string().min(1, 'path must not be empty'),
    content: z.string(),
  })
  .strict();

export const ListFilesArgsSchema = z
  .object({
    path: z.string().default('.'),
  })
  .strict();

export type RunShellArgs = z.infer<typeof RunShellArgsSchema>;
export type ReadFileArgs = z.infer<typeof ReadFileArgsSchema>;
export type WriteFileArgs = z.infer<typeof WriteFileArgsSchema>;
export type ListFilesArgs = z.infer<typeof ListFilesArgsSchema>;

export type ToolInvocation =
  | { name: 'run_shell'; args: RunShellArgs }
  | { name: 'read_file'; args: ReadFileArgs }
  | { name: 'write_file'; args: WriteFileArgs }
  | { name: 'list_files'; args: ListFilesArgs };

export function getToolDefinitions(maxListEntries: number): ToolDefinition[] {
  return [
    {
      name: 'run_shell',
      description: 'Run a shell command in the workspace. Only commands starting with an allowlisted prefix are executed.',
      parameters: {
        type: 'object',
        properties: {
          command: { type: 'string' },
          cwd: { type: 'string', description: 'Relative directory in workspace', default: '.' },
        },
        required: ['command'],
        additionalProperties: false,
      },
    },
    {
      name: 'read_file',
      description: 'Read a text file inside the workspace.',
      parameters: {
        type: 'object',
        properties: { path: { type: 'string' } },
        required: ['path'],
        additionalProperties: false,
      },
    },
    {
      name: 'write_file',
      description: 'Write a text file inside the workspace, creating parent directories as needed.',
      parameters: {
        type: 'object',
        properties: {
          path: { type: 'string' },
          content: { type: 'string' },
        },
        required: ['path', 'content'],
        additionalProperties: false,
      },
    },
    {
      name: 'list_files',
      description: `List up to ${maxListEntries} files inside a workspace path.`,
      parameters: {
        type: 'object',
        properties: { path: { type: 'string', default: '.' } },
        additionalProperties: false,
      },
    },
  ];
}

/**
 * Validate raw arguments for a known tool. Returns the zod issues joined into
 * one line on failure.
 */
export function parseInvocation(
  name: ToolName,
  args: unknown
): { ok: true; invocation: ToolInvocation } | { ok: false; error: string } {
  switch (name) {
    case 'run_shell': {
      const parsed = RunShellArgsSchema.safeParse(args);
      return parsed.success
        ? { ok: true, invocation: { name, args: parsed.data } }
        : { ok: false, error: formatIssues(parsed.error) };
    }
    case 'read_file': {
      const parsed = ReadFileArgsSchema.safeParse(args);
      return parsed.success
        ? { ok: true, invocation: { name, args: parsed.data } }
        : { ok: false, error: formatIssues(parsed.error) };
    }
    case 'write_file': {
      const parsed = WriteFileArgsSchema.safeParse(args);
      return parsed.success
        ? { ok: true, invocation: { name, args: parsed.data } }
        : { ok: false, error: formatIssues(parsed.error) };
    }
    case 'list_files': {
      const parsed = ListFilesArgsSchema.safeParse(args);
      return parsed.success
        ? { ok: true, invocation: { name, args: parsed.data } }
        : { ok: false, error: formatIssues(parsed.error) };
    }
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
