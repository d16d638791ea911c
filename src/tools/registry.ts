/**
 * Tool Registry
 *
 * Validates every tool call against the sandbox rules, executes it and turns
 * the outcome (or the rejection) into a ToolResult. Never throws for a
 * tool-level failure; those go back to the model as error results.
 */

import { relative } from 'path';
import type { KeelConfig } from '../core/config.js';
import { PathViolationError, errorMessage } from '../utils/errors.js';
import { isNotFound } from '../utils/fs.js';
import { createLogger } from '../utils/logger.js';
import { getToolDefinitions, parseInvocation } from './definitions.js';
import type { ListFilesArgs, ReadFileArgs, RunShellArgs, WriteFileArgs } from './definitions.js';
import { listFilesRecursive, readTextFile, writeTextFile } from './files.js';
import { confineToWorkspace, isCommandAllowed } from './sandbox.js';
import { runShellCommand } from './shell.js';
import { errorResult, isToolName, okResult } from './types.js';
import type { ToolCallRequest, ToolDefinition, ToolResult } from './types.js';

const logger = createLogger('registry');

export type ToolRegistryConfig = Pick<
  KeelConfig,
  'workspaceRoot' | 'allowlist' | 'shellTimeoutMs' | 'maxReadChars' | 'maxOutputChars' | 'maxListEntries'
>;

export class ToolRegistry {
  private readonly config: ToolRegistryConfig;
  private readonly definitions: ToolDefinition[];

  constructor(config: ToolRegistryConfig) {
    this.config = config;
    this.definitions = getToolDefinitions(config.maxListEntries);
  }

  getDefinitions(): ToolDefinition[] {
    return this.definitions;
  }

  getAllowlist(): readonly string[] {
    return this.config.allowlist;
  }

  async invoke(request: ToolCallRequest): Promise<ToolResult> {
    if (!isToolName(request.name)) {
      return errorResult(request.id, 'UnknownTool', `Unknown tool: ${request.name}`);
    }

    const parsed = parseInvocation(request.name, request.arguments);
    if (!parsed.ok) {
      return errorResult(request.id, 'InvalidArguments', `Invalid arguments for ${request.name}: ${parsed.error}`);
    }

    const { invocation } = parsed;
    logger.debug(`Invoking ${invocation.name} (${request.id})`, invocation.args);

    try {
      switch (invocation.name) {
        case 'run_shell':
          return await this.runShell(request.id, invocation.args);
        case 'read_file':
          return await this.readFile(request.id, invocation.args);
        case 'write_file':
          return await this.writeFile(request.id, invocation.args);
        case 'list_files':
          return await this.listFiles(request.id, invocation.args);
      }
    } catch (error) {
      if (error instanceof PathViolationError) {
        return errorResult(request.id, 'PathViolation', error.message);
      }
      logger.debug(`Tool ${invocation.name} failed: ${errorMessage(error)}`);
      return errorResult(request.id, 'IOError', errorMessage(error));
    }
  }

  private async runShell(callId: string, args: RunShellArgs): Promise<ToolResult> {
    // Permission check comes before anything touches the system
    if (!isCommandAllowed(this.config.allowlist, args.command)) {
      return errorResult(
        callId,
        'PermissionDenied',
        `Command "${args.command}" is blocked by the allowlist. Allowed prefixes: ${this.config.allowlist.join(', ') || '(none)'}`
      );
    }

    const cwd = await confineToWorkspace(this.config.workspaceRoot, args.cwd);
    const outcome = await runShellCommand({
      command: args.command,
      cwd,
      timeoutMs: this.config.shellTimeoutMs,
      maxOutputChars: this.config.maxOutputChars,
    });

    if (outcome.timedOut) {
      const seconds = Math.round(this.config.shellTimeoutMs / 100) / 10;
      return errorResult(
        callId,
        'ExecutionTimeout',
        `Command timed out after ${seconds}s`,
        outcome.truncated
      );
    }

    const output = JSON.stringify({ exitCode: outcome.exitCode, stdout: outcome.stdout, stderr: outcome.stderr });
    if (outcome.exitCode !== 0) {
      return errorResult(callId, 'ExecutionFailed', output, outcome.truncated);
    }
    return okResult(callId, output, outcome.truncated);
  }

  private async readFile(callId: string, args: ReadFileArgs): Promise<ToolResult> {
    const absPath = await confineToWorkspace(this.config.workspaceRoot, args.path);
    try {
      const { content, truncated } = await readTextFile(absPath, this.config.maxReadChars);
      return okResult(callId, content, truncated);
    } catch (error) {
      if (isNotFound(error)) {
        return errorResult(callId, 'NotFound', `File does not exist: ${args.path}`);
      }
      throw error;
    }
  }

  private async writeFile(callId: string, args: WriteFileArgs): Promise<ToolResult> {
    const absPath = await confineToWorkspace(this.config.workspaceRoot, args.path);
    const bytes = await writeTextFile(absPath, args.content);
    return okResult(callId, `Wrote ${bytes} bytes to ${args.path}`);
  }

  private async listFiles(callId: string, args: ListFilesArgs): Promise<ToolResult> {
    const absPath = await confineToWorkspace(this.config.workspaceRoot, args.path);
    const root = await confineToWorkspace(this.config.workspaceRoot, '.');
    try {
      const { files, truncated } = await listFilesRecursive(root, absPath, this.config.maxListEntries);
      return okResult(callId, files.join('\n'), truncated);
    } catch (error) {
      if (isNotFound(error)) {
        return errorResult(callId, 'NotFound', `Path does not exist: ${relative(root, absPath) || args.path}`);
      }
      throw error;
    }
  }
}
