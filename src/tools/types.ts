/**
 * Tool request/result shapes shared by the registry, the orchestrator and
 * the provider adapters
 */

export const TOOL_NAMES = ['run_shell', 'read_file', 'write_file', 'list_files'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export type ToolArgumentValue = string | number | boolean | null;

export type ToolArguments = Record<string, ToolArgumentValue>;

export interface ToolCallRequest {
  /** Identifier assigned by the backend; echoed back in the matching result */
  id: string;
  /** Name as emitted by the model. Unknown names are answered with an error result. */
  name: string;
  arguments: ToolArguments;
}

export type ToolErrorReason =
  | 'PathViolation'
  | 'PermissionDenied'
  | 'ExecutionTimeout'
  | 'ExecutionFailed'
  | 'NotFound'
  | 'InvalidArguments'
  | 'UnknownTool'
  | 'IOError';

export type ToolResult =
  | {
      callId: string;
      status: 'ok';
      output: string;
      truncated: boolean;
    }
  | {
      callId: string;
      status: 'error';
      reason: ToolErrorReason;
      output: string;
      truncated: boolean;
    };

export interface ToolDefinition {
  name: ToolName;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
    additionalProperties: false;
  };
}

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some(toolName => toolName === name);
}

export function okResult(callId: string, output: string, truncated = false): ToolResult {
  return { callId, status: 'ok', output, truncated };
}

export function errorResult(callId: string, reason: ToolErrorReason, output: string, truncated = false): ToolResult {
  return { callId, status: 'error', reason, output, truncated };
}

/**
 * Text the model receives for a tool result
 */
export function serializeToolResult(result: ToolResult): string {
  if (result.status === 'ok') {
    return JSON.stringify({ ok: true, output: result.output, truncated: result.truncated });
  }
  return JSON.stringify({ ok: false, reason: result.reason, error: result.output, truncated: result.truncated });
}
