/**
 * Provider-neutral model interfaces and types
 */

import type { ToolArguments, ToolCallRequest, ToolDefinition, ToolResult } from '../tools/types.js';
import type { ConversationState } from '../core/conversation.js';
import { ProtocolError } from '../utils/errors.js';

export type Message =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCallRequest[] }
  | { role: 'tool'; callId: string; toolName: string; result: ToolResult };

export type ApiMode = 'responses' | 'chat';

export type NeutralReply =
  | { kind: 'text'; text: string }
  | { kind: 'tool_calls'; calls: ToolCallRequest[]; text?: string };

export interface SendOptions {
  tools: ToolDefinition[];
}

export interface ModelProvider {
  readonly mode: ApiMode;
  readonly model: string;

  /**
   * Translate the conversation to the wire shape of the backend and the
   * reply back to a NeutralReply. Throws TransportError or ProtocolError.
   */
  send(state: ConversationState, options: SendOptions): Promise<NeutralReply>;

  /**
   * Forget any backend session handle so the next send starts a new chain
   */
  reset(): void;
}

/**
 * Parse the JSON argument string of a tool call into a flat primitive mapping
 */
export function parseToolArguments(raw: string, toolName: string): ToolArguments {
  if (raw.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ProtocolError(`Tool call "${toolName}" has arguments that are not valid JSON: ${raw.slice(0, 200)}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ProtocolError(`Tool call "${toolName}" arguments must be a JSON object`);
  }

  const args: ToolArguments = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      args[key] = value;
    } else {
      throw new ProtocolError(`Tool call "${toolName}" argument "${key}" is not a primitive value`);
    }
  }
  return args;
}

/**
 * Reject a batch of tool calls whose identifiers collide
 */
export function assertUniqueCallIds(calls: ToolCallRequest[]): void {
  const seen = new Set<string>();
  for (const call of calls) {
    if (seen.has(call.id)) {
      throw new ProtocolError(`Duplicate tool call id "${call.id}" in one reply`);
    }
    seen.add(call.id);
  }
}
