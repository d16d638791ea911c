/**
 * Conversation State
 *
 * Ordered message log of one agent run plus its turn counter.
 */

import type { Message } from '../models/base.js';
import type { ToolCallRequest, ToolResult } from '../tools/types.js';
import { KeelError } from '../utils/errors.js';

export class ConversationState {
  private readonly log: Message[] = [];
  private turnCount = 0;

  constructor(systemPrompt?: string) {
    if (systemPrompt) {
      this.log.push({ role: 'system', content: systemPrompt });
    }
  }

  get messages(): readonly Message[] {
    return this.log;
  }

  get turn(): number {
    return this.turnCount;
  }

  get length(): number {
    return this.log.length;
  }

  beginTurn(): number {
    this.turnCount++;
    return this.turnCount;
  }

  appendUser(content: string): void {
    this.log.push({ role: 'user', content });
  }

  appendAssistantText(content: string): void {
    this.log.push({ role: 'assistant', content });
  }

  appendToolCalls(calls: ToolCallRequest[], content = ''): void {
    this.log.push({ role: 'assistant', content, toolCalls: [...calls] });
  }

  /**
   * Append the results of a tool-call batch. Each request must be answered by
   * exactly one result, in request order.
   */
  appendToolResults(calls: ToolCallRequest[], results: ToolResult[]): void {
    if (calls.length !== results.length) {
      throw new KeelError(
        `Tool result count ${results.length} does not match request count ${calls.length}`,
        'TOOL_PAIRING_ERROR'
      );
    }

    calls.forEach((call, index) => {
      if (results[index].callId !== call.id) {
        throw new KeelError(
          `Tool result ${index} answers "${results[index].callId}" instead of "${call.id}"`,
          'TOOL_PAIRING_ERROR'
        );
      }
    });

    calls.forEach((call, index) => {
      this.log.push({ role: 'tool', callId: call.id, toolName: call.name, result: results[index] });
    });
  }

  systemPrompt(): string | undefined {
    const first = this.log[0];
    return first?.role === 'system' ? first.content : undefined;
  }
}
