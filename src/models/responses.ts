/**
 * Responses adapter
 *
 * Stateful: the backend stores each response, so after the first call only
 * the messages appended since the previous call are sent, chained through
 * `previous_response_id`.
 */

import { z } from 'zod';
import type {
  FunctionTool,
  ResponseCreateParamsNonStreaming,
  ResponseInputItem,
} from 'openai/resources/responses/responses';
import type { ConversationState } from '../core/conversation.js';
import { serializeToolResult } from '../tools/types.js';
import type { ToolCallRequest, ToolDefinition } from '../tools/types.js';
import { ProtocolError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { assertUniqueCallIds, parseToolArguments } from './base.js';
import type { Message, ModelProvider, NeutralReply, SendOptions } from './base.js';
import { toProviderError } from './client.js';
import type { ResponsesClient } from './client.js';

const logger = createLogger('responses');

const OutputItemSchema = z.object({ type: z.string() }).passthrough();

const FunctionCallItemSchema = z.object({
  type: z.literal('function_call'),
  call_id: z.string().min(1),
  name: z.string().min(1),
  arguments: z.string(),
});

const MessageItemSchema = z.object({
  type: z.literal('message'),
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()),
});

const ResponseReplySchema = z.object({
  id: z.string().min(1),
  status: z.string().optional(),
  error: z.object({ message: z.string() }).passthrough().nullable().optional(),
  incomplete_details: z.object({ reason: z.string().nullable().optional() }).passthrough().nullable().optional(),
  output: z.array(OutputItemSchema),
  output_text: z.string().optional(),
});

export interface ParsedResponse {
  responseId: string;
  reply: NeutralReply;
}

/**
 * Convert messages to response input items. System messages travel as
 * `instructions`. With `includeAssistant` off (continuation of a stored
 * chain) the assistant's own turns are left out because the backend already
 * holds them.
 */
export function toResponsesInput(messages: readonly Message[], includeAssistant: boolean): ResponseInputItem[] {
  const items: ResponseInputItem[] = [];

  for (const msg of messages) {
    switch (msg.role) {
      case 'system':
        break;
      case 'user':
        items.push({ role: 'user', content: msg.content });
        break;
      case 'assistant':
        if (!includeAssistant) {
          break;
        }
        if (msg.content) {
          items.push({ role: 'assistant', content: msg.content });
        }
        for (const call of msg.toolCalls ?? []) {
          items.push({
            type: 'function_call',
            call_id: call.id,
            name: call.name,
            arguments: JSON.stringify(call.arguments),
          });
        }
        break;
      case 'tool':
        items.push({
          type: 'function_call_output',
          call_id: msg.callId,
          output: serializeToolResult(msg.result),
        });
        break;
    }
  }

  return items;
}

export function toResponsesTools(tools: ToolDefinition[]): FunctionTool[] {
  return tools.map((tool): FunctionTool => ({
    type: 'function',
    name: tool.name,
    description: tool.description,
    parameters: { ...tool.parameters },
    strict: false,
  }));
}

export function parseResponsesReply(raw: unknown): ParsedResponse {
  const parsed = ResponseReplySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ProtocolError(
      `Malformed responses reply${issue ? ` at ${issue.path.join('.') || '(root)'}: ${issue.message}` : ''}`
    );
  }

  const response = parsed.data;
  if (response.status === 'failed') {
    throw new ProtocolError(`Response ${response.id} failed: ${response.error?.message ?? 'no reason given'}`);
  }
  if (response.status === 'incomplete') {
    throw new ProtocolError(
      `Response ${response.id} is incomplete: ${response.incomplete_details?.reason ?? 'no reason given'}`
    );
  }

  const calls: ToolCallRequest[] = [];
  const texts: string[] = [];
  let sawMessage = false;

  for (const item of response.output) {
    if (item.type === 'function_call') {
      const call = FunctionCallItemSchema.safeParse(item);
      if (!call.success) {
        throw new ProtocolError(`Malformed function_call item in response ${response.id}`);
      }
      calls.push({
        id: call.data.call_id,
        name: call.data.name,
        arguments: parseToolArguments(call.data.arguments, call.data.name),
      });
    } else if (item.type === 'message') {
      const message = MessageItemSchema.safeParse(item);
      if (!message.success) {
        throw new ProtocolError(`Malformed message item in response ${response.id}`);
      }
      sawMessage = true;
      for (const part of message.data.content) {
        if (part.type === 'output_text' && part.text !== undefined) {
          texts.push(part.text);
        }
      }
    }
  }

  const text = (response.output_text || texts.join('')).trim();

  if (calls.length > 0) {
    assertUniqueCallIds(calls);
    return {
      responseId: response.id,
      reply: text ? { kind: 'tool_calls', calls, text } : { kind: 'tool_calls', calls },
    };
  }

  // The SDK fills output_text with '' even when no message came back
  if (!sawMessage && text === '') {
    throw new ProtocolError(`Response ${response.id} has neither a message nor function calls`);
  }
  return { responseId: response.id, reply: { kind: 'text', text } };
}

export class ResponsesProvider implements ModelProvider {
  readonly mode = 'responses' as const;
  private previousResponseId?: string;
  private sentCount = 0;

  constructor(
    private readonly client: ResponsesClient,
    readonly model: string
  ) {}

  async send(state: ConversationState, options: SendOptions): Promise<NeutralReply> {
    const messages = state.messages;
    const continuing = this.previousResponseId !== undefined && this.sentCount <= messages.length;
    const pending = continuing ? messages.slice(this.sentCount) : messages;

    const body: ResponseCreateParamsNonStreaming = {
      model: this.model,
      input: toResponsesInput(pending, !continuing),
      store: true,
    };
    // Instructions are not inherited through previous_response_id
    const instructions = state.systemPrompt();
    if (instructions) {
      body.instructions = instructions;
    }
    if (continuing) {
      body.previous_response_id = this.previousResponseId;
    }
    if (options.tools.length > 0) {
      body.tools = toResponsesTools(options.tools);
      body.tool_choice = 'auto';
    }

    logger.debug(
      `Responses request: ${pending.length} new message(s)${continuing ? `, continuing ${this.previousResponseId}` : ''}`
    );

    let raw: unknown;
    try {
      raw = await this.client.responses.create(body);
    } catch (error) {
      throw toProviderError(error);
    }

    const { responseId, reply } = parseResponsesReply(raw);
    this.previousResponseId = responseId;
    this.sentCount = messages.length;
    return reply;
  }

  /**
   * Id of the stored response the next call will chain from
   */
  getSessionHandle(): string | undefined {
    return this.previousResponseId;
  }

  reset(): void {
    this.previousResponseId = undefined;
    this.sentCount = 0;
  }
}
