/**
 * Chat-completions adapter
 *
 * Stateless: the full message history is sent on every call.
 */

import { z } from 'zod';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import type { ConversationState } from '../core/conversation.js';
import { serializeToolResult } from '../tools/types.js';
import type { ToolCallRequest, ToolDefinition } from '../tools/types.js';
import { ProtocolError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { assertUniqueCallIds, parseToolArguments } from './base.js';
import type { Message, ModelProvider, NeutralReply, SendOptions } from './base.js';
import { toProviderError } from './client.js';
import type { ChatCompletionsClient } from './client.js';

const logger = createLogger('chat');

const ChatReplySchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string().min(1),
                type: z.string().optional(),
                function: z.object({
                  name: z.string().min(1),
                  arguments: z.string(),
                }),
              })
            )
            .nullable()
            .optional(),
        }),
      })
    )
    .min(1),
});

export function toChatMessages(messages: readonly Message[]): ChatCompletionMessageParam[] {
  return messages.map((msg): ChatCompletionMessageParam => {
    switch (msg.role) {
      case 'system':
        return { role: 'system', content: msg.content };
      case 'user':
        return { role: 'user', content: msg.content };
      case 'assistant':
        if (msg.toolCalls && msg.toolCalls.length > 0) {
          return {
            role: 'assistant',
            content: msg.content || null,
            tool_calls: msg.toolCalls.map((call): ChatCompletionMessageToolCall => ({
              id: call.id,
              type: 'function',
              function: { name: call.name, arguments: JSON.stringify(call.arguments) },
            })),
          };
        }
        return { role: 'assistant', content: msg.content };
      case 'tool':
        return { role: 'tool', tool_call_id: msg.callId, content: serializeToolResult(msg.result) };
    }
  });
}

export function toChatTools(tools: ToolDefinition[]): ChatCompletionTool[] {
  return tools.map((tool): ChatCompletionTool => ({
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: { ...tool.parameters },
    },
  }));
}

export function parseChatReply(raw: unknown): NeutralReply {
  const parsed = ChatReplySchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ProtocolError(
      `Malformed chat completion reply${issue ? ` at ${issue.path.join('.') || '(root)'}: ${issue.message}` : ''}`
    );
  }

  const message = parsed.data.choices[0].message;
  const toolCalls = message.tool_calls ?? [];

  if (toolCalls.length > 0) {
    const calls: ToolCallRequest[] = toolCalls.map(call => ({
      id: call.id,
      name: call.function.name,
      arguments: parseToolArguments(call.function.arguments, call.function.name),
    }));
    assertUniqueCallIds(calls);

    const text = message.content?.trim();
    return text ? { kind: 'tool_calls', calls, text } : { kind: 'tool_calls', calls };
  }

  if (message.content === null || message.content === undefined) {
    throw new ProtocolError('Chat completion reply has neither content nor tool calls');
  }
  return { kind: 'text', text: message.content.trim() };
}

export class ChatCompletionsProvider implements ModelProvider {
  readonly mode = 'chat' as const;

  constructor(
    private readonly client: ChatCompletionsClient,
    readonly model: string
  ) {}

  async send(state: ConversationState, options: SendOptions): Promise<NeutralReply> {
    const body: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: toChatMessages(state.messages),
    };
    if (options.tools.length > 0) {
      body.tools = toChatTools(options.tools);
      body.tool_choice = 'auto';
    }

    logger.debug(`Chat completions request: ${body.messages.length} message(s)`);

    let raw: unknown;
    try {
      raw = await this.client.chat.completions.create(body);
    } catch (error) {
      throw toProviderError(error);
    }
    return parseChatReply(raw);
  }

  reset(): void {
    // Nothing is kept between calls
  }
}
