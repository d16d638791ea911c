/**
 * OpenAI-compatible client plumbing shared by both wire protocols
 */

import OpenAI, { APIConnectionError, APIError } from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import type { ResponseCreateParamsNonStreaming } from 'openai/resources/responses/responses';
import type { KeelConfig } from '../core/config.js';
import { ProtocolError, TransportError, errorMessage } from '../utils/errors.js';

/**
 * The slice of the SDK the chat-completions adapter calls. Replies are
 * validated by the adapter, so they are typed as unknown here.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): PromiseLike<unknown>;
    };
  };
}

export interface ResponsesClient {
  responses: {
    create(body: ResponseCreateParamsNonStreaming): PromiseLike<unknown>;
  };
}

export type ProviderClient = ChatCompletionsClient & ResponsesClient;

const REQUEST_TIMEOUT_MS = 120_000;

// Statuses worth another attempt; everything else in 4xx is a rejection
const TRANSIENT_STATUSES = new Set([408, 409, 429]);

export function createOpenAIClient(config: Pick<KeelConfig, 'apiKey' | 'baseUrl'>): OpenAI {
  return new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    // Retries are the orchestrator's job
    maxRetries: 0,
    timeout: REQUEST_TIMEOUT_MS,
  });
}

/**
 * Map anything thrown by the SDK onto the transport/protocol split
 */
export function toProviderError(error: unknown): TransportError | ProtocolError {
  if (error instanceof TransportError || error instanceof ProtocolError) {
    return error;
  }

  if (error instanceof APIConnectionError) {
    return new TransportError(`Cannot reach model backend: ${error.message}`);
  }

  if (error instanceof APIError) {
    const status = error.status;
    if (status === undefined || status >= 500 || TRANSIENT_STATUSES.has(status)) {
      return new TransportError(`Model backend unavailable (${status ?? 'no status'}): ${error.message}`, status);
    }
    return new ProtocolError(`Model backend rejected the request (${status}): ${error.message}`, status);
  }

  return new TransportError(`Model request failed: ${errorMessage(error)}`);
}
