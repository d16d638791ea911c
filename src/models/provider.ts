/**
 * Provider selection
 */

import type { KeelConfig } from '../core/config.js';
import type { ModelProvider } from './base.js';
import { ChatCompletionsProvider } from './chat-completions.js';
import { createOpenAIClient } from './client.js';
import type { ProviderClient } from './client.js';
import { ResponsesProvider } from './responses.js';

/**
 * Build the adapter for the configured wire protocol. The client defaults to
 * the OpenAI SDK pointed at the configured endpoint.
 */
export function createModelProvider(
  config: Pick<KeelConfig, 'apiMode' | 'model' | 'apiKey' | 'baseUrl'>,
  client: ProviderClient = createOpenAIClient(config)
): ModelProvider {
  switch (config.apiMode) {
    case 'chat':
      return new ChatCompletionsProvider(client, config.model);
    case 'responses':
      return new ResponsesProvider(client, config.model);
  }
}
