/**
 * Keel - Sandboxed Coding Assistant
 *
 * Main exports for programmatic usage
 */

export { KeelAgent } from './core/agent.js';
export type { AgentOptions, AgentResponse, AnswerErrorReason } from './core/agent.js';
export { ConversationState } from './core/conversation.js';
export { ConfigManager, resolveKeelConfig, chooseApiMode, DEFAULT_ALLOWLIST } from './core/config.js';
export type { CliOptions, KeelConfig, UserDefaults } from './core/config.js';
export { WorkspaceManager } from './core/workspace.js';
export { MemoryStore } from './core/memory.js';
export type { MemoryAck, MemoryRecord } from './core/memory.js';
export { SessionHistory } from './core/history.js';
export type { HistoryEntry } from './core/history.js';

export { createModelProvider } from './models/provider.js';
export { ChatCompletionsProvider } from './models/chat-completions.js';
export { ResponsesProvider } from './models/responses.js';
export { createOpenAIClient } from './models/client.js';
export type { ChatCompletionsClient, ProviderClient, ResponsesClient } from './models/client.js';

export { ToolRegistry } from './tools/registry.js';
export { isCommandAllowed, resolveInWorkspace, confineToWorkspace } from './tools/sandbox.js';

export { logger, createLogger, LogLevel } from './utils/logger.js';
export type { Log } from './utils/logger.js';

export * from './utils/errors.js';
export * from './models/base.js';
export * from './tools/types.js';
