/**
 * Keel Agent - Main Orchestrator
 *
 * Drives one run: sends the conversation to the model provider, executes the
 * tool calls it asks for through the registry, feeds the results back, and
 * stops at a final answer or at the iteration cap.
 */

import { setTimeout as delay } from 'timers/promises';
import type { Message, ModelProvider, NeutralReply } from '../models/base.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolDefinition, ToolResult } from '../tools/types.js';
import { MemoryError, ProtocolError, TransportError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { getPlatformLabel } from '../utils/platform.js';
import type { KeelConfig } from './config.js';
import { ConversationState } from './conversation.js';
import type { SessionHistory } from './history.js';
import type { MemoryAck, MemoryRecord, MemoryStore } from './memory.js';
import { buildSystemPrompt } from './prompt.js';
import { maybeHandleSmalltalk } from './smalltalk.js';

const logger = createLogger('agent');

export interface AgentOptions {
  config: Pick<KeelConfig, 'workspaceRoot' | 'allowlist' | 'maxIterations' | 'maxRetries' | 'retryBaseDelayMs' | 'historyContextSize'>;
  provider: ModelProvider;
  registry: ToolRegistry;
  memoryStore?: MemoryStore;
  history?: SessionHistory;
}

export type AnswerErrorReason = 'TransportError' | 'ProtocolError' | 'IterationLimitExceeded';

export type AgentResponse =
  | {
      status: 'ok';
      content: string;
      iterations: number;
      toolsUsed: string[];
    }
  | {
      status: 'error';
      reason: AnswerErrorReason;
      content: string;
      iterations: number;
      toolsUsed: string[];
    };

export class KeelAgent {
  private readonly config: AgentOptions['config'];
  private readonly provider: ModelProvider;
  private readonly registry: ToolRegistry;
  private readonly memoryStore: MemoryStore | null;
  private readonly history: SessionHistory | null;
  private memory: MemoryRecord = {};
  private conversation: ConversationState | null = null;

  constructor(options: AgentOptions) {
    this.config = options.config;
    this.provider = options.provider;
    this.registry = options.registry;
    this.memoryStore = options.memoryStore ?? null;
    this.history = options.history ?? null;
  }

  /**
   * Load persisted memory. Call once at session start.
   */
  async initialize(): Promise<void> {
    if (this.memoryStore) {
      this.memory = await this.memoryStore.load();
      logger.debug(`Loaded ${Object.keys(this.memory).length} memory entr(ies)`);
    }
  }

  /**
   * Answer one user prompt
   */
  async run(userPrompt: string): Promise<AgentResponse> {
    const prompt = userPrompt.trim();

    const smalltalk = maybeHandleSmalltalk(prompt);
    if (smalltalk !== undefined) {
      await this.recordExchange(prompt, smalltalk);
      return { status: 'ok', content: smalltalk, iterations: 0, toolsUsed: [] };
    }

    logger.info('Processing user message...');

    const recentHistory = this.history ? await this.history.recent(this.config.historyContextSize) : [];
    const state = new ConversationState(
      buildSystemPrompt({
        workspaceDir: this.config.workspaceRoot,
        platform: getPlatformLabel(),
        allowlist: this.config.allowlist,
        memory: this.memory,
        recentHistory,
      })
    );
    state.appendUser(prompt);
    this.conversation = state;
    this.provider.reset();

    const response = await this.loop(state);
    await this.recordExchange(prompt, response.content);
    return response;
  }

  private async loop(state: ConversationState): Promise<AgentResponse> {
    const tools = this.registry.getDefinitions();
    const toolsUsed: string[] = [];

    while (state.turn < this.config.maxIterations) {
      const iteration = state.beginTurn();
      logger.debug(`Agent iteration ${iteration}/${this.config.maxIterations}`);

      let reply: NeutralReply;
      try {
        reply = await this.sendWithRetry(state, tools);
      } catch (error) {
        if (error instanceof ProtocolError) {
          logger.error('Model returned an unusable reply', error);
          return {
            status: 'error',
            reason: 'ProtocolError',
            content: `Provider failure: the model backend returned an unusable reply. ${error.message}`,
            iterations: iteration,
            toolsUsed,
          };
        }
        if (error instanceof TransportError) {
          logger.error('Model backend unreachable', error);
          return {
            status: 'error',
            reason: 'TransportError',
            content: `Provider failure: the model backend could not be reached after ${this.config.maxRetries + 1} attempt(s). ${error.message}`,
            iterations: iteration,
            toolsUsed,
          };
        }
        throw error;
      }

      if (reply.kind === 'text') {
        state.appendAssistantText(reply.text);
        return { status: 'ok', content: reply.text, iterations: iteration, toolsUsed };
      }

      logger.info(`Model requested ${reply.calls.length} tool call(s)`);
      state.appendToolCalls(reply.calls, reply.text);

      // One at a time, in the order received: later calls may read what earlier ones wrote
      const results: ToolResult[] = [];
      for (const call of reply.calls) {
        logger.info(`Executing tool: ${call.name}`);
        const result = await this.registry.invoke(call);
        toolsUsed.push(call.name);

        if (result.status === 'ok') {
          logger.success(`Tool ${call.name} executed successfully`);
        } else {
          logger.warn(`Tool ${call.name} failed (${result.reason})`);
        }
        results.push(result);
      }

      state.appendToolResults(reply.calls, results);
    }

    logger.warn('Max iterations reached');
    return {
      status: 'error',
      reason: 'IterationLimitExceeded',
      content: `Stopped after ${this.config.maxIterations} iterations without a final answer: the tool-call loop did not converge.`,
      iterations: state.turn,
      toolsUsed,
    };
  }

  private async sendWithRetry(state: ConversationState, tools: ToolDefinition[]): Promise<NeutralReply> {
    const maxRetries = this.config.maxRetries;
    let lastError: TransportError | undefined;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        const waitTime = this.config.retryBaseDelayMs * Math.pow(2, attempt - 1);
        logger.warn(`Retrying after ${waitTime}ms (attempt ${attempt + 1}/${maxRetries + 1})...`);
        await delay(waitTime);
      }

      try {
        return await this.provider.send(state, { tools });
      } catch (error) {
        // Only transport failures are worth another attempt
        if (!(error instanceof TransportError)) {
          throw error;
        }
        lastError = error;
        logger.warn(`Model request failed: ${error.message}`);
      }
    }

    throw lastError ?? new TransportError('Model request failed');
  }

  private async recordExchange(prompt: string, answer: string): Promise<void> {
    if (!this.history) {
      return;
    }
    try {
      await this.history.append('user', prompt);
      await this.history.append('assistant', answer);
    } catch (error) {
      logger.warn(`Could not update session history: ${errorMessage(error)}`);
    }
  }

  getMemory(): Readonly<MemoryRecord> {
    return { ...this.memory };
  }

  remember(key: string, value: string): void {
    // Assigning __proto__ on a plain object swaps its prototype instead of storing a fact
    if (key === '__proto__') {
      throw new MemoryError(`"${key}" cannot be used as a memory key`);
    }
    this.memory[key] = value;
  }

  forget(key: string): boolean {
    if (!Object.hasOwn(this.memory, key)) {
      return false;
    }
    delete this.memory[key];
    return true;
  }

  /**
   * Write the memory record back to disk
   */
  async saveMemory(): Promise<MemoryAck | null> {
    if (!this.memoryStore) {
      logger.warn('Memory store not configured');
      return null;
    }
    const ack = await this.memoryStore.save(this.memory);
    logger.debug(`Memory saved: ${ack.keys} key(s) to ${ack.path}`);
    return ack;
  }

  /**
   * Messages of the most recent run
   */
  getConversationHistory(): readonly Message[] {
    return this.conversation ? [...this.conversation.messages] : [];
  }

  async resetConversation(): Promise<void> {
    this.conversation = null;
    this.provider.reset();
    if (this.history) {
      await this.history.clear();
    }
    logger.info('Conversation history reset');
  }

  getRegistry(): ToolRegistry {
    return this.registry;
  }

  getProvider(): ModelProvider {
    return this.provider;
  }

  /**
   * Session end: persist memory
   */
  async cleanup(): Promise<void> {
    logger.info('Cleaning up agent resources...');
    if (this.memoryStore) {
      await this.saveMemory();
    }
  }
}
