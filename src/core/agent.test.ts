import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Message, ModelProvider, NeutralReply } from '../models/base.js';
import { ToolRegistry } from '../tools/registry.js';
import type { ToolArguments, ToolResult } from '../tools/types.js';
import { MemoryError, ProtocolError, TransportError } from '../utils/errors.js';
import { KeelAgent } from './agent.js';
import type { AgentOptions } from './agent.js';
import type { ConversationState } from './conversation.js';
import { SessionHistory } from './history.js';
import { MemoryStore } from './memory.js';
import { DUTCH_GREETING_REPLY } from './smalltalk.js';

type Step = (state: ConversationState, callIndex: number) => NeutralReply;

/**
 * Provider double that answers from a script and records what it was sent
 */
class ScriptedProvider implements ModelProvider {
  readonly mode = 'chat' as const;
  readonly model = 'test-model';
  readonly sent: Message[][] = [];
  resets = 0;

  constructor(private readonly step: Step) {}

  async send(state: ConversationState): Promise<NeutralReply> {
    const callIndex = this.sent.length;
    this.sent.push([...state.messages]);
    return this.step(state, callIndex);
  }

  reset(): void {
    this.resets++;
  }
}

function scripted(replies: Array<NeutralReply | Error>): ScriptedProvider {
  return new ScriptedProvider((_state, index) => {
    const reply = replies[index];
    if (reply === undefined) {
      throw new Error(`no scripted reply for call ${index}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  });
}

function text(value: string): NeutralReply {
  return { kind: 'text', text: value };
}

function toolCalls(...calls: Array<[string, string, ToolArguments]>): NeutralReply {
  return { kind: 'tool_calls', calls: calls.map(([id, name, args]) => ({ id, name, arguments: args })) };
}

function toolResults(messages: Message[]): ToolResult[] {
  return messages.flatMap(msg => (msg.role === 'tool' ? [msg.result] : []));
}

function systemText(messages: Message[]): string {
  const first = messages[0];
  return first?.role === 'system' ? first.content : '';
}

describe('KeelAgent', () => {
  let root: string;

  const config = (overrides: Partial<AgentOptions['config']> = {}): AgentOptions['config'] => ({
    workspaceRoot: root,
    allowlist: ['echo', 'git status'],
    maxIterations: 12,
    maxRetries: 2,
    retryBaseDelayMs: 0,
    historyContextSize: 8,
    ...overrides,
  });

  const registry = () =>
    new ToolRegistry({
      workspaceRoot: root,
      allowlist: ['echo', 'git status'],
      shellTimeoutMs: 5000,
      maxReadChars: 16000,
      maxOutputChars: 8000,
      maxListEntries: 200,
    });

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'keel-agent-')));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('returns a text reply as the final answer', async () => {
    const provider = scripted([text('Nothing to do.')]);
    const agent = new KeelAgent({ config: config(), provider, registry: registry() });

    await expect(agent.run('check the repo')).resolves.toEqual({
      status: 'ok',
      content: 'Nothing to do.',
      iterations: 1,
      toolsUsed: [],
    });
    expect(provider.sent[0].slice(1)).toEqual([{ role: 'user', content: 'check the repo' }]);
  });

  it('executes tool calls in order and feeds the results back', async () => {
    const provider = scripted([
      toolCalls(['c1', 'write_file', { path: 'notes.txt', content: 'fresh' }], ['c2', 'read_file', { path: 'notes.txt' }]),
      text('Saved and verified.'),
    ]);
    const agent = new KeelAgent({ config: config(), provider, registry: registry() });

    const response = await agent.run('save a note');

    expect(response).toEqual({
      status: 'ok',
      content: 'Saved and verified.',
      iterations: 2,
      toolsUsed: ['write_file', 'read_file'],
    });
    expect(toolResults(provider.sent[1])).toEqual([
      { callId: 'c1', status: 'ok', output: 'Wrote 5 bytes to notes.txt', truncated: false },
      { callId: 'c2', status: 'ok', output: 'fresh', truncated: false },
    ]);
    expect(agent.getConversationHistory().map(msg => msg.role)).toEqual([
      'system',
      'user',
      'assistant',
      'tool',
      'tool',
      'assistant',
    ]);
  });

  it('executes repeated identical calls once each', async () => {
    const provider = scripted([
      toolCalls(['c1', 'run_shell', { command: 'echo hi >> log.txt' }], ['c2', 'run_shell', { command: 'echo hi >> log.txt' }]),
      text('Logged twice.'),
    ]);
    const agent = new KeelAgent({ config: config(), provider, registry: registry() });

    await agent.run('log twice');
    await expect(fs.readFile(path.join(root, 'log.txt'), 'utf-8')).resolves.toBe('hi\nhi\n');
  });

  it('hands tool failures to the model instead of retrying them', async () => {
    const provider = scripted([toolCalls(['c1', 'run_shell', { command: 'rm -rf /' }]), text('That command is not allowed.')]);
    const agent = new KeelAgent({ config: config(), provider, registry: registry() });

    const response = await agent.run('wipe everything');

    expect(response.status).toBe('ok');
    expect(provider.sent).toHaveLength(2);
    expect(toolResults(provider.sent[1])).toMatchObject([{ callId: 'c1', status: 'error', reason: 'PermissionDenied' }]);
  });

  it('stops at the iteration cap', async () => {
    const provider = new ScriptedProvider((_state, index) => toolCalls([`c${index}`, 'list_files', {}]));
    const agent = new KeelAgent({ config: config({ maxIterations: 5 }), provider, registry: registry() });

    const response = await agent.run('loop forever');

    expect(provider.sent).toHaveLength(5);
    expect(response).toEqual({
      status: 'error',
      reason: 'IterationLimitExceeded',
      content: 'Stopped after 5 iterations without a final answer: the tool-call loop did not converge.',
      iterations: 5,
      toolsUsed: ['list_files', 'list_files', 'list_files', 'list_files', 'list_files'],
    });
  });

  it('retries transport failures and then succeeds', async () => {
    const provider = scripted([new TransportError('reset'), new TransportError('reset'), text('Back online.')]);
    const agent = new KeelAgent({ config: config(), provider, registry: registry() });

    const response = await agent.run('status?');

    expect(response).toMatchObject({ status: 'ok', content: 'Back online.', iterations: 1 });
    expect(provider.sent).toHaveLength(3);
  });

  it('gives up after the configured number of retries', async () => {
    const provider = new ScriptedProvider(() => {
      throw new TransportError('connection refused');
    });
    const agent = new KeelAgent({ config: config({ maxRetries: 2 }), provider, registry: registry() });

    const response = await agent.run('status?');

    expect(provider.sent).toHaveLength(3);
    expect(response).toEqual({
      status: 'error',
      reason: 'TransportError',
      content:
        'Provider failure: the model backend could not be reached after 3 attempt(s). connection refused',
      iterations: 1,
      toolsUsed: [],
    });
  });

  it('does not retry protocol errors', async () => {
    const provider = scripted([new ProtocolError('bad reply'), text('never sent')]);
    const agent = new KeelAgent({ config: config(), provider, registry: registry() });

    const response = await agent.run('status?');

    expect(provider.sent).toHaveLength(1);
    expect(response).toMatchObject({
      status: 'error',
      reason: 'ProtocolError',
      content: 'Provider failure: the model backend returned an unusable reply. bad reply',
    });
  });

  it('answers greetings without calling the model', async () => {
    const provider = scripted([]);
    const agent = new KeelAgent({ config: config(), provider, registry: registry() });

    await expect(agent.run('Hoi!')).resolves.toEqual({
      status: 'ok',
      content: DUTCH_GREETING_REPLY,
      iterations: 0,
      toolsUsed: [],
    });
    expect(provider.sent).toHaveLength(0);
  });

  it('resets the provider session at the start of every run', async () => {
    const provider = scripted([text('one'), text('two')]);
    const agent = new KeelAgent({ config: config(), provider, registry: registry() });

    await agent.run('first');
    await agent.run('second');
    expect(provider.resets).toBe(2);
  });

  describe('memory and history', () => {
    it('puts remembered facts into the system prompt', async () => {
      const memoryPath = path.join(root, '.keel', 'memory.json');
      await new MemoryStore(memoryPath).save({ project: 'keel' });

      const provider = scripted([text('ok')]);
      const agent = new KeelAgent({
        config: config(),
        provider,
        registry: registry(),
        memoryStore: new MemoryStore(memoryPath),
      });
      await agent.initialize();
      await agent.run('what project is this?');

      expect(systemText(provider.sent[0])).toContain('Remembered facts:\n- project: keel');
    });

    it('persists remembered facts on cleanup', async () => {
      const memoryPath = path.join(root, '.keel', 'memory.json');
      const agent = new KeelAgent({
        config: config(),
        provider: scripted([]),
        registry: registry(),
        memoryStore: new MemoryStore(memoryPath),
      });
      await agent.initialize();
      agent.remember('editor', 'vim');
      agent.remember('stale', 'x');
      expect(agent.forget('stale')).toBe(true);
      expect(agent.forget('stale')).toBe(false);

      await agent.cleanup();
      await expect(new MemoryStore(memoryPath).load()).resolves.toEqual({ editor: 'vim' });
    });

    it('only forgets keys that were remembered', () => {
      const agent = new KeelAgent({ config: config(), provider: scripted([]), registry: registry() });
      agent.remember('editor', 'vim');

      expect(agent.forget('toString')).toBe(false);
      expect(agent.forget('constructor')).toBe(false);
      expect(agent.getMemory()).toEqual({ editor: 'vim' });
    });

    it('refuses __proto__ as a memory key', () => {
      const agent = new KeelAgent({ config: config(), provider: scripted([]), registry: registry() });

      expect(() => agent.remember('__proto__', 'x')).toThrow(MemoryError);
      expect(agent.getMemory()).toEqual({});
      expect(agent.forget('__proto__')).toBe(false);
    });

    it('records each exchange and offers it as context to the next run', async () => {
      const history = new SessionHistory(path.join(root, '.keel', 'history.json'));
      const provider = scripted([text('first answer'), text('second answer')]);
      const agent = new KeelAgent({ config: config(), provider, registry: registry(), history });

      await agent.run('first prompt');
      await agent.run('second prompt');

      expect(systemText(provider.sent[1])).toContain('Recent memory:\nuser: first prompt\nassistant: first answer');
      expect((await history.readAll()).map(entry => entry.content)).toEqual([
        'first prompt',
        'first answer',
        'second prompt',
        'second answer',
      ]);
    });

    it('clears session history on reset', async () => {
      const history = new SessionHistory(path.join(root, '.keel', 'history.json'));
      const agent = new KeelAgent({ config: config(), provider: scripted([text('a')]), registry: registry(), history });

      await agent.run('something');
      await agent.resetConversation();

      await expect(history.readAll()).resolves.toEqual([]);
      expect(agent.getConversationHistory()).toEqual([]);
    });
  });
});
