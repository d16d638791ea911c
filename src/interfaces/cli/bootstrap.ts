/**
 * Wires configuration into the core components for one CLI session
 */

import { KeelAgent } from '../../core/agent.js';
import { resolveKeelConfig } from '../../core/config.js';
import type { CliOptions, KeelConfig, UserDefaults } from '../../core/config.js';
import { SessionHistory } from '../../core/history.js';
import { MemoryStore } from '../../core/memory.js';
import { WorkspaceManager } from '../../core/workspace.js';
import { createModelProvider } from '../../models/provider.js';
import { ToolRegistry } from '../../tools/registry.js';

export interface Session {
  config: KeelConfig;
  workspace: WorkspaceManager;
  agent: KeelAgent;
}

export async function createSession(options: CliOptions, defaults: UserDefaults): Promise<Session> {
  const initial = resolveKeelConfig(options, defaults);

  const workspace = new WorkspaceManager({ workspaceDir: initial.workspaceRoot });
  await workspace.initialize();

  // Pin the root to its real path so every later check compares like with like
  const config: KeelConfig = Object.freeze({ ...initial, workspaceRoot: workspace.getWorkspaceDir() });

  const agent = new KeelAgent({
    config,
    provider: createModelProvider(config),
    registry: new ToolRegistry(config),
    memoryStore: new MemoryStore(workspace.getMemoryPath()),
    history: new SessionHistory(workspace.getHistoryPath(), config.historyLimit),
  });
  await agent.initialize();

  return { config, workspace, agent };
}
