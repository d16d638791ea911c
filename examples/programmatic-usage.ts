/**
 * Example: Programmatic Usage of Keel
 *
 * Runs one prompt against a local OpenAI-compatible server (for example LM
 * Studio on port 1234) with a narrow allowlist.
 */

import {
  KeelAgent,
  MemoryStore,
  SessionHistory,
  ToolRegistry,
  WorkspaceManager,
  createModelProvider,
  logger,
  LogLevel,
  resolveKeelConfig,
} from '../src/index.js';

async function main() {
  logger.setLogLevel(LogLevel.DEBUG);

  try {
    // 1. Resolve configuration. A local base URL selects chat completions and
    //    falls back to a placeholder API key.
    const config = resolveKeelConfig({
      workspace: './scratch',
      baseUrl: 'http://localhost:1234/v1',
      allow: ['git status', 'ls', 'echo'],
      maxIterations: 8,
    });

    // 2. Prepare the workspace
    const workspace = new WorkspaceManager({ workspaceDir: config.workspaceRoot });
    await workspace.initialize();

    // 3. Create the agent
    const agent = new KeelAgent({
      config,
      provider: createModelProvider(config),
      registry: new ToolRegistry(config),
      memoryStore: new MemoryStore(workspace.getMemoryPath()),
      history: new SessionHistory(workspace.getHistoryPath(), config.historyLimit),
    });
    await agent.initialize();

    // 4. Remember something for later sessions
    agent.remember('project', 'scratch notes');

    // 5. Use the agent
    const response = await agent.run('Create notes.md with a short todo list, then list the workspace files.');
    console.log('Status:', response.status);
    console.log('Response:', response.content);
    console.log('Tools used:', response.toolsUsed);
    console.log('Iterations:', response.iterations);

    // 6. Persist memory
    await agent.cleanup();
  } catch (error) {
    logger.error('Error in main', error);
    process.exit(1);
  }
}

await main();
