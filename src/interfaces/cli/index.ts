#!/usr/bin/env node

/**
 * Keel CLI Entry Point
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { ConfigManager } from '../../core/config.js';
import type { CliOptions } from '../../core/config.js';
import { logger, LogLevel } from '../../utils/logger.js';
import { formatForCLI } from '../../utils/markdown.js';
import { createSession } from './bootstrap.js';
import { startREPL } from './repl.js';
import { runSetupWizard } from './setup-wizard.js';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read package.json for version
const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, '../../../package.json'), 'utf-8'));
const version =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

interface SessionCommandOptions extends CliOptions {
  debug?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function addSessionOptions(command: Command): Command {
  return command
    .option('-w, --workspace <path>', 'Workspace directory', process.cwd())
    .option('-m, --model <id>', 'Model identifier')
    .option('--api-mode <mode>', 'auto, responses (Responses API) or chat (chat/completions); auto picks by base URL')
    .option('--base-url <url>', 'OpenAI-compatible base URL (defaults to $OPENAI_BASE_URL)')
    .option('--allow <prefix...>', 'Allowed shell command prefixes (replaces the default allowlist)')
    .option('--max-iterations <number>', 'Maximum tool-call iterations per prompt', parsePositiveInt)
    .option('--debug', 'Enable debug mode');
}

function applyLogLevel(options: SessionCommandOptions, configManager: ConfigManager) {
  if (options.debug || configManager.isDebug()) {
    logger.setLogLevel(LogLevel.DEBUG);
  }
}

const program = new Command();

program
  .name('keel')
  .description('Sandboxed coding assistant for a single workspace')
  .version(version);

program
  .command('config')
  .description('Edit saved defaults (model, API mode, base URL, allowlist)')
  .option('--reset', 'Forget all saved defaults')
  .action(async (options: { reset?: boolean }) => {
    try {
      const configManager = ConfigManager.getInstance();
      if (options.reset) {
        configManager.reset();
        logger.success(`Saved defaults cleared (${configManager.getConfigPath()})`);
        return;
      }
      await runSetupWizard(configManager);
    } catch (error) {
      logger.error('Configuration update failed', error);
      process.exit(1);
    }
  });

addSessionOptions(
  program
    .command('chat', { isDefault: true })
    .description('Start interactive chat with Keel')
).action(async (options: SessionCommandOptions) => {
  try {
    const configManager = ConfigManager.getInstance();
    applyLogLevel(options, configManager);

    const session = await createSession(options, configManager.getDefaults());

    console.log(chalk.gray(`API mode: ${session.config.apiMode}`));
    if (session.config.baseUrl) {
      console.log(chalk.gray(`Base URL: ${session.config.baseUrl}`));
    }

    await startREPL({ agent: session.agent, workspace: session.workspace });

    await session.agent.cleanup();
  } catch (error) {
    logger.error('Chat session failed', error);
    process.exit(1);
  }
});

addSessionOptions(
  program
    .command('run')
    .description('Run Keel with a single prompt')
    .argument('<prompt>', 'Prompt to execute')
).action(async (prompt: string, options: SessionCommandOptions) => {
  try {
    const configManager = ConfigManager.getInstance();
    applyLogLevel(options, configManager);

    const session = await createSession(options, configManager.getDefaults());

    logger.info('Executing prompt...');
    const response = await session.agent.run(prompt);

    console.log('\n' + formatForCLI(response.content) + '\n');

    if (response.toolsUsed.length > 0) {
      logger.info(`Tools used: ${response.toolsUsed.join(', ')}`);
    }
    logger.info(`Completed in ${response.iterations} iteration(s)`);

    await session.agent.cleanup();

    if (response.status === 'error') {
      process.exitCode = 2;
    }
  } catch (error) {
    logger.error('Execution failed', error);
    process.exit(1);
  }
});

await program.parseAsync();
