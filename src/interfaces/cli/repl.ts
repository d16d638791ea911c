/**
 * REPL (Read-Eval-Print Loop) for interactive chat with the Keel agent
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import ora from 'ora';
import type { KeelAgent } from '../../core/agent.js';
import type { WorkspaceManager } from '../../core/workspace.js';
import type { Message } from '../../models/base.js';
import { errorMessage } from '../../utils/errors.js';
import { formatForCLI } from '../../utils/markdown.js';
import { saveOnInterrupt } from './shutdown.js';

export interface REPLOptions {
  agent: KeelAgent;
  workspace: WorkspaceManager;
}

export async function startREPL(options: REPLOptions): Promise<void> {
  const { agent, workspace } = options;

  console.log(chalk.bold.cyan('\n⚓ Keel - Interactive Mode\n'));
  console.log(chalk.gray('Type your message and press Enter. Type /help for commands or /exit to quit.\n'));

  console.log(chalk.gray(`Workspace: ${workspace.getWorkspaceDir()}`));
  console.log(chalk.gray(`Model: ${agent.getProvider().model}`));

  const memoryCount = Object.keys(agent.getMemory()).length;
  if (memoryCount > 0) {
    console.log(chalk.gray(`✓ ${memoryCount} remembered fact(s) loaded`));
  }

  console.log('');

  // /exit leaves saving to the caller; other ways out save here
  const disposeInterruptSave = saveOnInterrupt(agent);
  try {
    while (true) {
      const { message } = await inquirer.prompt<{ message: string }>([
        {
          type: 'input',
          name: 'message',
          message: chalk.bold.blue('You:'),
          prefix: '',
        },
      ]);

      const trimmedMessage = message.trim();

      // Handle commands with / prefix
      if (trimmedMessage.startsWith('/')) {
        const [rawCommand, ...rest] = trimmedMessage.substring(1).split(/\s+/);
        const command = rawCommand.toLowerCase();

        if (command === 'exit' || command === 'quit') {
          console.log(chalk.gray('\nStopping.\n'));
          break;
        }

        if (command === 'help') {
          showHelp();
          continue;
        }

        if (command === 'reset') {
          await agent.resetConversation();
          console.log(chalk.yellow('\n✓ Conversation reset\n'));
          continue;
        }

        if (command === 'history') {
          showHistory(agent.getConversationHistory());
          continue;
        }

        if (command === 'tools') {
          showTools(agent);
          continue;
        }

        if (command === 'memory') {
          showMemory(agent);
          continue;
        }

        if (command === 'remember') {
          const [key, ...valueParts] = rest;
          if (!key || valueParts.length === 0) {
            console.log(chalk.red('\n✗ Usage: /remember <key> <value>\n'));
            continue;
          }
          try {
            agent.remember(key, valueParts.join(' '));
            console.log(chalk.green(`\n✓ Remembered ${key}\n`));
          } catch (error) {
            console.log(chalk.red('\n✗'), errorMessage(error), '\n');
          }
          continue;
        }

        if (command === 'forget') {
          const [key] = rest;
          if (!key) {
            console.log(chalk.red('\n✗ Usage: /forget <key>\n'));
            continue;
          }
          const removed = agent.forget(key);
          console.log(removed ? chalk.green(`\n✓ Forgot ${key}\n`) : chalk.yellow(`\nNothing remembered under ${key}\n`));
          continue;
        }

        if (command === 'save') {
          await handleSaveMemory(agent);
          continue;
        }

        console.log(chalk.red(`\n✗ Unknown command: /${command}`));
        console.log(chalk.gray('Type /help for available commands\n'));
        continue;
      }

      if (!trimmedMessage) {
        continue;
      }

      if (trimmedMessage.toLowerCase() === 'exit' || trimmedMessage.toLowerCase() === 'quit') {
        console.log(chalk.gray('\nStopping.\n'));
        break;
      }

      const spinner = ora('Thinking...').start();

      try {
        const response = await agent.run(trimmedMessage);

        spinner.stop();

        if (response.status === 'ok') {
          console.log(chalk.bold.green('\nKeel:'));
          console.log(formatForCLI(response.content));
        } else {
          console.log(chalk.bold.red(`\nKeel (${response.reason}):`));
          console.log(response.content);
        }

        if (response.toolsUsed.length > 0) {
          console.log(chalk.gray(`\n[Used tools: ${response.toolsUsed.join(', ')}]`));
        }

        console.log(chalk.gray(`[Iterations: ${response.iterations}]\n`));
      } catch (error) {
        spinner.stop();
        console.log(chalk.red('\n✗ Error:'), errorMessage(error));
        console.log('');
      }
    }
  } finally {
    disposeInterruptSave();
  }
}

function showHelp() {
  console.log(chalk.bold('\nAvailable Commands:'));
  console.log('  /exit, /quit            - Exit the REPL (memory is saved)');
  console.log('  /help                   - Show this help message');
  console.log('  /reset                  - Reset conversation and session history');
  console.log('  /history                - Show messages of the last run');
  console.log('  /tools                  - Show available tools and the command allowlist');
  console.log('  /memory                 - Show remembered facts');
  console.log('  /remember <key> <value> - Remember a fact across sessions');
  console.log('  /forget <key>           - Forget a fact');
  console.log('  /save                   - Save remembered facts now');
  console.log('');
}

function describeMessage(msg: Message): string {
  switch (msg.role) {
    case 'tool':
      return `${msg.toolName} → ${msg.result.status}${msg.result.status === 'error' ? ` (${msg.result.reason})` : ''}`;
    case 'assistant':
      if (msg.toolCalls && msg.toolCalls.length > 0) {
        return `[tool calls: ${msg.toolCalls.map(call => call.name).join(', ')}]`;
      }
      return msg.content;
    default:
      return msg.content;
  }
}

function showHistory(history: readonly Message[]) {
  console.log(chalk.bold('\nConversation History:'));

  if (history.length === 0) {
    console.log(chalk.gray('  Nothing yet'));
  }

  history.forEach((msg, index) => {
    const roleColor =
      msg.role === 'user' ? chalk.blue :
      msg.role === 'assistant' ? chalk.green :
      msg.role === 'system' ? chalk.gray :
      chalk.yellow;

    const text = describeMessage(msg);
    const content = text.substring(0, 100) + (text.length > 100 ? '...' : '');

    console.log(`${index + 1}. ${roleColor(msg.role)}: ${content}`);
  });

  console.log('');
}

function showTools(agent: KeelAgent) {
  const registry = agent.getRegistry();
  const tools = registry.getDefinitions();

  console.log(chalk.bold(`\nAvailable Tools (${tools.length}):`));
  tools.forEach(tool => {
    console.log(`  ${chalk.cyan(tool.name)}: ${tool.description}`);
  });

  console.log(chalk.bold('\nAllowed command prefixes:'));
  console.log(`  ${registry.getAllowlist().join(', ') || chalk.gray('(none)')}`);
  console.log('');
}

function showMemory(agent: KeelAgent) {
  const entries = Object.entries(agent.getMemory());

  console.log(chalk.bold(`\nRemembered Facts (${entries.length}):`));
  if (entries.length === 0) {
    console.log(chalk.gray('  Nothing remembered'));
  }
  entries.forEach(([key, value]) => {
    console.log(`  ${chalk.cyan(key)}: ${value}`);
  });
  console.log('');
}

async function handleSaveMemory(agent: KeelAgent) {
  try {
    const ack = await agent.saveMemory();
    if (ack) {
      console.log(chalk.green(`\n✓ Memory saved: ${ack.keys} fact(s) to ${ack.path}`));
    } else {
      console.log(chalk.red('\n✗ Memory store not configured'));
    }
    console.log('');
  } catch (error) {
    console.log(chalk.red('\n✗ Failed to save memory:'), errorMessage(error));
    console.log('');
  }
}
