/**
 * Interactive editor for saved defaults
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import { DEFAULT_ALLOWLIST, DEFAULT_MODEL } from '../../core/config.js';
import type { ApiModeOption, ConfigManager, UserDefaults } from '../../core/config.js';
import { logger } from '../../utils/logger.js';

interface WizardAnswers {
  model: string;
  apiMode: ApiModeOption;
  baseUrl: string;
  allowlist: string;
  maxIterations: number;
  debug: boolean;
}

export async function runSetupWizard(configManager: ConfigManager): Promise<void> {
  const current = configManager.getDefaults();

  console.log(chalk.bold.cyan('\n⚓ Keel Configuration\n'));
  console.log(chalk.gray('Command-line options override everything saved here.\n'));

  const answers = await inquirer.prompt<WizardAnswers>([
    {
      type: 'input',
      name: 'model',
      message: 'Model name:',
      default: current.model ?? DEFAULT_MODEL,
    },
    {
      type: 'list',
      name: 'apiMode',
      message: 'API mode:',
      choices: [
        { name: 'auto (chat for localhost, responses otherwise)', value: 'auto' },
        { name: 'responses (stateful Responses API)', value: 'responses' },
        { name: 'chat (stateless chat/completions, e.g. LM Studio)', value: 'chat' },
      ],
      default: current.apiMode ?? 'auto',
    },
    {
      type: 'input',
      name: 'baseUrl',
      message: 'Base URL (empty for the provider default):',
      default: current.baseUrl ?? '',
      validate: (input: string) => {
        if (!input.trim()) {
          return true;
        }
        try {
          new URL(input);
          return true;
        } catch {
          return 'Please enter a valid URL';
        }
      },
    },
    {
      type: 'input',
      name: 'allowlist',
      message: 'Allowed command prefixes (comma separated):',
      default: (current.allowlist ?? DEFAULT_ALLOWLIST).join(', '),
    },
    {
      type: 'number',
      name: 'maxIterations',
      message: 'Maximum tool-call iterations per prompt:',
      default: current.maxIterations ?? 12,
      validate: (input: number) => (Number.isInteger(input) && input > 0) || 'Enter a positive whole number',
    },
    {
      type: 'confirm',
      name: 'debug',
      message: 'Enable debug mode?',
      default: current.debug ?? false,
    },
  ]);

  const defaults: UserDefaults = {
    model: answers.model.trim() || DEFAULT_MODEL,
    apiMode: answers.apiMode,
    allowlist: answers.allowlist
      .split(',')
      .map(prefix => prefix.trim())
      .filter(prefix => prefix.length > 0),
    maxIterations: answers.maxIterations,
    debug: answers.debug,
  };
  if (answers.baseUrl.trim()) {
    defaults.baseUrl = answers.baseUrl.trim();
  }

  configManager.setDefaults(defaults);

  logger.success('Defaults saved');
  console.log(`Configuration saved to: ${chalk.cyan(configManager.getConfigPath())}`);
  console.log('\nYou can now run:', chalk.cyan('keel'));
  console.log('');
}
