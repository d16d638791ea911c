/**
 * Saves the agent's memory when the REPL is left without /exit:
 * Ctrl+C (inquirer re-raises SIGINT) or end of input, after which the event
 * loop drains and Node emits `beforeExit`.
 */

import chalk from 'chalk';
import type { KeelAgent } from '../../core/agent.js';
import { errorMessage } from '../../utils/errors.js';

export type ExitFn = (code: number) => void;

// 128 + SIGINT, what a shell reports for Ctrl+C
export const INTERRUPTED_EXIT_CODE = 130;

export interface InterruptHandlers {
  onSigint(): void;
  onBeforeExit(): void;
}

/**
 * Both handlers save once and then exit; whichever fires first wins.
 */
export function createInterruptHandlers(
  agent: Pick<KeelAgent, 'cleanup'>,
  exit: ExitFn,
  onFirst: () => void = () => {}
): InterruptHandlers {
  let saving = false;

  const finish = (code: number) => {
    if (saving) {
      return;
    }
    saving = true;
    onFirst();
    void agent.cleanup().then(
      () => exit(code),
      (error: unknown) => {
        console.log(chalk.red('\n✗ Failed to save memory:'), errorMessage(error));
        exit(1);
      }
    );
  };

  return {
    onSigint: () => {
      console.log(chalk.gray('\nInterrupted, saving memory.'));
      finish(INTERRUPTED_EXIT_CODE);
    },
    onBeforeExit: () => finish(0),
  };
}

export function saveOnInterrupt(
  agent: Pick<KeelAgent, 'cleanup'>,
  exit: ExitFn = code => process.exit(code)
): () => void {
  const dispose = () => {
    process.off('SIGINT', handlers.onSigint);
    process.off('beforeExit', handlers.onBeforeExit);
  };
  const handlers = createInterruptHandlers(agent, exit, dispose);

  process.on('SIGINT', handlers.onSigint);
  process.on('beforeExit', handlers.onBeforeExit);

  return dispose;
}
