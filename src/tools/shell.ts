/**
 * Shell execution for run_shell
 *
 * Callers are responsible for the allowlist check; this module only runs the
 * command under a timeout and captures its output.
 */

import { spawn } from 'child_process';
import { getShellInvocation } from '../utils/platform.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { capTail } from './files.js';

const logger = createLogger('shell');

export interface ShellRunOptions {
  command: string;
  cwd: string;
  timeoutMs: number;
  maxOutputChars: number;
}

export interface ShellRunOutcome {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  truncated: boolean;
}

export async function runShellCommand(opts: ShellRunOptions): Promise<ShellRunOutcome> {
  const { file, args } = getShellInvocation(opts.command);
  const child = spawn(file, args, {
    cwd: opts.cwd,
    env: { ...process.env, KEEL: '1' },
    stdio: ['ignore', 'pipe', 'pipe'],
    windowsHide: true,
    // Own process group, so a timeout can take down everything the shell started
    detached: process.platform !== 'win32',
  });

  let stdout = '';
  let stderr = '';
  let timedOut = false;

  const timer = setTimeout(() => {
    timedOut = true;
    killProcessTree(child.pid, () => child.kill('SIGKILL'));
  }, Math.max(1, opts.timeoutMs));

  child.stdout.setEncoding('utf-8');
  child.stderr.setEncoding('utf-8');
  child.stdout.on('data', (chunk: string) => {
    stdout = capTail(stdout + chunk, opts.maxOutputChars * 2).text;
  });
  child.stderr.on('data', (chunk: string) => {
    stderr = capTail(stderr + chunk, opts.maxOutputChars * 2).text;
  });

  const exitCode = await new Promise<number | null>(resolve => {
    child.on('close', code => {
      clearTimeout(timer);
      resolve(code);
    });
    child.on('error', error => {
      clearTimeout(timer);
      stderr += `${stderr ? '\n' : ''}${error.message}`;
      resolve(null);
    });
  });

  const cappedOut = capTail(stdout, opts.maxOutputChars);
  const cappedErr = capTail(stderr, opts.maxOutputChars);

  return {
    exitCode,
    stdout: cappedOut.text,
    stderr: cappedErr.text,
    timedOut,
    truncated: cappedOut.truncated || cappedErr.truncated,
  };
}

function killProcessTree(pid: number | undefined, fallback: () => void): void {
  if (process.platform !== 'win32' && pid !== undefined) {
    try {
      process.kill(-pid, 'SIGKILL');
      return;
    } catch (error) {
      logger.debug(`Process group kill failed for ${pid}: ${errorMessage(error)}`);
    }
  }
  fallback();
}
