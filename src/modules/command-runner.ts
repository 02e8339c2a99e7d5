/**
 * @file Runs external commands from an argument list in a working directory under a hard
 *       wall-clock timeout. One child process per call, no shell, no retries.
 */

import { spawn } from 'child_process';
import { getLogger } from '../utils/logger';
import { getErrorMessage } from '../utils/error-handling';

export const DEFAULT_COMMAND_TIMEOUT_MS = 60000;

export type CommandResult =
  | { kind: 'completed'; stdout: string; stderr: string; exitCode: number | null }
  | { kind: 'timed-out'; timeoutMs: number }
  | { kind: 'spawn-failed'; error: string };

/**
 * Command execution port. Replaceable by a fake in tests.
 */
export interface CommandRunner {
  run(command: readonly string[], cwd: string, timeoutMs?: number): Promise<CommandResult>;
}

export class SpawnCommandRunner implements CommandRunner {
  private logger = getLogger('CommandRunner');

  run(
    command: readonly string[],
    cwd: string,
    timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS
  ): Promise<CommandResult> {
    const [executable, ...args] = command;
    if (!executable) {
      return Promise.resolve({ kind: 'spawn-failed', error: 'Empty command' });
    }

    this.logger.debug('Running command', { command: command.join(' '), cwd, timeoutMs });

    return new Promise<CommandResult>(resolve => {
      let stdout = '';
      let stderr = '';
      let settled = false;

      const finish = (result: CommandResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      const child = spawn(executable, args, {
        cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const timer = setTimeout(() => {
        this.logger.warn('Command timed out', { command: command.join(' '), timeoutMs });
        child.kill('SIGKILL');
        finish({ kind: 'timed-out', timeoutMs });
      }, timeoutMs);

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', error => {
        finish({ kind: 'spawn-failed', error: getErrorMessage(error) });
      });

      child.on('close', code => {
        finish({
          kind: 'completed',
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          exitCode: code,
        });
      });
    });
  }
}
