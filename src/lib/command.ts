import { execFile } from 'child_process';
import { QueryError } from './errors';

export interface CommandResult {
  stdout: string;
  exitCode: number;
}

/**
 * Runs an external program with a hard timeout.
 *
 * Resolves with the exit code for any normal exit (callers decide whether a
 * non-zero status is a failure; pgrep uses 1 for "no match"). Rejects with
 * QueryError when the program times out or cannot be started.
 */
export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<CommandResult>;

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export const runCommand: CommandRunner = (file, args, timeoutMs) => {
  const command = [file, ...args].join(' ');

  return new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { timeout: timeoutMs, maxBuffer: MAX_OUTPUT_BYTES, encoding: 'utf8' },
      (err, stdout) => {
        if (!err) {
          resolve({ stdout, exitCode: 0 });
          return;
        }
        if (err.killed) {
          reject(new QueryError('timeout', command, `${file} timed out after ${timeoutMs}ms`));
          return;
        }
        if (typeof err.code === 'number') {
          resolve({ stdout, exitCode: err.code });
          return;
        }
        reject(new QueryError('failure', command, `${file} could not run: ${err.message}`));
      }
    );
  });
};
