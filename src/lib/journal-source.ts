/**
 * Log Source backed by the systemd journal.
 *
 * Lines come back in emission order, each prefixed with journalctl's
 * short-iso-precise timestamp in UTC, e.g.
 *   2024-01-01T10:00:00.123456+0000 host java[812]: [INFO] Adding player 'Alice' ...
 */

import { runCommand, type CommandRunner } from './command';
import { QueryError } from './errors';
import { sinceArgument } from './time';

/** Either everything since a timestamp, or the newest N lines. */
export type LogQuery = { since: string } | { lines: number };

export interface LogSource {
  query(query: LogQuery, timeoutMs: number): Promise<string[]>;
}

export class JournalLogSource implements LogSource {
  private service: string;
  private run: CommandRunner;

  constructor(service: string, run: CommandRunner = runCommand) {
    this.service = service;
    this.run = run;
  }

  async query(query: LogQuery, timeoutMs: number): Promise<string[]> {
    const args = ['-u', this.service, '--no-pager', '-q', '--utc', '-o', 'short-iso-precise'];
    if ('since' in query) {
      args.push('--since', sinceArgument(query.since));
    } else {
      args.push('-n', String(query.lines));
    }

    const { stdout, exitCode } = await this.run('journalctl', args, timeoutMs);
    if (exitCode !== 0) {
      throw new QueryError(
        'failure',
        ['journalctl', ...args].join(' '),
        `journalctl exited with status ${exitCode}`,
        exitCode
      );
    }

    return splitLines(stdout);
  }
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/).filter((line) => line.trim() !== '');
}
