import { runCommand, type CommandRunner } from './command';

// ── PID resolution ────────────────────────────────────────────────────────
// The unit's MainPID is usually a shell wrapper; the server itself runs as a
// child process. When the child can't be found by name we fall back to a
// command-line search.

export interface ProcessLocator {
  /** Resolves to the server's PID, or null when no process matches. */
  resolve(): Promise<number | null>;
}

export interface SystemdLocatorOptions {
  service: string;
  processName: string;
  processMatch: string;
  timeoutMs: number;
}

export class SystemdProcessLocator implements ProcessLocator {
  private options: SystemdLocatorOptions;
  private run: CommandRunner;

  constructor(options: SystemdLocatorOptions, run: CommandRunner = runCommand) {
    this.options = options;
    this.run = run;
  }

  async resolve(): Promise<number | null> {
    const { service, processName, processMatch, timeoutMs } = this.options;

    const main = await this.run(
      'systemctl',
      ['show', service, '--property=MainPID', '--value'],
      timeoutMs
    );
    const mainPid = main.exitCode === 0 ? firstPid(main.stdout) : null;
    if (mainPid === null || mainPid === 0) return null;

    const child = await this.run('pgrep', ['-P', String(mainPid), processName], timeoutMs);
    const childPid = child.exitCode === 0 ? firstPid(child.stdout) : null;
    if (childPid !== null) return childPid;

    const byName = await this.run('pgrep', ['-f', processMatch], timeoutMs);
    return byName.exitCode === 0 ? firstPid(byName.stdout) : null;
  }
}

function firstPid(stdout: string): number | null {
  const token = stdout.trim().split(/\s+/)[0];
  if (!token || !/^\d+$/.test(token)) return null;
  return parseInt(token, 10);
}

// ── Resource probe ────────────────────────────────────────────────────────

export interface ResourceUsage {
  cpuPercent: number;
  ramPercent: number;
  ramKb: number;
}

export interface ResourceProbe {
  /** Resolves to null when the process is gone or its stats can't be read. */
  sample(pid: number): Promise<ResourceUsage | null>;
}

export class PsResourceProbe implements ResourceProbe {
  private timeoutMs: number;
  private run: CommandRunner;

  constructor(timeoutMs: number, run: CommandRunner = runCommand) {
    this.timeoutMs = timeoutMs;
    this.run = run;
  }

  async sample(pid: number): Promise<ResourceUsage | null> {
    const { stdout, exitCode } = await this.run(
      'ps',
      ['-p', String(pid), '-o', '%cpu,%mem,rss', '--no-headers'],
      this.timeoutMs
    );
    if (exitCode !== 0) return null;
    return parsePsOutput(stdout);
  }
}

/** Parses one `ps -o %cpu,%mem,rss` row, e.g. " 12.5  8.1 2097152". */
export function parsePsOutput(stdout: string): ResourceUsage | null {
  const parts = stdout.trim().split(/\s+/);
  if (parts.length < 3) return null;

  const cpuPercent = Number(parts[0]);
  const ramPercent = Number(parts[1]);
  const ramKb = Number(parts[2]);
  if (![cpuPercent, ramPercent, ramKb].every(Number.isFinite)) return null;

  return { cpuPercent, ramPercent, ramKb };
}
