/**
 * Error types shared by the worker.
 *
 * Nothing raised during steady-state operation is fatal: the scheduler logs
 * the error and the task is retried on its next interval.
 */

export type QueryErrorKind = 'timeout' | 'failure';

/** An external command (journalctl, systemctl, pgrep, ps) failed or timed out. */
export class QueryError extends Error {
  readonly kind: QueryErrorKind;
  readonly command: string;
  readonly exitCode: number | null;

  constructor(kind: QueryErrorKind, command: string, message: string, exitCode: number | null = null) {
    super(message);
    this.name = 'QueryError';
    this.kind = kind;
    this.command = command;
    this.exitCode = exitCode;
  }
}

/** A SQLite write failed; the checkpoint is left where it was. */
export class StorageError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${errorMessage(cause)}`, { cause });
    this.name = 'StorageError';
    this.operation = operation;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
