import { describe, it, expect, vi } from 'vitest';
import type { CommandRunner } from '../command';
import { QueryError } from '../errors';
import { JournalLogSource, splitLines } from '../journal-source';

const BASE_ARGS = ['-u', 'hytale', '--no-pager', '-q', '--utc', '-o', 'short-iso-precise'];

describe('JournalLogSource', () => {
  it('queries everything since a checkpoint', async () => {
    const run = vi.fn<CommandRunner>(async () => ({ stdout: 'a\nb\n', exitCode: 0 }));
    const source = new JournalLogSource('hytale', run);

    expect(await source.query({ since: '2024-01-01T10:00:00+0000' }, 30_000)).toEqual(['a', 'b']);
    expect(run).toHaveBeenCalledWith(
      'journalctl',
      [...BASE_ARGS, '--since', '2024-01-01 10:00:00 UTC'],
      30_000
    );
  });

  it('queries the newest N lines', async () => {
    const run = vi.fn<CommandRunner>(async () => ({ stdout: '', exitCode: 0 }));
    const source = new JournalLogSource('hytale', run);

    expect(await source.query({ lines: 200 }, 10_000)).toEqual([]);
    expect(run).toHaveBeenCalledWith('journalctl', [...BASE_ARGS, '-n', '200'], 10_000);
  });

  it('fails with a QueryError on a non-zero exit', async () => {
    const run = vi.fn<CommandRunner>(async () => ({ stdout: '', exitCode: 1 }));
    const source = new JournalLogSource('hytale', run);

    const err = await source.query({ lines: 10 }, 10_000).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(QueryError);
    expect(err).toMatchObject({ kind: 'failure', exitCode: 1 });
  });

  it('passes timeouts through', async () => {
    const timeout = new QueryError('timeout', 'journalctl', 'journalctl timed out after 10ms');
    const run = vi.fn<CommandRunner>(async () => {
      throw timeout;
    });
    const source = new JournalLogSource('hytale', run);

    await expect(source.query({ lines: 10 }, 10)).rejects.toBe(timeout);
  });
});

describe('splitLines', () => {
  it('drops blank lines and carriage returns', () => {
    expect(splitLines('one\r\n\ntwo\n  \n')).toEqual(['one', 'two']);
  });
});
