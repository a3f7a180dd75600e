import { mkdir, open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import lockfile from 'proper-lockfile';
import type { LockOptions } from 'proper-lockfile';
import type { BaseLogger } from 'pino';
import type { StoredRecord } from '../../domain/index.js';
import type { LoginStore } from '../../application/index.js';
import { PersistenceError } from './errors.js';

export interface AppendOptions {
  log: BaseLogger;
  /** Backoff while another writer holds the lock. */
  retries?: LockOptions['retries'];
  /** Age after which a lock left by a dead writer is taken over. */
  stale_ms?: number;
}

const DEFAULT_RETRIES: LockOptions['retries'] = {
  retries: 100,
  factor: 1.2,
  minTimeout: 5,
  maxTimeout: 100,
  randomize: true,
};

/**
 * Appends one record as a single JSONL line.
 *
 * - Parent directory is created on demand.
 * - An exclusive lock (`<path>.lock`, via proper-lockfile) is held for
 *   the write, so concurrent writers in this or other processes never
 *   interleave lines. It is released on every path.
 * - The file is opened in append mode: the line lands at end-of-file
 *   even if the file grew since it was opened.
 * - The line is fsynced before the lock is released. A failed release is
 *   logged, not thrown.
 * - If the write fails, the file is truncated back to its prior size so
 *   no partial line remains. The record is not retried.
 *
 * Throws `PersistenceError` on any failure.
 */
export async function appendJsonl(
  path: string,
  record: StoredRecord,
  options: AppendOptions,
): Promise<void> {
  // JSON.stringify escapes control characters, so the line has no raw newline
  const line = `${JSON.stringify(record)}\n`;

  try {
    await mkdir(dirname(path), { recursive: true });

    const handle = await open(path, 'a', 0o644);
    try {
      const release = await lockfile.lock(path, {
        retries: options.retries ?? DEFAULT_RETRIES,
        stale: options.stale_ms ?? 10_000,
        onCompromised: (err) => {
          options.log.warn({ err, path }, 'Store lock compromised');
        },
      });

      try {
        const { size } = await handle.stat();
        try {
          await handle.appendFile(line, 'utf8');
          await handle.sync();
        } catch (err: unknown) {
          await rollback(handle, size, err);
          throw err;
        }
      } finally {
        // Unlock failures are logged only; the fsynced line stays stored.
        await release().catch((err: unknown) => {
          options.log.warn({ err, path }, 'Failed to release store lock');
        });
      }
    } finally {
      await handle.close();
    }
  } catch (err: unknown) {
    if (err instanceof PersistenceError) throw err;
    throw new PersistenceError(`Failed to append record to ${path}`, { cause: err });
  }
}

async function rollback(
  handle: FileHandle,
  size: number,
  writeError: unknown,
): Promise<void> {
  try {
    await handle.truncate(size);
  } catch (truncateError: unknown) {
    throw new PersistenceError('Write failed and the partial line could not be removed', {
      cause: new AggregateError([writeError, truncateError]),
    });
  }
}

/** `LoginStore` backed by a JSONL file at `path`. */
export function createJsonlStore(path: string, log: BaseLogger): LoginStore {
  return {
    append: (record) => appendJsonl(path, record, { log }),
  };
}
