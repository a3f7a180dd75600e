import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { open } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import lockfile from 'proper-lockfile';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, open: vi.fn(actual.open) };
});

import { appendJsonl } from '../../src/infrastructure/store/jsonl-store.js';
import { PersistenceError } from '../../src/infrastructure/store/errors.js';
import { fakeLogger, makeRecord } from '../helpers.js';

const { open: realOpen } = await vi.importActual<typeof import('node:fs/promises')>(
  'node:fs/promises',
);
const mockOpen = vi.mocked(open);

const EXISTING = '{"a":1}\n';

/** Next open() yields a real handle whose append writes 10 bytes, then fails. */
function failAppendAfterPartialWrite(writeError: Error, truncateError?: Error): void {
  mockOpen.mockImplementationOnce(async (path, flags, mode) => {
    const handle = await realOpen(path, flags, mode);
    vi.spyOn(handle, 'appendFile').mockImplementation(async (data) => {
      await handle.write(String(data).slice(0, 10));
      throw writeError;
    });
    if (truncateError) {
      vi.spyOn(handle, 'truncate').mockRejectedValue(truncateError);
    }
    return handle;
  });
}

describe('appendJsonl failures', () => {
  let dir: string;
  let path: string;
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'login-logger-store-'));
    path = join(dir, 'logs.jsonl');
    writeFileSync(path, EXISTING, 'utf-8');
    log = fakeLogger();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('removes a partially written line and throws PersistenceError', async () => {
    const writeError = new Error('ENOSPC: no space left on device');
    failAppendAfterPartialWrite(writeError);

    const error = await appendJsonl(path, makeRecord(), { log }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PersistenceError);
    if (error instanceof PersistenceError) {
      expect(error.message).toBe(`Failed to append record to ${path}`);
      expect(error.cause).toBe(writeError);
    }
    expect(readFileSync(path, 'utf-8')).toBe(EXISTING);
  });

  it('reports both errors when the partial line cannot be removed', async () => {
    const writeError = new Error('ENOSPC: no space left on device');
    const truncateError = new Error('EIO: i/o error');
    failAppendAfterPartialWrite(writeError, truncateError);

    const error = await appendJsonl(path, makeRecord(), { log }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PersistenceError);
    if (error instanceof PersistenceError) {
      expect(error.message).toBe('Write failed and the partial line could not be removed');
      expect(error.cause).toBeInstanceOf(AggregateError);
      if (error.cause instanceof AggregateError) {
        expect(error.cause.errors).toEqual([writeError, truncateError]);
      }
    }
  });

  it('keeps a stored record when releasing the lock fails', async () => {
    const releaseError = new Error('ENOENT: lock already removed');
    vi.spyOn(lockfile, 'lock').mockResolvedValueOnce(() => Promise.reject(releaseError));
    const record = makeRecord();

    await expect(appendJsonl(path, record, { log })).resolves.toBeUndefined();

    expect(readFileSync(path, 'utf-8')).toBe(`${EXISTING}${JSON.stringify(record)}\n`);
    expect(log.warn).toHaveBeenCalledWith(
      { err: releaseError, path },
      'Failed to release store lock',
    );
  });
});
