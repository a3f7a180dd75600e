import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { appendJsonl, createJsonlStore } from '../../src/infrastructure/store/jsonl-store.js';
import { PersistenceError } from '../../src/infrastructure/store/errors.js';
import { fakeLogger, makeRecord } from '../helpers.js';

function readLines(path: string): string[] {
  const content = readFileSync(path, 'utf-8');
  expect(content.endsWith('\n')).toBe(true);
  return content.slice(0, -1).split('\n');
}

describe('appendJsonl', () => {
  let dir: string;
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'login-logger-store-'));
    log = fakeLogger();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates missing parent directories and writes one terminated line', async () => {
    const path = join(dir, 'nested', 'deeper', 'logs.jsonl');
    const record = makeRecord();

    await appendJsonl(path, record, { log });

    expect(readFileSync(path, 'utf-8')).toBe(`${JSON.stringify(record)}\n`);
  });

  it('appends after existing content', async () => {
    const path = join(dir, 'logs.jsonl');
    writeFileSync(path, '{"username":"earlier"}\n', 'utf-8');

    await appendJsonl(path, makeRecord({ username: 'later' }), { log });

    const lines = readLines(path);
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? '')).toEqual({ username: 'earlier' });
    expect(JSON.parse(lines[1] ?? '')).toEqual(expect.objectContaining({ username: 'later' }));
  });

  it('keeps values with embedded newlines on a single line', async () => {
    const path = join(dir, 'logs.jsonl');

    await appendJsonl(path, makeRecord({ username: 'multi\nline\r\nname' }), { log });

    const lines = readLines(path);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toEqual(
      expect.objectContaining({ username: 'multi\nline\r\nname' }),
    );
  });

  it('releases the lock after writing', async () => {
    const path = join(dir, 'logs.jsonl');

    await appendJsonl(path, makeRecord(), { log });

    expect(existsSync(`${path}.lock`)).toBe(false);
  });

  it('never interleaves concurrent appends', async () => {
    const path = join(dir, 'logs.jsonl');
    const count = 25;
    const padding = 'x'.repeat(4096);

    await Promise.all(
      Array.from({ length: count }, (_, i) =>
        appendJsonl(path, makeRecord({ username: `user-${i}`, padding }), { log }),
      ),
    );

    const lines = readLines(path);
    expect(lines).toHaveLength(count);

    const parsed: Array<{ username?: unknown; padding?: unknown }> = lines.map((line) =>
      JSON.parse(line),
    );
    expect(parsed.every((record) => record.padding === padding)).toBe(true);
    const usernames = parsed.map((record) => record.username);
    expect(new Set(usernames)).toEqual(
      new Set(Array.from({ length: count }, (_, i) => `user-${i}`)),
    );
    expect(existsSync(`${path}.lock`)).toBe(false);
  }, 20_000);

  it('throws PersistenceError with the cause when the directory cannot be created', async () => {
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'not a directory', 'utf-8');
    const path = join(blocker, 'logs.jsonl');

    const error = await appendJsonl(path, makeRecord(), { log }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PersistenceError);
    if (error instanceof PersistenceError) {
      expect(error.name).toBe('PersistenceError');
      expect(error.code).toBe('PERSISTENCE_FAILED');
      expect(error.message).toBe(`Failed to append record to ${path}`);
      expect(error.cause).toBeInstanceOf(Error);
    }
  });

  it('throws PersistenceError when the target is a directory', async () => {
    const path = join(dir, 'logs.jsonl');
    await appendJsonl(join(path, 'inner.jsonl'), makeRecord(), { log });

    await expect(appendJsonl(path, makeRecord(), { log })).rejects.toBeInstanceOf(
      PersistenceError,
    );
  });
});

describe('createJsonlStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'login-logger-store-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('appends records to the configured path', async () => {
    const path = join(dir, 'logs.jsonl');
    const store = createJsonlStore(path, fakeLogger());

    await store.append(makeRecord({ username: 'one' }));
    await store.append(makeRecord({ username: 'two' }));

    const usernames = readLines(path).map((line) => JSON.parse(line).username);
    expect(usernames).toEqual(['one', 'two']);
  });
});
