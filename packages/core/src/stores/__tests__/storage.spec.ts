import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InMemoryStorageProvider } from '../in-memory.js';
import { FileStorageProvider } from '../file.js';
import { ValidationError } from '../../errors/index.js';

describe('InMemoryStorageProvider', () => {
  it('reads what was written and null otherwise', async () => {
    const storage = new InMemoryStorageProvider();
    expect(await storage.read('a')).toBeNull();

    await storage.write('a', 'one');
    await storage.write('a', 'two');

    expect(await storage.read('a')).toBe('two');
  });

  it('removes and clears values', async () => {
    const storage = new InMemoryStorageProvider();
    await storage.write('a', '1');
    await storage.write('b', '2');

    await storage.remove('a');
    expect(await storage.read('a')).toBeNull();

    storage.clear();
    expect(await storage.read('b')).toBeNull();
  });
});

describe('FileStorageProvider', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'httpframe-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes one file per key', async () => {
    const storage = new FileStorageProvider(join(dir, 'nested'));

    await storage.write('default.cookies', '{"cookies":[]}');

    expect(await storage.read('default.cookies')).toBe('{"cookies":[]}');
    expect(await readFile(join(dir, 'nested', 'default.cookies'), 'utf8')).toBe('{"cookies":[]}');
  });

  it('returns null for missing keys and tolerates removing them', async () => {
    const storage = new FileStorageProvider(dir);

    expect(await storage.read('missing')).toBeNull();
    await expect(storage.remove('missing')).resolves.toBeUndefined();
  });

  it('removes stored values', async () => {
    const storage = new FileStorageProvider(dir);
    await storage.write('token', 'test-secret');

    await storage.remove('token');

    expect(await storage.read('token')).toBeNull();
  });

  it('rejects keys that would leave the directory', async () => {
    const storage = new FileStorageProvider(dir);

    await expect(storage.write('../escape', 'x')).rejects.toBeInstanceOf(ValidationError);
    await expect(storage.read('..')).rejects.toThrow("Invalid storage key '..'");
  });
});
