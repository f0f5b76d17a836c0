import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FilePersistence, MemoryPersistence } from './persistence.js';

describe('FilePersistence', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tapedeck-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads null before anything is saved', async () => {
    const persistence = new FilePersistence(path.join(dir, 'library.json'));

    expect(await persistence.load()).toBeNull();
  });

  it('creates missing directories and round-trips the blob', async () => {
    const file = path.join(dir, 'nested', 'deeper', 'library.json');
    const persistence = new FilePersistence(file);

    await persistence.save('{"format":1}');

    expect(await persistence.load()).toBe('{"format":1}');
    expect(await new FilePersistence(file).load()).toBe('{"format":1}');
  });

  it('applies concurrent saves in call order and leaves no temp file', async () => {
    const file = path.join(dir, 'library.json');
    const persistence = new FilePersistence(file);

    await Promise.all([persistence.save('first'), persistence.save('second'), persistence.save('third')]);

    expect(await persistence.load()).toBe('third');
    expect(await fs.readdir(dir)).toEqual(['library.json']);
  });

  it('writes the file readable by the owner only', async () => {
    const file = path.join(dir, 'library.json');

    await new FilePersistence(file).save('blob');

    const stat = await fs.stat(file);
    expect(stat.mode & 0o777).toBe(0o600);
  });
});

describe('MemoryPersistence', () => {
  it('hands back the last saved blob', async () => {
    const persistence = new MemoryPersistence();

    await persistence.save('a');
    await persistence.save('b');

    expect(await persistence.load()).toBe('b');
    expect(persistence.saves).toBe(2);
  });
});
