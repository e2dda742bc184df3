import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { readToken } from './token-source.js';

describe('readToken', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it('prefers --token', async () => {
    await expect(readToken({ token: ' a.b.c ', tokenFile: '/nonexistent' }, Readable.from([]))).resolves.toBe('a.b.c');
  });

  it('reads --token-file and trims the trailing newline', async () => {
    dir = mkdtempSync(join(tmpdir(), 'token-source-'));
    const path = join(dir, 'token');
    writeFileSync(path, 'h.p.s\n');

    await expect(readToken({ tokenFile: path }, Readable.from([]))).resolves.toBe('h.p.s');
  });

  it('falls back to stdin', async () => {
    const stdin = Readable.from([Buffer.from('h.p'), Buffer.from('.s\n')]);

    await expect(readToken({}, stdin)).resolves.toBe('h.p.s');
  });

  it('fails when no token is given', async () => {
    await expect(readToken({}, Readable.from([]))).rejects.toThrow(/No token provided/);
  });
});
