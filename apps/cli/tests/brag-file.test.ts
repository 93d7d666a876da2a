import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Readable } from 'node:stream';
import { loadDocument, saveDocument, readStream } from '../src/brag-file.js';
import { BRAG_TEXT } from './fixtures.js';

describe('brag file', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'brag-file-test-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('loads and parses a document', () => {
    const path = join(tmpDir, 'brag.md');
    writeFileSync(path, BRAG_TEXT);
    expect(loadDocument(path).users.map(u => u.name)).toEqual(['Ada Lovelace', 'Grace']);
  });

  it('fails on a missing file unless allowed', () => {
    const path = join(tmpDir, 'missing.md');
    expect(() => loadDocument(path)).toThrow(`Brag file not found: ${path}`);
    expect(loadDocument(path, { allowMissing: true })).toEqual({ users: [] });
  });

  it('writes the canonical text with a trailing newline', () => {
    const path = join(tmpDir, 'brag.md');
    writeFileSync(path, BRAG_TEXT);
    saveDocument(path, loadDocument(path));
    expect(readFileSync(path, 'utf8')).toBe(BRAG_TEXT);
  });
});

describe('readStream', () => {
  it('joins all chunks', async () => {
    const stream = Readable.from([Buffer.from('# Ada\n'), '## 2026-03-02\n']);
    await expect(readStream(stream)).resolves.toBe('# Ada\n## 2026-03-02\n');
  });
});
