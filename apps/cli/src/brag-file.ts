import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import type { BragDocument } from '@brag/core';
import { parseDocument, serializeDocument } from '@brag/core';

export interface LoadOptions {
  /** Treat a missing file as an empty document (first write) */
  allowMissing?: boolean;
}

export function loadDocument(path: string, options: LoadOptions = {}): BragDocument {
  if (!existsSync(path)) {
    if (options.allowMissing) return { users: [] };
    throw new Error(`Brag file not found: ${path}`);
  }
  return parseDocument(readFileSync(path, 'utf8'));
}

export function saveDocument(path: string, doc: BragDocument): void {
  writeFileSync(path, serializeDocument(doc) + '\n', 'utf8');
}

/** Read all of stdin (or another stream) as UTF-8 text */
export async function readStream(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf8');
}
