/**
 * io.ts
 *
 * Filesystem and terminal I/O for the CLI
 * - read a CRN file (one or more per line, # comments)
 * - ask the operator a question on stdin
 */

import fs from 'node:fs/promises';
import { createInterface } from 'node:readline/promises';
import { parseCrnInput } from './crns';

// Read a CRN file into a flat list. Comments and blank lines are ignored.
export async function loadCrnFile(crnPath: string): Promise<string[]> {
  const raw = await fs.readFile(crnPath, 'utf8');
  const crns = raw
    .split(/\r?\n/)
    .map((line) => line.replace(/#.*$/, ''))
    .flatMap(parseCrnInput);

  if (crns.length === 0) {
    throw new Error(`${crnPath} is empty (no CRNs to register).`);
  }
  return crns;
}

export async function ask(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}
