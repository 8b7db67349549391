import fs from 'fs';
import os from 'os';
import path from 'path';
import { RunLogger } from '../src/logging.js';

export const makeTempDir = (prefix = 'title-year-') => fs.mkdtempSync(path.join(os.tmpdir(), prefix));

export const cleanupTempDir = (dir: string) => fs.rmSync(dir, { recursive: true, force: true });

/** Create files (and their parent folders) below `root`. Paths ending in "/" are folders. */
export function makeTree(root: string, entries: string[]) {
  for (const rel of entries) {
    const full = path.join(root, rel);
    if (rel.endsWith('/')) {
      fs.mkdirSync(full, { recursive: true });
    } else {
      fs.mkdirSync(path.dirname(full), { recursive: true });
      fs.writeFileSync(full, rel);
    }
  }
}

/** Logger whose pino output is collected in memory. */
export function memoryLogger(level: 'debug' | 'info' = 'info') {
  const lines: string[] = [];
  const logger = new RunLogger({ level, stream: { write: (s: string) => { lines.push(s); } } });
  return { logger, lines };
}
