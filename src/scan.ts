import fs from 'fs';
import path from 'path';
import { RunLogger, normalizeError } from './logging.js';
import { renameEntity } from './renamer.js';
import { OutcomeKind, RenameOptions, RenameOutcome, RunSummary } from './types.js';

export interface WalkOptions extends RenameOptions {
  root: string;
  logger: RunLogger;
}

interface Level {
  files: string[];
  dirs: string[];
  /** Subset of dirs that are real directories (symlinks are not descended) */
  descend: string[];
}

function isDirEntry(dir: string, entry: fs.Dirent) {
  if (entry.isDirectory()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return fs.statSync(path.join(dir, entry.name)).isDirectory();
  } catch {
    // dangling link
    return false;
  }
}

function readLevel(dir: string, ignoredDirs: ReadonlySet<string>): Level {
  const entries = fs.readdirSync(dir, { withFileTypes: true })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const level: Level = { files: [], dirs: [], descend: [] };
  for (const e of entries) {
    if (e.name.startsWith('.')) continue;
    if (isDirEntry(dir, e)) {
      if (ignoredDirs.has(e.name)) continue;
      level.dirs.push(e.name);
      if (!e.isSymbolicLink()) level.descend.push(path.join(dir, e.name));
    } else {
      level.files.push(e.name);
    }
  }
  return level;
}

/** Push `dirs` so that popping yields them in their original order. */
export function pushChildren(stack: string[], dirs: readonly string[]) {
  for (let i = dirs.length - 1; i >= 0; i--) stack.push(dirs[i]);
}

export function emptySummary(): RunSummary {
  return { counts: { skipped: 0, unchanged: 0, planned: 0, renamed: 0, failed: 0 }, outcomes: [] };
}

function record(summary: RunSummary, outcome: RenameOutcome) {
  summary.counts[outcome.kind]++;
  summary.outcomes.push(outcome);
}

/**
 * Walk `root` top-down and rename every non-hidden entry.
 *
 * Per level: hidden and ignored subdirectories are pruned, hidden files are
 * dropped, then all files are renamed, then all directories. The paths to
 * descend into are taken from the listing before that level's directories
 * are renamed and are not re-resolved, so in a live run the contents of a
 * renamed directory are not visited (the old path is gone). Running again
 * picks them up.
 */
export function walkDirectory(opts: WalkOptions): RunSummary {
  const { root, logger } = opts;
  const summary = emptySummary();
  const pending: string[] = [root];

  while (pending.length) {
    const dir = pending.pop();
    if (dir === undefined) break;

    let level: Level;
    try {
      level = readLevel(dir, opts.ignoredDirs);
    } catch (e) {
      const { code, message } = normalizeError(e);
      if (code === 'ENOENT' && dir !== root) {
        logger.info(`Not descending into '${dir}': path no longer exists`);
      } else {
        logger.error(`Error listing '${dir}': ${message}`);
        record(summary, { kind: 'failed', from: dir, code, message });
      }
      continue;
    }
    logger.debug(`Visiting '${dir}' (${level.files.length} files, ${level.dirs.length} directories)`);

    for (const name of level.files) {
      record(summary, renameEntity({ ...opts, parentDir: dir, name, kind: 'file' }));
    }
    for (const name of level.dirs) {
      record(summary, renameEntity({ ...opts, parentDir: dir, name, kind: 'directory' }));
    }
    // depth-first, top-down: children of this level come next, in name order
    pushChildren(pending, level.descend);
  }
  return summary;
}

export function formatSummary(summary: RunSummary) {
  const c = summary.counts;
  return `renamed ${c.renamed}, planned ${c.planned}, unchanged ${c.unchanged}, skipped ${c.skipped}, failed ${c.failed}`;
}
