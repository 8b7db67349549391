import fs from 'fs';
import path from 'path';
import { IGNORED_EXTENSIONS, RESOURCE_FORK_PREFIX } from './catalog.js';
import { RunLogger, normalizeError } from './logging.js';
import { findYear, normalizeName } from './parse.js';
import { EntityKind, RenameOptions, RenameOutcome } from './types.js';

export interface RenameRequest extends RenameOptions {
  parentDir: string;
  name: string;
  kind: EntityKind;
  logger: RunLogger;
}

/** Year of the first non-hidden child (in name order) that carries one. */
export function detectChildYear(dir: string): string | undefined {
  const children = fs.readdirSync(dir).filter(n => !n.startsWith('.')).sort();
  for (const child of children) {
    const y = findYear(child);
    if (y) return y;
  }
  return undefined;
}

// rename(2) replaces an existing file on POSIX. Refuse that unless the
// target is the source itself seen through a case-only rename on a
// case-insensitive fs. Two hard links share an inode too, and rename(2)
// between them is a silent no-op, so the names must differ by case alone.
function isCaseOnlyRename(from: string, to: string) {
  if (from.toLowerCase() !== to.toLowerCase()) return false;
  const sa = fs.statSync(from);
  const sb = fs.statSync(to);
  return sa.dev === sb.dev && sa.ino === sb.ino;
}

function renameNoClobber(from: string, to: string) {
  if (fs.existsSync(to) && !isCaseOnlyRename(from, to)) {
    throw Object.assign(new Error(`target already exists: ${to}`), { code: 'EEXIST' });
  }
  fs.renameSync(from, to);
}

function skip(logger: RunLogger, outcome: Extract<RenameOutcome, { kind: 'skipped' }>, msg: string): RenameOutcome {
  logger.info(msg);
  return outcome;
}

export function renameEntity(req: RenameRequest): RenameOutcome {
  const { parentDir, name, kind, dryRun, ignoredDirs, logger } = req;
  const ignoredExtensions = req.ignoredExtensions ?? IGNORED_EXTENSIONS;
  const originalPath = path.join(parentDir, name);

  if (name.startsWith('.')) {
    return skip(logger, { kind: 'skipped', path: originalPath, reason: 'hidden' }, `Skipping hidden file or directory: ${name}`);
  }
  if (ignoredDirs.has(path.basename(parentDir))) {
    return skip(logger, { kind: 'skipped', path: originalPath, reason: 'ignored-directory' }, `Skipping ignored directory: ${parentDir}`);
  }
  if (ignoredExtensions.has(path.extname(name).toLowerCase())) {
    return skip(logger, { kind: 'skipped', path: originalPath, reason: 'ignored-extension' }, `Skipping renaming of file with ignored extension: ${name}`);
  }
  // '._' names are already caught as hidden; kept as a reason of its own
  if (name.startsWith(RESOURCE_FORK_PREFIX)) {
    return skip(logger, { kind: 'skipped', path: originalPath, reason: 'resource-fork' }, `Skipping file '${name}' as it starts with '${RESOURCE_FORK_PREFIX}'`);
  }

  let fallbackYear: string | undefined;
  if (kind === 'directory') {
    try {
      fallbackYear = detectChildYear(originalPath);
    } catch (e) {
      const { code, message } = normalizeError(e);
      logger.error(`Error reading directory '${originalPath}': ${message}`);
      return { kind: 'failed', from: originalPath, code, message };
    }
    if (fallbackYear) logger.debug(`Year ${fallbackYear} found in contents of '${originalPath}'`);
  }

  const newName = normalizeName(name, kind === 'file', fallbackYear);
  const newPath = path.join(parentDir, newName);

  if (newPath === originalPath) {
    logger.info(`No renaming necessary for '${originalPath}'`);
    return { kind: 'unchanged', path: originalPath };
  }
  if (dryRun) {
    logger.info(`Dry run: Would rename '${originalPath}' to '${newPath}'`);
    return { kind: 'planned', from: originalPath, to: newPath };
  }
  try {
    renameNoClobber(originalPath, newPath);
    logger.info(`Renamed '${originalPath}' to '${newPath}'`);
    return { kind: 'renamed', from: originalPath, to: newPath };
  } catch (e) {
    const { code, message } = normalizeError(e);
    logger.error(`Error renaming '${originalPath}' to '${newPath}': ${message}`);
    return { kind: 'failed', from: originalPath, to: newPath, code, message };
  }
}
