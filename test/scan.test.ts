import fs from 'fs';
import path from 'path';
import { formatSummary, pushChildren, walkDirectory } from '../src/scan.js';
import { RenameOutcome } from '../src/types.js';
import { cleanupTempDir, makeTempDir, makeTree, memoryLogger } from './helpers.js';

const LIBRARY = [
  'Movie.Title.2019.1080p.BluRay.x264-GROUP.mkv',
  '.hidden.mkv',
  'notes.nfo',
  'Some.Film/some.film.2004.mkv',
  'extras/Bonus.2010.mkv',
  '.git/Thing.1999.mkv',
];

describe('walkDirectory', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('walk-test-');
    makeTree(root, LIBRARY);
  });

  afterEach(() => {
    cleanupTempDir(root);
  });

  const walk = (dryRun: boolean) => {
    const { logger } = memoryLogger();
    const summary = walkDirectory({ root, dryRun, ignoredDirs: new Set(['extras']), logger });
    return { summary, logger };
  };

  it('processes files before folders and prunes hidden and ignored folders', () => {
    const { summary } = walk(true);
    const film = path.join(root, 'Some.Film');

    expect(summary.outcomes).toEqual<RenameOutcome[]>([
      { kind: 'planned', from: path.join(root, 'Movie.Title.2019.1080p.BluRay.x264-GROUP.mkv'), to: path.join(root, 'Movie Title (2019).mkv') },
      { kind: 'skipped', path: path.join(root, 'notes.nfo'), reason: 'ignored-extension' },
      { kind: 'planned', from: film, to: path.join(root, 'Some Film (2004)') },
      { kind: 'planned', from: path.join(film, 'some.film.2004.mkv'), to: path.join(film, 'some film (2004).mkv') },
    ]);
    expect(summary.counts).toEqual({ skipped: 1, unchanged: 0, planned: 3, renamed: 0, failed: 0 });
  });

  it('leaves every path untouched in dry-run mode', () => {
    walk(true);

    for (const rel of LIBRARY) {
      expect(fs.existsSync(path.join(root, rel))).toBe(true);
    }
  });

  it('does not descend into a folder renamed at the level above', () => {
    const { summary, logger } = walk(false);
    const renamedFilm = path.join(root, 'Some Film (2004)');

    expect(summary.counts).toEqual({ skipped: 1, unchanged: 0, planned: 0, renamed: 2, failed: 0 });
    expect(fs.existsSync(path.join(root, 'Movie Title (2019).mkv'))).toBe(true);
    expect(fs.existsSync(path.join(renamedFilm, 'some.film.2004.mkv'))).toBe(true);
    expect(logger.getLogs().map(e => e.msg)).toContain(
      `Not descending into '${path.join(root, 'Some.Film')}': path no longer exists`,
    );

    // a second pass reaches the contents under the new folder name
    const second = walk(false);
    expect(second.summary.counts).toEqual({ skipped: 1, unchanged: 2, planned: 0, renamed: 1, failed: 0 });
    expect(fs.existsSync(path.join(renamedFilm, 'some film (2004).mkv'))).toBe(true);
  });

  it('never touches ignored or hidden folders', () => {
    walk(false);

    expect(fs.existsSync(path.join(root, 'extras', 'Bonus.2010.mkv'))).toBe(true);
    expect(fs.existsSync(path.join(root, '.git', 'Thing.1999.mkv'))).toBe(true);
    expect(fs.existsSync(path.join(root, '.hidden.mkv'))).toBe(true);
  });
});

describe('traversal order', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('walk-order-');
    makeTree(root, ['a/a1.2001.mkv', 'a/x/x1.2002.mkv', 'b/b1.2003.mkv']);
  });

  afterEach(() => {
    cleanupTempDir(root);
  });

  it('finishes a subtree before moving to the next sibling', () => {
    const { outcomes } = walkDirectory({ root, dryRun: true, ignoredDirs: new Set(), logger: memoryLogger().logger });

    expect(outcomes.map(o => (o.kind === 'planned' ? path.basename(o.from) : o.kind))).toEqual([
      'a', 'b', 'a1.2001.mkv', 'x', 'x1.2002.mkv', 'b1.2003.mkv',
    ]);
  });

  it('queues very wide levels without spreading them into one call', () => {
    const dirs = Array.from({ length: 300_000 }, (_, i) => `d${i}`);
    const stack: string[] = [];

    pushChildren(stack, dirs);

    expect(stack).toHaveLength(300_000);
    expect(stack[0]).toBe('d299999');
    expect(stack.pop()).toBe('d0');
    expect(stack.pop()).toBe('d1');
  });
});

describe('dry run against live run', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('walk-compare-');
    makeTree(root, ['A.File.2001.mkv', 'Keep (2000)/B.File.2002.mkv', 'Keep (2000)/info.nfo']);
  });

  afterEach(() => {
    cleanupTempDir(root);
  });

  it('plans exactly the renames a live run performs', () => {
    const pairs = (outcomes: RenameOutcome[], kind: 'planned' | 'renamed') =>
      outcomes.flatMap(o => ((o.kind === 'planned' || o.kind === 'renamed') && o.kind === kind ? [[o.from, o.to]] : []));

    const dry = walkDirectory({ root, dryRun: true, ignoredDirs: new Set(), logger: memoryLogger().logger });
    const live = walkDirectory({ root, dryRun: false, ignoredDirs: new Set(), logger: memoryLogger().logger });

    expect(pairs(dry.outcomes, 'planned')).toEqual([
      [path.join(root, 'A.File.2001.mkv'), path.join(root, 'A File (2001).mkv')],
      [path.join(root, 'Keep (2000)', 'B.File.2002.mkv'), path.join(root, 'Keep (2000)', 'B File (2002).mkv')],
    ]);
    expect(pairs(live.outcomes, 'renamed')).toEqual(pairs(dry.outcomes, 'planned'));
  });
});

describe('formatSummary', () => {
  it('lists every outcome count', () => {
    expect(formatSummary({
      counts: { skipped: 2, unchanged: 5, planned: 0, renamed: 3, failed: 1 },
      outcomes: [],
    })).toBe('renamed 3, planned 0, unchanged 5, skipped 2, failed 1');
  });
});
