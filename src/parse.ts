import path from 'path';
import { CANONICAL_RE, RELEASE_TAGS, ReleaseTag, SEPARATORS_RE, YEAR_RE } from './catalog.js';

// Turns a release-style name into "Title (Year)". The cleanup is a fixed
// sequence of regex passes; there is no scoring and no lookup, so the result
// depends only on the input string and the optional fallback year.

export function findYear(s: string): string | undefined {
  const m = s.match(YEAR_RE);
  return m ? m[0] : undefined;
}

function normalizeSeparators(s: string) {
  return s.replace(SEPARATORS_RE, ' ');
}

function stripReleaseTags(s: string, tags: readonly ReleaseTag[]) {
  let out = s;
  for (const t of tags) out = out.replace(t.pattern, '');
  return out;
}

// Text before the year, without trailing separators or a bracket the year
// used to sit in, e.g. "Charlotte's Web (" -> "Charlotte's Web".
function titleBefore(s: string, yearIndex: number) {
  return s.slice(0, yearIndex).replace(/[\s([{-]+$/, '').trim();
}

function splitExtension(name: string, isFile: boolean): [stem: string, ext: string] {
  if (!isFile) return [name, ''];
  const ext = path.extname(name);
  return [ext ? name.slice(0, -ext.length) : name, ext];
}

export function isCanonical(stem: string) {
  return CANONICAL_RE.test(stem);
}

/**
 * Normalize a file or directory basename to the "Title (Year)" convention.
 *
 * The first four-digit run left after cleanup is taken as the year and
 * everything from it onward is dropped. A title that contains a four-digit
 * number ("Blade Runner 2049") is therefore cut there; this is accepted.
 * `fallbackYear` is used only when the name itself has no year. A name that
 * cleans down to nothing is returned as given.
 */
export function normalizeName(
  name: string,
  isFile = false,
  fallbackYear?: string,
  tags: readonly ReleaseTag[] = RELEASE_TAGS,
): string {
  const [rawStem, ext] = splitExtension(name, isFile);
  const stem = rawStem.replace(/&/g, 'and');

  if (isCanonical(stem)) return stem + ext;

  let out = stripReleaseTags(normalizeSeparators(stem), tags);

  const m = YEAR_RE.exec(out);
  const year = m ? m[0] : fallbackYear;
  if (year) {
    const title = m ? titleBefore(out, m.index) : out.trim();
    out = `${title} (${year})`;
  } else {
    out = out.replace(/\(\s*\)/g, '');
  }

  out = out.replace(/[-\s]+$/, '').replace(/\s+/g, ' ').trim();
  // nothing but tags ("1080p.mkv"): keep the name rather than produce ".mkv"
  if (!out) return name;
  return out + ext;
}
