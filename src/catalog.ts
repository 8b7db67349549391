// Static patterns shared by the normalizer and the renamer. Everything here is
// applied after separators (. _ -) have been turned into spaces, so markers
// that appear dot-delimited in release names are matched as whole tokens.

export type ReleaseTagKind =
  | 'resolution'
  | 'source'
  | 'codec'
  | 'audio'
  | 'channels'
  | 'group'
  | 'hdr'
  | 'episode'
  | 'separator';

export interface ReleaseTag {
  kind: ReleaseTagKind;
  pattern: RegExp;
}

export const RELEASE_TAGS: readonly ReleaseTag[] = Object.freeze([
  { kind: 'resolution', pattern: /\[?\b(?:480p|1080p|2160p)\b\]?/gi },
  { kind: 'resolution', pattern: /\[4K\]/gi },
  { kind: 'source', pattern: /\[?\b(?:WEBRip|BluRay)\b\]?/gi },
  { kind: 'source', pattern: /\[WEB\]/gi },
  { kind: 'codec', pattern: /x26[45]|h26[45]|hevc/gi },
  { kind: 'audio', pattern: /\b(?:E?AC3|AAC|MP3|AVC)\b/gi },
  { kind: 'channels', pattern: /\[5[ .]1\]/gi },
  { kind: 'group', pattern: /\[YTS[ .]MX\]/gi },
  { kind: 'hdr', pattern: /\bHDR\b/gi },
  { kind: 'episode', pattern: /\bS\d+E\d+\b/gi },
  { kind: 'separator', pattern: /-/g },
] satisfies ReleaseTag[]);

export const IGNORED_EXTENSIONS: ReadonlySet<string> = new Set([
  '.vob', '.info', '.nfo', '.ifo', '.bup', '.log', '.py',
]);

// "Title (2001)". \p{L}\p{N}_ is the Unicode reading of \w.
export const CANONICAL_RE = /^[\p{L}\p{N}_\s]+ \(\d{4}\)$/u;

// First run of exactly four digits.
export const YEAR_RE = /(?<!\d)\d{4}(?!\d)/;

export const SEPARATORS_RE = /[._-]+/g;

export const RESOURCE_FORK_PREFIX = '._';
