export type EntityKind = 'file' | 'directory';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type SkipReason = 'hidden' | 'ignored-directory' | 'ignored-extension' | 'resource-fork';

export type RenameOutcome =
  | { kind: 'skipped'; path: string; reason: SkipReason }
  | { kind: 'unchanged'; path: string }
  | { kind: 'planned'; from: string; to: string }
  | { kind: 'renamed'; from: string; to: string }
  | { kind: 'failed'; from: string; to?: string; code: string; message: string };

export type OutcomeKind = RenameOutcome['kind'];

export interface RunSummary {
  counts: Record<OutcomeKind, number>;
  /** Outcomes in processing order */
  outcomes: RenameOutcome[];
}

export interface RenameOptions {
  dryRun: boolean;
  ignoredDirs: ReadonlySet<string>;
  /** Lower-case extensions with leading dot; defaults to IGNORED_EXTENSIONS */
  ignoredExtensions?: ReadonlySet<string>;
}
