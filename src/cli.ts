#!/usr/bin/env node
import { Command } from 'commander';
import { CliOptions, ConfigError, DEFAULT_LOG_PATH, RunConfig, resolveRunConfig } from './config.js';
import { RunLogger, normalizeError } from './logging.js';
import { formatSummary, walkDirectory } from './scan.js';
import { RunSummary } from './types.js';

export function runRenamer(cfg: RunConfig, logger: RunLogger): RunSummary {
  logger.info('Starting renaming process...');
  if (cfg.dryRun) logger.info('Running in dry-run mode. No changes will be made.');
  if (cfg.ignoredDirs.size) logger.info(`Ignoring directories: ${[...cfg.ignoredDirs].join(', ')}`);
  const summary = walkDirectory({ root: cfg.root, dryRun: cfg.dryRun, ignoredDirs: cfg.ignoredDirs, logger });
  logger.info(`Renaming process completed: ${formatSummary(summary)}`);
  return summary;
}

/** Error entries of the run, for the end-of-run report on stderr. */
export function failureReport(logger: RunLogger): string[] {
  return logger.getLogs('error').map(e => `  ${e.msg}`);
}

export function buildProgram(onConfig: (cfg: RunConfig) => void): Command {
  const program = new Command();
  program
    .name('title-year-renamer')
    .description('Rename media files and folders to "Title (Year)"')
    .version('0.1.0')
    .argument('<directory>', 'root directory to start renaming from')
    .option('--dry-run', 'log intended renames without changing anything', false)
    .option('--ignore-dirs [names...]', 'directory names to skip entirely')
    .option('--log <path>', 'log file (appended to)', DEFAULT_LOG_PATH)
    .option('--log-level <level>', 'debug, info, warn or error (default: $LOG_LEVEL or info)')
    .option('-q, --quiet', 'do not print the summary line', false)
    .action((directory: string, opts: CliOptions) => {
      try {
        onConfig(resolveRunConfig(directory, opts));
      } catch (e) {
        if (e instanceof ConfigError) program.error(`error: ${e.message}`);
        throw e;
      }
    });
  return program;
}

function main(argv: string[]): number {
  let exitCode = 0;
  const program = buildProgram((cfg) => {
    const logger = new RunLogger({ logPath: cfg.logPath, level: cfg.logLevel });
    try {
      const summary = runRenamer(cfg, logger);
      if (!cfg.quiet) console.log(`${formatSummary(summary)} (log: ${cfg.logPath})`);
      const failures = failureReport(logger);
      // the ring is capped, so the count comes from the summary
      if (failures.length) console.error(`${summary.counts.failed} entries failed; last errors:\n${failures.join('\n')}`);
    } catch (e) {
      logger.error(`Renaming process aborted: ${normalizeError(e).message}`);
      console.error(e);
      exitCode = 1;
    } finally {
      logger.close();
    }
  });
  // usage errors exit from inside commander with code 1
  program.parse(argv);
  return exitCode;
}

if (require.main === module) {
  process.exitCode = main(process.argv);
}
