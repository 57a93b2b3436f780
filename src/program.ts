/**
 * layout-scout command definition. The action defaults to a real browse run.
 */

import { Command, InvalidArgumentError } from 'commander';
import { LayoutBrowser } from './browser';
import { errorMessage } from './core/errors';
import { OutputFormat } from './core/types';
import {
  DEFAULT_LIMIT,
  DEFAULT_OFFSET,
  OUTPUT_FORMATS,
  isOutputFormat,
  parseCount,
  parseTags,
  resolveBaseUrl,
  resolveCachePath,
} from './config';
import { createConsoleLogger } from './logger';

export interface CliOptions {
  debug?: boolean;
  limit: number;
  offset: number;
  redupe?: boolean;
  format: OutputFormat;
  cache?: string;
  baseUrl?: string;
  skipErrors?: boolean;
}

// ─── Option Parsers ─────────────────────────────────────────────────────────

function countOption(value: string): number {
  try {
    return parseCount(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
}

function formatOption(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return value;
}

// ─── Browse Action ──────────────────────────────────────────────────────────

export type CliAction = (tags: string | undefined, opts: CliOptions) => Promise<void>;

/**
 * Default action: browse, print, and exit 1 on failure.
 */
export async function runBrowse(tags: string | undefined, opts: CliOptions): Promise<void> {
  const logger = createConsoleLogger({ debug: opts.debug });

  try {
    const browser = new LayoutBrowser({
      cache: resolveCachePath(opts.cache),
      baseUrl: resolveBaseUrl(opts.baseUrl),
      skipErrors: opts.skipErrors,
      logger,
    });

    const result = await browser.browse({
      tags: parseTags(tags),
      limit: opts.limit,
      offset: opts.offset,
      redupe: opts.redupe,
    });

    console.log(browser.format(result.layouts, opts.format));

    logger.debug(
      `${result.layouts.length} shown of ${result.total} listed ` +
        `(${result.hits} cached, ${result.misses} fetched)`
    );
    if (result.skipped.length > 0) {
      logger.warn(`Skipped ${result.skipped.length} layouts: ${result.skipped.join(', ')}`);
    }
  } catch (error) {
    logger.error(errorMessage(error));
    process.exit(1);
  }
}

// ─── Program ────────────────────────────────────────────────────────────────

export function createProgram(action: CliAction = runBrowse): Command {
  const program = new Command();

  program
    .name('layout-scout')
    .description('Browse shared keyboard layouts, newest first, one row per layout.')
    .version('1.0.0')
    .argument('[tags]', 'Comma separated list of tags to search for')
    .allowExcessArguments(false)
    .option('--debug', 'Print diagnostic output to stderr')
    .option('-l, --limit <n>', 'How many layouts to show', countOption, DEFAULT_LIMIT)
    .option('-o, --offset <n>', 'How many layouts to skip', countOption, DEFAULT_OFFSET)
    .option('--redupe', 'Show layouts with the same title by the same creator')
    .option('-f, --format <format>', 'Output format: table, json, markdown', formatOption, 'table')
    .option('-c, --cache <file>', 'Layout cache file (default: per-user cache directory)')
    .option('--base-url <url>', 'Layout service base URL')
    .option('--skip-errors', 'Skip layouts that fail to load instead of aborting')
    .action(async (tags: string | undefined, opts: CliOptions) => {
      await action(tags, opts);
    });

  return program;
}
