/**
 * Config.ts
 * Config for scraping, defaults plus command line overrides
 */

import path from 'node:path';
import { parseArgs } from 'node:util';
import { UsageError, messageOf } from './errors';
import type { Paths, ScrapeConfig } from './types';

export const USAGE = [
  'Usage: auction-values [options]',
  '',
  'Scrape Yahoo! Fantasy Football auction draft values into a CSV file.',
  '',
  '  -f, --out_filename <file>  Filename of the output csv (default: stats.csv)',
  '  -n, --num_players <n>      Number of players to scrape (default: 350)',
  '  -d, --debug                Enable debug prints',
  '      --strict               Abort on the first malformed row instead of skipping it',
  '  -h, --help                 Show this help',
].join('\n');

// returns the settings used when the script is run with no arguments
export function getDefaultConfig(): ScrapeConfig {
  return {
    outFilename: 'stats.csv',
    numPlayers: 350,
    pageTimeoutMs: 30_000,
    rowPolicy: 'skip',
    debug: false,
    headless: true,
  };
}

export type CliArgs = { help: true } | { help: false; cfg: ScrapeConfig };

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        out_filename: { type: 'string', short: 'f' },
        num_players: { type: 'string', short: 'n' },
        debug: { type: 'boolean', short: 'd' },
        strict: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw new UsageError(messageOf(err), { cause: err });
  }
}

export function parseCliArgs(argv: string[], defaults: ScrapeConfig = getDefaultConfig()): CliArgs {
  const values = readArgs(argv);
  if (values.help) return { help: true };

  const cfg: ScrapeConfig = { ...defaults };

  if (values.out_filename !== undefined) {
    if (!values.out_filename.trim()) throw new UsageError('--out_filename must not be empty');
    cfg.outFilename = values.out_filename;
  }

  if (values.num_players !== undefined) {
    // Digits only: no "1e3", "0x10" or padding
    const n = Number(values.num_players);
    if (!/^\d+$/.test(values.num_players) || n < 1) {
      throw new UsageError(`--num_players must be a positive integer, got "${values.num_players}"`);
    }
    cfg.numPlayers = n;
  }

  if (values.debug) cfg.debug = true;
  if (values.strict) cfg.rowPolicy = 'abort';

  return { help: false, cfg };
}

// Output path is relative to where the script was started
export function getPaths(cfg: ScrapeConfig): Paths {
  const outPath = path.resolve(process.cwd(), cfg.outFilename);
  return { outDir: path.dirname(outPath), outPath };
}
