#!/usr/bin/env node
/**
 * cli.ts
 *
 * Entry point: parse arguments, scrape inside a browser session, report.
 * Exit codes: 0 success, 1 fatal scrape error, 2 bad arguments.
 */

import { USAGE, parseCliArgs } from './scrape/config';
import { launchPlaywrightDriver, withDriver } from './scrape/driver';
import { UsageError, messageOf } from './scrape/errors';
import { runScrape } from './scrape/run';
import type { LaunchDriver, Logger } from './scrape/types';

export async function main(
  argv: string[],
  launch: LaunchDriver<unknown> = launchPlaywrightDriver,
  log: Logger = console,
): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      log.log(USAGE);
      return 0;
    }

    const summary = await withDriver(launch, args.cfg, (driver) => runScrape(driver, args.cfg, log), log);
    log.log(`Done. written=${summary.written}, skipped=${summary.skipped}, file=${summary.outPath}`);
    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      log.error(`Error: ${err.message}\n\n${USAGE}`);
      return 2;
    }
    log.error(`Error: ${messageOf(err)}`);
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    },
  );
}
