/**
 * run.ts
 *
 * Runs the end-to-end scrape:
 * - walks the draft analysis table 50 players at a time (count=0, 50, ...)
 * - fails fast if the table itself is gone
 * - parses each row, skipping or aborting on malformed rows per cfg.rowPolicy
 * - writes everything to the CSV in one go at the end
 */

import type { BrowserDriver, Logger, RawValuationRow, ScrapeConfig, ScrapeSummary, ValuationRow } from './types';
import { getPaths } from './config';
import { writeValuationCsv } from './io';
import { ElementNotFoundError, FieldParseError } from './errors';
import { parseValuationRow } from './parse';
import { FIELD_SELECTORS, RESULTS_PER_PAGE, ROW_SELECTOR, TABLE_SELECTOR, draftAnalysisUrl } from './selectors';

async function readRow<E>(driver: BrowserDriver<E>, row: E): Promise<RawValuationRow> {
  return {
    playerName: await driver.text(row, FIELD_SELECTORS.playerName),
    position: await driver.text(row, FIELD_SELECTORS.position),
    auctionValue: await driver.text(row, FIELD_SELECTORS.auctionValue),
  };
}

export async function runScrape<E>(driver: BrowserDriver<E>, cfg: ScrapeConfig, log: Logger = console): Promise<ScrapeSummary> {
  const { outDir, outPath } = getPaths(cfg);

  const rows: ValuationRow[] = [];
  let skipped = 0;
  let rowIndex = 0;

  for (let count = 0; count < cfg.numPlayers; count += RESULTS_PER_PAGE) {
    log.log(`Getting stats for count ${count}`);

    const url = draftAnalysisUrl(count);
    await driver.navigate(url);

    if (!(await driver.waitFor(TABLE_SELECTOR))) {
      throw new ElementNotFoundError(TABLE_SELECTOR, url);
    }

    const elements = await driver.findAll(ROW_SELECTOR);
    // Last page may run past the number of players asked for
    const wanted = elements.slice(0, cfg.numPlayers - count);

    for (const element of wanted) {
      rowIndex++;
      const raw = await readRow(driver, element);
      if (cfg.debug) {
        log.log(`Row ${rowIndex}: ${raw.playerName} | ${raw.position} | ${raw.auctionValue}`);
      }

      try {
        rows.push(parseValuationRow(raw, rowIndex));
      } catch (err) {
        if (err instanceof FieldParseError && cfg.rowPolicy === 'skip') {
          skipped++;
          log.warn(`Skipping malformed row. ${err.message}`);
          continue;
        }
        throw err;
      }
    }

    // A short page is the end of the table
    if (elements.length < RESULTS_PER_PAGE) {
      log.warn(`Only scraped ${elements.length} rows @ count ${count}, expected to scrape ${RESULTS_PER_PAGE}`);
      break;
    }
  }

  if (rows.length < cfg.numPlayers) {
    log.warn(`Only scraped ${rows.length} rows, expected to scrape ${cfg.numPlayers}`);
  }

  log.log(`Writing to file ${outPath}`);
  await writeValuationCsv(outDir, outPath, rows);

  return { outPath, written: rows.length, skipped };
}
