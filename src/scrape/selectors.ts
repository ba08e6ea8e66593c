/**
 * selectors.ts
 *
 * Everything that ties the scraper to the Yahoo! draft analysis page layout.
 * If the site changes, this is the file to update.
 */

import type { ValuationField } from './types';

// The table is paged server side, 50 players at a time
export const RESULTS_PER_PAGE = 50;

export function draftAnalysisUrl(count: number): string {
  const u = new URL('https://football.fantasysports.yahoo.com/f1/draftanalysis');
  u.searchParams.set('tab', 'AD');
  u.searchParams.set('pos', 'ALL');
  u.searchParams.set('sort', 'DA_PC');
  u.searchParams.set('count', String(count));
  return u.toString();
}

export const TABLE_SELECTOR = '#draftanalysistable';
export const ROW_SELECTOR = `${TABLE_SELECTOR} > tbody > tr`;

// Relative to a row. Position cell reads "<Team> - <Pos>".
export const FIELD_SELECTORS: Record<ValuationField, string> = {
  playerName: 'td:nth-of-type(1) > div > div:nth-of-type(1) > div > a',
  position: 'td:nth-of-type(1) > div > div:nth-of-type(1) > div > span',
  auctionValue: 'td:nth-of-type(2) > div',
};
