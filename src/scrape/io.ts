/**
 * io.ts
 *
 * Contains all filesystem I/O for the scraper
 * - serialize valuation rows as CSV
 * - write the CSV file (truncating any previous run)
 */

import fs from 'node:fs/promises';
import type { ValuationRow } from './types';

export const CSV_HEADER = ['playerName', 'position', 'auctionValue'] as const;

// Quote only when the value would otherwise break the line
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(rows: readonly ValuationRow[]): string {
  const lines = [CSV_HEADER.join(',')];
  for (const row of rows) {
    lines.push(
      [row.playerName, row.position, String(row.auctionValue)].map(escapeCsvField).join(','),
    );
  }
  return lines.join('\n') + '\n';
}

// Only called once all pages are scraped, so a failed run never leaves a partial file
export async function writeValuationCsv(outDir: string, outPath: string, rows: readonly ValuationRow[]) {
  await fs.mkdir(outDir, { recursive: true });
  await fs.writeFile(outPath, toCsv(rows), 'utf8');
}
