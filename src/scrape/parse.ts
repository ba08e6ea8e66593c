/**
 * parse.ts
 *
 * Turns the text scraped from one table row into a ValuationRow.
 */

import { FieldParseError } from './errors';
import type { RawValuationRow, ValuationRow } from './types';

// "$42", "42", "1,024" -> number; anything else (N/A, -, blank) -> null
export function parseAuctionValue(text: string): number | null {
  const cleaned = text.trim().replace(/^\$/, '').replace(/,/g, '');
  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) return null;
  return Number(cleaned);
}

// Position cell is "<Team> - <Pos>"; fall back to the whole text
export function parsePosition(text: string): string {
  const parts = text.split(' - ');
  return parts[parts.length - 1].trim();
}

export function parseValuationRow(raw: RawValuationRow, rowIndex: number): ValuationRow {
  const playerName = raw.playerName?.trim();
  if (!playerName) throw new FieldParseError(rowIndex, 'playerName', raw.playerName);

  const position = raw.position === null ? '' : parsePosition(raw.position);
  if (!position) throw new FieldParseError(rowIndex, 'position', raw.position);

  const auctionValue = raw.auctionValue === null ? null : parseAuctionValue(raw.auctionValue);
  if (auctionValue === null) throw new FieldParseError(rowIndex, 'auctionValue', raw.auctionValue);

  return { playerName, position, auctionValue };
}
