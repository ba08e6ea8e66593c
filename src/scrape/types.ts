/**
 * types.ts
 *
 * Shared TypeScript types used across the scraper modules.
 *
 */

export type RowPolicy = 'skip' | 'abort';

export type ScrapeConfig = {
  outFilename: string;
  numPlayers: number;
  pageTimeoutMs: number;
  rowPolicy: RowPolicy;
  debug: boolean;
  headless: boolean;
};

export type Paths = {
  outDir: string;
  outPath: string;
};

export type ValuationRow = {
  readonly playerName: string;
  readonly position: string;
  readonly auctionValue: number;
};

// Field texts as read off the page; null means the sub-element was missing
export type RawValuationRow = {
  playerName: string | null;
  position: string | null;
  auctionValue: string | null;
};

export type ValuationField = keyof ValuationRow;

// Just enough browser to load a page and read text out of it.
export interface BrowserDriver<E> {
  navigate(url: string): Promise<void>;
  // false when nothing matches before the driver gives up waiting
  waitFor(selector: string): Promise<boolean>;
  findAll(selector: string): Promise<E[]>;
  text(element: E, subselector: string): Promise<string | null>;
}

export type DriverSession<E> = {
  driver: BrowserDriver<E>;
  close(): Promise<void>;
};

export type LaunchDriver<E> = (cfg: ScrapeConfig) => Promise<DriverSession<E>>;

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export type ScrapeSummary = {
  outPath: string;
  written: number;
  skipped: number;
};
