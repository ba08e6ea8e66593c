/**
 * errors.ts
 *
 * Centralizes error types and detection
 * - fatal conditions that end the run (driver, navigation, missing table)
 * - per-row parse failures
 * - recognizing Playwright's "browser not installed" launch failure
 */

import type { ValuationField } from './types';

export class ScrapeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DriverNotFoundError extends ScrapeError {}

export class NavigationError extends ScrapeError {
  constructor(readonly url: string, cause: unknown) {
    super(`Failed to load ${url}: ${messageOf(cause)}`, { cause });
  }
}

export class ElementNotFoundError extends ScrapeError {
  constructor(readonly selector: string, url: string) {
    super(`No element matching "${selector}" on ${url} (has the page layout changed?)`);
  }
}

export class FieldParseError extends ScrapeError {
  constructor(readonly rowIndex: number, readonly field: ValuationField, readonly raw: string | null) {
    super(
      raw === null
        ? `Row ${rowIndex}: missing ${field}`
        : `Row ${rowIndex}: cannot parse ${field} from "${raw}"`,
    );
  }
}

export class UsageError extends ScrapeError {}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// chromium.launch() throws this when `playwright install` was never run
export function isMissingExecutableError(err: unknown): boolean {
  return /Executable doesn't exist/i.test(messageOf(err));
}
