import { test, expect } from '@playwright/test';
import fs from 'node:fs/promises';
import { main } from '../src/cli';
import { USAGE } from '../src/scrape/config';
import { DriverNotFoundError } from '../src/scrape/errors';
import { draftAnalysisUrl } from '../src/scrape/selectors';
import type { LaunchDriver } from '../src/scrape/types';
import { FakeDriver, type FakeRow, captureLogger, fakeLauncher } from './helpers/fakeDriver';

class BrokenDriver extends FakeDriver {
  async findAll(): Promise<FakeRow[]> {
    throw new Error('Target page, context or browser has been closed');
  }
}

test('successful run exits 0 and closes the browser', async ({}, testInfo) => {
  const outPath = testInfo.outputPath('stats.csv');
  const launch = fakeLauncher(
    new FakeDriver({ 0: { kind: 'table', rows: [{ playerName: 'Player A', position: 'QB', auctionValue: '42' }] } }),
  );
  const { lines, logger } = captureLogger();

  const code = await main(['-f', outPath], launch, logger);

  expect(code).toBe(0);
  expect(launch.sessions).toEqual([{ closed: true }]);
  expect(lines.log[lines.log.length - 1]).toBe(`Done. written=1, skipped=0, file=${outPath}`);
  expect(await fs.readFile(outPath, 'utf8')).toBe('playerName,position,auctionValue\nPlayer A,QB,42\n');
});

test('missing table exits non-zero, closes the browser and writes no file', async ({}, testInfo) => {
  const outPath = testInfo.outputPath('stats.csv');
  const launch = fakeLauncher(new FakeDriver({ 0: { kind: 'no-table' } }));
  const { lines, logger } = captureLogger();

  const code = await main(['-f', outPath], launch, logger);

  expect(code).toBe(1);
  expect(launch.sessions).toEqual([{ closed: true }]);
  expect(lines.error).toEqual([
    `Error: No element matching "#draftanalysistable" on ${draftAnalysisUrl(0)} (has the page layout changed?)`,
  ]);
  await expect(fs.access(outPath)).rejects.toThrow();
});

test('unexpected driver failure still releases the browser', async ({}, testInfo) => {
  const launch = fakeLauncher(new BrokenDriver({}));
  const { lines, logger } = captureLogger();

  const code = await main(['-f', testInfo.outputPath('stats.csv')], launch, logger);

  expect(code).toBe(1);
  expect(launch.sessions).toEqual([{ closed: true }]);
  expect(lines.error).toEqual(['Error: Target page, context or browser has been closed']);
});

test('missing browser install is reported before any output', async ({}, testInfo) => {
  const outPath = testInfo.outputPath('stats.csv');
  const launch: LaunchDriver<FakeRow> = async () => {
    throw new DriverNotFoundError('Chromium is not installed for Playwright.');
  };
  const { lines, logger } = captureLogger();

  const code = await main(['-f', outPath], launch, logger);

  expect(code).toBe(1);
  expect(lines.error).toEqual(['Error: Chromium is not installed for Playwright.']);
  await expect(fs.access(outPath)).rejects.toThrow();
});

test('bad arguments exit 2 without launching a browser', async () => {
  const launch = fakeLauncher(new FakeDriver({}));
  const { lines, logger } = captureLogger();

  const code = await main(['-n', 'lots'], launch, logger);

  expect(code).toBe(2);
  expect(launch.sessions).toEqual([]);
  expect(lines.error).toEqual([`Error: --num_players must be a positive integer, got "lots"\n\n${USAGE}`]);
});

test('--help prints usage and exits 0', async () => {
  const launch = fakeLauncher(new FakeDriver({}));
  const { lines, logger } = captureLogger();

  expect(await main(['--help'], launch, logger)).toBe(0);
  expect(lines.log).toEqual([USAGE]);
  expect(launch.sessions).toEqual([]);
});
