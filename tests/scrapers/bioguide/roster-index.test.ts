import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { expect, test } from '@playwright/test';
import { RosterIndex } from '../../../src/scrapers/bioguide/roster-index';

const TEXT = 'A000001B000002c000003\nD000004\n';

test.describe('RosterIndex', () => {
  test('line offsets count back from the current Congress', () => {
    const index = RosterIndex.fromText(TEXT, 119);

    expect(index.lookup(119)).toEqual(['A000001', 'B000002', 'C000003']);
    expect(index.lookup(118)).toEqual(['D000004']);
  });

  test('Congresses without a line are not in the index', () => {
    const index = RosterIndex.fromText(TEXT, 119);

    expect(index.lookup(117)).toBeNull();
    expect(index.lookup(120)).toBeNull();
    expect(index.has(118)).toBe(true);
    expect(index.has(117)).toBe(false);
  });

  test('loads from a file', async () => {
    const path = join(mkdtempSync(join(tmpdir(), 'roster-index-')), 'all.congress.index');
    writeFileSync(path, TEXT, 'utf-8');

    const index = await RosterIndex.fromFile(path, 2);

    expect(index.lookup(1)).toEqual(['D000004']);
  });
});
