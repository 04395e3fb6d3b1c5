import { expect, test } from '@playwright/test';
import { extractBioguideIds, extractFinalPageNumber } from '../../../src/scrapers/bioguide/roster';
import { resultsPage } from '../../helpers/fixtures';

test.describe('extractBioguideIds', () => {
  test('reads the first query value of every member link, upper-cased', () => {
    expect(extractBioguideIds(resultsPage(['l000313', 'W000178']))).toEqual(['L000313', 'W000178']);
  });

  test('duplicates on a page are dropped, keeping document order', () => {
    expect(extractBioguideIds(resultsPage(['B000002', 'A000001', 'B000002']))).toEqual(['B000002', 'A000001']);
  });

  test('absolute links with several query values use the first one', () => {
    const html = `<div class="row"><div>
      <a class="red" href="https://bioguideretro.congress.gov/Home/MemberDetails?memIndex=c000003&amp;tab=1">C</a>
    </div></div>`;
    expect(extractBioguideIds(html)).toEqual(['C000003']);
  });

  test('links outside the result rows are ignored', () => {
    const html = `<nav><a class="red" href="/Home/MemberDetails?memIndex=X000009">X</a></nav>
      <div class="row"><div><a href="/Home/MemberDetails?memIndex=Y000009">Y</a></div></div>`;
    expect(extractBioguideIds(html)).toEqual([]);
  });
});

test.describe('extractFinalPageNumber', () => {
  test('prefers the skip-to-last link', () => {
    expect(extractFinalPageNumber(resultsPage(['A000001'], 12))).toBe(12);
  });

  test('falls back to the link before a trailing next arrow', () => {
    const html = `<ul class="pagination">
      <li class="page-item"><a class="page-link" href="/Home/SearchResults?page=1">1</a></li>
      <li class="page-item"><a class="page-link" href="/Home/SearchResults?page=2">2</a></li>
      <li class="page-item"><a class="page-link" href="/Home/SearchResults?page=3">3</a></li>
      <li class="page-item PagedList-skipToNext"><a class="page-link" href="/Home/SearchResults?page=2">&gt;</a></li>
    </ul>`;
    expect(extractFinalPageNumber(html)).toBe(3);
  });

  test('uses the last link when there is no arrow', () => {
    const html = `<ul class="pagination">
      <li class="page-item"><a class="page-link" href="/Home/SearchResults?page=1">1</a></li>
      <li class="page-item"><a class="page-link" href="/Home/SearchResults?page=2">2</a></li>
    </ul>`;
    expect(extractFinalPageNumber(html)).toBe(2);
  });

  test('results without a pagination control are a single page', () => {
    expect(extractFinalPageNumber(resultsPage(['A000001']))).toBe(1);
  });
});
