import { expect, test } from '@playwright/test';
import { crossReferenceDirectory, directoryBioguideId } from '../src/cross-reference';
import { createCongressRecord, createMemberRecord, createTermRecord } from '../src/records';

function member(bioguideId: string) {
  return createMemberRecord({
    bioguideId,
    firstName: 'Test',
    lastName: 'Member',
    terms: [createTermRecord({ congressNumber: 116, position: 'Representative', state: 'va', party: 'Democrat' })],
  });
}

function entry(bioGuideId?: string, extra: Record<string, unknown> = {}) {
  return bioGuideId === undefined ? { title: 'No key', ...extra } : { members: [{ bioGuideId, role: 'Member' }], ...extra };
}

test.describe('directoryBioguideId', () => {
  test('reads members[0].bioGuideId', () => {
    expect(directoryBioguideId(entry('a000001'))).toBe('A000001');
  });

  test('entries without a usable key give null', () => {
    expect(directoryBioguideId(entry())).toBeNull();
    expect(directoryBioguideId({ members: [] })).toBeNull();
    expect(directoryBioguideId({ members: [{ bioGuideId: '' }] })).toBeNull();
    expect(directoryBioguideId({ members: 'A000001' })).toBeNull();
  });
});

test.describe('crossReferenceDirectory', () => {
  const congress = createCongressRecord(116, [member('A000001'), member('B000002')]);

  test('pairs members with their entries and appends the rest as placeholders', () => {
    const matched = entry('B000002', { title: 'B' });
    const stranger = entry('Z000009');
    const keyless = entry();

    const result = crossReferenceDirectory(congress, [keyless, stranger, matched]);

    expect(result.map((m) => [m.bioguideId, m.bioguide?.bioguideId ?? null, m.directory])).toEqual([
      ['A000001', 'A000001', null],
      ['B000002', 'B000002', matched],
      ['Z000009', null, stranger],
      [null, null, keyless],
    ]);
  });

  test('inputs are not modified', () => {
    const entries = [entry('A000001')];
    const before = JSON.stringify({ congress, entries });

    crossReferenceDirectory(congress, entries);

    expect(JSON.stringify({ congress, entries })).toBe(before);
    expect(entries).toHaveLength(1);
  });

  test('a plain member list is accepted', () => {
    const result = crossReferenceDirectory([member('A000001')], []);
    expect(result).toEqual([{ bioguideId: 'A000001', bioguide: member('A000001'), directory: null }]);
  });
});
