import { expect, test } from '@playwright/test';
import { fixLastNameCasing, parseFirstNames } from '../../../src/scrapers/bioguide/names';

test.describe('parseFirstNames', () => {
  test('plain first names pass through', () => {
    expect(parseFirstNames('Abraham')).toEqual({ firstName: 'Abraham', nickname: null, suffix: null });
  });

  test('suffix is removed before the nickname', () => {
    expect(parseFirstNames('James Edward (Jim), Jr.')).toEqual({
      firstName: 'James Edward',
      nickname: 'Jim',
      suffix: 'Jr.',
    });
  });

  test('nickname in the middle of the name', () => {
    expect(parseFirstNames('Thomas Phillip (Tip) ')).toEqual({
      firstName: 'Thomas Phillip',
      nickname: 'Tip',
      suffix: null,
    });
  });

  test('roman numeral suffixes', () => {
    expect(parseFirstNames('John III')).toEqual({ firstName: 'John', nickname: null, suffix: 'III' });
    expect(parseFirstNames('Henry IV')).toEqual({ firstName: 'Henry', nickname: null, suffix: 'IV' });
    expect(parseFirstNames('Joseph Sr')).toEqual({ firstName: 'Joseph', nickname: null, suffix: 'Sr' });
  });

  test('names that start like a suffix are kept', () => {
    expect(parseFirstNames('John Ivan')).toEqual({ firstName: 'John Ivan', nickname: null, suffix: null });
  });
});

test.describe('fixLastNameCasing', () => {
  test('Mc prefix keeps its inner capital', () => {
    expect(fixLastNameCasing('McLASTNAME')).toBe('McLastname');
  });

  test('all-capital surnames are title-cased', () => {
    expect(fixLastNameCasing('SMITH')).toBe('Smith');
    expect(fixLastNameCasing('LaFOLLETTE')).toBe('LaFollette');
    expect(fixLastNameCasing("O'NEILL")).toBe("O'neill");
  });

  test('mixed-case surnames are left alone', () => {
    expect(fixLastNameCasing('McConnell')).toBe('McConnell');
    expect(fixLastNameCasing('Pelosi')).toBe('Pelosi');
  });
});
