import { describe, expect, it } from 'vitest';

import { lookupEntry } from './entry-matcher.js';
import type { BootCatalog } from './types.js';

const catalog: BootCatalog = {
  entries: [
    { id: 1, name: 'Ubuntu' },
    { id: 2, name: 'debuntu' },
    { id: 3, name: '7' },
    { id: 4, name: 'ubuntu' },
    { id: 7, name: 'Windows Boot Manager' },
    { id: 4, name: 'ubuntu (duplicate)' },
  ],
};

describe('lookupEntry', () => {
  it('matches numeric queries by id', () => {
    expect(lookupEntry(catalog, '7')).toEqual({ id: 7, name: 'Windows Boot Manager' });
  });

  it('accepts zero-padded ids', () => {
    expect(lookupEntry(catalog, '0002')).toEqual({ id: 2, name: 'debuntu' });
  });

  it('never matches a numeric query against names', () => {
    const withoutId7: BootCatalog = { entries: [{ id: 3, name: '7' }] };

    expect(lookupEntry(withoutId7, '7')).toBeUndefined();
  });

  it('returns undefined for an unknown id', () => {
    expect(lookupEntry(catalog, '42')).toBeUndefined();
  });

  it('matches names by case-sensitive prefix', () => {
    expect(lookupEntry(catalog, 'ub')).toEqual({ id: 4, name: 'ubuntu' });
    expect(lookupEntry(catalog, 'Ub')).toEqual({ id: 1, name: 'Ubuntu' });
  });

  it('does not match in the middle of a name', () => {
    expect(lookupEntry(catalog, 'bun')).toBeUndefined();
  });

  it('returns the first entry when several match', () => {
    expect(lookupEntry(catalog, '4')).toEqual({ id: 4, name: 'ubuntu' });
    expect(lookupEntry(catalog, 'ubuntu')).toEqual({ id: 4, name: 'ubuntu' });
  });

  it('treats out-of-range numbers as name prefixes', () => {
    const numeric: BootCatalog = { entries: [{ id: 1, name: '70000 series' }] };

    expect(lookupEntry(numeric, '70000')).toEqual({ id: 1, name: '70000 series' });
  });

  it('returns undefined on an empty catalog', () => {
    expect(lookupEntry({ entries: [] }, 'zzz')).toBeUndefined();
  });
});
