import {
  parseSelection,
  parseSelectionRequest,
  isExportCategory,
} from '../../src/export/selection.js';
import { SelectionError } from '../../src/utils/errors.js';

describe('parseSelection', () => {
  it('parses string test keys for the tests category', () => {
    expect(parseSelection({ tests: ['3', '5a'] })).toEqual([
      { category: 'tests', keys: ['3', '5a'] },
    ]);
  });

  it('stringifies numeric test keys', () => {
    expect(parseSelection({ tests: [3, '5a'] })).toEqual([
      { category: 'tests', keys: ['3', '5a'] },
    ]);
  });

  it('parses integer ids from strings and numbers, dropping non-numeric ones', () => {
    expect(parseSelection({ reports: ['5', 6, 'x', '7abc'] })).toEqual([
      { category: 'reports', ids: [5, 6, 7] },
    ]);
  });

  it('drops entries that are neither strings nor numbers', () => {
    expect(parseSelection({ tests: ['3', null, true, { id: 4 }] })).toEqual([
      { category: 'tests', keys: ['3'] },
    ]);
  });

  it('partitions retest entries into retest and fixed ids', () => {
    expect(
      parseSelection({ retests: ['retest_12', 'fixed_7', 'other_3', 'retest_x'] }),
    ).toEqual([{ category: 'retests', retestIds: [12], fixedIds: [7] }]);
  });

  it('ignores unknown categories and non-array values', () => {
    expect(parseSelection({ bogus: [1], reports: 5, users: [2] })).toEqual([
      { category: 'users', ids: [2] },
    ]);
  });

  it('skips categories with nothing left to export', () => {
    expect(parseSelection({ reports: [], retests: ['nope'], tags: ['a'] })).toEqual([]);
  });

  it('keeps the order categories were given in', () => {
    const categories = parseSelection({ tags: [1], reports: [2], client_versions: [3] }).map(
      (s) => s.category,
    );
    expect(categories).toEqual(['tags', 'reports', 'client_versions']);
  });

  it('accepts a JSON string', () => {
    expect(parseSelection('{"templates":["1","2"]}')).toEqual([
      { category: 'templates', ids: [1, 2] },
    ]);
  });

  it('rejects a missing or empty selection', () => {
    expect(() => parseSelection(undefined)).toThrow('No selection provided');
    expect(() => parseSelection('')).toThrow('No selection provided');
    expect(() => parseSelection({})).toThrow('No selection provided');
  });

  it('rejects malformed input', () => {
    expect(() => parseSelection('not json')).toThrow(SelectionError);
    expect(() => parseSelection('not json')).toThrow('Malformed selection');
    expect(() => parseSelection([1, 2])).toThrow('Malformed selection');
    expect(() => parseSelection(42)).toThrow('Malformed selection');
  });
});

describe('parseSelectionRequest', () => {
  it('keeps every requested key alongside the parsed selection', () => {
    expect(parseSelectionRequest('{"reports":[5],"bogus":[1],"tags":[]}')).toEqual({
      requested: ['reports', 'bogus', 'tags'],
      selection: [{ category: 'reports', ids: [5] }],
    });
  });
});

describe('isExportCategory', () => {
  it('recognises the fixed set of categories', () => {
    expect(isExportCategory('client_versions')).toBe(true);
    expect(isExportCategory('retests')).toBe(true);
    expect(isExportCategory('site_settings')).toBe(false);
  });
});
