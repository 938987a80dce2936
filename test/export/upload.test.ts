import { parseImportMode, validateUpload } from '../../src/export/upload.js';
import { UploadError } from '../../src/utils/errors.js';

describe('validateUpload', () => {
  it('returns the script text from a buffer', () => {
    expect(
      validateUpload({ filename: 'backup.sql', content: Buffer.from('SELECT 1;', 'utf-8') }),
    ).toBe('SELECT 1;');
  });

  it('accepts an upper-case extension', () => {
    expect(validateUpload({ filename: 'BACKUP.SQL', content: 'SELECT 1;' })).toBe('SELECT 1;');
  });

  it('accepts a file named only by its extension', () => {
    expect(validateUpload({ filename: '.sql', content: 'SELECT 1;' })).toBe('SELECT 1;');
  });

  it('requires a file', () => {
    expect(() => validateUpload(undefined)).toThrow('No file was uploaded.');
  });

  it('rejects other extensions', () => {
    expect(() => validateUpload({ filename: 'backup.txt', content: 'SELECT 1;' })).toThrow(
      'Only .sql files are accepted.',
    );
    expect(() => validateUpload({ filename: 'sql', content: 'SELECT 1;' })).toThrow(
      'Only .sql files are accepted.',
    );
    expect(() => validateUpload({ filename: 'backup.sql.', content: 'SELECT 1;' })).toThrow(
      'Only .sql files are accepted.',
    );
  });

  it('rejects an empty or blank file', () => {
    expect(() => validateUpload({ filename: 'a.sql', content: Buffer.alloc(0) })).toThrow(
      'The uploaded file is empty or could not be read.',
    );
    expect(() => validateUpload({ filename: 'a.sql', content: ' \n\t' })).toThrow(
      'The uploaded file is empty or could not be read.',
    );
  });

  it('raises upload errors with status 400', () => {
    try {
      validateUpload(undefined);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UploadError);
      expect(err).toMatchObject({ status: 400, name: 'UploadError' });
    }
  });
});

describe('parseImportMode', () => {
  it('defaults to full', () => {
    expect(parseImportMode(undefined)).toBe('full');
    expect(parseImportMode('')).toBe('full');
  });

  it('accepts both modes', () => {
    expect(parseImportMode('full')).toBe('full');
    expect(parseImportMode('data_only')).toBe('data_only');
  });

  it('rejects anything else', () => {
    expect(() => parseImportMode('schema_only')).toThrow('Invalid import mode: schema_only');
  });
});
