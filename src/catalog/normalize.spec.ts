import {
  idatChannel,
  isIdatFilename,
  normalizeGender,
  safeFilename,
  toCatalogFile,
} from './normalize';

describe('normalizeGender', () => {
  it.each([
    ['M', 'male'],
    [' male ', 'male'],
    ['F', 'female'],
    ['Female', 'female'],
    ['not recorded', 'unknown'],
  ])('maps %p to %p', (input, expected) => {
    expect(normalizeGender(input)).toBe(expected);
  });

  it('returns null for absent or blank values', () => {
    expect(normalizeGender(null)).toBeNull();
    expect(normalizeGender(undefined)).toBeNull();
    expect(normalizeGender('   ')).toBeNull();
  });
});

describe('IDAT file names', () => {
  it('recognises plain and gzipped IDAT files', () => {
    expect(isIdatFilename('GSM1_200_R01C01_Grn.idat')).toBe(true);
    expect(isIdatFilename('GSM1_200_R01C01_Red.IDAT.gz')).toBe(true);
    expect(isIdatFilename('GSE1_RAW.tar')).toBe(false);
  });

  it('reads the channel from the suffix', () => {
    expect(idatChannel('GSM1_200_R01C01_Grn.idat.gz')).toBe('Grn');
    expect(idatChannel('9296930098_R02C01_red.idat')).toBe('Red');
    expect(idatChannel('sample.idat')).toBeNull();
  });

  it('builds a catalog file with its channel', () => {
    expect(toCatalogFile('a_Red.idat', 'https://example.org/a_Red.idat')).toEqual({
      filename: 'a_Red.idat',
      url: 'https://example.org/a_Red.idat',
      channel: 'Red',
    });
  });
});

describe('safeFilename', () => {
  it('keeps only the last path segment', () => {
    expect(safeFilename('../../tmp/escaped.idat')).toBe('escaped.idat');
    expect(safeFilename('raw\\a_Grn.idat')).toBe('a_Grn.idat');
    expect(safeFilename('a_Grn.idat')).toBe('a_Grn.idat');
  });

  it('returns null when no file name is left', () => {
    expect(safeFilename('..')).toBeNull();
    expect(safeFilename('files/')).toBeNull();
    expect(safeFilename(undefined)).toBeNull();
  });
});
