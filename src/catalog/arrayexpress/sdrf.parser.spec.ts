import { groupSdrfSamples, normalizeHeader, parseSdrf, unitKey } from './sdrf.parser';

const BASE_URL = 'https://ftp.example.org/E-MTAB-/123/E-MTAB-123/Files/';

const SDRF = [
  [
    'Source Name',
    'Characteristics [organism]',
    'Characteristics [sex]',
    'Characteristics [age]',
    'Unit [time unit]',
    'Characteristics [organism part]',
    'Characteristics [individual]',
    'Comment [BioSD_SAMPLE]',
    'Protocol REF',
    'Protocol REF',
    'Assay Name',
    'Array Design REF',
    'Array Data File',
  ].join('\t'),
  ['donor 1', 'Homo sapiens', 'female', '52', 'year', 'blood', 'D1', 'SAMEA100', 'P-1', 'P-2', 'donor 1 grn', 'A-MEXP-2255', 'donor1_Grn.idat'].join('\t'),
  ['donor 1', 'Homo sapiens', 'female', '52', 'year', 'blood', 'D1', 'SAMEA100', '', 'P-2', 'donor 1 red', 'A-MEXP-2255', 'donor1_Red.idat'].join('\t'),
  ['donor 2', 'Homo sapiens', 'M', '', '', 'saliva', 'D2', '', 'P-1', '', 'donor 2 grn', 'A-MEXP-2255', 'donor 2_Grn.idat'].join('\t'),
  ['donor 3', 'Homo sapiens', 'male', '40', 'year', 'blood', 'D3', 'SAMEA300', 'P-1', '', 'donor 3', 'A-MEXP-2255', ''].join('\t'),
  '',
].join('\n');

describe('normalizeHeader', () => {
  it('lower-cases and tightens brackets', () => {
    expect(normalizeHeader(' Characteristics [Sex] ')).toBe('characteristics[sex]');
    expect(normalizeHeader('Comment[BioSD_SAMPLE]')).toBe('comment[biosd_sample]');
    expect(normalizeHeader('Array Data File')).toBe('array data file');
  });
});

describe('parseSdrf', () => {
  const rows = parseSdrf(SDRF);

  it('returns one row per non-empty line', () => {
    expect(rows).toHaveLength(4);
  });

  it('keys a unit column to the column before it', () => {
    expect(rows[0].get(unitKey('characteristics[age]'))).toBe('year');
  });

  it('keeps the first non-empty value of repeated headers', () => {
    expect(rows[0].get('protocol ref')).toBe('P-1');
    expect(rows[1].get('protocol ref')).toBe('P-2');
  });

  it('returns nothing for empty input', () => {
    expect(parseSdrf('')).toEqual([]);
  });
});

describe('groupSdrfSamples', () => {
  const samples = groupSdrfSamples('E-MTAB-123', parseSdrf(SDRF), BASE_URL);

  it('folds channel rows into one sample and skips rows without data files', () => {
    expect(samples.map((s) => s.accession)).toEqual([
      'SAMEA100',
      'E-MTAB-123/donor 2',
    ]);
  });

  it('maps characteristics onto sample fields', () => {
    const [first] = samples;
    expect(first).toMatchObject({
      repository: 'arrayexpress',
      seriesAccession: 'E-MTAB-123',
      platformId: 'A-MEXP-2255',
      title: 'donor 1',
      organism: 'Homo sapiens',
      gender: 'female',
      age: '52 year',
      tissue: 'blood',
      disease: null,
      extractionProtocol: null,
      extras: {
        characteristics: { individual: 'D1' },
        sourceName: 'donor 1',
        assayName: 'donor 1 grn',
      },
    });
  });

  it('lists both channels with URLs under the files folder', () => {
    expect(samples[0].files).toEqual([
      { filename: 'donor1_Grn.idat', url: `${BASE_URL}donor1_Grn.idat`, channel: 'Grn' },
      { filename: 'donor1_Red.idat', url: `${BASE_URL}donor1_Red.idat`, channel: 'Red' },
    ]);
  });

  it('encodes file names and leaves a missing age null', () => {
    const second = samples[1];
    expect(second.gender).toBe('male');
    expect(second.age).toBeNull();
    expect(second.files[0].url).toBe(`${BASE_URL}donor%202_Grn.idat`);
  });
});

describe('groupSdrfSamples with unsafe data file names', () => {
  it('reduces a data file path to its last segment', () => {
    const rows = parseSdrf(
      [
        ['Source Name', 'Array Data File'].join('\t'),
        ['donor 1', '../../../../../tmp/escaped.idat'].join('\t'),
        ['donor 2', '..'].join('\t'),
      ].join('\n'),
    );

    const samples = groupSdrfSamples('E-MTAB-1', rows, BASE_URL);

    expect(samples.map((s) => s.accession)).toEqual(['E-MTAB-1/donor 1']);
    expect(samples[0].files).toEqual([
      { filename: 'escaped.idat', url: `${BASE_URL}escaped.idat`, channel: null },
    ]);
  });
});
