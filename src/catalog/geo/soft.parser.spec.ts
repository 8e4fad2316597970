import { parseSoft, softFirst, softJoined, softValues } from './soft.parser';

const SERIES_SOFT = [
  '!Series_title = ignored before any entity',
  '^SERIES = GSE1000',
  '!Series_title = Blood methylation in aging',
  '!Series_summary = First paragraph.',
  '!Series_summary = ',
  '!Series_summary = Second paragraph.',
  '!Series_sample_id = GSM1',
  '!Series_sample_id = GSM2',
  '!Series_platform_id = GPL13534',
  '^SAMPLE = GSM1',
  '!Sample_characteristics_ch1 = tissue: whole blood',
  '!Sample_characteristics_ch1 = age: 54',
  '!sample_table_begin',
  'ID_REF\tVALUE',
  '!sample_table_end',
  '!Sample_extra_note = a = b',
].join('\r\n');

describe('parseSoft', () => {
  const entities = parseSoft(SERIES_SOFT);

  it('splits the text into entities', () => {
    expect(entities.map((e) => [e.type, e.id])).toEqual([
      ['series', 'GSE1000'],
      ['sample', 'GSM1'],
    ]);
  });

  it('strips the entity prefix and keeps repeated values in order', () => {
    const [series] = entities;
    expect(softValues(series, 'sample_id')).toEqual(['GSM1', 'GSM2']);
    expect(softFirst(series, 'title')).toBe('Blood methylation in aging');
    expect(softJoined(series, 'summary')).toBe('First paragraph. Second paragraph.');
  });

  it('skips table delimiters and splits only on the first separator', () => {
    const sample = entities[1];
    expect(Object.keys(sample.attributes)).toEqual([
      'characteristics_ch1',
      'extra_note',
    ]);
    expect(softFirst(sample, 'extra_note')).toBe('a = b');
  });

  it('returns null or empty for missing attributes', () => {
    const [series] = entities;
    expect(softValues(series, 'contributor')).toEqual([]);
    expect(softFirst(series, 'contributor')).toBeNull();
    expect(softJoined(series, 'contributor')).toBeNull();
  });
});
