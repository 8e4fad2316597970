import { parse } from 'csv-parse/sync';
import type { CatalogFile, CatalogSample } from '../catalog.types';
import { normalizeGender, safeFilename, toCatalogFile } from '../normalize';

/** One SDRF row keyed by normalised header: `characteristics[sex]`, `array data file`. */
export type SdrfRow = Map<string, string>;

/** Key under which a `Unit[...]` column is stored, after the column it qualifies. */
export const unitKey = (header: string) => `${header}#unit`;

export function normalizeHeader(header: string): string {
  return header
    .trim()
    .toLowerCase()
    .replace(/\s*\[\s*/, '[')
    .replace(/\s*\]\s*$/, ']');
}

/**
 * Parses a tab-separated SDRF sample sheet. Repeated headers (Protocol REF,
 * Parameter Value[...]) keep their first non-empty value.
 */
export function parseSdrf(text: string): SdrfRow[] {
  const records: string[][] = parse(text, {
    delimiter: '\t',
    quote: false,
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
    trim: true,
  });
  if (records.length === 0) return [];

  const [header, ...body] = records;
  const keys: string[] = [];
  header.forEach((raw, i) => {
    const key = normalizeHeader(raw);
    keys.push(key.startsWith('unit[') && i > 0 ? unitKey(keys[i - 1]) : key);
  });

  return body.map((cells) => {
    const row: SdrfRow = new Map();
    keys.forEach((key, i) => {
      const value = cells[i] ?? '';
      if (value.length > 0 && !row.has(key)) {
        row.set(key, value);
      }
    });
    return row;
  });
}

function first(row: SdrfRow, keys: string[]): string | null {
  for (const key of keys) {
    const value = row.get(key);
    if (value) return value;
  }
  return null;
}

function characteristic(row: SdrfRow, names: string[]): string | null {
  return first(
    row,
    names.map((n) => `characteristics[${n}]`),
  );
}

const MAPPED_CHARACTERISTICS = new Set([
  'sex',
  'gender',
  'age',
  'organism part',
  'cell type',
  'tissue',
  'disease',
  'disease state',
  'organism',
]);

function age(row: SdrfRow): string | null {
  const value = characteristic(row, ['age']);
  if (!value) return null;
  const unit = row.get(unitKey('characteristics[age]'));
  return unit ? `${value} ${unit}` : value;
}

function otherCharacteristics(row: SdrfRow): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of row) {
    const match = /^characteristics\[(.+)\]$/.exec(key);
    if (match && !MAPPED_CHARACTERISTICS.has(match[1])) {
      out[match[1]] = value;
    }
  }
  return out;
}

export function sdrfSampleKey(accession: string, row: SdrfRow): string | null {
  const biosample = row.get('comment[biosd_sample]');
  if (biosample) return biosample;
  const sourceName = row.get('source name');
  return sourceName ? `${accession}/${sourceName}` : null;
}

/**
 * Folds SDRF rows into samples. Rows of one sample (one per IDAT channel)
 * share a sample key; rows without a data file are skipped.
 */
export function groupSdrfSamples(
  accession: string,
  rows: SdrfRow[],
  filesBaseUrl: string,
): CatalogSample[] {
  const samples = new Map<string, CatalogSample>();

  for (const row of rows) {
    const dataFile = safeFilename(row.get('array data file'));
    const key = sdrfSampleKey(accession, row);
    if (!dataFile || !key) continue;

    let sample = samples.get(key);
    if (!sample) {
      const extras: Record<string, unknown> = {};
      const others = otherCharacteristics(row);
      if (Object.keys(others).length > 0) extras.characteristics = others;
      const sourceName = row.get('source name');
      if (sourceName) extras.sourceName = sourceName;
      const assayName = row.get('assay name');
      if (assayName) extras.assayName = assayName;

      sample = {
        repository: 'arrayexpress',
        accession: key,
        seriesAccession: accession,
        platformId: first(row, ['array design ref']),
        title: sourceName ?? null,
        organism: characteristic(row, ['organism']),
        gender: normalizeGender(characteristic(row, ['sex', 'gender'])),
        age: age(row),
        tissue: characteristic(row, ['organism part', 'cell type', 'tissue']),
        disease: characteristic(row, ['disease', 'disease state']),
        extractionProtocol: null,
        extras,
        files: [],
      };
      samples.set(key, sample);
    }

    if (!sample.files.some((f: CatalogFile) => f.filename === dataFile)) {
      sample.files.push(
        toCatalogFile(dataFile, filesBaseUrl + encodeURIComponent(dataFile)),
      );
    }
  }

  return [...samples.values()];
}
