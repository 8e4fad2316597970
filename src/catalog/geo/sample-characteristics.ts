import type { Gender } from '../../db/types';
import { normalizeGender } from '../normalize';

export interface MappedCharacteristics {
  gender: Gender | null;
  age: string | null;
  tissue: string | null;
  disease: string | null;
  /** Characteristics with no dedicated column */
  characteristics: Record<string, string>;
  /** Values that are not `key: value` pairs */
  notes: string[];
}

const GENDER_KEYS = ['gender', 'sex'];
const AGE_KEYS = ['age', 'age (years)', 'age (yrs)', 'age_years', 'age at collection'];
const TISSUE_KEYS = ['tissue', 'tissue type', 'cell type', 'organism part'];
const DISEASE_KEYS = ['disease', 'disease state', 'diagnosis', 'disease status'];

function pick(pairs: Map<string, string>, keys: string[]): string | null {
  for (const key of keys) {
    const value = pairs.get(key);
    if (value !== undefined && value.length > 0) {
      return value;
    }
  }
  return null;
}

/**
 * Maps GEO `characteristics_ch1` lines (`tissue: whole blood`) onto the sample
 * columns. The first occurrence of a key wins.
 */
export function mapCharacteristics(
  lines: string[],
  sourceName: string | null = null,
): MappedCharacteristics {
  const pairs = new Map<string, string>();
  const notes: string[] = [];

  for (const line of lines) {
    const at = line.indexOf(':');
    if (at === -1) {
      if (line.trim().length > 0) notes.push(line.trim());
      continue;
    }
    const key = line.slice(0, at).trim().toLowerCase();
    const value = line.slice(at + 1).trim();
    if (!pairs.has(key)) {
      pairs.set(key, value);
    }
  }

  const mappedKeys = new Set([
    ...GENDER_KEYS,
    ...AGE_KEYS,
    ...TISSUE_KEYS,
    ...DISEASE_KEYS,
  ]);
  const characteristics: Record<string, string> = {};
  for (const [key, value] of pairs) {
    if (!mappedKeys.has(key)) {
      characteristics[key] = value;
    }
  }

  return {
    gender: normalizeGender(pick(pairs, GENDER_KEYS)),
    age: pick(pairs, AGE_KEYS),
    tissue: pick(pairs, TISSUE_KEYS) ?? sourceName,
    disease: pick(pairs, DISEASE_KEYS),
    characteristics,
    notes,
  };
}
