import type { Gender, IdatChannel } from '../db/types';
import type { CatalogFile } from './catalog.types';

export function normalizeGender(value: string | null | undefined): Gender | null {
  if (value === null || value === undefined) return null;
  const v = value.trim().toLowerCase();
  if (v.length === 0) return null;
  if (v === 'm' || v === 'male') return 'male';
  if (v === 'f' || v === 'female') return 'female';
  return 'unknown';
}

const CHANNEL_PATTERN = /_(grn|red)\.idat(\.gz)?$/i;
const IDAT_PATTERN = /\.idat(\.gz)?$/i;

export function isIdatFilename(filename: string): boolean {
  return IDAT_PATTERN.test(filename);
}

export function idatChannel(filename: string): IdatChannel | null {
  const match = CHANNEL_PATTERN.exec(filename);
  if (!match) return null;
  return match[1].toLowerCase() === 'grn' ? 'Grn' : 'Red';
}

export function toCatalogFile(filename: string, url: string): CatalogFile {
  return { filename, url, channel: idatChannel(filename) };
}

/**
 * Last path segment of a file name taken from a remote listing, or null when
 * nothing usable is left (empty, `.` or `..`).
 */
export function safeFilename(name: string | null | undefined): string | null {
  if (!name) return null;
  const base = name.split(/[\\/]/).pop()?.trim() ?? '';
  return base === '' || base === '.' || base === '..' ? null : base;
}
