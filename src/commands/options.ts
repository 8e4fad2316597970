import { InvalidArgumentError } from 'commander';

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  const parsed = parseInt(value, 10);
  if (parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/** Accepts "GPL13534" or "13534"; repeated flags accumulate. */
export function collectPlatform(value: string, previous: string[] = []): string[] {
  const id = value.trim().toUpperCase();
  if (!/^(GPL)?\d+$/.test(id)) {
    throw new InvalidArgumentError(`Not a GEO platform accession: ${value}`);
  }
  return [...previous, id.startsWith('GPL') ? id : `GPL${id}`];
}
