/**
 * Parser for GEO's SOFT text format as served by the accession display
 * endpoint (`form=text`).
 *
 * ```
 * ^SERIES = GSE1000
 * !Series_title = Methylation of ...
 * !Series_sample_id = GSM1
 * !Series_sample_id = GSM2
 * ```
 */

export interface SoftEntity {
  /** Lower-cased entity type: series, sample, platform, database */
  type: string;
  id: string;
  /** Attribute name without the entity prefix → values in file order */
  attributes: Record<string, string[]>;
}

// Lines are right-trimmed, so an empty value leaves "name =" behind
const SEPARATOR = ' =';

function splitOnce(text: string): [string, string] {
  const at = text.indexOf(SEPARATOR);
  if (at === -1) {
    return [text.trim(), ''];
  }
  return [text.slice(0, at).trim(), text.slice(at + SEPARATOR.length).trim()];
}

function stripPrefix(attr: string, type: string): string {
  const prefix = `${type}_`;
  return attr.toLowerCase().startsWith(prefix) ? attr.slice(prefix.length) : attr;
}

export function parseSoft(text: string): SoftEntity[] {
  const entities: SoftEntity[] = [];
  let current: SoftEntity | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trimEnd();
    const marker = line.charAt(0);

    if (marker === '^') {
      const [type, id] = splitOnce(line.slice(1));
      current = { type: type.toLowerCase(), id, attributes: {} };
      entities.push(current);
    } else if (marker === '!' && current) {
      const [attr, value] = splitOnce(line.slice(1));
      // Table delimiters such as !sample_table_begin carry no value
      if (attr.endsWith('_table_begin') || attr.endsWith('_table_end')) {
        continue;
      }
      const key = stripPrefix(attr, current.type);
      (current.attributes[key] ??= []).push(value);
    }
  }

  return entities;
}

export function softValues(entity: SoftEntity, attr: string): string[] {
  return entity.attributes[attr] ?? [];
}

export function softFirst(entity: SoftEntity, attr: string): string | null {
  const value = softValues(entity, attr)[0];
  return value !== undefined && value.length > 0 ? value : null;
}

export function softJoined(entity: SoftEntity, attr: string): string | null {
  const values = softValues(entity, attr).filter((v) => v.length > 0);
  return values.length > 0 ? values.join(' ') : null;
}
