import {
  asArray,
  asInt,
  asObject,
  asString,
  JsonObject,
} from '../../common/utils/json';

export interface ArrayExpressHit {
  accession: string;
  title: string | null;
  releaseDate: string | null;
  author: string | null;
}

export interface ArrayExpressSearchPage {
  totalHits: number;
  hits: ArrayExpressHit[];
}

export interface BioStudiesStudy {
  accession: string;
  title: string | null;
  description: string | null;
  organism: string | null;
  studyType: string | null;
  releaseDate: string | null;
}

export function parseSearchPage(payload: unknown): ArrayExpressSearchPage {
  const body = asObject(payload);
  const hits: ArrayExpressHit[] = [];
  for (const item of asArray(body.hits)) {
    const hit = asObject(item);
    const accession = asString(hit.accession);
    if (!accession) continue;
    hits.push({
      accession,
      title: asString(hit.title),
      releaseDate: asString(hit.release_date),
      author: asString(hit.author),
    });
  }
  return { totalHits: asInt(body.totalHits) ?? hits.length, hits };
}

function collectAttributes(node: JsonObject, into: Map<string, string>): void {
  for (const item of asArray(node.attributes)) {
    const attr = asObject(item);
    const name = asString(attr.name);
    const value = asString(attr.value);
    if (name && value && !into.has(name.toLowerCase())) {
      into.set(name.toLowerCase(), value);
    }
  }
}

/** Top-level attributes first, then the root section's; the first value of a name wins. */
export function parseStudy(accession: string, payload: unknown): BioStudiesStudy {
  const body = asObject(payload);
  const attributes = new Map<string, string>();
  collectAttributes(body, attributes);
  collectAttributes(asObject(body.section), attributes);

  return {
    accession: asString(body.accno) ?? accession,
    title: attributes.get('title') ?? null,
    description: attributes.get('description') ?? null,
    organism: attributes.get('organism') ?? null,
    studyType: attributes.get('study type') ?? null,
    releaseDate: attributes.get('releasedate') ?? null,
  };
}
