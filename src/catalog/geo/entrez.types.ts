import {
  asArray,
  asInt,
  asObject,
  asString,
  isObject,
} from '../../common/utils/json';

export interface EntrezSearchResult {
  total: number;
  ids: string[];
}

/** One `db=gds` esummary document, as returned with `retmode=json`. */
export interface GeoSeriesSummary {
  uid: string;
  accession: string;
  entryType: string;
  title: string;
  summary: string | null;
  /** Platform numbers without the GPL prefix, `;`-separated for multi-platform series */
  gpl: string;
  taxon: string | null;
  gdsType: string | null;
  publishedAt: string | null;
  suppFile: string | null;
  sampleCount: number | null;
  sampleAccessions: string[];
  bioproject: string | null;
}

export function parseSearchResult(payload: unknown): EntrezSearchResult | string {
  const result = asObject(payload).esearchresult;
  if (!isObject(result)) {
    return 'missing esearchresult';
  }
  const error = asString(result.ERROR);
  if (error) {
    return error;
  }
  return {
    total: asInt(result.count) ?? 0,
    ids: asArray(result.idlist)
      .map(asString)
      .filter((id): id is string => id !== null),
  };
}

export function parseSeriesSummary(doc: unknown): GeoSeriesSummary | null {
  if (!isObject(doc) || doc.error !== undefined) {
    return null;
  }
  const uid = asString(doc.uid);
  const accession = asString(doc.accession);
  if (!uid || !accession) {
    return null;
  }

  const sampleAccessions = asArray(doc.samples)
    .map((item) => asString(asObject(item).accession))
    .filter((acc): acc is string => acc !== null);

  return {
    uid,
    accession,
    entryType: asString(doc.entrytype) ?? '',
    title: asString(doc.title) ?? accession,
    summary: asString(doc.summary),
    gpl: asString(doc.gpl) ?? '',
    taxon: asString(doc.taxon),
    gdsType: asString(doc.gdstype),
    publishedAt: asString(doc.pdat),
    suppFile: asString(doc.suppfile),
    sampleCount: asInt(doc.n_samples),
    sampleAccessions,
    bioproject: asString(doc.bioproject),
  };
}

/** Summaries in `uids` order; uids with an error entry are skipped. */
export function parseSummaryResult(payload: unknown): GeoSeriesSummary[] {
  const result = asObject(asObject(payload).result);
  return asArray(result.uids)
    .map(asString)
    .filter((uid): uid is string => uid !== null)
    .map((uid) => parseSeriesSummary(result[uid]))
    .filter((s): s is GeoSeriesSummary => s !== null);
}
