import { Logger } from '@nestjs/common';
import { CatalogFormatError, CatalogRequestError } from '../../common/errors';
import type { CatalogFile, CatalogSample, CatalogStudy } from '../catalog.types';
import { CatalogHttpClient, QueryParams } from '../http/catalog-http.client';
import { isIdatFilename, toCatalogFile } from '../normalize';
import { parseDirectoryListing } from './directory-listing';
import {
  EntrezSearchResult,
  GeoSeriesSummary,
  parseSearchResult,
  parseSummaryResult,
} from './entrez.types';
import {
  DEFAULT_PLATFORMS,
  E_UTILS_BASE,
  ENTREZ_TOOL,
  ESEARCH_PAGE_SIZE,
  ESUMMARY_BATCH_SIZE,
  GEO_ACCN_BASE,
  GEO_FTP_BASE,
  METHYLATION_PLATFORMS,
} from './geo.constants';
import { mapCharacteristics } from './sample-characteristics';
import {
  parseSoft,
  SoftEntity,
  softFirst,
  softJoined,
  softValues,
} from './soft.parser';

export interface GeoClientOptions {
  apiKey?: string;
  email?: string;
}

export interface GeoSeriesRecord {
  accession: string;
  title: string | null;
  summary: string | null;
  overallDesign: string | null;
  platformIds: string[];
  sampleIds: string[];
  organism: string | null;
}

export function buildSearchTerm(platforms: string[]): string {
  return `(${platforms.map((p) => `${p}[accn]`).join(' OR ')}) AND idat[suppFile]`;
}

/**
 * Directory stub GEO uses to shard accessions:
 * GSM1234567 → GSM1234nnn, GSM123 → GSMnnn.
 */
export function accessionStub(accession: string): string {
  const match = /^([A-Z]+)(\d+)$/.exec(accession);
  if (!match) {
    throw new Error(`Not a GEO accession: ${accession}`);
  }
  const [, prefix, digits] = match;
  return digits.length > 3 ? `${prefix}${digits.slice(0, -3)}nnn` : `${prefix}nnn`;
}

export function sampleFilesUrl(accession: string): string {
  return `${GEO_FTP_BASE}/samples/${accessionStub(accession)}/${accession}/suppl/`;
}

function compact(values: Record<string, string | null>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== null) out[key] = value;
  }
  return out;
}

export function toPlatformIds(gpl: string): string[] {
  return gpl
    .split(';')
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .map((p) => (p.startsWith('GPL') ? p : `GPL${p}`));
}

/**
 * Gene Expression Omnibus access: Entrez E-utilities for discovery, the
 * accession display endpoint for SOFT metadata, the FTP mirror for files.
 */
export class GeoClient {
  private readonly logger = new Logger(GeoClient.name);

  constructor(
    private readonly http: CatalogHttpClient,
    private readonly options: GeoClientOptions = {},
  ) {}

  // ==========================================
  // Entrez E-utilities
  // ==========================================

  async searchSeries(params: {
    platforms?: string[];
    offset?: number;
    pageSize?: number;
  }): Promise<EntrezSearchResult> {
    const url = `${E_UTILS_BASE}/esearch.fcgi`;
    const payload = await this.http.getJson(
      url,
      this.entrezParams({
        term: buildSearchTerm(params.platforms ?? DEFAULT_PLATFORMS),
        retstart: params.offset ?? 0,
        retmax: params.pageSize ?? ESEARCH_PAGE_SIZE,
      }),
    );

    const result = parseSearchResult(payload);
    if (typeof result === 'string') {
      throw new CatalogFormatError(url, result);
    }
    return result;
  }

  async getSummaries(ids: string[]): Promise<GeoSeriesSummary[]> {
    if (ids.length === 0) return [];
    const payload = await this.http.getJson(
      `${E_UTILS_BASE}/esummary.fcgi`,
      this.entrezParams({ id: ids.join(',') }),
    );
    return parseSummaryResult(payload);
  }

  /**
   * Walks every series matching the platform search, page by page.
   * Only GSE entries are yielded.
   */
  async *iterateSeries(params: {
    platforms?: string[];
    limit?: number;
    pageSize?: number;
  } = {}): AsyncGenerator<GeoSeriesSummary> {
    const pageSize = params.pageSize ?? ESEARCH_PAGE_SIZE;
    const limit = params.limit ?? Infinity;
    let offset = 0;
    let yielded = 0;

    while (yielded < limit) {
      const page = await this.searchSeries({
        platforms: params.platforms,
        offset,
        pageSize,
      });
      if (offset === 0) {
        const names = (params.platforms ?? DEFAULT_PLATFORMS).map(
          (p) => METHYLATION_PLATFORMS[p] ?? p,
        );
        this.logger.log(
          `Entrez search over ${names.join(', ')} matched ${page.total} records`,
        );
      }
      if (page.ids.length === 0) return;

      for (let i = 0; i < page.ids.length; i += ESUMMARY_BATCH_SIZE) {
        const summaries = await this.getSummaries(
          page.ids.slice(i, i + ESUMMARY_BATCH_SIZE),
        );
        for (const summary of summaries) {
          if (summary.entryType !== 'GSE') continue;
          yield summary;
          if (++yielded >= limit) return;
        }
      }

      offset += page.ids.length;
      if (offset >= page.total) return;
    }
  }

  // ==========================================
  // Accession display (SOFT)
  // ==========================================

  async lookup(
    accession: string,
    view: 'brief' | 'full' = 'brief',
  ): Promise<SoftEntity[]> {
    const text = await this.http.getText(GEO_ACCN_BASE, {
      acc: accession,
      targ: 'self',
      view,
      form: 'text',
    });
    return parseSoft(text);
  }

  async getSeries(accession: string): Promise<GeoSeriesRecord> {
    const entity = await this.lookupEntity(accession, 'series');
    return {
      accession: entity.id,
      title: softFirst(entity, 'title'),
      summary: softJoined(entity, 'summary'),
      overallDesign: softJoined(entity, 'overall_design'),
      platformIds: softValues(entity, 'platform_id'),
      sampleIds: softValues(entity, 'sample_id'),
      organism: softFirst(entity, 'sample_organism'),
    };
  }

  async getSample(accession: string): Promise<CatalogSample> {
    const entity = await this.lookupEntity(accession, 'sample');
    const sourceName = softFirst(entity, 'source_name_ch1');
    const mapped = mapCharacteristics(
      softValues(entity, 'characteristics_ch1'),
      sourceName,
    );
    const seriesIds = softValues(entity, 'series_id');

    const extras: Record<string, unknown> = {};
    if (Object.keys(mapped.characteristics).length > 0) {
      extras.characteristics = mapped.characteristics;
    }
    if (mapped.notes.length > 0) extras.notes = mapped.notes;
    if (sourceName) extras.sourceName = sourceName;
    if (seriesIds.length > 1) extras.seriesIds = seriesIds;
    const molecule = softFirst(entity, 'molecule_ch1');
    if (molecule) extras.molecule = molecule;

    let files = await this.listSampleFiles(accession);
    if (files.length === 0) {
      files = this.supplementaryFiles(entity);
    }

    return {
      repository: 'geo',
      accession: entity.id,
      seriesAccession: seriesIds[0] ?? null,
      platformId: softFirst(entity, 'platform_id'),
      title: softFirst(entity, 'title'),
      organism: softFirst(entity, 'organism_ch1'),
      gender: mapped.gender,
      age: mapped.age,
      tissue: mapped.tissue,
      disease: mapped.disease,
      extractionProtocol: softJoined(entity, 'extract_protocol_ch1'),
      extras,
      files,
    };
  }

  // ==========================================
  // Files
  // ==========================================

  /** IDAT files in the sample's supplementary folder; none when the folder is missing. */
  async listSampleFiles(accession: string): Promise<CatalogFile[]> {
    const url = sampleFilesUrl(accession);
    let html: string;
    try {
      html = await this.http.getText(url);
    } catch (error) {
      if (error instanceof CatalogRequestError && error.status === 404) {
        return [];
      }
      throw error;
    }
    return parseDirectoryListing(html)
      .filter(isIdatFilename)
      .map((name) => toCatalogFile(name, url + encodeURIComponent(name)));
  }

  toCatalogStudy(
    summary: GeoSeriesSummary,
    series?: GeoSeriesRecord,
  ): CatalogStudy {
    const platformIds = toPlatformIds(summary.gpl);
    return {
      repository: 'geo',
      accession: summary.accession,
      title: summary.title,
      summary: summary.summary ?? series?.summary ?? null,
      overallDesign: series?.overallDesign ?? null,
      platformIds:
        platformIds.length > 0 ? platformIds : (series?.platformIds ?? []),
      organism: summary.taxon ?? series?.organism ?? null,
      sampleCount: summary.sampleCount,
      releasedAt: summary.publishedAt,
      extras: compact({
        entrezUid: summary.uid,
        gdsType: summary.gdsType,
        suppFile: summary.suppFile,
        bioproject: summary.bioproject,
      }),
      // The esummary list can be truncated for large series; SOFT has them all
      sampleAccessions:
        series && series.sampleIds.length > summary.sampleAccessions.length
          ? series.sampleIds
          : summary.sampleAccessions,
    };
  }

  private async lookupEntity(
    accession: string,
    type: 'series' | 'sample',
  ): Promise<SoftEntity> {
    const entity = (await this.lookup(accession)).find(
      (e) => e.type === type && e.id === accession,
    );
    if (!entity) {
      throw new CatalogFormatError(
        GEO_ACCN_BASE,
        `no ${type} record for ${accession}`,
      );
    }
    return entity;
  }

  private supplementaryFiles(entity: SoftEntity): CatalogFile[] {
    const files: CatalogFile[] = [];
    for (const [attr, values] of Object.entries(entity.attributes)) {
      if (!attr.startsWith('supplementary_file')) continue;
      for (const value of values) {
        const url = value.replace(/^ftp:\/\//, 'https://');
        const filename = url.slice(url.lastIndexOf('/') + 1);
        if (isIdatFilename(filename)) {
          files.push(toCatalogFile(filename, url));
        }
      }
    }
    return files;
  }

  private entrezParams(params: QueryParams): QueryParams {
    return {
      db: 'gds',
      retmode: 'json',
      tool: ENTREZ_TOOL,
      email: this.options.email,
      api_key: this.options.apiKey,
      ...params,
    };
  }
}
