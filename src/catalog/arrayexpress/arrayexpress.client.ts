import { Logger } from '@nestjs/common';
import type { CatalogSample, CatalogStudy } from '../catalog.types';
import { CatalogHttpClient } from '../http/catalog-http.client';
import {
  ArrayExpressHit,
  ArrayExpressSearchPage,
  BioStudiesStudy,
  parseSearchPage,
  parseStudy,
} from './biostudies.types';
import { groupSdrfSamples, parseSdrf, SdrfRow } from './sdrf.parser';

export const BIOSTUDIES_API = 'https://www.ebi.ac.uk/biostudies/api/v1';
export const BIOSTUDIES_FTP = 'https://ftp.ebi.ac.uk/biostudies/fire';

export const METHYLATION_STUDY_TYPE = 'methylation profiling by array';
export const SEARCH_PAGE_SIZE = 100;

/**
 * Folder of a study's files on the BioStudies FIRE mirror:
 * E-MTAB-1234 → fire/E-MTAB-/234/E-MTAB-1234/Files/
 */
export function filesBaseUrl(accession: string): string {
  const parts = accession.split('-');
  if (parts.length < 3) {
    throw new Error(`Not an ArrayExpress accession: ${accession}`);
  }
  const prefix = `${parts.slice(0, 2).join('-')}-`;
  const digits = parts[parts.length - 1].replace(/\D/g, '');
  const suffix = digits.slice(-3).padStart(3, '0');
  return `${BIOSTUDIES_FTP}/${prefix}/${suffix}/${accession}/Files/`;
}

/**
 * ArrayExpress, as served by BioStudies: search API for discovery, study
 * API for descriptions, SDRF sample sheets on the FTP mirror for samples.
 */
export class ArrayExpressClient {
  private readonly logger = new Logger(ArrayExpressClient.name);

  constructor(private readonly http: CatalogHttpClient) {}

  async search(params: {
    page?: number;
    pageSize?: number;
  } = {}): Promise<ArrayExpressSearchPage> {
    const payload = await this.http.getJson(
      `${BIOSTUDIES_API}/arrayexpress/search`,
      {
        'facet.study_type': METHYLATION_STUDY_TYPE,
        'facet.file_type': 'idat',
        page: params.page ?? 1,
        pageSize: params.pageSize ?? SEARCH_PAGE_SIZE,
      },
    );
    return parseSearchPage(payload);
  }

  async *iterateStudies(params: {
    limit?: number;
    pageSize?: number;
  } = {}): AsyncGenerator<ArrayExpressHit> {
    const limit = params.limit ?? Infinity;
    let page = 1;
    let yielded = 0;
    let seen = 0;

    while (yielded < limit) {
      const result = await this.search({ page, pageSize: params.pageSize });
      if (page === 1) {
        this.logger.log(`ArrayExpress search matched ${result.totalHits} studies`);
      }
      if (result.hits.length === 0) return;

      for (const hit of result.hits) {
        yield hit;
        if (++yielded >= limit) return;
      }

      seen += result.hits.length;
      if (seen >= result.totalHits) return;
      page++;
    }
  }

  async getStudy(accession: string): Promise<BioStudiesStudy> {
    const payload = await this.http.getJson(
      `${BIOSTUDIES_API}/studies/${encodeURIComponent(accession)}`,
    );
    return parseStudy(accession, payload);
  }

  async getSdrf(accession: string): Promise<SdrfRow[]> {
    const text = await this.http.getText(
      `${filesBaseUrl(accession)}${accession}.sdrf.txt`,
    );
    return parseSdrf(text);
  }

  async getStudySamples(accession: string): Promise<CatalogSample[]> {
    const rows = await this.getSdrf(accession);
    return groupSdrfSamples(accession, rows, filesBaseUrl(accession));
  }

  toCatalogStudy(
    hit: ArrayExpressHit,
    study: BioStudiesStudy,
    samples: CatalogSample[],
  ): CatalogStudy {
    const platformIds = [
      ...new Set(
        samples
          .map((s) => s.platformId)
          .filter((p): p is string => p !== null),
      ),
    ];
    return {
      repository: 'arrayexpress',
      accession: hit.accession,
      title: study.title ?? hit.title ?? hit.accession,
      summary: study.description,
      overallDesign: null,
      platformIds,
      organism: study.organism,
      sampleCount: samples.length,
      releasedAt: study.releaseDate ?? hit.releaseDate,
      extras: {
        ...(study.studyType !== null ? { studyType: study.studyType } : {}),
        ...(hit.author !== null ? { author: hit.author } : {}),
      },
      sampleAccessions: samples.map((s) => s.accession),
    };
  }
}
