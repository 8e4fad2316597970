import type { Gender, IdatChannel, RepositoryId } from '../db/types';

export interface CatalogFile {
  filename: string;
  url: string;
  channel: IdatChannel | null;
}

export interface CatalogSample {
  repository: RepositoryId;
  accession: string;
  seriesAccession: string | null;
  platformId: string | null;
  title: string | null;
  organism: string | null;
  gender: Gender | null;
  age: string | null;
  tissue: string | null;
  disease: string | null;
  extractionProtocol: string | null;
  extras: Record<string, unknown>;
  files: CatalogFile[];
}

export interface CatalogStudy {
  repository: RepositoryId;
  accession: string;
  title: string;
  summary: string | null;
  overallDesign: string | null;
  platformIds: string[];
  organism: string | null;
  sampleCount: number | null;
  releasedAt: string | null;
  extras: Record<string, unknown>;
  /** Sample accessions listed by the study record, when the repository gives them */
  sampleAccessions: string[];
}
