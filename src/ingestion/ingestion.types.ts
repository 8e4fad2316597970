import type { CatalogFile, CatalogSample, CatalogStudy } from '../catalog/catalog.types';
import type { RepositoryId } from '../db/types';

export interface CrawlOptions {
  /** Maximum number of studies to crawl */
  limit?: number;
  /** Maximum number of samples per study */
  sampleLimit?: number;
  /** GEO platform accessions to search for */
  platforms?: string[];
  dryRun?: boolean;
  /** Download raw files and push them to object storage */
  uploadFiles?: boolean;
}

export interface CrawlFailure {
  accession: string;
  reason: string;
}

export interface CrawlReport {
  repository: RepositoryId;
  studies: number;
  samples: number;
  files: number;
  uploaded: number;
  failures: CrawlFailure[];
}

/** Where the loader writes what the catalog clients produce. */
export interface CatalogSink {
  saveStudy(study: CatalogStudy): Promise<number>;
  saveSample(sample: CatalogSample, studyId: number): Promise<number>;
  saveFile(file: CatalogFile, sampleId: number): Promise<number>;
  /** Whether transferFile can push files anywhere. */
  canTransfer(): boolean;
  /** Copies a registered file into object storage. Resolves false when it was already there. */
  transferFile(
    fileId: number,
    file: CatalogFile,
    sample: CatalogSample,
  ): Promise<boolean>;
}

export function emptyReport(repository: RepositoryId): CrawlReport {
  return { repository, studies: 0, samples: 0, files: 0, uploaded: 0, failures: [] };
}
