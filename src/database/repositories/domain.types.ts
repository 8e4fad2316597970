import type { Gender, IdatChannel, RepositoryId } from '../../db/types';

// Domain interfaces for studies, samples and their raw files

export interface DomainStudy {
  id: number;
  repositoryId: RepositoryId;
  repositoryStudyId: string;
  title: string;
  summary: string | null;
  overallDesign: string | null;
  platformIds: string[];
  organism: string | null;
  sampleCount: number | null;
  releasedAt: string | null;
  extras: Record<string, unknown> | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface DomainSample {
  id: number;
  repositoryId: RepositoryId;
  repositorySampleId: string;
  repositorySeriesId: string | null;
  studyId: number | null;
  platformId: string | null;
  title: string | null;
  organism: string | null;
  gender: Gender | null;
  age: string | null;
  tissue: string | null;
  disease: string | null;
  extractionProtocol: string | null;
  extras: Record<string, unknown> | null;
  createdAt: Date;
}

export interface DomainIdatFile {
  id: number;
  sampleId: number;
  filename: string;
  sourceUrl: string;
  s3Key: string | null;
  channel: IdatChannel | null;
  uploadedAt: Date | null;
  processedAt: Date | null;
  deletedAt: Date | null;
  createdAt: Date;
}

// Write models (what the loader hands to the repositories)

export interface NewStudy {
  repositoryId: RepositoryId;
  repositoryStudyId: string;
  title: string;
  summary?: string | null;
  overallDesign?: string | null;
  platformIds: string[];
  organism?: string | null;
  sampleCount?: number | null;
  releasedAt?: string | null;
  extras?: Record<string, unknown> | null;
}

export interface NewSample {
  repositoryId: RepositoryId;
  repositorySampleId: string;
  repositorySeriesId?: string | null;
  studyId?: number | null;
  platformId?: string | null;
  title?: string | null;
  organism?: string | null;
  gender?: Gender | null;
  age?: string | null;
  tissue?: string | null;
  disease?: string | null;
  extractionProtocol?: string | null;
  extras?: Record<string, unknown> | null;
}

export interface NewIdatFile {
  sampleId: number;
  filename: string;
  sourceUrl: string;
  channel?: IdatChannel | null;
  s3Key?: string | null;
}

export interface StudyFilter {
  repository?: RepositoryId;
  platformId?: string;
  search?: string;
}

export interface SampleFilter {
  repository?: RepositoryId;
  studyId?: number;
  platformId?: string;
  gender?: Gender;
  tissue?: string;
  disease?: string;
}

export interface Page {
  limit: number;
  offset: number;
}
