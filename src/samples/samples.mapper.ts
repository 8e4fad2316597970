import type {
  DomainIdatFile,
  DomainSample,
} from '../database/repositories/domain.types';
import type { IdatFileResponseDto, SampleResponseDto } from './dto';

export function toSampleResponse(sample: DomainSample): SampleResponseDto {
  return {
    id: sample.id,
    repository: sample.repositoryId,
    accession: sample.repositorySampleId,
    seriesAccession: sample.repositorySeriesId,
    studyId: sample.studyId,
    platformId: sample.platformId,
    title: sample.title,
    organism: sample.organism,
    gender: sample.gender,
    age: sample.age,
    tissue: sample.tissue,
    disease: sample.disease,
    extractionProtocol: sample.extractionProtocol,
    extras: sample.extras,
    createdAt: sample.createdAt,
  };
}

export function toIdatFileResponse(file: DomainIdatFile): IdatFileResponseDto {
  return {
    id: file.id,
    filename: file.filename,
    sourceUrl: file.sourceUrl,
    channel: file.channel,
    s3Key: file.s3Key,
    uploadedAt: file.uploadedAt,
  };
}
