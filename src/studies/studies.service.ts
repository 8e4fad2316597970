import { Injectable, NotFoundException } from '@nestjs/common';
import {
  paginate,
  PaginatedResponse,
} from '../common/interfaces/pagination.interface';
import {
  IdatFileRepository,
  SampleRepository,
  StudyRepository,
} from '../database/repositories';
import type { DomainStudy } from '../database/repositories/domain.types';
import { toSampleResponse } from '../samples/samples.mapper';
import type { SampleResponseDto } from '../samples/dto';
import {
  CatalogStatsResponseDto,
  PageQueryDto,
  QueryStudiesDto,
  StudyResponseDto,
} from './dto';

@Injectable()
export class StudiesService {
  constructor(
    private readonly studyRepo: StudyRepository,
    private readonly sampleRepo: SampleRepository,
    private readonly idatFileRepo: IdatFileRepository,
  ) {}

  async findMany(
    query: QueryStudiesDto,
  ): Promise<PaginatedResponse<StudyResponseDto>> {
    const filter = {
      repository: query.repository,
      platformId: query.platform,
      search: query.q,
    };
    const [studies, total] = await Promise.all([
      this.studyRepo.findMany(filter, query),
      this.studyRepo.count(filter),
    ]);
    return paginate(
      studies.map((s) => this.mapToResponse(s)),
      total,
      query.limit,
      query.offset,
    );
  }

  async findOne(id: number): Promise<StudyResponseDto> {
    const study = await this.studyRepo.findById(id);
    if (!study) {
      throw new NotFoundException(`Study with ID ${id} not found`);
    }
    return this.mapToResponse(study);
  }

  async findSamples(
    id: number,
    page: PageQueryDto,
  ): Promise<PaginatedResponse<SampleResponseDto>> {
    await this.findOne(id);
    const [samples, total] = await Promise.all([
      this.sampleRepo.findMany({ studyId: id }, page),
      this.sampleRepo.count({ studyId: id }),
    ]);
    return paginate(
      samples.map(toSampleResponse),
      total,
      page.limit,
      page.offset,
    );
  }

  async getStats(): Promise<CatalogStatsResponseDto> {
    const [studies, samples, files, pendingUpload, samplesByRepository] =
      await Promise.all([
        this.studyRepo.count(),
        this.sampleRepo.count(),
        this.idatFileRepo.count(),
        this.idatFileRepo.countPendingUpload(),
        this.sampleRepo.countByRepository(),
      ]);
    return {
      studies,
      samples,
      files: files.total,
      uploadedFiles: files.uploaded,
      pendingUpload,
      samplesByRepository,
    };
  }

  private mapToResponse(study: DomainStudy): StudyResponseDto {
    return {
      id: study.id,
      repository: study.repositoryId,
      accession: study.repositoryStudyId,
      title: study.title,
      summary: study.summary,
      overallDesign: study.overallDesign,
      platformIds: study.platformIds,
      organism: study.organism,
      sampleCount: study.sampleCount,
      releasedAt: study.releasedAt,
      extras: study.extras,
      createdAt: study.createdAt,
      updatedAt: study.updatedAt,
    };
  }
}
