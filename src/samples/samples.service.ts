import { Injectable, NotFoundException } from '@nestjs/common';
import {
  paginate,
  PaginatedResponse,
} from '../common/interfaces/pagination.interface';
import {
  IdatFileRepository,
  SampleRepository,
} from '../database/repositories';
import type { SampleFilter } from '../database/repositories/domain.types';
import {
  QuerySamplesDto,
  SampleDetailResponseDto,
  SampleResponseDto,
} from './dto';
import { toIdatFileResponse, toSampleResponse } from './samples.mapper';

@Injectable()
export class SamplesService {
  constructor(
    private readonly sampleRepo: SampleRepository,
    private readonly idatFileRepo: IdatFileRepository,
  ) {}

  async findMany(
    query: QuerySamplesDto,
  ): Promise<PaginatedResponse<SampleResponseDto>> {
    const filter: SampleFilter = {
      repository: query.repository,
      platformId: query.platform,
      gender: query.gender,
      tissue: query.tissue,
      disease: query.disease,
    };
    const [samples, total] = await Promise.all([
      this.sampleRepo.findMany(filter, query),
      this.sampleRepo.count(filter),
    ]);
    return paginate(
      samples.map(toSampleResponse),
      total,
      query.limit,
      query.offset,
    );
  }

  async findOne(id: number): Promise<SampleDetailResponseDto> {
    const sample = await this.sampleRepo.findById(id);
    if (!sample) {
      throw new NotFoundException(`Sample with ID ${id} not found`);
    }
    const files = await this.idatFileRepo.findBySampleId(id);
    return {
      ...toSampleResponse(sample),
      files: files.map(toIdatFileResponse),
    };
  }
}
