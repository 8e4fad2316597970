import { NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import {
  IdatFileRepository,
  SampleRepository,
} from '../database/repositories';
import type {
  DomainIdatFile,
  DomainSample,
} from '../database/repositories/domain.types';
import { QuerySamplesDto } from './dto';
import { SamplesService } from './samples.service';

const created = new Date('2024-05-01T12:00:00Z');

const sample: DomainSample = {
  id: 5,
  repositoryId: 'geo',
  repositorySampleId: 'GSM1000001',
  repositorySeriesId: 'GSE1001',
  studyId: 1,
  platformId: 'GPL13534',
  title: 'donor 1',
  organism: 'Homo sapiens',
  gender: 'male',
  age: '61',
  tissue: 'whole blood',
  disease: null,
  extractionProtocol: null,
  extras: { molecule: 'genomic DNA' },
  createdAt: created,
};

const idatFile: DomainIdatFile = {
  id: 11,
  sampleId: 5,
  filename: 'GSM1000001_R01C01_Grn.idat.gz',
  sourceUrl: 'https://files.example.org/GSM1000001_R01C01_Grn.idat.gz',
  s3Key: 'geo/GSM1000001/GSM1000001_R01C01_Grn.idat.gz',
  channel: 'Grn',
  uploadedAt: created,
  processedAt: null,
  deletedAt: null,
  createdAt: created,
};

describe('SamplesService', () => {
  let service: SamplesService;
  const sampleRepo = {
    findById: jest.fn(async (id: number) => (id === 5 ? sample : null)),
    findMany: jest.fn(async () => [sample]),
    count: jest.fn(async () => 1),
  };
  const idatFileRepo = {
    findBySampleId: jest.fn(async () => [idatFile]),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    const moduleRef = await Test.createTestingModule({
      providers: [
        SamplesService,
        { provide: SampleRepository, useValue: sampleRepo },
        { provide: IdatFileRepository, useValue: idatFileRepo },
      ],
    }).compile();
    service = moduleRef.get(SamplesService);
  });

  it('passes query filters to the repository', async () => {
    const query = Object.assign(new QuerySamplesDto(), {
      repository: 'geo' as const,
      gender: 'male' as const,
      tissue: 'blood',
    });

    const page = await service.findMany(query);

    expect(sampleRepo.findMany).toHaveBeenCalledWith(
      {
        repository: 'geo',
        platformId: undefined,
        gender: 'male',
        tissue: 'blood',
        disease: undefined,
      },
      query,
    );
    expect(page.pagination).toEqual({
      limit: 50,
      offset: 0,
      total: 1,
      hasNext: false,
      hasPrev: false,
    });
  });

  it('returns a sample with its files', async () => {
    const detail = await service.findOne(5);

    expect(detail).toMatchObject({
      id: 5,
      accession: 'GSM1000001',
      seriesAccession: 'GSE1001',
      gender: 'male',
      files: [
        {
          id: 11,
          filename: 'GSM1000001_R01C01_Grn.idat.gz',
          channel: 'Grn',
          s3Key: 'geo/GSM1000001/GSM1000001_R01C01_Grn.idat.gz',
          uploadedAt: created,
        },
      ],
    });
    expect(idatFileRepo.findBySampleId).toHaveBeenCalledWith(5);
  });

  it('throws NotFoundException for a missing sample', async () => {
    await expect(service.findOne(6)).rejects.toBeInstanceOf(NotFoundException);
  });
});
