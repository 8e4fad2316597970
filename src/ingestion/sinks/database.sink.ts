import { Inject, Injectable, Logger } from '@nestjs/common';
import { rm } from 'node:fs/promises';
import path from 'node:path';
import { CATALOG_HTTP } from '../../catalog/catalog.module';
import type {
  CatalogFile,
  CatalogSample,
  CatalogStudy,
} from '../../catalog/catalog.types';
import { CatalogHttpClient } from '../../catalog/http/catalog-http.client';
import {
  IdatFileRepository,
  SampleRepository,
  StudyRepository,
} from '../../database/repositories';
import {
  ObjectStorageService,
  objectKey,
} from '../../storage/object-storage.service';
import type { CatalogSink } from '../ingestion.types';

@Injectable()
export class DatabaseSink implements CatalogSink {
  private readonly logger = new Logger(DatabaseSink.name);

  constructor(
    private readonly studyRepo: StudyRepository,
    private readonly sampleRepo: SampleRepository,
    private readonly idatFileRepo: IdatFileRepository,
    private readonly storage: ObjectStorageService,
    @Inject(CATALOG_HTTP) private readonly http: CatalogHttpClient,
  ) {}

  async saveStudy(study: CatalogStudy): Promise<number> {
    return this.studyRepo.upsert({
      repositoryId: study.repository,
      repositoryStudyId: study.accession,
      title: study.title,
      summary: study.summary,
      overallDesign: study.overallDesign,
      platformIds: study.platformIds,
      organism: study.organism,
      sampleCount: study.sampleCount,
      releasedAt: study.releasedAt,
      extras: study.extras,
    });
  }

  async saveSample(sample: CatalogSample, studyId: number): Promise<number> {
    return this.sampleRepo.upsert({
      repositoryId: sample.repository,
      repositorySampleId: sample.accession,
      repositorySeriesId: sample.seriesAccession,
      studyId,
      platformId: sample.platformId,
      title: sample.title,
      organism: sample.organism,
      gender: sample.gender,
      age: sample.age,
      tissue: sample.tissue,
      disease: sample.disease,
      extractionProtocol: sample.extractionProtocol,
      extras: sample.extras,
    });
  }

  async saveFile(file: CatalogFile, sampleId: number): Promise<number> {
    return this.idatFileRepo.insert({
      sampleId,
      filename: file.filename,
      sourceUrl: file.url,
      channel: file.channel,
    });
  }

  canTransfer(): boolean {
    return this.storage.isConfigured();
  }

  async transferFile(
    fileId: number,
    file: CatalogFile,
    sample: CatalogSample,
  ): Promise<boolean> {
    const existing = await this.idatFileRepo.findById(fileId);
    if (existing?.uploadedAt) {
      this.logger.debug(`${file.filename} already stored as ${existing.s3Key}`);
      return false;
    }

    const key = objectKey(sample.repository, sample.accession, file.filename);
    const root = path.resolve(this.storage.downloadDir);
    const localPath = path.resolve(root, key);
    if (!localPath.startsWith(root + path.sep)) {
      throw new Error(`Refusing to download ${file.filename} outside ${root}`);
    }
    try {
      await this.http.download(file.url, localPath);
      await this.storage.uploadFile(localPath, key);
      await this.idatFileRepo.markUploaded(fileId, key);
      return true;
    } finally {
      await rm(localPath, { force: true });
    }
  }
}
