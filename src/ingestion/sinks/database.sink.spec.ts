import { Test } from '@nestjs/testing';
import { access, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { CATALOG_HTTP } from '../../catalog/catalog.module';
import type { CatalogFile, CatalogSample } from '../../catalog/catalog.types';
import {
  IdatFileRepository,
  SampleRepository,
  StudyRepository,
} from '../../database/repositories';
import type { DomainIdatFile } from '../../database/repositories/domain.types';
import { ObjectStorageService } from '../../storage/object-storage.service';
import { DatabaseSink } from './database.sink';

const DOWNLOAD_DIR = path.join(tmpdir(), 'idat-database-sink-spec');

const file: CatalogFile = {
  filename: 'a_Grn.idat',
  url: 'https://files.example.org/E-MTAB-1/a_Grn.idat',
  channel: 'Grn',
};

const sample: CatalogSample = {
  repository: 'arrayexpress',
  accession: 'E-MTAB-1/donor 1',
  seriesAccession: 'E-MTAB-1',
  platformId: 'A-GEOD-13534',
  title: 'donor 1',
  organism: 'Homo sapiens',
  gender: 'female',
  age: '52 year',
  tissue: 'blood',
  disease: null,
  extractionProtocol: null,
  extras: { sourceName: 'donor 1' },
  files: [file],
};

function storedFile(overrides: Partial<DomainIdatFile>): DomainIdatFile {
  return {
    id: 9,
    sampleId: 4,
    filename: file.filename,
    sourceUrl: file.url,
    s3Key: null,
    channel: 'Grn',
    uploadedAt: null,
    processedAt: null,
    deletedAt: null,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
}

describe('DatabaseSink', () => {
  let sink: DatabaseSink;
  const studyRepo = { upsert: jest.fn(async () => 1) };
  const sampleRepo = { upsert: jest.fn(async () => 4) };
  const idatFileRepo = {
    insert: jest.fn(async () => 9),
    findById: jest.fn(async (_id: number): Promise<DomainIdatFile | null> => storedFile({})),
    markUploaded: jest.fn(async (_id: number, _key: string) => undefined),
  };
  const storage = {
    downloadDir: DOWNLOAD_DIR,
    isConfigured: jest.fn(() => true),
    uploadFile: jest.fn(async (_localPath: string, key: string) => key),
  };
  const http = {
    download: jest.fn(async (_url: string, _destination: string) => 12),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    const moduleRef = await Test.createTestingModule({
      providers: [
        DatabaseSink,
        { provide: StudyRepository, useValue: studyRepo },
        { provide: SampleRepository, useValue: sampleRepo },
        { provide: IdatFileRepository, useValue: idatFileRepo },
        { provide: ObjectStorageService, useValue: storage },
        { provide: CATALOG_HTTP, useValue: http },
      ],
    }).compile();
    sink = moduleRef.get(DatabaseSink);
  });

  afterAll(async () => {
    await rm(DOWNLOAD_DIR, { recursive: true, force: true });
  });

  it('maps a catalog sample onto the sample row', async () => {
    await expect(sink.saveSample(sample, 1)).resolves.toBe(4);
    expect(sampleRepo.upsert).toHaveBeenCalledWith({
      repositoryId: 'arrayexpress',
      repositorySampleId: 'E-MTAB-1/donor 1',
      repositorySeriesId: 'E-MTAB-1',
      studyId: 1,
      platformId: 'A-GEOD-13534',
      title: 'donor 1',
      organism: 'Homo sapiens',
      gender: 'female',
      age: '52 year',
      tissue: 'blood',
      disease: null,
      extractionProtocol: null,
      extras: { sourceName: 'donor 1' },
    });
  });

  it('registers files by sample and source URL', async () => {
    await expect(sink.saveFile(file, 4)).resolves.toBe(9);
    expect(idatFileRepo.insert).toHaveBeenCalledWith({
      sampleId: 4,
      filename: 'a_Grn.idat',
      sourceUrl: 'https://files.example.org/E-MTAB-1/a_Grn.idat',
      channel: 'Grn',
    });
  });

  it('downloads, uploads and marks a file that is not stored yet', async () => {
    const key = 'arrayexpress/E-MTAB-1_donor_1/a_Grn.idat';
    const localPath = path.join(DOWNLOAD_DIR, key);

    await expect(sink.transferFile(9, file, sample)).resolves.toBe(true);

    expect(http.download).toHaveBeenCalledWith(file.url, localPath);
    expect(storage.uploadFile).toHaveBeenCalledWith(localPath, key);
    expect(idatFileRepo.markUploaded).toHaveBeenCalledWith(9, key);
  });

  it('skips files that were already uploaded', async () => {
    idatFileRepo.findById.mockResolvedValueOnce(
      storedFile({ uploadedAt: new Date(), s3Key: 'arrayexpress/x/a_Grn.idat' }),
    );

    await expect(sink.transferFile(9, file, sample)).resolves.toBe(false);
    expect(http.download).not.toHaveBeenCalled();
  });

  it('leaves the row unmarked when the upload fails', async () => {
    storage.uploadFile.mockRejectedValueOnce(new Error('access denied'));

    await expect(sink.transferFile(9, file, sample)).rejects.toThrow('access denied');
    expect(idatFileRepo.markUploaded).not.toHaveBeenCalled();
  });

  it('deletes the local copy when the upload fails', async () => {
    const localPath = path.join(DOWNLOAD_DIR, 'arrayexpress/E-MTAB-1_donor_1/a_Grn.idat');
    http.download.mockImplementationOnce(async (_url: string, destination: string) => {
      await mkdir(path.dirname(destination), { recursive: true });
      await writeFile(destination, 'IDAT');
      return 4;
    });
    let uploaded = '';
    storage.uploadFile.mockImplementationOnce(async (localFile: string) => {
      uploaded = await readFile(localFile, 'utf8');
      throw new Error('access denied');
    });

    await expect(sink.transferFile(9, file, sample)).rejects.toThrow('access denied');

    expect(uploaded).toBe('IDAT');
    await expect(access(localPath)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('keeps a file name with path segments inside the download folder', async () => {
    const escaping: CatalogFile = { ...file, filename: '../../../../tmp/escaped.idat' };
    const key = 'arrayexpress/E-MTAB-1_donor_1/.._.._.._.._tmp_escaped.idat';

    await expect(sink.transferFile(9, escaping, sample)).resolves.toBe(true);

    expect(http.download).toHaveBeenCalledWith(file.url, path.join(DOWNLOAD_DIR, key));
    expect(storage.uploadFile).toHaveBeenCalledWith(path.join(DOWNLOAD_DIR, key), key);
  });

  it('refuses a file name that points at a folder', async () => {
    await expect(
      sink.transferFile(9, { ...file, filename: '..' }, sample),
    ).rejects.toThrow('Cannot build an object key from E-MTAB-1/donor 1/..');
    expect(http.download).not.toHaveBeenCalled();
  });
});
