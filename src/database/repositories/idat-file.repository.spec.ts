import { Test } from '@nestjs/testing';
import { DbError } from '../../common/errors';
import { DatabaseService } from '../../db/database.service';
import { createRecordingDb, RecordingDb } from '../../db/testing/recording-db';
import { IdatFileRepository } from './idat-file.repository';

describe('IdatFileRepository', () => {
  let recording: RecordingDb;
  let repository: IdatFileRepository;

  beforeEach(async () => {
    recording = createRecordingDb();
    const moduleRef = await Test.createTestingModule({
      providers: [
        IdatFileRepository,
        { provide: DatabaseService, useValue: { db: recording.router } },
      ],
    }).compile();
    repository = moduleRef.get(IdatFileRepository);
  });

  it('registers a file idempotently on sample and source URL', async () => {
    await expect(
      repository.insert({
        sampleId: 4,
        filename: 'a_Grn.idat',
        sourceUrl: 'https://files.example.org/a_Grn.idat',
        channel: 'Grn',
      }),
    ).rejects.toThrow(
      new DbError('IDAT file https://files.example.org/a_Grn.idat was expected to exist'),
    );

    const [insert, lookup] = recording.queries;
    expect(insert.sql).toBe(
      'insert into "idat_file" ("sample_id", "filename", "source_url", "channel", "s3_key") values ($1, $2, $3, $4, $5) on conflict ("sample_id", "source_url") do nothing returning "id"',
    );
    expect(insert.parameters).toEqual([
      4,
      'a_Grn.idat',
      'https://files.example.org/a_Grn.idat',
      'Grn',
      null,
    ]);
    expect(lookup.parameters).toEqual([4, 'https://files.example.org/a_Grn.idat']);
  });

  it('stamps upload, processing and deletion times', async () => {
    await repository.markUploaded(9, 'geo/GSM1/a_Grn.idat');
    await repository.markProcessed(9);
    await repository.markDeleted(9);

    expect(recording.queries.map((q) => q.sql)).toEqual([
      'update "idat_file" set "s3_key" = $1, "uploaded_at" = now() where "id" = $2',
      'update "idat_file" set "processed_at" = now() where "id" = $1',
      'update "idat_file" set "deleted_at" = now() where "id" = $1',
    ]);
    expect(recording.queries[0].parameters).toEqual(['geo/GSM1/a_Grn.idat', 9]);
  });

  it('lists live files of a sample by name', async () => {
    await expect(repository.findBySampleId(4)).resolves.toEqual([]);

    expect(recording.queries[0].sql).toBe(
      'select * from "idat_file" where "sample_id" = $1 and "deleted_at" is null order by "filename" asc',
    );
  });

  it('counts files still waiting for upload', async () => {
    await expect(repository.countPendingUpload()).resolves.toBe(0);

    expect(recording.queries[0].sql).toBe(
      'select count("id") as "count" from "idat_file" where "uploaded_at" is null and "deleted_at" is null',
    );
  });

  it('counts total and uploaded files', async () => {
    await expect(repository.count()).resolves.toEqual({ total: 0, uploaded: 0 });

    expect(recording.queries[0].sql).toBe(
      'select count("id") as "total", count("uploaded_at") as "uploaded" from "idat_file" where "deleted_at" is null',
    );
  });
});
