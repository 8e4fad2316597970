import { Test } from '@nestjs/testing';
import { DbError } from '../../common/errors';
import { DatabaseService } from '../../db/database.service';
import { createRecordingDb, RecordingDb } from '../../db/testing/recording-db';
import { SampleRepository } from './sample.repository';

describe('SampleRepository', () => {
  let recording: RecordingDb;
  let repository: SampleRepository;

  beforeEach(async () => {
    recording = createRecordingDb();
    const moduleRef = await Test.createTestingModule({
      providers: [
        SampleRepository,
        { provide: DatabaseService, useValue: { db: recording.router } },
      ],
    }).compile();
    repository = moduleRef.get(SampleRepository);
  });

  it('inserts with on conflict do nothing, then looks the row up', async () => {
    await expect(
      repository.upsert({
        repositoryId: 'geo',
        repositorySampleId: 'GSM1',
        studyId: 7,
        platformId: 'GPL13534',
        gender: 'female',
        extras: { batch: '2' },
      }),
    ).rejects.toThrow(new DbError('Sample geo:GSM1 was expected to exist'));

    const [insert, lookup] = recording.queries;
    expect(insert.sql).toContain(
      'on conflict ("repository_id", "repository_sample_id") do nothing returning "id"',
    );
    expect(insert.parameters).toEqual([
      'geo',
      'GSM1',
      null,
      7,
      'GPL13534',
      null,
      null,
      'female',
      null,
      null,
      null,
      null,
      '{"batch":"2"}',
    ]);
    expect(lookup.sql).toBe(
      'select "id" from "sample" where "repository_id" = $1 and "repository_sample_id" = $2',
    );
    expect(lookup.parameters).toEqual(['geo', 'GSM1']);
  });

  it('filters free-text columns by case-insensitive substring', async () => {
    await expect(
      repository.count({ repository: 'geo', gender: 'female', tissue: 'blood' }),
    ).resolves.toBe(0);

    expect(recording.queries[0].sql).toBe(
      'select count("id") as "count" from "sample" where "repository_id" = $1 and "gender" = $2 and "tissue" ilike $3',
    );
    expect(recording.queries[0].parameters).toEqual(['geo', 'female', '%blood%']);
  });

  it('pages through samples of a study in id order', async () => {
    await expect(
      repository.findMany({ studyId: 3 }, { limit: 20, offset: 40 }),
    ).resolves.toEqual([]);

    expect(recording.queries[0].sql).toBe(
      'select * from "sample" where "study_id" = $1 order by "id" asc limit $2 offset $3',
    );
    expect(recording.queries[0].parameters).toEqual([3, 20, 40]);
  });

  it('reports zero for repositories without samples', async () => {
    await expect(repository.countByRepository()).resolves.toEqual({
      geo: 0,
      arrayexpress: 0,
    });
  });
});
