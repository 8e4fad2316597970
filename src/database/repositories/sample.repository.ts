import { Injectable } from '@nestjs/common';
import { SelectQueryBuilder, Selectable } from 'kysely';
import { DbError } from '../../common/errors';
import { DatabaseService } from '../../db/database.service';
import { DB, RepositoryId } from '../../db/types';
import { DomainSample, NewSample, Page, SampleFilter } from './domain.types';
import { toJsonColumn } from './json-column';

type SampleTable = DB['sample'];

@Injectable()
export class SampleRepository {
  constructor(private readonly databaseService: DatabaseService) {}

  /**
   * Inserts a sample, ignoring conflicts on (repository_id, repository_sample_id).
   * Returns the sample id, new or existing.
   */
  async upsert(sample: NewSample): Promise<number> {
    const db = this.databaseService.db.write();

    const inserted = await db
      .insertInto('sample')
      .values({
        repository_id: sample.repositoryId,
        repository_sample_id: sample.repositorySampleId,
        repository_series_id: sample.repositorySeriesId ?? null,
        study_id: sample.studyId ?? null,
        platform_id: sample.platformId ?? null,
        title: sample.title ?? null,
        organism: sample.organism ?? null,
        gender: sample.gender ?? null,
        age: sample.age ?? null,
        tissue: sample.tissue ?? null,
        disease: sample.disease ?? null,
        extraction_protocol: sample.extractionProtocol ?? null,
        extras: toJsonColumn(sample.extras),
      })
      .onConflict((oc) =>
        oc.columns(['repository_id', 'repository_sample_id']).doNothing(),
      )
      .returning('id')
      .executeTakeFirst();

    if (inserted) {
      return inserted.id;
    }

    // Row already existed, fetch its id from the primary
    const existing = await db
      .selectFrom('sample')
      .select('id')
      .where('repository_id', '=', sample.repositoryId)
      .where('repository_sample_id', '=', sample.repositorySampleId)
      .executeTakeFirst();

    if (existing) {
      return existing.id;
    }

    throw new DbError(
      `Sample ${sample.repositoryId}:${sample.repositorySampleId} was expected to exist`,
    );
  }

  async findById(id: number): Promise<DomainSample | null> {
    const res = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('sample')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst(),
    );
    return res ? this.mapToDomainSample(res) : null;
  }

  async findMany(filter: SampleFilter, page: Page): Promise<DomainSample[]> {
    const res = await this.databaseService.db.executeRead((trx) =>
      this.applyFilter(trx.selectFrom('sample').selectAll(), filter)
        .orderBy('id', 'asc')
        .limit(page.limit)
        .offset(page.offset)
        .execute(),
    );
    return res.map((row) => this.mapToDomainSample(row));
  }

  async count(filter: SampleFilter = {}): Promise<number> {
    return this.databaseService.db.executeRead(async (trx) => {
      const res = await this.applyFilter(
        trx
          .selectFrom('sample')
          .select((eb) => eb.fn.count<string>('id').as('count')),
        filter,
      ).executeTakeFirst();
      return Number(res?.count ?? 0);
    });
  }

  async countByRepository(): Promise<Record<RepositoryId, number>> {
    const rows = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('sample')
        .select((eb) => ['repository_id', eb.fn.count<string>('id').as('count')])
        .groupBy('repository_id')
        .execute(),
    );

    const counts: Record<RepositoryId, number> = { geo: 0, arrayexpress: 0 };
    for (const row of rows) {
      counts[row.repository_id] = Number(row.count);
    }
    return counts;
  }

  private applyFilter<O>(
    query: SelectQueryBuilder<DB, 'sample', O>,
    filter: SampleFilter,
  ): SelectQueryBuilder<DB, 'sample', O> {
    let q = query;
    if (filter.repository) {
      q = q.where('repository_id', '=', filter.repository);
    }
    if (filter.studyId !== undefined) {
      q = q.where('study_id', '=', filter.studyId);
    }
    if (filter.platformId) {
      q = q.where('platform_id', '=', filter.platformId);
    }
    if (filter.gender) {
      q = q.where('gender', '=', filter.gender);
    }
    // Free-text columns from the repositories: partial, case-insensitive match
    if (filter.tissue) {
      q = q.where('tissue', 'ilike', `%${filter.tissue}%`);
    }
    if (filter.disease) {
      q = q.where('disease', 'ilike', `%${filter.disease}%`);
    }
    return q;
  }

  private mapToDomainSample(row: Selectable<SampleTable>): DomainSample {
    return {
      id: row.id,
      repositoryId: row.repository_id,
      repositorySampleId: row.repository_sample_id,
      repositorySeriesId: row.repository_series_id,
      studyId: row.study_id,
      platformId: row.platform_id,
      title: row.title,
      organism: row.organism,
      gender: row.gender,
      age: row.age,
      tissue: row.tissue,
      disease: row.disease,
      extractionProtocol: row.extraction_protocol,
      extras: row.extras,
      createdAt: row.created_at,
    };
  }
}
