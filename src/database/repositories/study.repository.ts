import { Injectable } from '@nestjs/common';
import { SelectQueryBuilder, Selectable, sql } from 'kysely';
import { DbError } from '../../common/errors';
import { DatabaseService } from '../../db/database.service';
import { DB } from '../../db/types';
import { DomainStudy, NewStudy, Page, StudyFilter } from './domain.types';
import { toJsonColumn } from './json-column';

type StudyTable = DB['study'];

@Injectable()
export class StudyRepository {
  constructor(private readonly databaseService: DatabaseService) {}

  /**
   * Inserts a study or refreshes the descriptive columns of the existing row
   * with the same (repository_id, repository_study_id). Returns the row id.
   */
  async upsert(study: NewStudy): Promise<number> {
    const values = {
      title: study.title,
      summary: study.summary ?? null,
      overall_design: study.overallDesign ?? null,
      platform_ids: study.platformIds,
      organism: study.organism ?? null,
      sample_count: study.sampleCount ?? null,
      released_at: study.releasedAt ?? null,
      extras: toJsonColumn(study.extras),
    };

    const row = await this.databaseService.db
      .write()
      .insertInto('study')
      .values({
        repository_id: study.repositoryId,
        repository_study_id: study.repositoryStudyId,
        ...values,
      })
      .onConflict((oc) =>
        oc
          .columns(['repository_id', 'repository_study_id'])
          .doUpdateSet({ ...values, updated_at: new Date() }),
      )
      .returning('id')
      .executeTakeFirst();

    if (!row) {
      throw new DbError(
        `Upsert of study ${study.repositoryStudyId} returned no row`,
      );
    }
    return row.id;
  }

  async findById(id: number): Promise<DomainStudy | null> {
    const res = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('study')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst(),
    );
    return res ? this.mapToDomainStudy(res) : null;
  }

  async findMany(filter: StudyFilter, page: Page): Promise<DomainStudy[]> {
    const res = await this.databaseService.db.executeRead((trx) =>
      this.applyFilter(trx.selectFrom('study').selectAll(), filter)
        .orderBy('id', 'asc')
        .limit(page.limit)
        .offset(page.offset)
        .execute(),
    );
    return res.map((row) => this.mapToDomainStudy(row));
  }

  async count(filter: StudyFilter = {}): Promise<number> {
    return this.databaseService.db.executeRead(async (trx) => {
      const res = await this.applyFilter(
        trx
          .selectFrom('study')
          .select((eb) => eb.fn.count<string>('id').as('count')),
        filter,
      ).executeTakeFirst();
      return Number(res?.count ?? 0);
    });
  }

  private applyFilter<O>(
    query: SelectQueryBuilder<DB, 'study', O>,
    filter: StudyFilter,
  ): SelectQueryBuilder<DB, 'study', O> {
    let q = query;
    if (filter.repository) {
      q = q.where('repository_id', '=', filter.repository);
    }
    if (filter.platformId) {
      q = q.where(
        sql<boolean>`${filter.platformId} = any(${sql.ref('platform_ids')})`,
      );
    }
    if (filter.search) {
      const pattern = `%${filter.search}%`;
      q = q.where((eb) =>
        eb.or([
          eb('title', 'ilike', pattern),
          eb('summary', 'ilike', pattern),
          eb('repository_study_id', 'ilike', pattern),
        ]),
      );
    }
    return q;
  }

  private mapToDomainStudy(row: Selectable<StudyTable>): DomainStudy {
    return {
      id: row.id,
      repositoryId: row.repository_id,
      repositoryStudyId: row.repository_study_id,
      title: row.title,
      summary: row.summary,
      overallDesign: row.overall_design,
      platformIds: row.platform_ids,
      organism: row.organism,
      sampleCount: row.sample_count,
      releasedAt: row.released_at,
      extras: row.extras,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
