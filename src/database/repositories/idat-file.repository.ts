import { Injectable } from '@nestjs/common';
import { Selectable, sql } from 'kysely';
import { DbError } from '../../common/errors';
import { DatabaseService } from '../../db/database.service';
import { DB } from '../../db/types';
import { DomainIdatFile, NewIdatFile } from './domain.types';

type IdatFileTable = DB['idat_file'];

@Injectable()
export class IdatFileRepository {
  constructor(private readonly databaseService: DatabaseService) {}

  /** Registers a raw file; registering the same (sample, url) twice returns the first id. */
  async insert(file: NewIdatFile): Promise<number> {
    const db = this.databaseService.db.write();

    const inserted = await db
      .insertInto('idat_file')
      .values({
        sample_id: file.sampleId,
        filename: file.filename,
        source_url: file.sourceUrl,
        channel: file.channel ?? null,
        s3_key: file.s3Key ?? null,
      })
      .onConflict((oc) => oc.columns(['sample_id', 'source_url']).doNothing())
      .returning('id')
      .executeTakeFirst();

    if (inserted) {
      return inserted.id;
    }

    const existing = await db
      .selectFrom('idat_file')
      .select('id')
      .where('sample_id', '=', file.sampleId)
      .where('source_url', '=', file.sourceUrl)
      .executeTakeFirst();

    if (existing) {
      return existing.id;
    }

    throw new DbError(`IDAT file ${file.sourceUrl} was expected to exist`);
  }

  async findById(id: number): Promise<DomainIdatFile | null> {
    const res = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('idat_file')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst(),
    );
    return res ? this.mapToDomainIdatFile(res) : null;
  }

  async findBySampleId(sampleId: number): Promise<DomainIdatFile[]> {
    const res = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('idat_file')
        .selectAll()
        .where('sample_id', '=', sampleId)
        .where('deleted_at', 'is', null)
        .orderBy('filename', 'asc')
        .execute(),
    );
    return res.map((row) => this.mapToDomainIdatFile(row));
  }

  async markUploaded(id: number, s3Key: string): Promise<void> {
    await this.databaseService.db
      .write()
      .updateTable('idat_file')
      .set({ s3_key: s3Key, uploaded_at: sql`now()` })
      .where('id', '=', id)
      .execute();
  }

  async markProcessed(id: number): Promise<void> {
    await this.databaseService.db
      .write()
      .updateTable('idat_file')
      .set({ processed_at: sql`now()` })
      .where('id', '=', id)
      .execute();
  }

  async markDeleted(id: number): Promise<void> {
    await this.databaseService.db
      .write()
      .updateTable('idat_file')
      .set({ deleted_at: sql`now()` })
      .where('id', '=', id)
      .execute();
  }

  /** Registered files not yet copied to object storage. */
  async countPendingUpload(): Promise<number> {
    return this.databaseService.db.executeRead(async (trx) => {
      const res = await trx
        .selectFrom('idat_file')
        .select((eb) => eb.fn.count<string>('id').as('count'))
        .where('uploaded_at', 'is', null)
        .where('deleted_at', 'is', null)
        .executeTakeFirst();
      return Number(res?.count ?? 0);
    });
  }

  async count(): Promise<{ total: number; uploaded: number }> {
    return this.databaseService.db.executeRead(async (trx) => {
      const res = await trx
        .selectFrom('idat_file')
        .select((eb) => [
          eb.fn.count<string>('id').as('total'),
          eb.fn.count<string>('uploaded_at').as('uploaded'),
        ])
        .where('deleted_at', 'is', null)
        .executeTakeFirst();
      return {
        total: Number(res?.total ?? 0),
        uploaded: Number(res?.uploaded ?? 0),
      };
    });
  }

  private mapToDomainIdatFile(row: Selectable<IdatFileTable>): DomainIdatFile {
    return {
      id: row.id,
      sampleId: row.sample_id,
      filename: row.filename,
      sourceUrl: row.source_url,
      s3Key: row.s3_key,
      channel: row.channel,
      uploadedAt: row.uploaded_at,
      processedAt: row.processed_at,
      deletedAt: row.deleted_at,
      createdAt: row.created_at,
    };
  }
}
