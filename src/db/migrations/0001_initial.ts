import { Kysely, sql } from 'kysely';

// Migrations take an untyped Kysely: the schema they build is what DB describes
export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createType('gender')
    .asEnum(['male', 'female', 'unknown'])
    .execute();

  await db.schema
    .createTable('study')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('repository_id', 'text', (col) => col.notNull())
    .addColumn('repository_study_id', 'text', (col) => col.notNull())
    .addColumn('title', 'text', (col) => col.notNull())
    .addColumn('summary', 'text')
    .addColumn('overall_design', 'text')
    .addColumn('platform_ids', sql`text[]`, (col) =>
      col.notNull().defaultTo(sql`'{}'`),
    )
    .addColumn('organism', 'text')
    .addColumn('sample_count', 'integer')
    .addColumn('released_at', 'text')
    .addColumn('extras', 'jsonb')
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`),
    )
    .addColumn('updated_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`),
    )
    .addUniqueConstraint('study_repository_uq', [
      'repository_id',
      'repository_study_id',
    ])
    .execute();

  await db.schema
    .createTable('sample')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('repository_id', 'text', (col) => col.notNull())
    .addColumn('repository_sample_id', 'text', (col) => col.notNull())
    .addColumn('repository_series_id', 'text')
    .addColumn('study_id', 'integer', (col) =>
      col.references('study.id').onDelete('set null'),
    )
    .addColumn('platform_id', 'text')
    .addColumn('title', 'text')
    .addColumn('organism', 'text')
    .addColumn('gender', sql`gender`)
    .addColumn('age', 'text')
    .addColumn('tissue', 'text')
    .addColumn('disease', 'text')
    .addColumn('extraction_protocol', 'text')
    .addColumn('extras', 'jsonb')
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`),
    )
    .addUniqueConstraint('sample_repository_uq', [
      'repository_id',
      'repository_sample_id',
    ])
    .execute();

  await db.schema
    .createIndex('sample_study_id_idx')
    .on('sample')
    .column('study_id')
    .execute();

  await db.schema
    .createTable('idat_file')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('sample_id', 'integer', (col) =>
      col.notNull().references('sample.id').onDelete('cascade'),
    )
    .addColumn('filename', 'text', (col) => col.notNull())
    .addColumn('source_url', 'text', (col) => col.notNull())
    .addColumn('s3_key', 'text')
    .addColumn('channel', 'text')
    .addColumn('uploaded_at', 'timestamptz')
    .addColumn('processed_at', 'timestamptz')
    .addColumn('deleted_at', 'timestamptz')
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`),
    )
    .addUniqueConstraint('idat_file_source_uq', ['sample_id', 'source_url'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('idat_file').execute();
  await db.schema.dropTable('sample').execute();
  await db.schema.dropTable('study').execute();
  await db.schema.dropType('gender').execute();
}
