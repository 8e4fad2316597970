import type { ColumnType } from 'kysely';
export type Generated<T> = T extends ColumnType<infer S, infer I, infer U>
  ? ColumnType<S, I | undefined, U>
  : ColumnType<T, T | undefined, T>;
export type Timestamp = ColumnType<Date, Date | string, Date | string>;
export type Json = ColumnType<
  Record<string, unknown>,
  string,
  string
>;

export const REPOSITORY_IDS = ['geo', 'arrayexpress'] as const;
export type RepositoryId = (typeof REPOSITORY_IDS)[number];
export const GENDERS = ['male', 'female', 'unknown'] as const;
export type Gender = (typeof GENDERS)[number];
export type IdatChannel = 'Grn' | 'Red';

export type Study = {
  id: Generated<number>;
  repository_id: RepositoryId;
  repository_study_id: string;
  title: string;
  summary: string | null;
  overall_design: string | null;
  platform_ids: ColumnType<string[], string[], string[]>;
  organism: string | null;
  sample_count: number | null;
  released_at: string | null;
  extras: Json | null;
  created_at: Generated<Timestamp>;
  updated_at: Generated<Timestamp>;
};
export type Sample = {
  id: Generated<number>;
  repository_id: RepositoryId;
  repository_sample_id: string;
  repository_series_id: string | null;
  study_id: number | null;
  platform_id: string | null;
  title: string | null;
  organism: string | null;
  gender: Gender | null;
  age: string | null;
  tissue: string | null;
  disease: string | null;
  extraction_protocol: string | null;
  extras: Json | null;
  created_at: Generated<Timestamp>;
};
export type IdatFile = {
  id: Generated<number>;
  sample_id: number;
  filename: string;
  source_url: string;
  s3_key: string | null;
  channel: IdatChannel | null;
  uploaded_at: Timestamp | null;
  processed_at: Timestamp | null;
  deleted_at: Timestamp | null;
  created_at: Generated<Timestamp>;
};
export type DB = {
  study: Study;
  sample: Sample;
  idat_file: IdatFile;
};
