import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { REPOSITORY_IDS, RepositoryId } from '../../db/types';

export class PaginationDto {
  @ApiProperty({ example: 50 })
  limit!: number;

  @ApiProperty({ example: 0 })
  offset!: number;

  @ApiProperty({ example: 120 })
  total!: number;

  @ApiProperty({ example: true })
  hasNext!: boolean;

  @ApiProperty({ example: false })
  hasPrev!: boolean;
}

export class StudyResponseDto {
  @ApiProperty({ example: 1 })
  id!: number;

  @ApiProperty({ enum: REPOSITORY_IDS, example: 'geo' })
  repository!: RepositoryId;

  @ApiProperty({ example: 'GSE40279' })
  accession!: string;

  @ApiProperty({ example: 'Genome-wide methylation profiles of whole blood' })
  title!: string;

  @ApiPropertyOptional({ nullable: true, type: String })
  summary!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  overallDesign!: string | null;

  @ApiProperty({ example: ['GPL13534'] })
  platformIds!: string[];

  @ApiPropertyOptional({ nullable: true, type: String, example: 'Homo sapiens' })
  organism!: string | null;

  @ApiPropertyOptional({ nullable: true, type: Number, example: 656 })
  sampleCount!: number | null;

  @ApiPropertyOptional({ nullable: true, type: String, example: '2012/07/31' })
  releasedAt!: string | null;

  @ApiPropertyOptional({ nullable: true, type: Object })
  extras!: Record<string, unknown> | null;

  @ApiProperty({ example: '2024-01-01T00:00:00.000Z' })
  createdAt!: Date;

  @ApiProperty({ example: '2024-01-01T00:00:00.000Z' })
  updatedAt!: Date;
}

export class StudyListResponseDto {
  @ApiProperty({ type: [StudyResponseDto] })
  data!: StudyResponseDto[];

  @ApiProperty({ type: PaginationDto })
  pagination!: PaginationDto;
}

export class RepositoryCountsDto {
  @ApiProperty({ example: 640 })
  geo!: number;

  @ApiProperty({ example: 12 })
  arrayexpress!: number;
}

export class CatalogStatsResponseDto {
  @ApiProperty({ example: 11 })
  studies!: number;

  @ApiProperty({ example: 652 })
  samples!: number;

  @ApiProperty({ example: 1304 })
  files!: number;

  @ApiProperty({ example: 0 })
  uploadedFiles!: number;

  @ApiProperty({ example: 1304 })
  pendingUpload!: number;

  @ApiProperty({ type: RepositoryCountsDto })
  samplesByRepository!: RepositoryCountsDto;
}
