import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  GENDERS,
  Gender,
  IdatChannel,
  REPOSITORY_IDS,
  RepositoryId,
} from '../../db/types';
import { PaginationDto } from '../../studies/dto/response.dto';

export class SampleResponseDto {
  @ApiProperty({ example: 1 })
  id!: number;

  @ApiProperty({ enum: REPOSITORY_IDS, example: 'geo' })
  repository!: RepositoryId;

  @ApiProperty({ example: 'GSM989827' })
  accession!: string;

  @ApiPropertyOptional({ nullable: true, type: String, example: 'GSE40279' })
  seriesAccession!: string | null;

  @ApiPropertyOptional({ nullable: true, type: Number, example: 1 })
  studyId!: number | null;

  @ApiPropertyOptional({ nullable: true, type: String, example: 'GPL13534' })
  platformId!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  title!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String, example: 'Homo sapiens' })
  organism!: string | null;

  @ApiPropertyOptional({ nullable: true, enum: GENDERS })
  gender!: Gender | null;

  @ApiPropertyOptional({ nullable: true, type: String, example: '67' })
  age!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String, example: 'whole blood' })
  tissue!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  disease!: string | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  extractionProtocol!: string | null;

  @ApiPropertyOptional({ nullable: true, type: Object })
  extras!: Record<string, unknown> | null;

  @ApiProperty({ example: '2024-01-01T00:00:00.000Z' })
  createdAt!: Date;
}

export class IdatFileResponseDto {
  @ApiProperty({ example: 1 })
  id!: number;

  @ApiProperty({ example: 'GSM989827_5815381016_R01C01_Grn.idat.gz' })
  filename!: string;

  @ApiProperty()
  sourceUrl!: string;

  @ApiPropertyOptional({ nullable: true, enum: ['Grn', 'Red'] })
  channel!: IdatChannel | null;

  @ApiPropertyOptional({ nullable: true, type: String })
  s3Key!: string | null;

  @ApiPropertyOptional({ nullable: true, type: Date })
  uploadedAt!: Date | null;
}

export class SampleDetailResponseDto extends SampleResponseDto {
  @ApiProperty({ type: [IdatFileResponseDto] })
  files!: IdatFileResponseDto[];
}

export class SampleListResponseDto {
  @ApiProperty({ type: [SampleResponseDto] })
  data!: SampleResponseDto[];

  @ApiProperty({ type: PaginationDto })
  pagination!: PaginationDto;
}
