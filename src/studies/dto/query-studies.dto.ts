import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsIn, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { REPOSITORY_IDS, RepositoryId } from '../../db/types';

export class PageQueryDto {
  @ApiPropertyOptional({
    description: 'Maximum number of rows to return',
    example: 50,
    minimum: 1,
    maximum: 200,
    default: 50,
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(200)
  @Type(() => Number)
  limit: number = 50;

  @ApiPropertyOptional({
    description: 'Number of rows to skip',
    example: 0,
    minimum: 0,
    default: 0,
  })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Type(() => Number)
  offset: number = 0;
}

export class QueryStudiesDto extends PageQueryDto {
  @ApiPropertyOptional({ enum: REPOSITORY_IDS, example: 'geo' })
  @IsOptional()
  @IsIn(REPOSITORY_IDS)
  repository?: RepositoryId;

  @ApiPropertyOptional({
    description: 'Platform accession the study was run on',
    example: 'GPL13534',
  })
  @IsOptional()
  @IsString()
  platform?: string;

  @ApiPropertyOptional({
    description: 'Matches title, summary or accession',
    example: 'blood',
  })
  @IsOptional()
  @IsString()
  q?: string;
}
