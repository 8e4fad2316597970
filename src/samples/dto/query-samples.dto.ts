import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsOptional, IsString } from 'class-validator';
import { GENDERS, Gender, REPOSITORY_IDS, RepositoryId } from '../../db/types';
import { PageQueryDto } from '../../studies/dto/query-studies.dto';

export class QuerySamplesDto extends PageQueryDto {
  @ApiPropertyOptional({ enum: REPOSITORY_IDS, example: 'arrayexpress' })
  @IsOptional()
  @IsIn(REPOSITORY_IDS)
  repository?: RepositoryId;

  @ApiPropertyOptional({ example: 'GPL21145' })
  @IsOptional()
  @IsString()
  platform?: string;

  @ApiPropertyOptional({ enum: GENDERS })
  @IsOptional()
  @IsIn(GENDERS)
  gender?: Gender;

  @ApiPropertyOptional({
    description: 'Case-insensitive substring of the tissue',
    example: 'blood',
  })
  @IsOptional()
  @IsString()
  tissue?: string;

  @ApiPropertyOptional({
    description: 'Case-insensitive substring of the disease',
    example: 'control',
  })
  @IsOptional()
  @IsString()
  disease?: string;
}
