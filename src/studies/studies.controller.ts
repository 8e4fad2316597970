import {
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Query,
  ValidationPipe,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { SampleListResponseDto } from '../samples/dto';
import {
  CatalogStatsResponseDto,
  PageQueryDto,
  QueryStudiesDto,
  StudyListResponseDto,
  StudyResponseDto,
} from './dto';
import { StudiesService } from './studies.service';

@ApiTags('studies')
@Controller('api/studies')
export class StudiesController {
  constructor(private readonly studiesService: StudiesService) {}

  @Get()
  @ApiOperation({ summary: 'List studies (filter by repository, platform, text)' })
  @ApiResponse({ type: StudyListResponseDto })
  async findMany(
    @Query(new ValidationPipe({ transform: true })) query: QueryStudiesDto,
  ): Promise<StudyListResponseDto> {
    return this.studiesService.findMany(query);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a study' })
  @ApiResponse({ type: StudyResponseDto })
  async findOne(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<StudyResponseDto> {
    return this.studiesService.findOne(id);
  }

  @Get(':id/samples')
  @ApiOperation({ summary: 'List the samples of a study' })
  @ApiResponse({ type: SampleListResponseDto })
  async findSamples(
    @Param('id', ParseIntPipe) id: number,
    @Query(new ValidationPipe({ transform: true })) page: PageQueryDto,
  ): Promise<SampleListResponseDto> {
    return this.studiesService.findSamples(id, page);
  }
}

@ApiTags('stats')
@Controller('api/stats')
export class StatsController {
  constructor(private readonly studiesService: StudiesService) {}

  @Get()
  @ApiOperation({ summary: 'Row counts across the catalog' })
  @ApiResponse({ type: CatalogStatsResponseDto })
  async getStats(): Promise<CatalogStatsResponseDto> {
    return this.studiesService.getStats();
  }
}
