import {
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Query,
  ValidationPipe,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  QuerySamplesDto,
  SampleDetailResponseDto,
  SampleListResponseDto,
} from './dto';
import { SamplesService } from './samples.service';

@ApiTags('samples')
@Controller('api/samples')
export class SamplesController {
  constructor(private readonly samplesService: SamplesService) {}

  @Get()
  @ApiOperation({
    summary: 'List samples',
    description: 'Tissue and disease match as case-insensitive substrings.',
  })
  @ApiResponse({ type: SampleListResponseDto })
  async findMany(
    @Query(new ValidationPipe({ transform: true })) query: QuerySamplesDto,
  ): Promise<SampleListResponseDto> {
    return this.samplesService.findMany(query);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a sample with its IDAT files' })
  @ApiResponse({ type: SampleDetailResponseDto })
  async findOne(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<SampleDetailResponseDto> {
    return this.samplesService.findOne(id);
  }
}
