import { Body, Controller, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { SearchQueryDto, SearchResponseDto } from '../dtos/search.dto';
import { SearchService } from '../../search/search.service';

@ApiTags('Search')
@Controller('api/indices/:index/_search')
export class SearchController {
  constructor(private readonly searchService: SearchService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Search for documents containing either of two keywords',
    description:
      'Returns up to five documents ranked by keyword frequency. On equal frequency the first keyword wins; a document matching both keywords is listed once.',
  })
  @ApiParam({ name: 'index', description: 'Index name to search in', example: 'poems' })
  @ApiBody({
    type: SearchQueryDto,
    examples: {
      or: { summary: 'Two keywords', value: { keyword1: 'deep', keyword2: 'world' } },
    },
  })
  @ApiResponse({ status: HttpStatus.OK, type: SearchResponseDto })
  @ApiResponse({ status: HttpStatus.BAD_REQUEST, description: 'Invalid keywords' })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Index not found' })
  search(
    @Param('index') index: string,
    @Body() searchQuery: SearchQueryDto,
  ): SearchResponseDto {
    return this.searchService.search(index, searchQuery);
  }
}
