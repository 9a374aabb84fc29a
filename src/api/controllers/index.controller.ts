import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import {
  ApiBody,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import {
  CreateIndexDto,
  IndexListResponseDto,
  IndexResponseDto,
  PostingsResponseDto,
} from '../dtos/index.dto';
import { IndexService } from '../../index/index.service';

@ApiTags('Indices')
@Controller('api/indices')
export class IndexController {
  constructor(private readonly indexService: IndexService) {}

  @Post()
  @ApiOperation({
    summary: 'Build a new index',
    description:
      'Scans the listed corpus documents and builds a keyword index under a unique name. Names are resolved against the corpus directory.',
  })
  @ApiBody({
    type: CreateIndexDto,
    examples: {
      inline: {
        summary: 'Documents listed inline',
        value: { name: 'poems', documents: ['jude.txt', 'pohlx.txt'] },
      },
      docsFile: {
        summary: 'Documents listed in a corpus file',
        value: { name: 'poems', docsFile: 'docs.txt', stopwordsFile: 'noisewords.txt' },
      },
    },
  })
  @ApiResponse({ status: HttpStatus.CREATED, type: IndexResponseDto })
  @ApiResponse({ status: HttpStatus.BAD_REQUEST, description: 'Invalid request' })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'A document or stop-word file is missing' })
  @ApiResponse({ status: HttpStatus.CONFLICT, description: 'Index already exists' })
  async createIndex(@Body() createIndexDto: CreateIndexDto): Promise<IndexResponseDto> {
    return this.indexService.createIndex(createIndexDto);
  }

  @Get()
  @ApiOperation({ summary: 'List all indices' })
  @ApiResponse({ status: HttpStatus.OK, type: IndexListResponseDto })
  listIndices(): IndexListResponseDto {
    const indices = this.indexService.listIndices();
    return { indices, total: indices.length };
  }

  @Get(':index')
  @ApiOperation({ summary: 'Get index details' })
  @ApiParam({ name: 'index', example: 'poems' })
  @ApiResponse({ status: HttpStatus.OK, type: IndexResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Index not found' })
  getIndex(@Param('index') name: string): IndexResponseDto {
    return this.indexService.getIndex(name);
  }

  @Get(':index/keywords/:keyword')
  @ApiOperation({
    summary: 'Get the posting list of a keyword',
    description: 'Documents containing the keyword with their frequencies, highest first.',
  })
  @ApiParam({ name: 'index', example: 'poems' })
  @ApiParam({ name: 'keyword', example: 'deep' })
  @ApiResponse({ status: HttpStatus.OK, type: PostingsResponseDto })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Index or keyword not found' })
  getPostings(
    @Param('index') name: string,
    @Param('keyword') keyword: string,
  ): PostingsResponseDto {
    return this.indexService.getPostings(name, keyword);
  }

  @Delete(':index')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete an index' })
  @ApiParam({ name: 'index', example: 'poems' })
  @ApiResponse({ status: HttpStatus.NO_CONTENT, description: 'Index deleted' })
  @ApiResponse({ status: HttpStatus.NOT_FOUND, description: 'Index not found' })
  deleteIndex(@Param('index') name: string): void {
    this.indexService.deleteIndex(name);
  }
}
