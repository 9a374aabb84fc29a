import {
  ArrayNotEmpty,
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
} from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

export const INDEX_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;

export class CreateIndexDto {
  @ApiProperty({
    description: 'Unique name for the index',
    example: 'poems',
  })
  @IsString()
  @Matches(INDEX_NAME_PATTERN, {
    message: 'name must start with a lowercase letter or digit and contain only a-z, 0-9, _ or -',
  })
  name!: string;

  @ApiProperty({
    description: 'Corpus documents to index, in order (use either this or docsFile)',
    required: false,
    type: [String],
    example: ['jude.txt', 'pohlx.txt'],
  })
  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  documents?: string[];

  @ApiProperty({
    description: 'Corpus file listing the documents to index, one per line',
    required: false,
    example: 'docs.txt',
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  docsFile?: string;

  @ApiProperty({
    description: 'Noise-word file in the corpus; the configured default when omitted',
    required: false,
    example: 'noisewords.txt',
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  stopwordsFile?: string;
}

export class IndexResponseDto {
  @ApiProperty({ example: 'poems', description: 'Name of the index' })
  name!: string;

  @ApiProperty({ example: 2, description: 'Number of documents in the index' })
  documentCount!: number;

  @ApiProperty({ example: 1520, description: 'Number of distinct keywords' })
  keywordCount!: number;

  @ApiProperty({ example: 94, description: 'Number of noise words excluded while indexing' })
  stopwordCount!: number;

  @ApiProperty({ example: '2024-01-01T00:00:00.000Z', description: 'Creation date' })
  createdAt!: string;
}

export class IndexListResponseDto {
  @ApiProperty({ type: [IndexResponseDto], description: 'List of indices' })
  indices!: IndexResponseDto[];

  @ApiProperty({ example: 1, description: 'Total number of indices' })
  total!: number;
}

export class OccurrenceDto {
  @ApiProperty({ example: 'jude.txt' })
  document!: string;

  @ApiProperty({ example: 12 })
  frequency!: number;
}

export class PostingsResponseDto {
  @ApiProperty({ example: 'deep' })
  keyword!: string;

  @ApiProperty({
    type: [OccurrenceDto],
    description: 'Documents containing the keyword, by descending frequency',
  })
  postings!: OccurrenceDto[];
}
