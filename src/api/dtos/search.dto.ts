import { IsNotEmpty, IsString, Matches } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

const KEYWORD_PATTERN = /^\p{Alphabetic}+$/u;

export class SearchQueryDto {
  @ApiProperty({
    description: 'First keyword; wins frequency ties',
    example: 'deep',
  })
  @IsString()
  @IsNotEmpty()
  @Matches(KEYWORD_PATTERN, { message: 'keyword1 must contain letters only' })
  keyword1!: string;

  @ApiProperty({
    description: 'Second keyword',
    example: 'world',
  })
  @IsString()
  @IsNotEmpty()
  @Matches(KEYWORD_PATTERN, { message: 'keyword2 must contain letters only' })
  keyword2!: string;
}

export class SearchResultDto {
  @ApiProperty({
    type: [String],
    nullable: true,
    description: 'Up to five documents by descending frequency, null when neither keyword is indexed',
    example: ['jude.txt', 'pohlx.txt'],
  })
  documents!: string[] | null;

  @ApiProperty({ example: 2 })
  total!: number;
}

export class SearchResponseDto {
  @ApiProperty({ type: SearchResultDto })
  data!: SearchResultDto;

  @ApiProperty({ example: 1, description: 'Time taken in milliseconds' })
  took!: number;
}
