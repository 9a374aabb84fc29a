import { Injectable, Logger } from '@nestjs/common';
import { SearchQueryDto, SearchResponseDto } from '../api/dtos/search.dto';
import { IndexService } from '../index/index.service';
import { TopKMerger } from './top-k-merger';

@Injectable()
export class SearchService {
  private readonly logger = new Logger(SearchService.name);

  constructor(private readonly indexService: IndexService) {}

  /**
   * Top five documents containing either keyword.
   * A miss on both keywords is a normal result with `documents: null`.
   */
  search(indexName: string, searchQuery: SearchQueryDto): SearchResponseDto {
    const startTime = Date.now();
    const merger = new TopKMerger(this.indexService.requireIndex(indexName));

    const keyword1 = searchQuery.keyword1.toLowerCase();
    const keyword2 = searchQuery.keyword2.toLowerCase();
    const documents = merger.query(keyword1, keyword2);

    if (!documents) {
      this.logger.debug(`No documents in ${indexName} for "${keyword1}" or "${keyword2}"`);
    }

    return {
      data: {
        documents,
        total: documents ? documents.length : 0,
      },
      took: Date.now() - startTime,
    };
  }
}
