import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { KeywordAnalyzer } from '../analysis/analyzers/keyword-analyzer';
import { StopwordLoaderService } from '../analysis/stopword-loader.service';
import { SearchConfig } from '../config/search.config';
import { DocumentScannerService } from '../document/document-scanner.service';
import { IndexBuilder } from '../index/index-builder';
import { KeywordIndex } from '../index/keyword-index';
import { CorpusReaderService } from '../storage/corpus/corpus-reader.service';

export interface IndexSource {
  /**
   * Documents to index, in order
   */
  documents?: string[];

  /**
   * Corpus file listing the documents to index, whitespace-separated
   */
  docsFile?: string;

  /**
   * Noise-word file; the configured default when omitted
   */
  stopwordsFile?: string;
}

export interface BuiltIndex {
  index: KeywordIndex;
  documents: string[];
  stopwordCount: number;
}

@Injectable()
export class IndexingService {
  private readonly logger = new Logger(IndexingService.name);
  private readonly defaultStopwordsFile: string;

  constructor(
    private readonly corpusReader: CorpusReaderService,
    private readonly stopwordLoader: StopwordLoaderService,
    private readonly documentScanner: DocumentScannerService,
    configService: ConfigService,
  ) {
    this.defaultStopwordsFile = configService.getOrThrow<SearchConfig>('search').stopwordsFile;
  }

  /**
   * Build a fresh index over the given documents.
   * The first missing file aborts the build with ResourceNotFoundError.
   */
  async buildIndex(source: IndexSource): Promise<BuiltIndex> {
    const startTime = Date.now();
    const stopwordsFile = source.stopwordsFile ?? this.defaultStopwordsFile;

    // 1. Load noise words
    const stopwords = await this.stopwordLoader.load(stopwordsFile);
    const analyzer = new KeywordAnalyzer(stopwords);

    // 2. Resolve the document list
    const documents = await this.resolveDocuments(source);
    this.logger.log(`Indexing ${documents.length} documents`);

    // 3. Scan and merge each document
    const index = new KeywordIndex();
    const builder = new IndexBuilder(index);
    for (const document of documents) {
      const keywords = await this.documentScanner.extractKeywordMap(document, analyzer);
      index.addDocument(document);
      builder.merge(keywords);
      this.logger.debug(`Merged ${keywords.size} keywords from ${document}`);
    }

    this.logger.log(
      `Indexed ${index.documentCount} documents, ${index.keywordCount} keywords in ${Date.now() - startTime}ms`,
    );
    return { index, documents, stopwordCount: stopwords.size };
  }

  private async resolveDocuments(source: IndexSource): Promise<string[]> {
    let names: string[] = [];
    if (source.documents) {
      names = source.documents;
    } else if (source.docsFile) {
      const content = await this.corpusReader.read(source.docsFile, 'docs-list');
      names = content.split(/\s+/).filter(name => name.length > 0);
    }

    // a document listed twice would contribute two occurrences to the same posting list
    return Array.from(new Set(names));
  }
}
