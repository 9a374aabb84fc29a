import { Injectable, Logger } from '@nestjs/common';
import { KeywordAnalyzer } from '../analysis/analyzers/keyword-analyzer';
import { KeywordMap } from '../index/interfaces/posting.interface';
import { CorpusReaderService } from '../storage/corpus/corpus-reader.service';

@Injectable()
export class DocumentScannerService {
  private readonly logger = new Logger(DocumentScannerService.name);

  constructor(private readonly corpusReader: CorpusReaderService) {}

  /**
   * Scan a document and count every keyword in it.
   * Each keyword gets one occurrence whose frequency is its count in the document.
   *
   * @throws ResourceNotFoundError if the document is not in the corpus
   */
  async extractKeywordMap(documentId: string, analyzer: KeywordAnalyzer): Promise<KeywordMap> {
    const content = await this.corpusReader.read(documentId, 'document');
    const keywords = countKeywords(documentId, analyzer.analyze(content));
    this.logger.debug(`Scanned ${documentId}: ${keywords.size} distinct keywords`);
    return keywords;
  }
}

export function countKeywords(documentId: string, keywords: string[]): KeywordMap {
  const map: KeywordMap = new Map();
  for (const keyword of keywords) {
    const occurrence = map.get(keyword);
    if (occurrence) {
      occurrence.frequency++;
    } else {
      map.set(keyword, { document: documentId, frequency: 1 });
    }
  }
  return map;
}
