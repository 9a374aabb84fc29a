import { Injectable, Logger } from '@nestjs/common';
import { CorpusReaderService } from '../storage/corpus/corpus-reader.service';

@Injectable()
export class StopwordLoaderService {
  private readonly logger = new Logger(StopwordLoaderService.name);

  constructor(private readonly corpusReader: CorpusReaderService) {}

  /**
   * Load a noise-word file: whitespace-separated words, matched case-insensitively
   */
  async load(fileName: string): Promise<Set<string>> {
    const content = await this.corpusReader.read(fileName, 'stopwords');
    const stopwords = new Set(
      content
        .split(/\s+/)
        .filter(word => word.length > 0)
        .map(word => word.toLowerCase()),
    );

    this.logger.log(`Loaded ${stopwords.size} stop words from ${fileName}`);
    return stopwords;
  }
}
