import { registerAs } from '@nestjs/config';

export interface SearchConfig {
  corpusRoot: string;
  stopwordsFile: string;
}

export default registerAs(
  'search',
  (): SearchConfig => ({
    // Documents, document lists and stop-word files are resolved against this directory
    corpusRoot: process.env.CORPUS_ROOT || './corpus',
    stopwordsFile: process.env.STOPWORDS_FILE || 'noisewords.txt',
  }),
);
