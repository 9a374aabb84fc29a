import { Analyzer } from '../interfaces/analyzer.interface';
import { Tokenizer } from '../interfaces/tokenizer.interface';
import { TokenFilter } from '../interfaces/token-filter.interface';
import { WhitespaceTokenizer } from '../tokenizers/whitespace-tokenizer';
import { TokenFilterFactory } from '../filters/token-filter.factory';

/**
 * Splits text on whitespace and keeps the keywords.
 *
 * A keyword is a token stripped of trailing punctuation, lowercased, made only of
 * letters and not a stop word. Every filter looks at one token at a time, so
 * `analyze` yields exactly the tokens for which `extractKeyword` is non-null,
 * in document order and with repeats.
 */
export class KeywordAnalyzer implements Analyzer {
  private readonly tokenizer: Tokenizer;
  private readonly filters: TokenFilter[];

  constructor(stopwords: Iterable<string> = []) {
    this.tokenizer = new WhitespaceTokenizer();
    this.filters = [
      TokenFilterFactory.createFilter('trailing_punctuation'),
      TokenFilterFactory.createFilter('lowercase'),
      TokenFilterFactory.createFilter('stopword', { stopwords }),
      TokenFilterFactory.createFilter('alphabetic'),
    ];
  }

  analyze(text: string): string[] {
    return this.applyFilters(this.tokenizer.tokenize(text));
  }

  extractKeyword(rawToken: string): string | null {
    const [keyword] = this.applyFilters([rawToken]);
    return keyword ?? null;
  }

  getName(): string {
    return 'keyword';
  }

  getTokenizer(): Tokenizer {
    return this.tokenizer;
  }

  getFilters(): TokenFilter[] {
    return this.filters;
  }

  private applyFilters(tokens: string[]): string[] {
    let result = tokens;
    for (const filter of this.filters) {
      result = filter.filter(result);
    }
    return result;
  }
}
