import { TokenFilter, TokenFilterOptions } from '../interfaces/token-filter.interface';

export type StopwordFilterOptions = Pick<TokenFilterOptions, 'stopwords'>;

/**
 * Drops tokens found in the stop-word set. Matching is exact, so tokens
 * should be lowercased before they reach this filter.
 */
export class StopwordFilter implements TokenFilter {
  private readonly stopwords: ReadonlySet<string>;

  constructor(options: StopwordFilterOptions = {}) {
    this.stopwords = new Set(options.stopwords ?? []);
  }

  filter(tokens: string[]): string[] {
    return tokens.filter(token => !this.stopwords.has(token));
  }

  getName(): string {
    return 'stopword';
  }
}
