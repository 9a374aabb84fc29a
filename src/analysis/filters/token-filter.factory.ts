import { TokenFilter, TokenFilterOptions } from '../interfaces/token-filter.interface';
import { LowercaseFilter } from './lowercase-filter';
import { StopwordFilter } from './stopword-filter';
import { TrailingPunctuationFilter } from './trailing-punctuation-filter';
import { AlphabeticFilter } from './alphabetic-filter';

export type TokenFilterType = 'trailing_punctuation' | 'lowercase' | 'stopword' | 'alphabetic';

export class TokenFilterFactory {
  /**
   * Create a token filter based on the specified type and options
   */
  static createFilter(type: TokenFilterType, options: TokenFilterOptions = {}): TokenFilter {
    switch (type) {
      case 'trailing_punctuation':
        return new TrailingPunctuationFilter();
      case 'lowercase':
        return new LowercaseFilter();
      case 'stopword':
        return new StopwordFilter(options);
      case 'alphabetic':
        return new AlphabeticFilter();
      default:
        throw new Error(`Unknown token filter type: ${String(type)}`);
    }
  }
}
