import { TokenFilter } from '../interfaces/token-filter.interface';

export const TRAILING_PUNCTUATION: ReadonlySet<string> = new Set(['.', ',', '?', ':', ';', '!']);

/**
 * Strips every trailing punctuation character, so "word?!?!" becomes "word".
 * Only the six characters in TRAILING_PUNCTUATION count; tokens left empty are dropped.
 */
export class TrailingPunctuationFilter implements TokenFilter {
  filter(tokens: string[]): string[] {
    return tokens.map(stripTrailingPunctuation).filter(token => token.length > 0);
  }

  getName(): string {
    return 'trailing_punctuation';
  }
}

export function stripTrailingPunctuation(token: string): string {
  let end = token.length;
  while (end > 0 && TRAILING_PUNCTUATION.has(token.charAt(end - 1))) {
    end--;
  }
  return token.slice(0, end);
}
