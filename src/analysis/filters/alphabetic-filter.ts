import { TokenFilter } from '../interfaces/token-filter.interface';

const LETTER = /^\p{Alphabetic}$/u;

/**
 * Keeps tokens made of letters only. Digits, apostrophes, hyphens and any
 * punctuation left inside the token reject it.
 *
 * Each UTF-16 code unit is checked on its own, so letters outside the Basic
 * Multilingual Plane (stored as surrogate pairs) are rejected too.
 */
export class AlphabeticFilter implements TokenFilter {
  filter(tokens: string[]): string[] {
    return tokens.filter(isAlphabetic);
  }

  getName(): string {
    return 'alphabetic';
  }
}

function isAlphabetic(token: string): boolean {
  if (token.length === 0) {
    return false;
  }
  for (let i = 0; i < token.length; i++) {
    if (!LETTER.test(token.charAt(i))) {
      return false;
    }
  }
  return true;
}
