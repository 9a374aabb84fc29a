import { TokenFilter } from '../interfaces/token-filter.interface';

export class LowercaseFilter implements TokenFilter {
  filter(tokens: string[]): string[] {
    return tokens.map(token => token.toLowerCase());
  }

  getName(): string {
    return 'lowercase';
  }
}
