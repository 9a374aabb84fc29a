import { Tokenizer } from '../interfaces/tokenizer.interface';

export class WhitespaceTokenizer implements Tokenizer {
  tokenize(text: string): string[] {
    if (!text) {
      return [];
    }

    // Split text into tokens using whitespace
    return text.split(/\s+/).filter(token => token.length > 0);
  }

  getName(): string {
    return 'whitespace';
  }
}
