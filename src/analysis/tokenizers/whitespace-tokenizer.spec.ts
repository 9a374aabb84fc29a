import { WhitespaceTokenizer } from './whitespace-tokenizer';

describe('WhitespaceTokenizer', () => {
  let tokenizer: WhitespaceTokenizer;

  beforeEach(() => {
    tokenizer = new WhitespaceTokenizer();
  });

  it('should tokenize text using whitespace as delimiter', () => {
    const text = 'Hello world,  this  is a\ttest.\nNew line';
    const tokens = tokenizer.tokenize(text);
    expect(tokens).toEqual(['Hello', 'world,', 'this', 'is', 'a', 'test.', 'New', 'line']);
  });

  it('should handle empty input', () => {
    expect(tokenizer.tokenize('')).toEqual([]);
    expect(tokenizer.tokenize('  \n\t ')).toEqual([]);
  });

  it('should ignore leading and trailing whitespace', () => {
    expect(tokenizer.tokenize('\n  tree river  \n')).toEqual(['tree', 'river']);
  });

  it('should keep the original case', () => {
    expect(tokenizer.tokenize('Hello World')).toEqual(['Hello', 'World']);
  });

  it('should preserve punctuation and special characters', () => {
    const text = 'Hello, world! This-is a_test.';
    const tokens = tokenizer.tokenize(text);
    expect(tokens).toEqual(['Hello,', 'world!', 'This-is', 'a_test.']);
  });
});
