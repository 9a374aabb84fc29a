import { stripTrailingPunctuation, TrailingPunctuationFilter } from './trailing-punctuation-filter';

describe('TrailingPunctuationFilter', () => {
  let filter: TrailingPunctuationFilter;

  beforeEach(() => {
    filter = new TrailingPunctuationFilter();
  });

  it('should strip a single trailing punctuation mark', () => {
    expect(filter.filter(['end.', 'list,', 'why?', 'note:', 'stop;', 'wow!'])).toEqual([
      'end',
      'list',
      'why',
      'note',
      'stop',
      'wow',
    ]);
  });

  it('should strip any run of trailing punctuation', () => {
    expect(filter.filter(['Tree!!', 'word?!?!', 'done.;:,'])).toEqual(['Tree', 'word', 'done']);
  });

  it('should leave leading and inner punctuation in place', () => {
    expect(filter.filter(['.net', 'e.g.', "can't", 'a-b!'])).toEqual(['.net', 'e.g', "can't", 'a-b']);
  });

  it('should not treat other characters as punctuation', () => {
    expect(filter.filter(['quote"', 'paren)', 'dash-', "it's'"])).toEqual([
      'quote"',
      'paren)',
      'dash-',
      "it's'",
    ]);
  });

  it('should drop tokens made only of punctuation', () => {
    expect(filter.filter(['!!!', 'word', '?'])).toEqual(['word']);
  });

  it('should strip up to the first other character', () => {
    expect(stripTrailingPunctuation('end!)!')).toBe('end!)');
  });
});
