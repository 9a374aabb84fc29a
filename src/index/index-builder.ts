import { KeywordMap } from './interfaces/posting.interface';
import { KeywordIndex } from './keyword-index';
import { insertLastOccurrence } from './posting-list';

export class IndexBuilder {
  constructor(private readonly index: KeywordIndex) {}

  /**
   * Merge the keywords of one document into the index, keeping every
   * posting list in descending order of frequency.
   */
  merge(keywords: KeywordMap): void {
    for (const [keyword, occurrence] of keywords) {
      const list = this.index.getPostingList(keyword);
      if (!list) {
        this.index.setPostingList(keyword, [occurrence]);
        continue;
      }

      list.push(occurrence);
      insertLastOccurrence(list);
    }
  }
}
