import { Occurrence } from '../index/interfaces/posting.interface';
import { KeywordIndex } from '../index/keyword-index';

export const TOP_K = 5;

/**
 * Answers "keyword1 OR keyword2" over a built index.
 */
export class TopKMerger {
  constructor(private readonly index: KeywordIndex) {}

  /**
   * Up to five documents containing either keyword, by descending frequency.
   * Frequency ties go to keyword1 and a document is listed once.
   *
   * @returns null when neither keyword is indexed
   */
  query(keyword1: string, keyword2: string): string[] | null {
    const first = this.index.getPostingList(keyword1);
    const second = this.index.getPostingList(keyword2);

    if (first && second) {
      return mergePostingLists(first, second, TOP_K);
    }

    const present = first ?? second;
    if (!present) {
      return null;
    }
    return takeDocuments(present, TOP_K);
  }
}

function takeDocuments(list: readonly Occurrence[], limit: number): string[] {
  return list.slice(0, limit).map(occurrence => occurrence.document);
}

/**
 * Cursor merge of two lists sorted by descending frequency. Each list is read once,
 * a document already taken is skipped without counting toward the limit.
 */
export function mergePostingLists(
  first: readonly Occurrence[],
  second: readonly Occurrence[],
  limit: number = TOP_K,
): string[] {
  const result: string[] = [];
  const seen = new Set<string>();
  const take = (document: string): void => {
    if (!seen.has(document)) {
      seen.add(document);
      result.push(document);
    }
  };

  let j = 0;
  let k = 0;
  while (j < first.length && k < second.length && result.length < limit) {
    if (first[j].frequency >= second[k].frequency) {
      take(first[j++].document);
    } else {
      take(second[k++].document);
    }
  }

  // only one of the lists can have entries left
  while (j < first.length && result.length < limit) {
    take(first[j++].document);
  }
  while (k < second.length && result.length < limit) {
    take(second[k++].document);
  }

  return result;
}
