import { PostingList } from './interfaces/posting.interface';

/**
 * Keyword -> posting list mapping built from one corpus.
 *
 * Owned by whoever builds it; the builder appends to it and the merger only reads it.
 * Keywords are never removed.
 */
export class KeywordIndex {
  private readonly postings: Map<string, PostingList> = new Map();
  private readonly documents: Set<string> = new Set();

  getPostingList(keyword: string): PostingList | undefined {
    return this.postings.get(keyword);
  }

  hasKeyword(keyword: string): boolean {
    return this.postings.has(keyword);
  }

  setPostingList(keyword: string, list: PostingList): void {
    this.postings.set(keyword, list);
  }

  /**
   * Record a document as part of the corpus, even if it produced no keywords
   */
  addDocument(document: string): void {
    this.documents.add(document);
  }

  getKeywords(): string[] {
    return Array.from(this.postings.keys());
  }

  getDocuments(): string[] {
    return Array.from(this.documents);
  }

  get keywordCount(): number {
    return this.postings.size;
  }

  get documentCount(): number {
    return this.documents.size;
  }
}
