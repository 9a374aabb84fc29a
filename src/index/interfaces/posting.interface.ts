/**
 * One document's occurrence count for one keyword
 */
export interface Occurrence {
  /**
   * Document identifier (the document's name in the corpus)
   */
  readonly document: string;

  /**
   * Number of times the keyword appears in the document.
   * Incremented while the document is scanned, frozen once merged into an index.
   */
  frequency: number;
}

/**
 * Occurrences of one keyword, ordered by non-increasing frequency
 */
export type PostingList = Occurrence[];

/**
 * Keywords of a single document, each with its aggregated occurrence
 */
export type KeywordMap = Map<string, Occurrence>;

/**
 * Where the binary search placed a candidate occurrence
 */
export interface InsertionPoint {
  /**
   * Final index of the candidate in the list
   */
  position: number;

  /**
   * Midpoints examined by the search, in probe order
   */
  probes: number[];

  /**
   * True when the search stopped on an entry of equal frequency
   */
  matched: boolean;
}
