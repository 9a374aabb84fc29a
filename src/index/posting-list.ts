import { InsertionPoint, Occurrence, PostingList } from './interfaces/posting.interface';

/**
 * Binary-searches the sorted prefix `list[0 .. n-2]` for the slot of the last entry.
 *
 * The search stops at the first entry of equal frequency it lands on and places the
 * candidate right after it; otherwise the candidate goes to `lo`. Does not mutate the list.
 */
export function locateInsertionPoint(list: readonly Occurrence[]): InsertionPoint {
  const target = list[list.length - 1];
  const probes: number[] = [];
  let lo = 0;
  let hi = list.length - 2;

  while (lo <= hi) {
    const mid = Math.floor((lo + hi) / 2);
    probes.push(mid);

    const frequency = list[mid].frequency;
    if (target.frequency === frequency) {
      return { position: mid + 1, probes, matched: true };
    }
    if (target.frequency < frequency) {
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }

  return { position: lo, probes, matched: false };
}

/**
 * Moves the last occurrence of `list` into its place by descending frequency.
 * Entries `0 .. n-2` must already be sorted.
 *
 * @returns the midpoints probed by the search, or null for a single-entry list
 */
export function insertLastOccurrence(list: PostingList): number[] | null {
  if (list.length === 1) {
    return null;
  }

  const { position, probes } = locateInsertionPoint(list);
  const candidate = list.pop();
  if (candidate) {
    list.splice(position, 0, candidate);
  }
  return probes;
}

