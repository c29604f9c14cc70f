import type { FieldValue, ListQuery, StoredDocument } from './persistence.js';

function compareValues(a: FieldValue | undefined, b: FieldValue | undefined): number {
  if (a === b) {
    return 0;
  }
  if (a === undefined) {
    return -1;
  }
  if (b === undefined) {
    return 1;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = String(a);
  const right = String(b);
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

export function matchesQuery(doc: StoredDocument, query?: ListQuery): boolean {
  if (!query?.where) {
    return true;
  }
  return Object.entries(query.where).every(([field, value]) => doc.data[field] === value);
}

/**
 * Filters and sorts documents given in insertion order. The sort is stable,
 * so equal `orderBy` values keep that order.
 */
export function applyQuery(docs: StoredDocument[], query?: ListQuery): StoredDocument[] {
  const filtered = docs.filter(doc => matchesQuery(doc, query));
  const orderBy = query?.orderBy;
  if (!orderBy) {
    return filtered;
  }
  const sign = query?.direction === 'desc' ? -1 : 1;
  return filtered
    .map((doc, index) => ({ doc, index }))
    .sort((left, right) => {
      const diff = compareValues(left.doc.data[orderBy], right.doc.data[orderBy]);
      return diff !== 0 ? diff * sign : left.index - right.index;
    })
    .map(entry => entry.doc);
}
