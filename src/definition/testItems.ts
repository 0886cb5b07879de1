import type { ParentLookup, ParentResolution, RawItem } from '../types/index.js';

let sequence = 0;

export function comment(overrides: Partial<RawItem> = {}): RawItem {
  sequence += 1;
  return {
    id: `t1_c${sequence}`,
    kind: 'comment',
    author: 'target',
    body: 'A reply long enough to keep.',
    parentId: null,
    createdUtc: 1_700_000_000 - sequence,
    score: 1,
    ...overrides,
  };
}

export function post(overrides: Partial<RawItem> = {}): RawItem {
  sequence += 1;
  return {
    id: `t3_p${sequence}`,
    kind: 'post',
    author: 'op',
    title: 'A thread title',
    body: '',
    parentId: null,
    createdUtc: 1_600_000_000,
    score: 10,
    ...overrides,
  };
}

export function lookupFrom(items: RawItem[], failures: Record<string, string> = {}): ParentLookup {
  const byId = new Map(items.map((item) => [item.id, item]));
  return (parentId: string): ParentResolution => {
    const reason = failures[parentId];
    if (reason !== undefined) {
      return { status: 'failed', reason };
    }
    const item = byId.get(parentId);
    return item ? { status: 'found', item } : { status: 'missing' };
  };
}
