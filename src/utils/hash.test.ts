import { describe, expect, it } from 'vitest';
import { canonicalize, checksumFrom } from './hash.js';

describe('canonicalize', () => {
  it('sorts object keys and drops undefined values', () => {
    expect(canonicalize({ b: 1, a: [true, null], c: undefined })).toBe('{"a":[true,null],"b":1}');
  });
});

describe('checksumFrom', () => {
  it('ignores key order', () => {
    expect(checksumFrom({ path: '/api/info', ids: ['t1_a'] })).toBe(checksumFrom({ ids: ['t1_a'], path: '/api/info' }));
  });

  it('distinguishes different id batches', () => {
    expect(checksumFrom({ ids: ['t1_a'] })).not.toBe(checksumFrom({ ids: ['t1_b'] }));
  });
});
