import { describe, expect, it } from 'vitest';

import { parseRequestTarget, requestPathOf } from '@/core/utils/request.js';

describe('request target helpers', () => {
  it('keeps dot segments and decodes escapes in the logged path', () => {
    expect(requestPathOf('/x/../index.html')).toBe('/x/../index.html');
    expect(requestPathOf('/a%20b.html?q=%20')).toBe('/a b.html');
    expect(requestPathOf('/bad%zz?x=1')).toBe('/bad%zz');
    expect(requestPathOf(undefined)).toBe('(unknown)');
  });

  it('resolves dot segments for file lookup and keeps the raw query', () => {
    expect(parseRequestTarget('/x/../a%20b.html?q=1')).toEqual({ path: '/a%20b.html', search: '?q=1' });
  });
});
