// tests/unit/HostResolver.test.ts

import { describe, it, expect } from 'vitest';
import { resolveHost, buildUrl, MAX_ATTEMPTS } from '../../src/core/http/HostResolver';

describe('resolveHost', () => {
  it('should resolve the DSN replica for the first read attempt', () => {
    expect(resolveHost('APP', 'read', 0)).toBe('APP-dsn.algolia.net');
  });

  it('should resolve the master host for the first write attempt', () => {
    expect(resolveHost('APP', 'write', 0)).toBe('APP.algolia.net');
  });

  it('should resolve the same cluster host for both classes on attempts 1-3', () => {
    for (const attempt of [1, 2, 3]) {
      const read = resolveHost('APP', 'read', attempt);
      const write = resolveHost('APP', 'write', attempt);
      expect(read).toBe(write);
      expect(read).toBe(`APP-${attempt}.algolianet.com`);
    }
  });

  it('should substitute the provider label', () => {
    expect(resolveHost('APP', 'read', 0, 'example')).toBe('APP-dsn.example.net');
    expect(resolveHost('APP', 'write', 2, 'example')).toBe('APP-2.examplenet.com');
  });

  it('should have no host beyond the last attempt', () => {
    expect(MAX_ATTEMPTS).toBe(4);
    expect(() => resolveHost('APP', 'read', 4)).toThrow(RangeError);
    expect(() => resolveHost('APP', 'read', -1)).toThrow(RangeError);
  });
});

describe('buildUrl', () => {
  it('should append the path under /1/indexes', () => {
    expect(buildUrl('APP.algolia.net', 'products/sku-1')).toBe(
      'https://APP.algolia.net/1/indexes/products/sku-1'
    );
  });

  it('should collapse leading slashes', () => {
    expect(buildUrl('APP.algolia.net', '/products/batch')).toBe(
      'https://APP.algolia.net/1/indexes/products/batch'
    );
  });

  it('should address the index list for an empty path', () => {
    expect(buildUrl('APP-dsn.algolia.net', '')).toBe('https://APP-dsn.algolia.net/1/indexes');
  });
});
