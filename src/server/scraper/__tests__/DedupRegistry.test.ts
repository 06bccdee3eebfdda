import { describe, test, expect } from 'vitest';
import { DedupRegistry, canonicalize } from '../DedupRegistry.js';

const BASE = 'https://market.example.com';

describe('DedupRegistry', () => {
  describe('canonicalize', () => {
    test('strips query string and fragment', () => {
      expect(canonicalize('https://market.example.com/itm/1?hash=abc&var=2#top', BASE)).toBe(
        'https://market.example.com/itm/1'
      );
    });

    test('normalizes protocol-relative URLs to https', () => {
      expect(canonicalize('//market.example.com/itm/2?x=1', BASE)).toBe('https://market.example.com/itm/2');
    });

    test('resolves relative URLs against the base host', () => {
      expect(canonicalize('/itm/3?var=1', BASE)).toBe('https://market.example.com/itm/3');
    });

    test('is idempotent', () => {
      const inputs = [
        'https://market.example.com/itm/1?hash=abc',
        '//market.example.com/itm/2#x',
        '/itm/3?a=b',
        'http://other.example.com/itm/4',
      ];
      for (const input of inputs) {
        const once = canonicalize(input, BASE);
        expect(canonicalize(once, BASE)).toBe(once);
      }
    });
  });

  test('treats URLs differing only in query as the same item', () => {
    const registry = new DedupRegistry(BASE);
    expect(registry.hasSeen('/itm/1?ref=a')).toBe(false);

    expect(registry.record('/itm/1?ref=a')).toBe('https://market.example.com/itm/1');
    expect(registry.hasSeen('https://market.example.com/itm/1?ref=b')).toBe(true);
    expect(registry.hasSeen('/itm/2')).toBe(false);
    expect(registry.size).toBe(1);
  });

  test('recording twice keeps one entry', () => {
    const registry = new DedupRegistry(BASE);
    registry.record('/itm/5');
    registry.record('//market.example.com/itm/5?x=1');
    expect(registry.size).toBe(1);
  });
});
