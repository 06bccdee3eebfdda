import { describe, test, expect } from 'vitest';
import {
  isPlaceholderUrl,
  isThumbnailUrl,
  upgradeImageUrl,
  resolveUrl,
  normalizeText,
  cleanTitle,
  isBoilerplateTitle,
  acceptCondition,
  pickImageUrl,
} from '../utils/ValueExtractor.js';

const BASE = 'https://www.example.co.uk/itm/123';

describe('ValueExtractor', () => {
  describe('isPlaceholderUrl', () => {
    test('detects placeholder images', () => {
      expect(isPlaceholderUrl('data:image/gif;base64,R0lGOD')).toBe(true);
      expect(isPlaceholderUrl('https://img.example.com/spacer.gif')).toBe(true);
      expect(isPlaceholderUrl(null)).toBe(true);
      expect(isPlaceholderUrl('')).toBe(true);
    });

    test('accepts real images', () => {
      expect(isPlaceholderUrl('https://img.example.com/g/abc/s-l1600.jpg')).toBe(false);
    });
  });

  describe('isThumbnailUrl', () => {
    test('detects thumbnail variants', () => {
      expect(isThumbnailUrl('https://img.example.com/thumbs/g/abc/s-l1600.jpg')).toBe(true);
      expect(isThumbnailUrl('https://img.example.com/g/abc/s-l64.jpg')).toBe(true);
      expect(isThumbnailUrl('https://img.example.com/g/abc/s-l96.png')).toBe(true);
    });

    test('accepts full-size images', () => {
      expect(isThumbnailUrl('https://img.example.com/g/abc/s-l1600.jpg')).toBe(false);
    });
  });

  describe('upgradeImageUrl', () => {
    test('rewrites low-resolution size tokens', () => {
      expect(upgradeImageUrl('https://img.example.com/g/abc/s-l140.jpg')).toBe(
        'https://img.example.com/g/abc/s-l1600.jpg'
      );
      expect(upgradeImageUrl('https://img.example.com/g/abc/s-l500.webp')).toBe(
        'https://img.example.com/g/abc/s-l1600.webp'
      );
    });

    test('leaves other URLs unchanged', () => {
      expect(upgradeImageUrl('https://img.example.com/g/abc/photo.jpg')).toBe(
        'https://img.example.com/g/abc/photo.jpg'
      );
    });
  });

  describe('resolveUrl', () => {
    test('resolves relative URLs', () => {
      expect(resolveUrl('/images/a.jpg', BASE)).toBe('https://www.example.co.uk/images/a.jpg');
    });

    test('handles protocol-relative URLs', () => {
      expect(resolveUrl('//img.example.com/a.jpg', BASE)).toBe('https://img.example.com/a.jpg');
    });

    test('keeps absolute URLs', () => {
      expect(resolveUrl('http://other.example.com/x', BASE)).toBe('http://other.example.com/x');
    });

    test('returns null for empty input', () => {
      expect(resolveUrl(null, BASE)).toBeNull();
      expect(resolveUrl('', BASE)).toBeNull();
    });
  });

  describe('normalizeText', () => {
    test('collapses whitespace', () => {
      expect(normalizeText('  Brand \n  new\tbox ')).toBe('Brand new box');
    });

    test('returns null for blank text', () => {
      expect(normalizeText('   ')).toBeNull();
      expect(normalizeText(undefined)).toBeNull();
    });
  });

  describe('cleanTitle', () => {
    test('removes marketplace decorations', () => {
      expect(cleanTitle('New listing  Vintage Widget Opens in a new window or tab')).toBe('Vintage Widget');
    });

    test('keeps ordinary titles', () => {
      expect(cleanTitle('  Blue   Widget ')).toBe('Blue Widget');
      expect(cleanTitle(null)).toBe('');
    });
  });

  describe('isBoilerplateTitle', () => {
    test('flags chrome text and empty titles', () => {
      expect(isBoilerplateTitle('Shop on eBay')).toBe(true);
      expect(isBoilerplateTitle('  ')).toBe(true);
    });

    test('flags promo cards that embed the chrome text', () => {
      expect(isBoilerplateTitle('Shop on eBay Brand New')).toBe(true);
      expect(isBoilerplateTitle('Results matching fewer words (12)')).toBe(true);
    });

    test('matches "see all" only as the whole title', () => {
      expect(isBoilerplateTitle('See all')).toBe(true);
      expect(isBoilerplateTitle('Camera lens, see all photos')).toBe(false);
    });

    test('accepts real titles', () => {
      expect(isBoilerplateTitle('Widget Pro 3000')).toBe(false);
    });
  });

  describe('acceptCondition', () => {
    test('accepts condition labels', () => {
      expect(acceptCondition(' Pre-owned ')).toBe('Pre-owned');
      expect(acceptCondition('Brand New')).toBe('Brand New');
      expect(acceptCondition('For parts or not working')).toBe('For parts or not working');
    });

    test('rejects unrelated text', () => {
      expect(acceptCondition('Free postage')).toBeNull();
      expect(acceptCondition('Renewal pending')).toBeNull();
      expect(acceptCondition(null)).toBeNull();
    });

    test('rejects text over 120 characters', () => {
      expect(acceptCondition('Used ' + 'x'.repeat(120))).toBeNull();
    });
  });

  describe('pickImageUrl', () => {
    test('upgrades and resolves image URLs', () => {
      expect(pickImageUrl('https://img.example.com/g/abc/s-l225.jpg', BASE)).toBe(
        'https://img.example.com/g/abc/s-l1600.jpg'
      );
      expect(pickImageUrl('//img.example.com/g/abc/s-l300.jpg', BASE)).toBe(
        'https://img.example.com/g/abc/s-l1600.jpg'
      );
      expect(pickImageUrl('/img/widget.jpg', BASE)).toBe('https://www.example.co.uk/img/widget.jpg');
    });

    test('takes the first srcset entry', () => {
      const srcset = 'https://img.example.com/g/abc/s-l300.jpg 1x, https://img.example.com/g/abc/s-l500.jpg 2x';
      expect(pickImageUrl(srcset, BASE)).toBe('https://img.example.com/g/abc/s-l1600.jpg');
    });

    test('rejects placeholders and thumbnails', () => {
      expect(pickImageUrl('data:image/gif;base64,R0lGOD', BASE)).toBeNull();
      expect(pickImageUrl('https://img.example.com/thumbs/g/abc/s-l1600.jpg', BASE)).toBeNull();
      expect(pickImageUrl('https://img.example.com/g/abc/s-l64.jpg', BASE)).toBeNull();
      expect(pickImageUrl(null, BASE)).toBeNull();
    });
  });
});
