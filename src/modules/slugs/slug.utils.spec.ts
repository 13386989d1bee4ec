import { slugify, slugMatchesBase, truncateSlug, withSuffix } from './slug.utils';

describe('slug utils', () => {
  describe('slugify', () => {
    it('should lowercase and hyphenate words', () => {
      expect(slugify('Hello World', 180)).toBe('hello-world');
    });

    it('should strip diacritics and punctuation', () => {
      expect(slugify('  Héllo, Wörld!  ', 180)).toBe('hello-world');
      expect(slugify('Crème Brûlée', 180)).toBe('creme-brulee');
    });

    it('should collapse runs of separators into one hyphen', () => {
      expect(slugify('a -- b__c', 180)).toBe('a-b-c');
    });

    it('should return an empty string when nothing slug-worthy remains', () => {
      expect(slugify('!!!', 180)).toBe('');
      expect(slugify('   ', 180)).toBe('');
    });

    it('should truncate without leaving a trailing hyphen', () => {
      expect(slugify('abc def ghi', 8)).toBe('abc-def');
    });
  });

  describe('truncateSlug', () => {
    it('should leave short slugs alone', () => {
      expect(truncateSlug('short', 10)).toBe('short');
    });

    it('should cut long slugs', () => {
      expect(truncateSlug('abcdefghij', 4)).toBe('abcd');
    });
  });

  describe('withSuffix', () => {
    it('should return the base for the first candidate', () => {
      expect(withSuffix('hello-world', 1, 180)).toBe('hello-world');
    });

    it('should append the counter from the second candidate on', () => {
      expect(withSuffix('hello-world', 2, 180)).toBe('hello-world-2');
      expect(withSuffix('hello-world', 3, 180)).toBe('hello-world-3');
    });

    it('should shorten the base so the suffix fits', () => {
      expect(withSuffix('abcdefghij', 12, 10)).toBe('abcdefg-12');
      expect(withSuffix('abc-defghij', 2, 6)).toBe('abc-2');
    });
  });

  describe('slugMatchesBase', () => {
    it('should match the base itself', () => {
      expect(slugMatchesBase('hello-world', 'hello-world', 180)).toBe(true);
    });

    it('should match suffixed candidates', () => {
      expect(slugMatchesBase('hello-world-3', 'hello-world', 180)).toBe(true);
      expect(slugMatchesBase('top-10-2', 'top-10', 180)).toBe(true);
    });

    it('should not match a -1 suffix or a different base', () => {
      expect(slugMatchesBase('hello-world-1', 'hello-world', 180)).toBe(false);
      expect(slugMatchesBase('hello-there', 'hello-world', 180)).toBe(false);
      expect(slugMatchesBase('hello-world-2', 'hello', 180)).toBe(false);
    });

    it('should match candidates whose base was shortened', () => {
      expect(slugMatchesBase('abcdefg-12', 'abcdefghij', 10)).toBe(true);
    });
  });
});
