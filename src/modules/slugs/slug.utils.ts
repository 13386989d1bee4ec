/**
 * Convert a display string to a URL-safe slug of at most `maxLength`
 * characters. Returns an empty string when nothing slug-worthy remains.
 */
export function slugify(text: string, maxLength: number): string {
  const slug = text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '') // strip diacritics
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');

  return truncateSlug(slug, maxLength);
}

/**
 * Cuts `slug` to `maxLength` without leaving a trailing hyphen.
 */
export function truncateSlug(slug: string, maxLength: number): string {
  if (slug.length <= maxLength) {
    return slug;
  }
  return slug.substring(0, maxLength).replace(/-+$/, '');
}

/**
 * The n-th candidate for `base`: the base itself for n = 1, `base-n` after
 * that, with the base shortened so the suffix always fits.
 */
export function withSuffix(base: string, n: number, maxLength: number): string {
  if (n <= 1) {
    return truncateSlug(base, maxLength);
  }

  const suffix = `-${n}`;
  const head = truncateSlug(base, maxLength - suffix.length);
  return `${head}${suffix}`;
}

/**
 * Whether `slug` is one of the candidates `withSuffix` derives from `base`.
 */
export function slugMatchesBase(slug: string, base: string, maxLength: number): boolean {
  if (slug === truncateSlug(base, maxLength)) {
    return true;
  }

  const match = /-(\d+)$/.exec(slug);
  if (!match) {
    return false;
  }

  const n = parseInt(match[1], 10);
  return n >= 2 && withSuffix(base, n, maxLength) === slug;
}
