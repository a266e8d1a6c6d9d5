export const SLUG_MAX_LENGTH = 60;
export const SLUG_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

const FALLBACK_SLUG = 'untitled';

/**
 * Lower-case, ASCII-only, hyphen separated. Accents are folded
 * ("Café" -> "cafe"); anything else outside [a-z0-9] becomes a separator.
 * Titles with nothing usable (e.g. only CJK characters) fall back to "untitled".
 */
export function slugify(input: string, maxLength = SLUG_MAX_LENGTH): string {
  const slug = input
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, maxLength)
    .replace(/-+$/, '');

  return slug || FALLBACK_SLUG;
}

/**
 * First free slug in the sequence base, base-2, base-3, ... given the slugs
 * already taken. Suffixed candidates are trimmed so they stay within maxLength.
 */
export function nextAvailableSlug(base: string, taken: Iterable<string>, maxLength = SLUG_MAX_LENGTH): string {
  const used = new Set(taken);
  if (!used.has(base)) return base;

  for (let n = 2; ; n++) {
    const suffix = `-${n}`;
    const stem = base.slice(0, maxLength - suffix.length).replace(/-+$/, '');
    const candidate = `${stem}${suffix}`;
    if (!used.has(candidate)) return candidate;
  }
}

/**
 * LIKE pattern that matches every slug `nextAvailableSlug` can produce for
 * `base` (suffixes up to `-999`). Long bases are shortened before the suffix
 * goes on, so their family is matched on the shortest stem instead.
 */
export function slugFamilyPattern(base: string, maxLength = SLUG_MAX_LENGTH): string {
  if (base.length <= maxLength - 4) return `${base}-%`;
  return `${base.slice(0, maxLength - 4).replace(/-+$/, '')}%`;
}

export function isValidSlug(value: string): boolean {
  return value.length <= SLUG_MAX_LENGTH && SLUG_PATTERN.test(value);
}
