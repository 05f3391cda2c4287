/**
 * Lowercase ASCII slug: accents folded, runs of anything else collapsed to a
 * single hyphen, no leading or trailing hyphens.
 */
export function slugify(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, '')
    .trim()
    .replace(/[\s_-]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Appends `-1`, `-2`, ... to `base` until `isTaken` says the candidate is free.
 */
export function uniqueSlug(base: string, isTaken: (candidate: string) => boolean): string {
  const root = base || 'post';
  let candidate = root;
  let counter = 1;
  while (isTaken(candidate)) {
    candidate = `${root}-${counter}`;
    counter++;
  }
  return candidate;
}
