const MAX_SLUG_LENGTH = 60

/**
 * Lowercase ASCII words joined by `_`; `untitled` when nothing survives.
 */
export function slugify(value: string): string {
  const slug = value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/_+$/, '')
  return slug || 'untitled'
}
