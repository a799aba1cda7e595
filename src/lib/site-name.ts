/**
 * Site Name Helpers
 * Turns a user-entered site name into a subdomain slug.
 */

const SITE_NAME_PATTERN = /^[a-z0-9-]+$/;

const encoder = new TextEncoder();

function percentEncode(char: string): string {
  return Array.from(
    encoder.encode(char),
    (byte) => `%${byte.toString(16).padStart(2, '0')}`
  ).join('');
}

/**
 * Normalize a site name into slug form.
 *
 * Accents are folded to ASCII, whitespace becomes hyphens and other
 * punctuation is dropped. Characters with no ASCII form are kept as
 * percent-encoded octets and underscores are kept as-is, so the result
 * is not guaranteed to pass `isValidSiteName`.
 */
export function normalizeSiteName(raw: string): string {
  return raw
    .replace(/<[^>]*>/g, '')
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/%(?![0-9a-fA-F]{2})/g, '')
    .replace(/[^\x00-\x7f]/gu, percentEncode)
    .toLowerCase()
    .replace(/&[^\s;]+;/g, '')
    .replace(/[^%a-z0-9 _-]/g, '')
    .replace(/\s+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function isValidSiteName(slug: string): boolean {
  return SITE_NAME_PATTERN.test(slug);
}

/**
 * Full domain of a subdomain site, e.g. `blog.example.com`
 */
export function buildSiteDomain(slug: string, networkDomain: string): string {
  return `${slug}.${networkDomain.replace(/^www\./i, '')}`;
}

/**
 * Default title of a newly provisioned site
 */
export function buildSiteTitle(slug: string): string {
  return `${slug.charAt(0).toUpperCase()}${slug.slice(1)} Website`;
}
