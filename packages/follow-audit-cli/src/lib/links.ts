// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A profile URL exactly as it appears in an href attribute */
export type Link = string;

export type LinkSet = ReadonlySet<Link>;

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Prefix that identifies profile links in the export */
export const DEFAULT_PROFILE_DOMAIN = "https://www.instagram.com/";

const HREF_PATTERN = /href="(https?:\/\/[^"]+)"/g;

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/**
 * Extract every http(s) href value from a blob of text.
 * Order of appearance is kept and duplicates are retained.
 */
export function extractLinks(text: string): Link[] {
  const links: Link[] = [];
  for (const match of text.matchAll(HREF_PATTERN)) {
    links.push(match[1]);
  }
  return links;
}

export function toLinkSet(links: Iterable<Link>): LinkSet {
  return new Set(links);
}

/**
 * Keep links that contain the given prefix anywhere in the URL.
 */
export function filterByDomain(links: Link[], domain: string): Link[] {
  return links.filter((link) => link.includes(domain));
}
