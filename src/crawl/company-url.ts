const FEED_SUFFIXES = ['/feed.atom', '/feed.json'];

export function canonicalListingUrl(rawUrl: string): string {
  const url = rawUrl.trim();
  for (const suffix of FEED_SUFFIXES) {
    if (url.endsWith(suffix)) {
      return url.slice(0, -suffix.length);
    }
  }
  return url;
}

/** Origin of the listing page; relative job hrefs are appended to it. */
export function siteBaseOf(listingUrl: string): string {
  return new URL(listingUrl).origin;
}
