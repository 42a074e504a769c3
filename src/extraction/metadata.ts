/**
 * Meta tag extraction
 */

/**
 * Named meta tags collected under their own name
 */
const META_NAMES = ["description", "keywords", "author", "robots"];

/**
 * Extract content from meta tag by name or property
 * Works regardless of attribute order
 */
export function extractMetaContent(document: Document, name: string): string | null {
  // Try name attribute first
  const byName = document.querySelector(`meta[name="${name}"]`);
  if (byName) {
    const content = byName.getAttribute("content");
    if (content?.trim()) return content.trim();
  }

  // Try property attribute (for Open Graph)
  const byProperty = document.querySelector(`meta[property="${name}"]`);
  if (byProperty) {
    const content = byProperty.getAttribute("content");
    if (content?.trim()) return content.trim();
  }

  return null;
}

/**
 * Collect description/keywords/author/robots and every og:* property.
 * Open Graph keys become og_<name>; the first tag for a key wins.
 */
export function extractMetaTags(document: Document): Record<string, string> | null {
  const metaTags: Record<string, string> = {};

  for (const name of META_NAMES) {
    const content = extractMetaContent(document, name);
    if (content) {
      metaTags[name] = content;
    }
  }

  for (const tag of Array.from(document.querySelectorAll('meta[property^="og:"]'))) {
    const property = tag.getAttribute("property");
    const content = tag.getAttribute("content")?.trim();
    if (!property || !content) continue;

    const key = `og_${property.slice(3)}`;
    if (!(key in metaTags)) {
      metaTags[key] = content;
    }
  }

  return Object.keys(metaTags).length > 0 ? metaTags : null;
}
