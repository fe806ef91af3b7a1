// src/processing/tag-filter.ts

/**
 * Element names treated as page chrome rather than article content. Any element
 * with one of these names is dropped together with its whole subtree.
 */
export const DEFAULT_SKIP_TAGS: readonly string[] = [
  'script',
  'style',
  'noscript',
  'iframe',
  'header',
  'footer',
  'nav',
  'aside',
  'form',
  'input',
  'button',
  'svg',
  'picture',
  'source',
];

export type SkipSet = ReadonlySet<string>;

export function createSkipSet(extraTags: readonly string[] = []): SkipSet {
  const tags = new Set(DEFAULT_SKIP_TAGS);
  for (const tag of extraTags) {
    const name = tag.trim().toLowerCase();
    if (name) tags.add(name);
  }
  return tags;
}

export function isSkipped(tagName: string, skipSet: SkipSet): boolean {
  return skipSet.has(tagName.toLowerCase());
}
