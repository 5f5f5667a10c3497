/**
 * TagExtractor - keyword tags for history search
 */

export const MAX_TAGS = 10;
export const MIN_TAG_LENGTH = 4;

export const STOP_WORDS: ReadonlySet<string> = new Set([
  'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'of', 'with', 'by'
]);

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

/**
 * Extract up to ten tags from a text, in order of first appearance.
 * Duplicates are kept; tags are not ranked.
 */
export function extractTags(text: string): string[] {
  const words = text.toLowerCase().match(WORD_PATTERN) ?? [];
  const tags: string[] = [];

  for (const word of words) {
    if ([...word].length < MIN_TAG_LENGTH || STOP_WORDS.has(word)) continue;
    tags.push(word);
    if (tags.length === MAX_TAGS) break;
  }

  return tags;
}

export class TagExtractor {
  extract(text: string): string[] {
    return extractTags(text);
  }
}

export default TagExtractor;
