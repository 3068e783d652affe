const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/**
 * Split text into user-perceived characters (extended grapheme clusters)
 */
export function splitCharacters(input: string): string[] {
  return Array.from(graphemes.segment(input), (part) => part.segment);
}
