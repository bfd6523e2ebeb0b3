/** `source_name` column width on reports and omics */
export const MAX_SOURCE_NAME_LENGTH = 255;

/**
 * The client-supplied file name as stored: NUL characters removed, cut to
 * the column width in characters, `fallback` when nothing is left.
 */
export function toSourceName(name: string, fallback: string): string {
  const cleaned = name.split('\u0000').join('').trim();
  const characters = Array.from(cleaned);
  if (characters.length === 0) {
    return fallback;
  }
  return characters.slice(0, MAX_SOURCE_NAME_LENGTH).join('');
}
