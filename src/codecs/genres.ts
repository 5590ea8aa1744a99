import ID3V1_GENRES from './id3v1-genres.json';

export const UNKNOWN_GENRE = 'Unknown';

const SPECIAL_GENRES: Record<string, string> = {
  RX: 'Remix',
  CR: 'Cover',
};

/**
 * Look up a genre in the ID3v1 genre table (the original 80 entries plus the Winamp extensions).
 * @param index The genre byte of an ID3v1 tag, or a numeric ID3v2 genre reference
 * @returns The genre name, or "Unknown" for 255 and any index past the end of the table
 */
export function genreName(index: number): string {
  return ID3V1_GENRES[index] ?? UNKNOWN_GENRE;
}

/**
 * Number of named entries in the genre table
 */
export const GENRE_COUNT = ID3V1_GENRES.length;

function resolveReference(reference: string): string {
  return SPECIAL_GENRES[reference] ?? genreName(Number(reference));
}

/**
 * Turn one content type (TCON) value into a genre name.
 *
 * Handles the forms found in the wild:
 * - 2.3 references: "(17)" → "Rock", "(17)(6)" → "Rock"
 * - 2.3 reference with refinement: "(4)Eurodisco" → "Eurodisco"
 * - escaped parenthesis: "((Foo)" → "(Foo)"
 * - 2.4 bare numbers and keywords: "17" → "Rock", "RX" → "Remix", "CR" → "Cover"
 * - plain text, returned as is
 * @param value One value of the frame
 * @returns The genre name
 */
export function resolveGenre(value: string): string {
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed) || Object.hasOwn(SPECIAL_GENRES, trimmed)) {
    return resolveReference(trimmed);
  }

  const references = new Array<string>();
  let rest = trimmed;
  while (rest.startsWith('(') && !rest.startsWith('((')) {
    const match = /^\((\d+|RX|CR)\)/.exec(rest);
    if (!match) break;
    references.push(match[1]);
    rest = rest.slice(match[0].length);
  }
  if (rest.startsWith('((')) {
    rest = rest.slice(1);
  }

  if (rest.length > 0) {
    return rest;
  }
  return references.length > 0 ? resolveReference(references[0]) : trimmed;
}
