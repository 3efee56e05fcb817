/**
 * Series volume extraction
 * "Der Hypnotiseur (Band 1)" → { title: "Der Hypnotiseur", seriesVolume: 1 }
 *
 * Only a parenthetical at the very end of the title is considered. One that
 * is not a volume marker ("(Director's Cut)") stays part of the title.
 */

export interface TitleParts {
  title: string;
  seriesVolume: number | null;
}

const TRAILING_PARENTHETICAL = /\s*\(([^()]*)\)\s*$/;

// Keywords are matched against the text inside the parentheses
const VOLUME_MARKERS: RegExp[] = [
  /^(?:band|bd\.?|fall|teil|buch|volume|vol\.?|book)\s*(\d+)$/i,  // Band 1, Bd. 2, Fall 3
  /^(\d+)\.?\s*(?:band|fall|teil|buch)$/i,                         // 2. Fall
  /^(\d+)\.$/,                                                     // 3.
];

/**
 * Volume number if the text inside a parenthetical is a volume marker
 */
export function matchVolume(annotation: string): number | null {
  const text = annotation.trim();
  for (const pattern of VOLUME_MARKERS) {
    const match = text.match(pattern);
    if (match) {
      const volume = parseInt(match[1], 10);
      return volume > 0 ? volume : null;
    }
  }
  return null;
}

export function extractSeries(rawTitle: string): TitleParts {
  const trimmed = rawTitle.trim();
  const trailing = trimmed.match(TRAILING_PARENTHETICAL);

  if (trailing?.index !== undefined) {
    const volume = matchVolume(trailing[1]);
    if (volume !== null) {
      return { title: trimmed.slice(0, trailing.index).trim(), seriesVolume: volume };
    }
  }

  return { title: trimmed, seriesVolume: null };
}
