/**
 * Note classification
 *
 * A note is a location only when the whole note is a known place name.
 * Everything else is kept verbatim as a note, emoji and all.
 */

export interface ClassifiedNote {
  location: string | null;
  notes: string | null;
}

function comparable(text: string): string {
  return text.normalize('NFC').trim().toLowerCase();
}

export class NoteClassifier {
  private readonly known = new Map<string, string>();

  constructor(locations: Iterable<string>) {
    for (const location of locations) {
      const key = comparable(location);
      if (key) this.known.set(key, location.trim());
    }
  }

  get size(): number {
    return this.known.size;
  }

  /** Returns a classifier that also knows the given places */
  extend(locations: Iterable<string>): NoteClassifier {
    return new NoteClassifier([...this.known.values(), ...locations]);
  }

  classify(rawNote: string | null | undefined): ClassifiedNote {
    const text = rawNote?.trim();
    if (!text) {
      return { location: null, notes: null };
    }

    const location = this.known.get(comparable(text));
    if (location !== undefined) {
      return { location, notes: null };
    }

    return { location: null, notes: text };
  }
}
