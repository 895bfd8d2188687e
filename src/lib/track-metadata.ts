/**
 * Track metadata extraction
 *
 * Pulls the tags the composer uses out of the player's metadata map. Tag
 * names match case-insensitively and the first occurrence of a tag wins.
 * Values shown in the body are escaped for markup; artist and title are also
 * kept raw because the summary is never interpreted as markup.
 */

import { isNodeMap, type NodeValue } from '../types/signals';
import { displayYear, escapeMarkup } from './markup';

export interface TrackMetadata {
  album?: string;
  albumArtist?: string;
  /** Raw, for the summary */
  artist?: string;
  /** Escaped, for the body */
  artistEscaped?: string;
  date?: string;
  dateYear?: string;
  disc?: string;
  discc?: string;
  discnumber?: string;
  disctotal?: string;
  originaldate?: string;
  originaldateYear?: string;
  originalyear?: string;
  /** Raw, for the summary */
  title?: string;
  totaldiscs?: string;
  year?: string;
}

export interface MetadataSnapshot {
  /** The player reported a metadata map (possibly empty) */
  available: boolean;
  tags: TrackMetadata;
}

export const EMPTY_METADATA: MetadataSnapshot = Object.freeze({
  available: false,
  tags: Object.freeze({})
});

type TagWriter = (tags: TrackMetadata, value: string, markup: boolean) => void;

function setOnce<K extends keyof TrackMetadata>(tags: TrackMetadata, key: K, value: string): void {
  if (tags[key] === undefined) {
    tags[key] = value;
  }
}

const TAG_WRITERS = new Map<string, TagWriter>(Object.entries({
  album: (t, v, m) => setOnce(t, 'album', escapeMarkup(v, m)),
  album_artist: (t, v, m) => setOnce(t, 'albumArtist', escapeMarkup(v, m)),
  artist: (t, v, m) => {
    setOnce(t, 'artist', v);
    setOnce(t, 'artistEscaped', escapeMarkup(v, m));
  },
  date: (t, v, m) => {
    setOnce(t, 'date', escapeMarkup(v, m));
    setOnce(t, 'dateYear', displayYear(v, m));
  },
  disc: (t, v, m) => setOnce(t, 'disc', escapeMarkup(v, m)),
  discc: (t, v, m) => setOnce(t, 'discc', escapeMarkup(v, m)),
  discnumber: (t, v, m) => setOnce(t, 'discnumber', escapeMarkup(v, m)),
  disctotal: (t, v, m) => setOnce(t, 'disctotal', escapeMarkup(v, m)),
  originaldate: (t, v, m) => {
    setOnce(t, 'originaldate', escapeMarkup(v, m));
    setOnce(t, 'originaldateYear', displayYear(v, m));
  },
  originalyear: (t, v, m) => setOnce(t, 'originalyear', escapeMarkup(v, m)),
  title: (t, v) => setOnce(t, 'title', v),
  totaldiscs: (t, v, m) => setOnce(t, 'totaldiscs', escapeMarkup(v, m)),
  year: (t, v, m) => setOnce(t, 'year', escapeMarkup(v, m))
} satisfies Record<string, TagWriter>));

export function extractTrackMetadata(node: NodeValue | undefined, markupEnabled: boolean): MetadataSnapshot {
  if (!isNodeMap(node)) {
    return EMPTY_METADATA;
  }

  const tags: TrackMetadata = {};

  for (const [key, value] of Object.entries(node)) {
    if (typeof value !== 'string') continue;
    const writer = TAG_WRITERS.get(key.toLowerCase());
    if (writer) {
      writer(tags, value, markupEnabled);
    }
  }

  return { available: true, tags };
}
