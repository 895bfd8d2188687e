/**
 * Text Composer - Summary and body text for the notification
 *
 * Pure functions of a ComposerSnapshot: the observed-state table, the
 * extracted track metadata, the active options and a few derived values the
 * engine keeps (rounded percent, OSD strings, timings). Repeated calls with
 * the same snapshot return identical strings.
 *
 * BODY LAYOUT (each line only when it has content):
 *   L1  playlist position, playback glyph, time / duration (percent), loop,
 *       speed, mute, volume, slideshow hints
 *   L2  Chapter: <osd chapter> / <osd chapters>
 *   L3  Edition: <osd edition> / <osd editions>
 *   L4  release line (album artist - album (year)) or Date: <date>
 *   L5  Disc: <disc> / <total>
 *   L6  end of playlist / EOF
 *   L7  timing diagnostics (perfdata)
 *   L8  current subtitle text
 */

import type { OsdOptions } from '../types/options';
import type { ObservedStateTable } from './observed-state';
import type { MetadataSnapshot } from './track-metadata';
import { isNormalNumber } from './markup';

export const MAX_SUMMARY_BYTES = 511;
export const MAX_BODY_BYTES = 4095;

export const GLYPHS = {
  waiting: '⏲',
  paused: '⏸',
  backward: '◀',
  playing: '▶',
  loop: '\u{1F501}',
  muted: '\u{1F507}',
  volume: '\u{1F50A}'
} as const;

/** OSD-formatted chapter/edition strings; a pair is shown only when both are set */
export interface OsdStrings {
  chapter: string | null;
  chapters: string | null;
  edition: string | null;
  editions: string | null;
}

export const EMPTY_OSD_STRINGS: Readonly<OsdStrings> = Object.freeze({
  chapter: null,
  chapters: null,
  edition: null,
  editions: null
});

export interface PerfTimings {
  /** Last thumbnail scale/copy, µs */
  thumbnailMicros: number;
  /** Last show round trip, µs */
  showRttMicros: number;
}

export interface ComposerSnapshot {
  state: ObservedStateTable;
  metadata: MetadataSnapshot;
  options: Readonly<OsdOptions>;
  osd: Readonly<OsdStrings>;
  percentPosRounded: number;
  markupEnabled: boolean;
  perf: Readonly<PerfTimings>;
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

export function composeSummary(snapshot: ComposerSnapshot): string {
  const { artist, title } = snapshot.metadata.tags;

  if (artist !== undefined && title !== undefined) {
    return truncateUtf8(`${artist} - ${title}`, MAX_SUMMARY_BYTES);
  }

  if (snapshot.state.isTruthy('media-title')) {
    return truncateUtf8(snapshot.state.string('media-title') ?? 'No file', MAX_SUMMARY_BYTES);
  }

  return 'No file';
}

// ---------------------------------------------------------------------------
// Body
// ---------------------------------------------------------------------------

export function composeBody(snapshot: ComposerSnapshot): string {
  const parts: string[] = [
    playbackLine(snapshot),
    osdPairLine('Chapter', snapshot.osd.chapter, snapshot.osd.chapters),
    osdPairLine('Edition', snapshot.osd.edition, snapshot.osd.editions),
    releaseLine(snapshot.metadata),
    discLine(snapshot.metadata),
    endOfFileLine(snapshot),
    perfLines(snapshot),
    subtitleLine(snapshot)
  ];

  return truncateUtf8(parts.join(''), MAX_BODY_BYTES);
}

/** hh:mm:ss with at least two digits per field */
export function formatHms(totalSeconds: number): string {
  const total = Math.trunc(totalSeconds);
  const hours = Math.trunc(total / 3600);
  const minutes = Math.trunc((total % 3600) / 60);
  const seconds = total % 60;
  return `${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

function playbackLine(snapshot: ComposerSnapshot): string {
  const { state } = snapshot;
  const playlistCount = state.number('playlist-count') ?? 0;
  const playlistPos = state.number('playlist-pos');
  const detectedImage = state.isTruthy('user-data/detect-image/detected');
  let line = '';

  if (playlistPos !== undefined && playlistCount > 1) {
    line += `(${pad2(playlistPos + 1)}/${pad2(playlistCount)}) `;
  }

  if (state.isTruthy('paused-for-cache') || state.isTruthy('seeking')) {
    line += GLYPHS.waiting;
  } else if (state.isTruthy('pause')) {
    line += GLYPHS.paused;
  } else if (state.string('play-direction') === 'backward') {
    line += GLYPHS.backward;
  } else {
    line += GLYPHS.playing;
  }

  const timePos = state.number('time-pos');
  if (!state.isTruthy('idle-active') && !detectedImage && timePos !== undefined) {
    const duration = state.number('duration');
    line += duration !== undefined
      ? ` ${formatHms(timePos)} / ${formatHms(duration)} (${snapshot.percentPosRounded}%)`
      : ` ${formatHms(timePos)} (${snapshot.percentPosRounded}%)`;

    const loopFile = state.string('loop-file');
    if (loopFile !== undefined && loopFile !== 'no') {
      line += ` ${GLYPHS.loop}`;
    }
  }

  const speed = state.number('speed');
  if (speed !== undefined && speed !== 1) {
    line += ` (${speed.toFixed(2)}x)`;
  }

  if (state.isTruthy('mute')) {
    line += ` ${GLYPHS.muted}`;
  }

  const volume = state.number('volume');
  if (volume !== undefined && volume !== 100) {
    line += ` (${GLYPHS.volume} ${volume}%)`;
  }

  const imageDuration = state.number('image-display-duration');
  if (!isNormalNumber(imageDuration)) {
    const keepOpen = state.string('keep-open');
    if (!detectedImage && keepOpen !== undefined && keepOpen !== '' && keepOpen !== 'always') {
      line += ' (auto)';
    }
  } else if (detectedImage) {
    line += ` (ss: ${imageDuration.toFixed(0)}s)`;
  }

  return line;
}

function osdPairLine(label: string, current: string | null, total: string | null): string {
  return current !== null && total !== null ? `\n${label}: ${current} / ${total}` : '';
}

function releaseLine(metadata: MetadataSnapshot): string {
  const tags = metadata.tags;
  const albumArtist = tags.albumArtist ?? tags.artistEscaped;

  if (tags.album !== undefined) {
    const year = tags.originalyear ?? tags.originaldateYear ?? tags.year ?? tags.dateYear;
    let line = '\n';
    if (albumArtist !== undefined) line += `${albumArtist} - `;
    line += tags.album;
    if (year !== undefined) line += ` (${year})`;
    return line;
  }

  const date = tags.originalyear ?? tags.originaldate ?? tags.year ?? tags.date;
  return date !== undefined ? `\nDate: ${date}` : '';
}

function discLine(metadata: MetadataSnapshot): string {
  const tags = metadata.tags;
  const total = tags.totaldiscs ?? tags.disctotal ?? tags.discc;
  const disc = tags.disc ?? tags.discnumber;

  if (disc === undefined || total === undefined || total === '0' || total === '1') {
    return '';
  }
  return `\nDisc: ${disc} / ${total}`;
}

function endOfFileLine(snapshot: ComposerSnapshot): string {
  const { state } = snapshot;
  const count = state.number('playlist-count') ?? 0;
  const pos = state.number('playlist-pos');

  if (!state.isTruthy('eof-reached') || pos === undefined || count <= 0 || pos < 0) {
    return '';
  }

  const message = count > 1 && pos + 1 === count ? 'end of playlist' : 'EOF';
  return snapshot.markupEnabled ? `\n<b>${message}</b>` : `\n${message}`;
}

function perfLines(snapshot: ComposerSnapshot): string {
  if (!snapshot.options.perfdata) return '';

  return `\nThumbnail postprocess timing (last µs): ${snapshot.perf.thumbnailMicros}`
    + `\nPrevious ntf show rtt (µs): ${snapshot.perf.showRttMicros}`;
}

function subtitleLine(snapshot: ComposerSnapshot): string {
  const { state } = snapshot;
  if (!snapshot.options.sendSubText || !state.isTruthy('sub-text') || !state.isTruthy('sub-visibility')) {
    return '';
  }
  return `\n${state.string('sub-text') ?? ''}`;
}

/**
 * Cut text to at most maxBytes of UTF-8 without splitting a code point.
 */
export function truncateUtf8(text: string, maxBytes: number): string {
  if (Buffer.byteLength(text, 'utf8') <= maxBytes) return text;

  let bytes = 0;
  let result = '';
  for (const ch of text) {
    const size = Buffer.byteLength(ch, 'utf8');
    if (bytes + size > maxBytes) break;
    bytes += size;
    result += ch;
  }
  return result;
}
