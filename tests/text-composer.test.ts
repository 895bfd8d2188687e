/**
 * Tests for the text composer - summary and body lines
 */

import { describe, expect, test } from 'vitest';

import { ObservedStateTable } from '../src/lib/observed-state';
import type { PropertyName } from '../src/lib/observed-properties';
import {
  composeBody,
  composeSummary,
  EMPTY_OSD_STRINGS,
  formatHms,
  type ComposerSnapshot,
  truncateUtf8
} from '../src/lib/text-composer';
import { EMPTY_METADATA, extractTrackMetadata } from '../src/lib/track-metadata';
import { DEFAULT_OPTIONS } from '../src/types/options';
import type { NodeValue } from '../src/types/signals';

type StateValues = Partial<Record<PropertyName, NodeValue>>;

function snapshot(values: StateValues = {}, overrides: Partial<ComposerSnapshot> = {}): ComposerSnapshot {
  const state = new ObservedStateTable();
  for (const [name, value] of Object.entries(values)) {
    const property = OBSERVED_NAMES.find(candidate => candidate === name);
    if (property) state.update(property, value);
  }

  return {
    state,
    metadata: EMPTY_METADATA,
    options: DEFAULT_OPTIONS,
    osd: EMPTY_OSD_STRINGS,
    percentPosRounded: 0,
    markupEnabled: false,
    perf: { thumbnailMicros: 0, showRttMicros: 0 },
    ...overrides
  };
}

const OBSERVED_NAMES: PropertyName[] = [
  'duration', 'eof-reached', 'idle-active', 'image-display-duration', 'keep-open', 'loop-file',
  'media-title', 'mute', 'pause', 'paused-for-cache', 'play-direction', 'playlist-count',
  'playlist-pos', 'seeking', 'speed', 'sub-text', 'sub-visibility', 'time-pos',
  'user-data/detect-image/detected', 'volume'
];

const PLAYING: StateValues = { 'time-pos': 65, 'duration': 3600 };

// ===========================================================================
// Summary
// ===========================================================================

describe('composeSummary', () => {
  test('falls back to "No file"', () => {
    expect(composeSummary(snapshot())).toBe('No file');
    expect(composeSummary(snapshot({ 'media-title': '' }))).toBe('No file');
  });

  test('uses the media title', () => {
    expect(composeSummary(snapshot({ 'media-title': 'clip.mkv' }))).toBe('clip.mkv');
  });

  test('prefers artist - title', () => {
    const metadata = extractTrackMetadata({ artist: 'Band & Co', title: 'Song' }, true);
    expect(composeSummary(snapshot({ 'media-title': 'file.flac' }, { metadata }))).toBe('Band & Co - Song');
  });

  test('needs both artist and title', () => {
    const metadata = extractTrackMetadata({ title: 'Song' }, false);
    expect(composeSummary(snapshot({ 'media-title': 'file.flac' }, { metadata }))).toBe('file.flac');
  });

  test('is truncated to 511 bytes on a code point boundary', () => {
    const metadata = extractTrackMetadata({ artist: 'A', title: 'é'.repeat(300) }, false);
    const summary = composeSummary(snapshot({}, { metadata }));

    expect(summary).toBe(`A - ${'é'.repeat(253)}`);
    expect(Buffer.byteLength(summary)).toBe(510);
  });
});

// ===========================================================================
// Playback line
// ===========================================================================

describe('composeBody playback line', () => {
  test('playing with duration and percent', () => {
    expect(composeBody(snapshot(PLAYING, { percentPosRounded: 2 }))).toBe('▶ 00:01:05 / 01:00:00 (2%)');
  });

  test('without duration', () => {
    expect(composeBody(snapshot({ 'time-pos': 5 }))).toBe('▶ 00:00:05 (0%)');
  });

  test('pause glyph', () => {
    expect(composeBody(snapshot({ ...PLAYING, pause: true }, { percentPosRounded: 2 }))).toBe('⏸ 00:01:05 / 01:00:00 (2%)');
  });

  test('waiting beats paused, paused beats backward', () => {
    expect(composeBody(snapshot({ seeking: true, pause: true }))).toBe('⏲');
    expect(composeBody(snapshot({ 'paused-for-cache': true }))).toBe('⏲');
    expect(composeBody(snapshot({ pause: true, 'play-direction': 'backward' }))).toBe('⏸');
    expect(composeBody(snapshot({ 'play-direction': 'backward' }))).toBe('◀');
  });

  test('playlist position prefix', () => {
    expect(composeBody(snapshot({ 'playlist-count': 12, 'playlist-pos': 2 }))).toBe('(03/12) ▶');
    expect(composeBody(snapshot({ 'playlist-count': 1, 'playlist-pos': 0 }))).toBe('▶');
  });

  test('no time while idle', () => {
    expect(composeBody(snapshot({ ...PLAYING, 'idle-active': true }))).toBe('▶');
  });

  test('loop, speed, mute and volume', () => {
    const body = composeBody(snapshot({ ...PLAYING, 'loop-file': 'inf', speed: 1.5, mute: true, volume: 50 }));
    expect(body).toBe('▶ 00:01:05 / 01:00:00 (0%) \u{1F501} (1.50x) \u{1F507} (\u{1F50A} 50%)');
  });

  test('loop-file "no" and default speed/volume add nothing', () => {
    expect(composeBody(snapshot({ ...PLAYING, 'loop-file': 'no', speed: 1, volume: 100 })))
      .toBe('▶ 00:01:05 / 01:00:00 (0%)');
  });

  test('keep-open other than always shows (auto) without a slideshow timer', () => {
    expect(composeBody(snapshot({ 'keep-open': 'yes' }))).toBe('▶ (auto)');
    expect(composeBody(snapshot({ 'keep-open': 'always' }))).toBe('▶');
    expect(composeBody(snapshot({ 'keep-open': 'no' }))).toBe('▶ (auto)');
  });

  test('keep-open and loop-file as delivered over JSON IPC', () => {
    expect(composeBody(snapshot({ 'keep-open': false }))).toBe('▶ (auto)');
    expect(composeBody(snapshot({ ...PLAYING, 'loop-file': 2 })))
      .toBe('▶ 00:01:05 / 01:00:00 (0%) \u{1F501}');
    expect(composeBody(snapshot({ ...PLAYING, 'loop-file': false })))
      .toBe('▶ 00:01:05 / 01:00:00 (0%)');
  });

  test('slideshow duration for detected images', () => {
    const body = composeBody(snapshot({
      ...PLAYING,
      'user-data/detect-image/detected': true,
      'image-display-duration': 5
    }));
    expect(body).toBe('▶ (ss: 5s)');
  });
});

// ===========================================================================
// Other lines
// ===========================================================================

describe('composeBody lines', () => {
  test('chapter and edition lines need both parts', () => {
    const body = composeBody(snapshot({}, {
      osd: { chapter: 'Intro', chapters: '10', edition: '1', editions: null }
    }));
    expect(body).toBe('▶\nChapter: Intro / 10');
  });

  test('release line with album', () => {
    const metadata = extractTrackMetadata({ album: 'Al', artist: 'Ar', date: '2001-02-03' }, false);
    expect(composeBody(snapshot({}, { metadata }))).toBe('▶\nAr - Al (2001)');
  });

  test('album artist and original year take precedence', () => {
    const metadata = extractTrackMetadata({ album: 'Al', artist: 'Ar', album_artist: 'Various', originalyear: '1980', year: '2001' }, false);
    expect(composeBody(snapshot({}, { metadata }))).toBe('▶\nVarious - Al (1980)');
  });

  test('date line without album', () => {
    const metadata = extractTrackMetadata({ date: '2001-02-03' }, false);
    expect(composeBody(snapshot({}, { metadata }))).toBe('▶\nDate: 2001-02-03');
  });

  test('disc line only for multi-disc releases', () => {
    const twoDiscs = extractTrackMetadata({ disc: '1', totaldiscs: '2' }, false);
    const oneDisc = extractTrackMetadata({ disc: '1', disctotal: '1' }, false);

    expect(composeBody(snapshot({}, { metadata: twoDiscs }))).toBe('▶\nDisc: 1 / 2');
    expect(composeBody(snapshot({}, { metadata: oneDisc }))).toBe('▶');
  });

  test('end of playlist and EOF', () => {
    const last = { 'eof-reached': true, 'playlist-count': 3, 'playlist-pos': 2 };

    expect(composeBody(snapshot(last))).toBe('(03/03) ▶\nend of playlist');
    expect(composeBody(snapshot(last, { markupEnabled: true }))).toBe('(03/03) ▶\n<b>end of playlist</b>');
    expect(composeBody(snapshot({ 'eof-reached': true, 'playlist-count': 1, 'playlist-pos': 0 }))).toBe('▶\nEOF');
  });

  test('timing lines with perfdata', () => {
    const body = composeBody(snapshot({}, {
      options: { ...DEFAULT_OPTIONS, perfdata: true },
      perf: { thumbnailMicros: 120, showRttMicros: 3400 }
    }));
    expect(body).toBe('▶\nThumbnail postprocess timing (last µs): 120\nPrevious ntf show rtt (µs): 3400');
  });

  test('subtitle text when visible and enabled', () => {
    const values = { 'sub-text': 'hello', 'sub-visibility': true };

    expect(composeBody(snapshot(values))).toBe('▶\nhello');
    expect(composeBody(snapshot({ ...values, 'sub-visibility': false }))).toBe('▶');
    expect(composeBody(snapshot(values, { options: { ...DEFAULT_OPTIONS, sendSubText: false } }))).toBe('▶');
  });

  test('body is capped at 4095 bytes', () => {
    const body = composeBody(snapshot({ 'sub-text': 'x'.repeat(5000), 'sub-visibility': true }));
    expect(Buffer.byteLength(body)).toBe(4095);
  });

  test('identical snapshots compose identical text', () => {
    const snap = snapshot({ ...PLAYING, pause: true }, { percentPosRounded: 2 });
    expect(composeBody(snap)).toBe(composeBody(snap));
    expect(composeSummary(snap)).toBe(composeSummary(snap));
  });
});

describe('helpers', () => {
  test('formatHms pads every field', () => {
    expect(formatHms(0)).toBe('00:00:00');
    expect(formatHms(3661.9)).toBe('01:01:01');
    expect(formatHms(360000)).toBe('100:00:00');
  });

  test('truncateUtf8 never splits a code point', () => {
    expect(truncateUtf8('a\u{1F501}b', 4)).toBe('a');
    expect(truncateUtf8('a\u{1F501}b', 5)).toBe('a\u{1F501}');
    expect(truncateUtf8('short', 10)).toBe('short');
  });
});
