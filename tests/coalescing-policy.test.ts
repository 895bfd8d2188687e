/**
 * Tests for ActionSet and the coalescing decisions
 */

import { describe, expect, test } from 'vitest';

import { ActionSet, type OsdAction } from '../src/lib/action-set';
import {
  canCapture,
  decideCapture,
  decideLifecycle,
  isViewerFocused,
  isVisible,
  type VisibilityInput
} from '../src/lib/coalescing-policy';

function actions(...list: OsdAction[]): ActionSet {
  const set = new ActionSet();
  set.accumulate(list);
  return set;
}

const VISIBLE: VisibilityInput = {
  focused: false,
  forceOpen: false,
  metadataAvailable: true,
  timePosAvailable: true,
  idle: false
};

// ===========================================================================
// ActionSet
// ===========================================================================

describe('ActionSet', () => {
  test('deduplicates and reports canonical order', () => {
    const set = new ActionSet();
    set.accumulate(['update', 'reset', 'update']);
    set.accumulate('check-image');

    expect(set.toArray()).toEqual(['reset', 'update', 'check-image']);
  });

  test('clear empties the set', () => {
    const set = actions('close', 'queue-capture');
    set.clear();
    expect(set.isEmpty()).toBe(true);
    expect(set.has('close')).toBe(false);
  });
});

// ===========================================================================
// Capture
// ===========================================================================

describe('decideCapture', () => {
  test('nothing requested, nothing captured', () => {
    expect(decideCapture({ actions: actions('update'), imageEnabled: true, timerArmed: true, forceOpen: false }))
      .toBe('none');
  });

  test('queued capture needs an armed timer', () => {
    const input = { actions: actions('queue-capture'), imageEnabled: true, forceOpen: false };
    expect(decideCapture({ ...input, timerArmed: false })).toBe('none');
    expect(decideCapture({ ...input, timerArmed: true })).toBe('normal');
  });

  test('force-open stands in for the armed timer', () => {
    expect(decideCapture({ actions: actions('queue-capture'), imageEnabled: true, timerArmed: false, forceOpen: true }))
      .toBe('normal');
  });

  test('forced capture ignores the timer and wins over queued', () => {
    expect(decideCapture({ actions: actions('forced-capture'), imageEnabled: true, timerArmed: false, forceOpen: false }))
      .toBe('forced');
    expect(decideCapture({ actions: actions('queue-capture', 'forced-capture'), imageEnabled: true, timerArmed: true, forceOpen: false }))
      .toBe('forced');
  });

  test('disabled images block every capture', () => {
    expect(decideCapture({ actions: actions('forced-capture'), imageEnabled: false, timerArmed: true, forceOpen: true }))
      .toBe('none');
    expect(canCapture(false, true, true, true)).toBe(false);
  });
});

// ===========================================================================
// Focus and visibility
// ===========================================================================

describe('isViewerFocused', () => {
  test('any source of focus counts', () => {
    expect(isViewerFocused({ focusedProperty: false, mouseHovered: false, focusManual: false })).toBe(false);
    expect(isViewerFocused({ focusedProperty: true, mouseHovered: false, focusManual: false })).toBe(true);
    expect(isViewerFocused({ focusedProperty: false, mouseHovered: true, focusManual: false })).toBe(true);
    expect(isViewerFocused({ focusedProperty: false, mouseHovered: false, focusManual: true })).toBe(true);
  });
});

describe('isVisible', () => {
  test('needs metadata and position unless idle', () => {
    expect(isVisible(VISIBLE)).toBe(true);
    expect(isVisible({ ...VISIBLE, metadataAvailable: false })).toBe(false);
    expect(isVisible({ ...VISIBLE, timePosAvailable: false })).toBe(false);
    expect(isVisible({ ...VISIBLE, metadataAvailable: false, timePosAvailable: false, idle: true })).toBe(true);
  });

  test('focus hides unless forced open', () => {
    expect(isVisible({ ...VISIBLE, focused: true })).toBe(false);
    expect(isVisible({ ...VISIBLE, focused: true, forceOpen: true })).toBe(true);
  });
});

// ===========================================================================
// Lifecycle
// ===========================================================================

describe('decideLifecycle', () => {
  test('close beats reset and update', () => {
    expect(decideLifecycle({ ...VISIBLE, actions: actions('close', 'reset', 'update'), timerArmed: true })).toBe('close');
  });

  test('close is vetoed by force-open', () => {
    expect(decideLifecycle({ ...VISIBLE, forceOpen: true, actions: actions('close', 'reset'), timerArmed: true })).toBe('reset');
    expect(decideLifecycle({ ...VISIBLE, forceOpen: true, actions: actions('close'), timerArmed: true })).toBe('none');
  });

  test('close does not need visibility', () => {
    expect(decideLifecycle({ ...VISIBLE, focused: true, actions: actions('close'), timerArmed: true })).toBe('close');
  });

  test('reset beats update', () => {
    expect(decideLifecycle({ ...VISIBLE, actions: actions('reset', 'update'), timerArmed: false })).toBe('reset');
  });

  test('update only refreshes an open notification', () => {
    expect(decideLifecycle({ ...VISIBLE, actions: actions('update'), timerArmed: false })).toBe('none');
    expect(decideLifecycle({ ...VISIBLE, actions: actions('update'), timerArmed: true })).toBe('update');
    expect(decideLifecycle({ ...VISIBLE, forceOpen: true, actions: actions('update'), timerArmed: false })).toBe('update');
  });

  test('nothing happens while focused', () => {
    expect(decideLifecycle({ ...VISIBLE, focused: true, actions: actions('reset'), timerArmed: false })).toBe('none');
  });
});
