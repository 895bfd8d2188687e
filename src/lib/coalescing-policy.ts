/**
 * Coalescing Policy - Ordered decisions over one cycle's action set
 *
 * Pure functions; the engine gathers the inputs after the image check
 * (step 1) has run and executes whatever these return.
 *
 * PRIORITY:
 * - capture: forced beats normal; normal needs an armed timer (or force-open)
 * - lifecycle: close (unless force-open) beats everything; otherwise reset
 *   beats update, both behind the visibility gate
 */

import type { ActionSet } from './action-set';

export type CaptureDecision = 'none' | 'forced' | 'normal';

export interface CaptureInput {
  actions: ActionSet;
  imageEnabled: boolean;
  timerArmed: boolean;
  forceOpen: boolean;
}

export function decideCapture(input: CaptureInput): CaptureDecision {
  const forced = input.actions.has('forced-capture');
  if (!forced && !input.actions.has('queue-capture')) {
    return 'none';
  }
  return canCapture(input.imageEnabled, input.timerArmed, forced, input.forceOpen)
    ? forced ? 'forced' : 'normal'
    : 'none';
}

/**
 * Capture gate shared with the reset path: images must be enabled, and the
 * timer armed unless the request is forced or the notification is held open.
 */
export function canCapture(imageEnabled: boolean, timerArmed: boolean, forced: boolean, forceOpen: boolean): boolean {
  return imageEnabled && (timerArmed || forced || forceOpen);
}

export interface FocusInput {
  focusedProperty: boolean;
  mouseHovered: boolean;
  focusManual: boolean;
}

export function isViewerFocused(input: FocusInput): boolean {
  return input.focusedProperty || input.mouseHovered || input.focusManual;
}

export interface VisibilityInput {
  focused: boolean;
  forceOpen: boolean;
  metadataAvailable: boolean;
  timePosAvailable: boolean;
  idle: boolean;
}

/**
 * Show only while unfocused (or forced), and only once the track's
 * metadata and position are known, or the player is idle. Mid-switch
 * states would otherwise flash "No file" or a bare filename.
 */
export function isVisible(input: VisibilityInput): boolean {
  return (!input.focused || input.forceOpen)
    && ((input.metadataAvailable && input.timePosAvailable) || input.idle);
}

export type LifecycleDecision = 'none' | 'close' | 'reset' | 'update';

export interface LifecycleInput extends VisibilityInput {
  actions: ActionSet;
  timerArmed: boolean;
}

export function decideLifecycle(input: LifecycleInput): LifecycleDecision {
  const { actions } = input;

  if (actions.has('close') && !input.forceOpen) {
    return 'close';
  }

  if (!isVisible(input)) {
    return 'none';
  }

  if (actions.has('reset')) {
    return 'reset';
  }

  if (actions.has('update') && (input.timerArmed || input.forceOpen)) {
    return 'update';
  }

  return 'none';
}
