/**
 * ActionSet - Coalesced, deduplicated work accumulated during one drain cycle
 *
 * Any number of signals may arrive before the engine gets to run; each one
 * only adds actions here. The set is the OR of everything seen, so order and
 * duplicates do not matter. It is cleared unconditionally when the cycle ends.
 */

export type OsdAction =
  /** Open (or restart) the notification and its expiry timer */
  | 'reset'
  /** Refresh an already open notification */
  | 'update'
  /** Close, unless force-open is active */
  | 'close'
  /** Capture a new thumbnail if the timer is armed */
  | 'queue-capture'
  /** Capture even while the timer is disarmed (video reconfig) */
  | 'forced-capture'
  /** Re-evaluate whether thumbnails are enabled */
  | 'check-image';

export const ALL_ACTIONS: readonly OsdAction[] = [
  'reset',
  'update',
  'close',
  'queue-capture',
  'forced-capture',
  'check-image'
];

export class ActionSet {
  private readonly actions = new Set<OsdAction>();

  accumulate(actions: Iterable<OsdAction> | OsdAction): void {
    if (typeof actions === 'string') {
      this.actions.add(actions);
      return;
    }
    for (const action of actions) {
      this.actions.add(action);
    }
  }

  has(action: OsdAction): boolean {
    return this.actions.has(action);
  }

  isEmpty(): boolean {
    return this.actions.size === 0;
  }

  clear(): void {
    this.actions.clear();
  }

  /** Actions in canonical order */
  toArray(): OsdAction[] {
    return ALL_ACTIONS.filter(action => this.actions.has(action));
  }
}

export default ActionSet;
