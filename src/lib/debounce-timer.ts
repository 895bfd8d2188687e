/**
 * Debounce Timer - Single expiry countdown for the open notification
 *
 * arm() always restarts from the time of the call, never from an earlier
 * deadline. Expiry does not close anything by itself: the engine polls
 * takeExpiry() and feeds the result through the action set, so a force-open
 * override can still veto the close.
 *
 * After expiry has been taken the timer stays armed without a deadline until
 * the engine disarms it (close) or re-arms it (reset).
 */

export type Clock = () => number;

export class DebounceTimer {
  private armed = false;
  private expiresAt: number | null = null;
  private readonly now: Clock;

  constructor(now: Clock = Date.now) {
    this.now = now;
  }

  /**
   * Arm for timeoutSeconds from now. 0 keeps the timer armed with no deadline.
   */
  arm(timeoutSeconds: number): void {
    this.armed = true;
    this.expiresAt = timeoutSeconds > 0 ? this.now() + timeoutSeconds * 1000 : null;
  }

  disarm(): void {
    this.armed = false;
    this.expiresAt = null;
  }

  isArmed(): boolean {
    return this.armed;
  }

  getExpiresAt(): number | null {
    return this.expiresAt;
  }

  /** Milliseconds until expiry, null when there is nothing to wait for */
  remainingMs(): number | null {
    if (!this.armed || this.expiresAt === null) return null;
    return Math.max(0, this.expiresAt - this.now());
  }

  hasExpired(): boolean {
    return this.armed && this.expiresAt !== null && this.now() >= this.expiresAt;
  }

  /**
   * Report expiry once: returns true and clears the deadline if it has passed.
   */
  takeExpiry(): boolean {
    if (!this.hasExpired()) return false;
    this.expiresAt = null;
    return true;
  }
}

export default DebounceTimer;
