/**
 * Notification Lifecycle - Owns the backend session, the handle and the timer
 *
 * STATES:
 *   uninitialized  nothing connected yet (or after shutdown)
 *   closed         session up, handle created, nothing visible
 *   open           shown at least once since the last reset/close
 *   failed         a backend call failed; the next update reinitializes
 *
 * TRANSITIONS:
 *   reset   restart the timer from now, request a capture if it was not
 *           armed, then update
 *   update  rewrite dirty text, push update + show; on failure tear down and
 *           rebuild the session, after which every observed property is
 *           re-subscribed through the onReinitialized hook
 *   close   disarm the timer and close the handle; close errors are logged
 *
 * Reinitializing also recovers from a notification server that restarted
 * underneath us.
 */

import type { NotificationHandle, PresentationBackend, ThumbnailImage } from '../types/backends';
import { CAP_BODY_MARKUP } from '../types/backends';
import type { Urgency } from '../types/options';
import type { DebounceTimer } from './debounce-timer';
import type { Logger } from './logger';

export type LifecycleState = 'uninitialized' | 'closed' | 'open' | 'failed';

/**
 * Everything the lifecycle reads from (or reports to) the engine.
 */
export interface LifecycleContent {
  appName(): string;
  /** null removes the icon */
  appIcon(): string | null;
  /** null removes the category hint */
  category(): string | null;
  urgency(): Urgency;
  progress(): number | null;
  image(): ThumbnailImage | null;
  composeSummary(): string;
  composeBody(): string;
  perfEnabled(): boolean;

  onCapabilities(markupEnabled: boolean): void;
  onShowMeasured(micros: number): void;
  /** The timer went from disarmed to armed */
  onTimerArmed(): void;
  onReinitialized(): void;
}

export interface LifecycleOptions {
  backend: PresentationBackend;
  timer: DebounceTimer;
  logger: Logger;
  content: LifecycleContent;
  /** High resolution clock in ms */
  now?: () => number;
}

export class NotificationLifecycle {
  private state: LifecycleState = 'uninitialized';
  private handle: NotificationHandle | null = null;
  private summary = '';
  private body = '';
  private summaryDirty = true;
  private bodyDirty = true;

  private readonly backend: PresentationBackend;
  private readonly timer: DebounceTimer;
  private readonly logger: Logger;
  private readonly content: LifecycleContent;
  private readonly now: () => number;

  constructor(options: LifecycleOptions) {
    this.backend = options.backend;
    this.timer = options.timer;
    this.logger = options.logger;
    this.content = options.content;
    this.now = options.now ?? (() => performance.now());
  }

  getState(): LifecycleState {
    return this.state;
  }

  getHandle(): NotificationHandle | null {
    return this.handle;
  }

  getSummary(): string {
    return this.summary;
  }

  getBody(): string {
    return this.body;
  }

  invalidate(parts: { summary?: boolean; body?: boolean }): void {
    if (parts.summary) this.summaryDirty = true;
    if (parts.body) this.bodyDirty = true;
  }

  isBodyDirty(): boolean {
    return this.bodyDirty;
  }

  // -------------------------------------------------------------------------
  // Session
  // -------------------------------------------------------------------------

  /**
   * Compose the initial text and connect. A failed connect leaves the
   * lifecycle in 'failed'; the next update retries.
   */
  start(): void {
    this.rewriteText();
    this.init();
  }

  /** Tear down unconditionally */
  shutdown(): void {
    this.timer.disarm();
    this.uninit();
    this.state = 'uninitialized';
  }

  reinitialize(): void {
    this.uninit();
    this.init();
    if (this.handle) {
      this.content.onReinitialized();
    }
  }

  private init(): void {
    try {
      this.backend.init(this.content.appName());

      const markup = this.backend.queryServerCapabilities().has(CAP_BODY_MARKUP);
      this.logger.verbose(`server supports markup? ${markup ? 1 : 0}`);
      this.content.onCapabilities(markup);

      this.pushAppName();
      this.pushAppIcon();

      this.handle = this.backend.create(this.summary, this.body);
      this.pushProgress();
      this.pushCategory();
      this.pushUrgency();
      this.pushImage();

      this.state = 'closed';
    } catch (error) {
      this.logger.error('failed to initialize notification backend', error);
      this.uninit();
      this.state = 'failed';
    }
  }

  private uninit(): void {
    this.closeHandle();
    this.handle = null;
    if (this.backend.isInitialized()) {
      this.backend.uninit();
    }
  }

  // -------------------------------------------------------------------------
  // Transitions
  // -------------------------------------------------------------------------

  reset(expireTimeoutSeconds: number): void {
    this.logger.debug('notification reset');
    const wasArmed = this.timer.isArmed();
    this.timer.disarm();
    this.timer.arm(expireTimeoutSeconds);
    if (!wasArmed) {
      this.content.onTimerArmed();
    }
    this.update();
  }

  update(): void {
    const handle = this.handle;
    if (!handle) {
      this.reinitialize();
      return;
    }

    const textChanged = this.summaryDirty || this.bodyDirty;
    this.rewriteText();

    this.logger.debug('sending notification');

    const measure = this.content.perfEnabled();
    const start = measure ? this.now() : 0;

    try {
      if (textChanged) {
        this.backend.update(handle, this.summary, this.body);
      }
      this.backend.show(handle);
      this.state = 'open';
    } catch (error) {
      this.logger.error('failed to show notification', error);
      this.state = 'failed';
      this.reinitialize();
    }

    if (measure) {
      this.content.onShowMeasured(Math.round((this.now() - start) * 1000));
      this.bodyDirty = true;
    }
  }

  close(): void {
    this.timer.disarm();
    this.closeHandle();
    if (this.handle) {
      this.state = 'closed';
    }
  }

  private closeHandle(): void {
    if (!this.handle) return;

    this.logger.debug('notification close');
    try {
      this.backend.close(this.handle);
    } catch (error) {
      this.logger.error('failed to close notification', error);
    }
  }

  private rewriteText(): void {
    if (this.summaryDirty) {
      this.summary = this.content.composeSummary();
    }
    if (this.bodyDirty) {
      this.body = this.content.composeBody();
    }
    this.summaryDirty = false;
    this.bodyDirty = false;
  }

  // -------------------------------------------------------------------------
  // Attribute pushes (no-ops without a session/handle)
  // -------------------------------------------------------------------------

  pushAppName(): void {
    if (!this.backend.isInitialized()) return;
    this.backend.setAppName(this.content.appName());
  }

  pushAppIcon(): void {
    if (!this.backend.isInitialized()) return;
    this.backend.setAppIcon(this.content.appIcon());
  }

  pushProgress(): void {
    if (!this.handle) return;
    this.backend.setProgressHint(this.handle, this.content.progress());
  }

  pushCategory(): void {
    if (!this.handle) return;
    this.backend.setCategory(this.handle, this.content.category());
  }

  pushUrgency(): void {
    if (!this.handle) return;
    this.backend.setUrgency(this.handle, this.content.urgency());
  }

  pushImage(): void {
    if (!this.handle) return;
    this.backend.setImage(this.handle, this.content.image());
  }
}

export default NotificationLifecycle;
