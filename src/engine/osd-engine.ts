/**
 * OSD Engine - Coalesces player signals into notification side effects
 *
 * One explicit context object: observed state, options, pending actions,
 * timer, thumbnail cache and lifecycle all live here; nothing is global, so
 * independent engines can run side by side (tests do).
 *
 * CYCLE:
 *   1. await the channel (or the timer deadline)
 *   2. handle every queued signal: update state, accumulate actions
 *   3. turn a passed deadline into a timer-expired signal
 *   4. drain(): image check, capture, close | reset | update
 *   5. clear the action set, whatever happened
 *
 * Asynchronous work (captures, OSD text expansion) is requested here and
 * completes as a later signal carrying the request id. Only the most recent
 * request of each kind is honoured.
 */

import type { CaptureBackend, PlayerClient, PresentationBackend, ThumbnailImage } from '../types/backends';
import type { OsdOptions, Urgency } from '../types/options';
import type { NodeValue, RawFrame, Signal } from '../types/signals';
import { isNodeMap } from '../types/signals';
import { ActionSet } from '../lib/action-set';
import { canCapture, decideCapture, decideLifecycle, isViewerFocused } from '../lib/coalescing-policy';
import { type Clock, DebounceTimer } from '../lib/debounce-timer';
import type { Logger } from '../lib/logger';
import { escapeMarkup, isNormalNumber } from '../lib/markup';
import { NotificationLifecycle } from '../lib/notification-lifecycle';
import { OBSERVED_PROPERTIES, type PropertyName } from '../lib/observed-properties';
import { ObservedStateTable } from '../lib/observed-state';
import type { OptionChange, OptionStore } from '../lib/option-store';
import type { SignalChannel } from '../lib/signal-channel';
import { composeBody, composeSummary, EMPTY_OSD_STRINGS, type ComposerSnapshot, type OsdStrings, type PerfTimings } from '../lib/text-composer';
import { ThumbnailCache } from '../lib/thumbnail-cache';
import { EMPTY_METADATA, extractTrackMetadata, type MetadataSnapshot } from '../lib/track-metadata';

export interface OsdEngineDeps {
  player: PlayerClient;
  capture: CaptureBackend;
  presentation: PresentationBackend;
  channel: SignalChannel;
  options: OptionStore;
  logger: Logger;
  /** Wall clock for the expiry timer, ms */
  clock?: Clock;
  /** High resolution clock for timing diagnostics, ms */
  hrClock?: () => number;
}

type OsdTextSlot = 'chapter' | 'edition';

/** Separates the current and total parts of an expanded OSD template */
const OSD_TEXT_SEPARATOR = '\x1f';

const OSD_TEXT_TEMPLATES: Record<OsdTextSlot, string> = {
  chapter: `\${?chapter:\${chapter}${OSD_TEXT_SEPARATOR}\${chapters}}`,
  edition: `\${?edition:\${edition}${OSD_TEXT_SEPARATOR}\${editions}}`
};

const DEFAULT_APP_NAME = 'mpv';

type PropertyHandler = (raw: NodeValue | undefined) => void;

export class OsdEngine {
  private readonly player: PlayerClient;
  private readonly capture: CaptureBackend;
  private readonly channel: SignalChannel;
  private readonly options: OptionStore;
  private readonly logger: Logger;

  private readonly state = new ObservedStateTable();
  private readonly actions = new ActionSet();
  private readonly timer: DebounceTimer;
  private readonly thumbnails: ThumbnailCache;
  private readonly lifecycle: NotificationLifecycle;
  private readonly propertyHandlers: Partial<Record<PropertyName, PropertyHandler>>;

  private metadata: MetadataSnapshot = EMPTY_METADATA;
  private osd: Readonly<OsdStrings> = EMPTY_OSD_STRINGS;
  private readonly perf: PerfTimings = { thumbnailMicros: 0, showRttMicros: 0 };
  private percentPosRounded = 0;
  private mouseHovered = false;
  private forceOpen = false;
  private imageEnabled = false;
  private markupEnabled = false;
  private running = false;

  private requestSeq = 0;
  private latestCaptureId: number | null = null;
  private readonly pendingText = new Map<OsdTextSlot, number>();

  constructor(deps: OsdEngineDeps) {
    this.player = deps.player;
    this.capture = deps.capture;
    this.channel = deps.channel;
    this.options = deps.options;
    this.logger = deps.logger;

    this.timer = new DebounceTimer(deps.clock);
    this.thumbnails = new ThumbnailCache({ logger: deps.logger, now: deps.hrClock });
    this.lifecycle = new NotificationLifecycle({
      backend: deps.presentation,
      timer: this.timer,
      logger: deps.logger,
      now: deps.hrClock,
      content: {
        appName: () => this.appName(),
        appIcon: () => this.opts().appIcon || null,
        category: () => this.opts().category || null,
        urgency: (): Urgency => this.opts().urgency,
        progress: () => this.progressValue(),
        image: () => this.currentImage(),
        composeSummary: () => composeSummary(this.snapshot()),
        composeBody: () => composeBody(this.snapshot()),
        perfEnabled: () => this.opts().perfdata,
        onCapabilities: markup => this.setMarkupEnabled(markup),
        onShowMeasured: micros => { this.perf.showRttMicros = micros; },
        onTimerArmed: () => this.captureAfterArm(),
        onReinitialized: () => this.subscribeAll(true)
      }
    });

    this.propertyHandlers = {
      'app-name': () => this.lifecycle.pushAppName(),
      'chapter': () => this.requestOsdText('chapter'),
      'chapters': () => this.requestOsdText('chapter'),
      'edition': () => this.requestOsdText('edition'),
      'editions': () => this.requestOsdText('edition'),
      'idle-active': () => {
        this.lifecycle.pushProgress();
        this.lifecycle.invalidate({ body: true });
      },
      'metadata': raw => { this.metadata = extractTrackMetadata(raw, this.markupEnabled); },
      'mouse-pos': raw => this.onMousePos(raw),
      'msg-level': () => this.logger.applyMsgLevel(this.state.node('msg-level')),
      'options/script-opts': raw => this.applyOptionChanges(this.options.applyRuntimeOverlay(raw)),
      'percent-pos': () => this.onPercentPos(),
      'playlist-count': () => this.lifecycle.pushProgress(),
      'playlist-pos': () => this.lifecycle.pushProgress(),
      'user-data/detect-image/detected': () => this.lifecycle.pushProgress()
    };
  }

  // -------------------------------------------------------------------------
  // Startup / run loop / teardown
  // -------------------------------------------------------------------------

  /**
   * Connect the presentation backend, load the option file and subscribe
   * to every observed property. Actions raised while loading options are
   * discarded; their immediate pushes (icon, category, urgency) still happen.
   */
  start(): void {
    this.running = true;
    this.lifecycle.start();
    this.applyOptionChanges(this.options.reload());
    this.actions.clear();
    this.subscribeAll(false);
  }

  async run(): Promise<void> {
    try {
      while (this.running) {
        const signal = await this.channel.next(this.timer.remainingMs());
        if (signal) {
          this.handleSignal(signal);
        }
        this.pump();
      }
    } finally {
      this.teardown();
    }
  }

  /**
   * One cycle without waiting: handle queued signals, check the deadline,
   * drain. Returns false once a shutdown has been seen.
   */
  pump(): boolean {
    let signal: Signal | undefined;
    while (this.running && (signal = this.channel.tryNext()) !== undefined) {
      this.handleSignal(signal);
    }

    if (!this.running) return false;

    if (this.timer.takeExpiry()) {
      this.handleSignal({ kind: 'timer-expired' });
    }

    this.drain();
    return true;
  }

  isRunning(): boolean {
    return this.running;
  }

  teardown(): void {
    this.running = false;
    this.thumbnails.destroy();
    this.lifecycle.shutdown();
  }

  // -------------------------------------------------------------------------
  // Signals
  // -------------------------------------------------------------------------

  handleSignal(signal: Signal): void {
    switch (signal.kind) {
      case 'property-change':
        this.onPropertyChange(signal.name, signal.value);
        return;

      case 'timer-expired':
        this.logger.debug('expire timer expired');
        this.actions.accumulate('close');
        return;

      case 'capture-ready':
        this.onCaptureReady(signal.requestId, signal.frame);
        return;

      case 'capture-failed':
        if (signal.requestId !== this.latestCaptureId) return;
        this.latestCaptureId = null;
        this.logger.error(`screenshot failed: ${signal.reason}`);
        return;

      case 'text-expanded':
        this.onTextExpanded(signal.requestId, signal.text);
        return;

      case 'player-event':
        if (signal.event === 'video-reconfig') {
          this.logger.debug('video reconfig');
          this.actions.accumulate('forced-capture');
        } else {
          this.logger.debug('seeked');
          this.actions.accumulate('reset');
        }
        return;

      case 'client-message':
        this.onClientMessage(signal.args);
        return;

      case 'config-reload-requested':
        this.reloadConfig();
        return;

      case 'shutdown':
        this.logger.verbose(`shutting down: ${signal.reason}`);
        this.running = false;
        return;
    }
  }

  private onPropertyChange(name: PropertyName, value: NodeValue | undefined): void {
    const result = this.state.update(name, value);
    this.actions.accumulate(result.actions);
    this.lifecycle.invalidate({ summary: result.summaryDirty, body: result.bodyDirty });

    this.propertyHandlers[name]?.(value);

    this.logger.debug(`property changed, ${name}.`);
  }

  private onMousePos(raw: NodeValue | undefined): void {
    const wasHovered = this.mouseHovered;
    this.mouseHovered = isNodeMap(raw) && raw['hover'] === true;
    if (!wasHovered && this.mouseHovered) {
      this.actions.accumulate('close');
    }
  }

  private onPercentPos(): void {
    // Cover art and other still images keep the position moving without the
    // picture changing; re-capturing them every tick is wasted work
    if (!this.state.isTruthy('current-tracks/video/image')) {
      this.actions.accumulate('queue-capture');
    }

    const previous = this.percentPosRounded;
    const percent = this.state.number('percent-pos');
    this.percentPosRounded = isNormalNumber(percent) ? roundHalfAwayFromZero(percent) : 0;

    if (previous !== this.percentPosRounded) {
      this.lifecycle.pushProgress();
      this.actions.accumulate('update');
      this.lifecycle.invalidate({ body: true });
    }
  }

  private onClientMessage(args: string[]): void {
    const [command] = args;

    switch (command) {
      case 'close':
        this.actions.accumulate('close');
        this.forceOpen = false;
        return;
      case 'open':
        this.actions.accumulate('reset');
        this.forceOpen = true;
        return;
      case 'reload-config':
        this.reloadConfig();
        return;
      default:
        if (command !== undefined) {
          this.logger.debug(`ignoring client message '${command}'`);
        }
    }
  }

  private reloadConfig(): void {
    this.logger.verbose('reloading configuration');
    this.applyOptionChanges(this.options.reload());
  }

  // -------------------------------------------------------------------------
  // Drain
  // -------------------------------------------------------------------------

  drain(): void {
    try {
      if (this.actions.has('check-image')) {
        this.checkImage();
      }

      const capture = decideCapture({
        actions: this.actions,
        imageEnabled: this.imageEnabled,
        timerArmed: this.timer.isArmed(),
        forceOpen: this.forceOpen
      });
      if (capture !== 'none') {
        this.requestCapture(capture === 'forced');
      }

      const decision = decideLifecycle({
        actions: this.actions,
        forceOpen: this.forceOpen,
        timerArmed: this.timer.isArmed(),
        focused: isViewerFocused({
          focusedProperty: this.state.isTruthy('focused'),
          mouseHovered: this.mouseHovered,
          focusManual: this.opts().focusManual
        }),
        metadataAvailable: this.metadata.available,
        timePosAvailable: this.state.isAvailable('time-pos'),
        idle: this.state.isTruthy('idle-active')
      });

      switch (decision) {
        case 'close':
          this.lifecycle.close();
          break;
        case 'reset':
          this.lifecycle.reset(this.opts().expireTimeout);
          break;
        case 'update':
          this.lifecycle.update();
          break;
        case 'none':
          break;
      }
    } finally {
      this.actions.clear();
      this.logger.debug('back to sleep ~');
    }
  }

  /**
   * Images follow the player: off while idle, when thumbnails are disabled,
   * or when no video track (or lavfi graph) is selected. A track switch in
   * progress (nothing known yet) keeps the current setting. Enabling does not
   * capture by itself; the video reconfig that follows does.
   */
  private checkImage(): void {
    const idle = this.state.isTruthy('idle-active');
    const hasVideo = this.state.isAvailable('vid');
    const switchingTrack = !idle && !hasVideo && !this.metadata.available;

    if (idle || !this.opts().sendThumbnail || (!hasVideo && !this.state.isTruthy('lavfi-complex') && !switchingTrack)) {
      if (this.imageEnabled) {
        this.logger.verbose('notification image disabled');
        this.imageEnabled = false;
        this.thumbnails.destroy();
        this.lifecycle.pushImage();
        this.actions.accumulate('update');
      }
      return;
    }

    if (!this.imageEnabled) {
      this.logger.verbose('notification image enabled');
      this.imageEnabled = true;
    }
  }

  // -------------------------------------------------------------------------
  // Captures
  // -------------------------------------------------------------------------

  private captureAfterArm(): void {
    if (canCapture(this.imageEnabled, this.timer.isArmed(), false, this.forceOpen)) {
      this.requestCapture(false);
    }
  }

  private requestCapture(forced: boolean): void {
    if (this.latestCaptureId !== null) {
      this.logger.debug(`superseding screenshot request ${this.latestCaptureId}`);
    }

    const requestId = ++this.requestSeq;
    this.latestCaptureId = requestId;
    this.capture.requestCapture(requestId, this.opts().screenshotFlags);
    this.logger.debug(`queued ${forced ? 'forced ' : ''}screenshot ${requestId}`);
  }

  private onCaptureReady(requestId: number, frame: RawFrame): void {
    if (requestId !== this.latestCaptureId) {
      this.logger.debug(`discarding stale screenshot ${requestId}`);
      return;
    }
    this.latestCaptureId = null;

    if (!this.imageEnabled) return;

    this.logger.debug('post-processing screenshot');

    const opts = this.opts();
    const previousImage = this.thumbnails.getImage();
    const ready = this.thumbnails.ensureContext(
      frame.width,
      frame.height,
      frame.stride,
      opts.thumbnailSize,
      opts.thumbnailScaling,
      opts.disableScaling
    );

    if (!ready) {
      if (previousImage) this.lifecycle.pushImage();
      return;
    }

    const result = this.thumbnails.process(frame.data, opts.perfdata);
    if (!result.processed) return;

    if (result.elapsedMicros !== null) {
      this.perf.thumbnailMicros = result.elapsedMicros;
      this.lifecycle.invalidate({ body: true });
    }

    this.lifecycle.pushImage();
    this.actions.accumulate('update');
  }

  // -------------------------------------------------------------------------
  // OSD text
  // -------------------------------------------------------------------------

  private requestOsdText(slot: OsdTextSlot): void {
    const requestId = ++this.requestSeq;
    this.pendingText.set(slot, requestId);
    this.player.requestTextExpansion(requestId, OSD_TEXT_TEMPLATES[slot]);
  }

  private onTextExpanded(requestId: number, text: string | null): void {
    let slot: OsdTextSlot | undefined;
    for (const [candidate, pendingId] of this.pendingText) {
      if (pendingId === requestId) slot = candidate;
    }
    if (!slot) return;
    this.pendingText.delete(slot);

    const parts = text ? text.split(OSD_TEXT_SEPARATOR) : [];
    const current = parts.length === 2 ? escapeMarkup(parts[0], this.markupEnabled) : null;
    const total = parts.length === 2 ? parts[1] : null;

    if (slot === 'chapter') {
      this.osd = { ...this.osd, chapter: current, chapters: total };
    } else {
      this.osd = { ...this.osd, edition: current, editions: total };
    }

    this.lifecycle.invalidate({ body: true });
    this.actions.accumulate('update');
  }

  // -------------------------------------------------------------------------
  // Options
  // -------------------------------------------------------------------------

  private applyOptionChanges(changes: OptionChange[]): void {
    for (const change of changes) {
      this.logger.verbose(`option ${change.key} changed`);

      switch (change.trigger) {
        case 'none':
          break;
        case 'push-app-icon':
          this.lifecycle.pushAppIcon();
          this.actions.accumulate('update');
          break;
        case 'push-category':
          this.lifecycle.pushCategory();
          this.actions.accumulate('update');
          break;
        case 'push-urgency':
          this.lifecycle.pushUrgency();
          this.actions.accumulate('update');
          this.lifecycle.invalidate({ body: true });
          break;
        case 'toggle-thumbnail':
          this.actions.accumulate('check-image');
          if (this.opts().sendThumbnail) {
            this.actions.accumulate('queue-capture');
          }
          break;
        case 'push-progress':
          this.lifecycle.pushProgress();
          this.actions.accumulate('update');
          break;
        case 'rewrite-body':
          this.actions.accumulate('update');
          this.lifecycle.invalidate({ body: true });
          break;
        case 'rebuild-thumbnail':
          this.thumbnails.destroy();
          this.lifecycle.pushImage();
          this.actions.accumulate('queue-capture');
          break;
        case 'recapture':
          this.actions.accumulate('queue-capture');
          break;
        case 'reopen':
          this.actions.accumulate('reset');
          break;
      }
    }
  }

  // -------------------------------------------------------------------------
  // Subscriptions
  // -------------------------------------------------------------------------

  /**
   * Observe every registered property. With resubscribe, each is dropped
   * first so the player re-delivers its current value (re-escaped under
   * the server's current markup support).
   */
  private subscribeAll(resubscribe: boolean): void {
    for (const entry of OBSERVED_PROPERTIES) {
      try {
        if (resubscribe) {
          this.player.unobserve(entry.id);
        }
        this.player.observe(entry.id, entry.name);
      } catch (error) {
        this.logger.error(`failed to observe property: ${entry.name}`, error);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Derived values
  // -------------------------------------------------------------------------

  private opts(): Readonly<OsdOptions> {
    return this.options.getActive();
  }

  private setMarkupEnabled(enabled: boolean): void {
    this.markupEnabled = enabled;
    this.state.setMarkupEnabled(enabled);
  }

  private appName(): string {
    return this.state.isTruthy('app-name')
      ? this.state.string('app-name') ?? DEFAULT_APP_NAME
      : DEFAULT_APP_NAME;
  }

  private currentImage(): ThumbnailImage | null {
    return this.imageEnabled ? this.thumbnails.getImage() : null;
  }

  /**
   * Playback percent; for image galleries the playlist position instead.
   * null removes the hint.
   */
  private progressValue(): number | null {
    if (this.state.isTruthy('idle-active') || !this.opts().sendProgress) {
      return null;
    }

    if (this.state.isTruthy('user-data/detect-image/detected')) {
      const pos = this.state.number('playlist-pos');
      const count = this.state.number('playlist-count') ?? 0;
      if (pos === undefined || count <= 1) return null;
      return roundHalfAwayFromZero(((pos + 1) / count) * 100);
    }

    return this.percentPosRounded;
  }

  private snapshot(): ComposerSnapshot {
    return {
      state: this.state,
      metadata: this.metadata,
      options: this.opts(),
      osd: this.osd,
      percentPosRounded: this.percentPosRounded,
      markupEnabled: this.markupEnabled,
      perf: this.perf
    };
  }

  // -------------------------------------------------------------------------
  // Introspection
  // -------------------------------------------------------------------------

  getLifecycle(): NotificationLifecycle {
    return this.lifecycle;
  }

  getTimer(): DebounceTimer {
    return this.timer;
  }

  getThumbnailCache(): ThumbnailCache {
    return this.thumbnails;
  }

  getObservedState(): ObservedStateTable {
    return this.state;
  }

  getPendingActions(): ActionSet {
    return this.actions;
  }

  isForceOpen(): boolean {
    return this.forceOpen;
  }

  isImageEnabled(): boolean {
    return this.imageEnabled;
  }

  getPercentPosRounded(): number {
    return this.percentPosRounded;
  }

  getOsdStrings(): Readonly<OsdStrings> {
    return this.osd;
  }
}

function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

export default OsdEngine;
