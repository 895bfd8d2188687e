/**
 * Collaborator contracts - player connection, capture, notification server
 *
 * The engine only talks to these interfaces. Completions of asynchronous
 * requests (captures, text expansion) come back as Signals through the
 * SignalChannel, never as callbacks into the engine.
 */

import type { Urgency } from './options';

// ---------------------------------------------------------------------------
// Player connection
// ---------------------------------------------------------------------------

export interface PlayerClient {
  /** Start observing a property; changes arrive as property-change signals */
  observe(id: number, name: string): void;

  unobserve(id: number): void;

  /**
   * Expand a property template (OSD formatting) asynchronously.
   * The result arrives as a text-expanded signal carrying requestId.
   */
  requestTextExpansion(requestId: number, template: string): void;

  close(): void;
}

// ---------------------------------------------------------------------------
// Capture
// ---------------------------------------------------------------------------

export interface CaptureBackend {
  /**
   * Request a raw RGBA frame. Completion arrives as capture-ready or
   * capture-failed carrying requestId. A later request may supersede this one.
   */
  requestCapture(requestId: number, flags: string): void;
}

// ---------------------------------------------------------------------------
// Presentation
// ---------------------------------------------------------------------------

/** Scaled RGBA image wrapping the thumbnail cache's destination buffer */
export interface ThumbnailImage {
  readonly width: number;
  readonly height: number;
  readonly stride: number;
  readonly data: Uint8Array;
  /** Bumped every time the pixels are rewritten */
  revision: number;
}

export interface NotificationHandle {
  summary: string;
  body: string;
  urgency: Urgency;
  category: string | null;
  /** Progress hint 0..100, null = no hint */
  progress: number | null;
  image: ThumbnailImage | null;
  /** Id assigned by the notification server on first show */
  serverId: number | null;
}

export interface PresentationBackend {
  /** Connect to the notification server. Throws BackendError on failure. */
  init(appName: string): void;
  uninit(): void;
  isInitialized(): boolean;

  queryServerCapabilities(): Set<string>;

  setAppName(name: string): void;
  /** null removes the app icon */
  setAppIcon(icon: string | null): void;

  create(summary: string, body: string): NotificationHandle;
  update(handle: NotificationHandle, summary: string, body: string): void;
  setUrgency(handle: NotificationHandle, urgency: Urgency): void;
  /** null removes the category hint */
  setCategory(handle: NotificationHandle, category: string | null): void;
  setProgressHint(handle: NotificationHandle, value: number | null): void;
  setImage(handle: NotificationHandle, image: ThumbnailImage | null): void;

  /** Throws BackendError on failure */
  show(handle: NotificationHandle): void;
  /** Throws BackendError on failure */
  close(handle: NotificationHandle): void;
}

export type BackendOperation = 'init' | 'capabilities' | 'show' | 'update' | 'close';

export class BackendError extends Error {
  readonly operation: BackendOperation;

  constructor(operation: BackendOperation, message: string, options?: { cause?: unknown }) {
    super(`${operation}: ${message}`, options);
    this.name = 'BackendError';
    this.operation = operation;
  }
}

/** Server capability advertising body markup support */
export const CAP_BODY_MARKUP = 'body-markup';
