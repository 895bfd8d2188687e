/**
 * Tests for NotificationLifecycle - session, handle and timer transitions
 */

import { beforeEach, describe, expect, test } from 'vitest';

import { DebounceTimer } from '../src/lib/debounce-timer';
import { type LifecycleContent, NotificationLifecycle } from '../src/lib/notification-lifecycle';
import { createTestLogger, FakeClock, FakePresentation } from './helpers/fakes';

interface ContentProbe {
  content: LifecycleContent;
  events: string[];
  summary: { value: string };
  body: { value: string };
  perf: { enabled: boolean };
}

function makeContent(): ContentProbe {
  const events: string[] = [];
  const summary = { value: 'Summary' };
  const body = { value: 'Body' };
  const perf = { enabled: false };

  const content: LifecycleContent = {
    appName: () => 'mpv',
    appIcon: () => 'mpv',
    category: () => null,
    urgency: () => 'normal',
    progress: () => 42,
    image: () => null,
    composeSummary: () => {
      events.push('compose-summary');
      return summary.value;
    },
    composeBody: () => {
      events.push('compose-body');
      return body.value;
    },
    perfEnabled: () => perf.enabled,
    onCapabilities: markup => { events.push(`markup:${markup}`); },
    onShowMeasured: micros => { events.push(`rtt:${micros}`); },
    onTimerArmed: () => { events.push('armed'); },
    onReinitialized: () => { events.push('reinitialized'); }
  };

  return { content, events, summary, body, perf };
}

describe('NotificationLifecycle', () => {
  let backend: FakePresentation;
  let clock: FakeClock;
  let timer: DebounceTimer;
  let probe: ContentProbe;
  let lines: string[];
  let lifecycle: NotificationLifecycle;

  beforeEach(() => {
    backend = new FakePresentation();
    clock = new FakeClock();
    timer = new DebounceTimer(clock.now);
    probe = makeContent();
    const captured = createTestLogger('error');
    lines = captured.lines;
    lifecycle = new NotificationLifecycle({ backend, timer, logger: captured.logger, content: probe.content });
  });

  // =========================================================================
  // Startup
  // =========================================================================

  describe('start', () => {
    test('creates a closed notification with every attribute pushed', () => {
      lifecycle.start();

      expect(lifecycle.getState()).toBe('closed');
      expect(backend.calls).toEqual(['init', 'create']);
      expect(probe.events).toEqual(['compose-summary', 'compose-body', 'markup:true']);
      expect(lifecycle.getHandle()).toEqual({
        summary: 'Summary',
        body: 'Body',
        urgency: 'normal',
        category: null,
        progress: 42,
        image: null,
        serverId: null
      });
      expect(backend.appIcon).toBe('mpv');
    });

    test('a failed init leaves the lifecycle failed', () => {
      backend.failInit = 1;

      lifecycle.start();

      expect(lifecycle.getState()).toBe('failed');
      expect(lifecycle.getHandle()).toBeNull();
      expect(lines).toEqual(['osd: ERROR: failed to initialize notification backend: init: server unavailable']);
    });
  });

  // =========================================================================
  // Reset / update / close
  // =========================================================================

  describe('transitions', () => {
    beforeEach(() => {
      lifecycle.start();
      probe.events.length = 0;
      backend.calls.length = 0;
    });

    test('reset arms the timer, reports the arming and shows', () => {
      lifecycle.reset(10);

      expect(timer.isArmed()).toBe(true);
      expect(timer.remainingMs()).toBe(10_000);
      expect(probe.events).toEqual(['armed']);
      expect(backend.calls).toEqual(['show']);
      expect(lifecycle.getState()).toBe('open');
    });

    test('reset while armed restarts the timer without re-reporting', () => {
      lifecycle.reset(10);
      clock.advance(4000);
      lifecycle.reset(10);

      expect(timer.remainingMs()).toBe(10_000);
      expect(probe.events).toEqual(['armed']);
    });

    test('dirty text is recomposed and pushed before show', () => {
      probe.body.value = 'Paused';
      lifecycle.invalidate({ body: true });

      lifecycle.update();

      expect(probe.events).toEqual(['compose-body']);
      expect(backend.calls).toEqual(['update', 'show']);
      expect(backend.shows[0].body).toBe('Paused');
      expect(lifecycle.isBodyDirty()).toBe(false);
    });

    test('clean text skips the update call', () => {
      lifecycle.update();
      expect(backend.calls).toEqual(['show']);
    });

    test('close disarms and closes', () => {
      lifecycle.reset(10);
      lifecycle.close();

      expect(timer.isArmed()).toBe(false);
      expect(backend.calls).toEqual(['show', 'close']);
      expect(lifecycle.getState()).toBe('closed');
    });

    test('close errors are logged, not thrown', () => {
      backend.failClose = 1;
      lifecycle.close();
      expect(lines).toEqual(['osd: ERROR: failed to close notification: close: no such notification']);
    });

    test('show timing is reported and dirties the body', () => {
      const ticks = [10, 10.5];
      const timed = new NotificationLifecycle({
        backend,
        timer,
        logger: createTestLogger('quiet').logger,
        content: probe.content,
        now: () => ticks.shift() ?? 0
      });
      timed.start();
      probe.perf.enabled = true;
      probe.events.length = 0;

      timed.update();

      expect(probe.events).toEqual(['rtt:500']);
      expect(timed.isBodyDirty()).toBe(true);
    });
  });

  // =========================================================================
  // Recovery
  // =========================================================================

  describe('recovery', () => {
    test('a failed show reinitializes and resubscribes, the next reset succeeds', () => {
      lifecycle.start();
      backend.failShow = 1;
      backend.calls.length = 0;
      probe.events.length = 0;

      lifecycle.reset(10);

      expect(lines).toEqual(['osd: ERROR: failed to show notification: show: server went away']);
      expect(backend.calls).toEqual(['show', 'close', 'uninit', 'init', 'create']);
      expect(probe.events).toEqual(['armed', 'markup:true', 'reinitialized']);
      expect(lifecycle.getState()).toBe('closed');

      backend.calls.length = 0;
      lifecycle.reset(10);

      expect(backend.calls).toEqual(['show']);
      expect(lifecycle.getState()).toBe('open');
      expect(backend.shows).toHaveLength(1);
    });

    test('update without a handle reinitializes instead of showing', () => {
      backend.failInit = 1;
      lifecycle.start();
      backend.calls.length = 0;

      lifecycle.update();

      expect(backend.calls).toEqual(['init', 'create']);
      expect(lifecycle.getState()).toBe('closed');
      expect(backend.shows).toHaveLength(0);
    });

    test('shutdown tears everything down', () => {
      lifecycle.start();
      lifecycle.reset(10);
      lifecycle.shutdown();

      expect(lifecycle.getState()).toBe('uninitialized');
      expect(lifecycle.getHandle()).toBeNull();
      expect(backend.isInitialized()).toBe(false);
      expect(timer.isArmed()).toBe(false);
    });
  });
});
