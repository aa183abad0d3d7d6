import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fc from 'fast-check';
import { OcrScheduler, type Extractor, type SchedulerSettings } from '../src/pipeline/ocr-scheduler';
import { PollableTask, type TaskSpawner } from '../src/pipeline/pollable-task';
import { extractText } from '../src/pipeline/text-extractor';
import { LockedOcrEngine } from '../src/engines/locked-engine';
import { DEFAULT_LAYOUT_OPTION } from '../src/config/settings';
import type { LayoutOption } from '../src/types/layout';
import type { OcrResults } from '../src/types/ocr-results';
import type { RgbaImage } from '../src/types/frame';
import { box, createDeferred, createFakeService, createImage, type Deferred } from './helpers/fakes';

const smallLayout: LayoutOption = {
  aspectRatio: [2, 1],
  pixelChecks: [],
  layout: {
    offset: { x: 1, y: 1 },
    size: { width: 2, height: 1 },
    referenceResolution: { width: 4, height: 2 },
    themeTextColor: { r: 255, g: 255, b: 255, a: 255 },
    itemNameDistance: 10,
  },
};

const settings: SchedulerSettings = {
  layouts: [smallLayout],
  gapThreshold: 15,
  saveToDisk: false,
  captureDirectory: 'captures',
};

const results: OcrResults = {
  detectBounds: box(1, 1, 3, 2),
  words: [{ text: 'Rope', bounds: box(1, 1, 2, 2) }],
  lines: [{ bounds: box(1, 1, 2, 2), wordRange: { start: 0, end: 1 } }],
  items: [{ name: 'Rope', bounds: box(1, 1, 2, 2) }],
};

const spawnNow: TaskSpawner = (job) => new PollableTask(job());

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

const createFrames = (image: RgbaImage | null = createImage(4, 2)) => ({
  takeRgba: vi.fn(() => image),
});

describe('OcrScheduler unit tests', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs one pass and delivers its results on a later poll', async () => {
    const pending = createDeferred<OcrResults>();
    const extract = vi.fn<Extractor>(() => pending.promise);
    const onResults = vi.fn();
    const scheduler = new OcrScheduler({
      frames: createFrames(),
      engine: new LockedOcrEngine(createFakeService('fake')),
      settings,
      onResults,
      spawn: spawnNow,
      extract,
    });

    expect(scheduler.trigger()).toBe('started');
    expect(scheduler.state).toBe('running');
    expect(scheduler.poll()).toBe('pending');

    pending.resolve(results);
    await flush();

    expect(scheduler.poll()).toBe('delivered');
    expect(onResults).toHaveBeenCalledWith(results);
    expect(scheduler.state).toBe('idle');
    expect(scheduler.poll()).toBe('idle');
  });

  it('passes the scaled layout region and gap threshold to the extractor', () => {
    const extract = vi.fn<Extractor>(() => Promise.resolve(results));
    const scheduler = new OcrScheduler({
      frames: createFrames(),
      engine: new LockedOcrEngine(createFakeService('fake')),
      settings,
      onResults: vi.fn(),
      spawn: spawnNow,
      extract,
    });

    scheduler.trigger();

    expect(extract).toHaveBeenCalledTimes(1);
    expect(extract.mock.calls[0]?.[1]).toEqual(box(1, 1, 3, 2));
    expect(extract.mock.calls[0]?.[3]).toEqual({ gapThreshold: 15 });
  });

  it('ignores triggers while a pass is running', () => {
    const frames = createFrames();
    const extract = vi.fn<Extractor>(() => createDeferred<OcrResults>().promise);
    const scheduler = new OcrScheduler({
      frames,
      engine: new LockedOcrEngine(createFakeService('fake')),
      settings,
      onResults: vi.fn(),
      spawn: spawnNow,
      extract,
    });

    expect(scheduler.trigger()).toBe('started');
    expect(scheduler.trigger()).toBe('busy');
    expect(scheduler.trigger()).toBe('busy');

    expect(frames.takeRgba).toHaveBeenCalledTimes(1);
    expect(extract).toHaveBeenCalledTimes(1);
  });

  it('does nothing without a frame', () => {
    const extract = vi.fn<Extractor>(() => Promise.resolve(results));
    const scheduler = new OcrScheduler({
      frames: createFrames(null),
      engine: new LockedOcrEngine(createFakeService('fake')),
      settings,
      onResults: vi.fn(),
      spawn: spawnNow,
      extract,
    });

    expect(scheduler.trigger()).toBe('no-frame');
    expect(scheduler.state).toBe('idle');
    expect(extract).not.toHaveBeenCalled();
  });

  it('warns and stays idle when no layout matches', () => {
    const extract = vi.fn<Extractor>(() => Promise.resolve(results));
    const scheduler = new OcrScheduler({
      frames: createFrames(createImage(3, 3)),
      engine: new LockedOcrEngine(createFakeService('fake')),
      settings,
      onResults: vi.fn(),
      spawn: spawnNow,
      extract,
    });

    expect(scheduler.trigger()).toBe('no-layout');
    expect(scheduler.state).toBe('idle');
    expect(extract).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith(
      '[OCR]',
      'No configured layout matches the captured frame. (3x3)'
    );
  });

  it('reports failures and accepts the next trigger', async () => {
    const failure = new Error('engine down');
    const extract = vi
      .fn<Extractor>()
      .mockImplementationOnce(() => Promise.reject(failure))
      .mockImplementationOnce(() => Promise.resolve(results));
    const onError = vi.fn();
    const onResults = vi.fn();
    const scheduler = new OcrScheduler({
      frames: createFrames(),
      engine: new LockedOcrEngine(createFakeService('fake')),
      settings,
      onResults,
      onError,
      spawn: spawnNow,
      extract,
    });

    scheduler.trigger();
    await flush();

    expect(scheduler.poll()).toBe('failed');
    expect(onError).toHaveBeenCalledWith(failure);
    expect(console.error).toHaveBeenCalledWith('[OCR]', failure);
    expect(onResults).not.toHaveBeenCalled();
    expect(scheduler.state).toBe('idle');

    expect(scheduler.trigger()).toBe('started');
    await flush();
    expect(scheduler.poll()).toBe('delivered');
  });

  it('maps results through the projection before delivering them', async () => {
    const onResults = vi.fn();
    const scheduler = new OcrScheduler({
      frames: createFrames(),
      engine: new LockedOcrEngine(createFakeService('fake')),
      settings,
      onResults,
      projection: { viewportToWorld: (point) => ({ x: point.x * 10, y: point.y * 10 }) },
      spawn: spawnNow,
      extract: () => Promise.resolve(results),
    });

    scheduler.trigger();
    await flush();
    scheduler.poll();

    expect(onResults).toHaveBeenCalledWith({
      detectBounds: box(10, 10, 30, 20),
      words: [{ text: 'Rope', bounds: box(10, 10, 20, 20) }],
      lines: [{ bounds: box(10, 10, 20, 20), wordRange: { start: 0, end: 1 } }],
      items: [{ name: 'Rope', bounds: box(10, 10, 20, 20) }],
    });
  });

  it('treats a failed projection as a failed pass', async () => {
    const onError = vi.fn();
    const scheduler = new OcrScheduler({
      frames: createFrames(),
      engine: new LockedOcrEngine(createFakeService('fake')),
      settings,
      onResults: vi.fn(),
      onError,
      projection: { viewportToWorld: () => null },
      spawn: spawnNow,
      extract: () => Promise.resolve(results),
    });

    scheduler.trigger();
    await flush();

    expect(scheduler.poll()).toBe('failed');
    expect(onError).toHaveBeenCalledTimes(1);
    expect(scheduler.state).toBe('idle');
  });

  it('saves the frame when saving to disk is enabled', async () => {
    const image = createImage(4, 2);
    const saveCapture = vi.fn(() => Promise.resolve('captures/frame.png'));
    const scheduler = new OcrScheduler({
      frames: createFrames(image),
      engine: new LockedOcrEngine(createFakeService('fake')),
      settings: { ...settings, saveToDisk: true },
      onResults: vi.fn(),
      spawn: spawnNow,
      extract: () => Promise.resolve(results),
      saveCapture,
    });

    scheduler.trigger();
    await flush();

    expect(saveCapture).toHaveBeenCalledWith(image, 'captures');
  });

  it('turns a captured screen into screen-space items', async () => {
    const engine = new LockedOcrEngine(
      createFakeService('fake', [
        {
          text: 'Healing Potion Rope',
          bounds: box(10, 5, 450, 30),
          words: [
            { text: 'Healing', bounds: box(10, 5, 60, 30) },
            { text: 'Potion', bounds: box(70, 5, 120, 30) },
            { text: 'Rope', bounds: box(400, 5, 450, 30) },
          ],
        },
      ])
    );
    const onResults = vi.fn();
    const scheduler = new OcrScheduler({
      frames: createFrames(createImage(1920, 1080)),
      engine,
      settings: { ...settings, layouts: [DEFAULT_LAYOUT_OPTION] },
      onResults,
      extract: (image, bounds, locked, options) => extractText(image, bounds, locked, { ...options, preprocess: [] }),
    });

    expect(scheduler.trigger()).toBe('started');
    await vi.waitFor(() => expect(scheduler.poll()).toBe('delivered'));

    const delivered: unknown = onResults.mock.calls[0]?.[0];
    expect(delivered).toMatchObject({
      detectBounds: box(478, 411, 1443, 460),
      items: [
        { name: 'Healing Potion', bounds: box(488, 416, 598, 441) },
        { name: 'Rope', bounds: box(878, 416, 928, 441) },
      ],
    });
  });

  it('keeps polling responsive while the default chain runs on a full HD frame', async () => {
    const onResults = vi.fn();
    const scheduler = new OcrScheduler({
      frames: createFrames(createImage(1920, 1080, [40, 80, 120, 255])),
      engine: new LockedOcrEngine(createFakeService('fake')),
      settings: { ...settings, layouts: [DEFAULT_LAYOUT_OPTION] },
      onResults,
    });

    let worstGap = 0;
    let last = performance.now();
    expect(scheduler.trigger()).toBe('started');
    const outcome = await new Promise<string>((resolve) => {
      const timer = setInterval(() => {
        const now = performance.now();
        worstGap = Math.max(worstGap, now - last);
        last = now;
        const polled = scheduler.poll();
        if (polled === 'delivered' || polled === 'failed') {
          clearInterval(timer);
          resolve(polled);
        }
      }, 5);
    });

    expect(outcome).toBe('delivered');
    expect(onResults).toHaveBeenCalledTimes(1);
    expect(worstGap).toBeLessThan(100);
  }, 30_000);
});

describe('OcrScheduler property tests', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('never runs two extractions at once, whatever the order of triggers, completions and polls', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(fc.constantFrom('trigger', 'resolve', 'poll'), { maxLength: 40 }), async (commands) => {
        let running = 0;
        let mostRunning = 0;
        let started = 0;
        const pending: Array<Deferred<OcrResults>> = [];
        const extract = vi.fn<Extractor>(() => {
          running += 1;
          mostRunning = Math.max(mostRunning, running);
          const deferred = createDeferred<OcrResults>();
          pending.push(deferred);
          return deferred.promise.finally(() => {
            running -= 1;
          });
        });
        const scheduler = new OcrScheduler({
          frames: createFrames(),
          engine: new LockedOcrEngine(createFakeService('fake')),
          settings,
          onResults: vi.fn(),
          spawn: spawnNow,
          extract,
        });

        for (const command of commands) {
          if (command === 'trigger') {
            const idle = scheduler.state === 'idle';
            const outcome = scheduler.trigger();
            expect(outcome).toBe(idle ? 'started' : 'busy');
            if (outcome === 'started') {
              started += 1;
            }
          } else if (command === 'resolve') {
            pending.shift()?.resolve(results);
            await flush();
          } else {
            scheduler.poll();
          }
          expect(running).toBeLessThanOrEqual(1);
        }

        expect(mostRunning).toBeLessThanOrEqual(1);
        expect(extract).toHaveBeenCalledTimes(started);
      }),
      { numRuns: 200 }
    );
  });
});
