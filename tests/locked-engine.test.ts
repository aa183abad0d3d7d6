import { describe, it, expect, vi } from 'vitest';
import { LockedOcrEngine } from '../src/engines/locked-engine';
import { createDeferred, createFakeService } from './helpers/fakes';

describe('LockedOcrEngine unit tests', () => {
  it('runs one holder at a time in request order', async () => {
    const engine = new LockedOcrEngine(createFakeService('fake'));
    const first = createDeferred<void>();
    const events: string[] = [];

    const a = engine.withLock(async () => {
      events.push('a:start');
      await first.promise;
      events.push('a:end');
    });
    const b = engine.withLock(() => {
      events.push('b:start');
      return Promise.resolve();
    });

    await vi.waitFor(() => expect(events).toEqual(['a:start']));
    expect(engine.isLocked).toBe(true);

    first.resolve();
    await Promise.all([a, b]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start']);
    expect(engine.isLocked).toBe(false);
  });

  it('releases the lock when the holder throws', async () => {
    const engine = new LockedOcrEngine(createFakeService('fake'));

    await expect(engine.withLock(() => Promise.reject(new Error('inference failed')))).rejects.toThrow(
      'inference failed'
    );
    await expect(engine.withLock((service) => Promise.resolve(service.id))).resolves.toBe('fake');
  });

  it('waits for the current holder before destroying the service', async () => {
    const destroy = vi.fn(() => Promise.resolve());
    const engine = new LockedOcrEngine(createFakeService('fake', [], { destroy }));
    const holder = createDeferred<void>();

    const running = engine.withLock(() => holder.promise);
    const destroyed = engine.destroy();
    await Promise.resolve();
    expect(destroy).not.toHaveBeenCalled();

    holder.resolve();
    await Promise.all([running, destroyed]);
    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it('exposes the service id', () => {
    expect(new LockedOcrEngine(createFakeService('tesseract')).id).toBe('tesseract');
  });
});
