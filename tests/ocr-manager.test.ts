import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { OCRManager } from '../src/ocr-manager';
import { EngineFactory } from '../src/engines/engine-factory';
import { createFakeService } from './helpers/fakes';

describe('OCRManager property tests', () => {
  it('destroys the previous engine before loading the next one', async () => {
    await fc.assert(
      fc.asyncProperty(fc.string({ minLength: 1 }), fc.string({ minLength: 1 }), async (idA, idB) => {
        fc.pre(idA !== idB);

        const calls: string[] = [];
        const factory = new EngineFactory();
        const tracked = (id: string) =>
          createFakeService(id, [], {
            load: (): Promise<void> => {
              calls.push(`load:${id}`);
              return Promise.resolve();
            },
            destroy: (): Promise<void> => {
              calls.push(`destroy:${id}`);
              return Promise.resolve();
            },
          });

        factory.register(idA, () => tracked(idA));
        factory.register(idB, () => tracked(idB));

        const manager = new OCRManager(factory);
        await manager.setEngine(idA);
        await manager.setEngine(idB);

        expect(calls).toEqual([`load:${idA}`, `destroy:${idA}`, `load:${idB}`]);
      }),
      { numRuns: 50 }
    );
  });
});

describe('OCRManager unit tests', () => {
  it('returns the active engine behind a lock', async () => {
    const factory = new EngineFactory();
    factory.register('a', () => createFakeService('a'));

    const manager = new OCRManager(factory);
    const engine = await manager.setEngine('a');

    expect(engine.id).toBe('a');
    expect(manager.getEngine()).toBe(engine);
    expect(engine.isLocked).toBe(false);
  });

  it('throws when no engine is set', () => {
    const manager = new OCRManager(new EngineFactory());
    expect(() => manager.getEngine()).toThrow('Engine not initialized');
  });

  it('reports loading while the engine loads', async () => {
    const factory = new EngineFactory();
    const manager = new OCRManager(factory);
    const seen: boolean[] = [];
    factory.register('slow', () =>
      createFakeService('slow', [], {
        load: (): Promise<void> => {
          seen.push(manager.getLoadingState());
          return Promise.resolve();
        },
      })
    );

    await manager.setEngine('slow');

    expect(seen).toEqual([true]);
    expect(manager.getLoadingState()).toBe(false);
  });

  it('clears the loading state when loading fails', async () => {
    const factory = new EngineFactory();
    factory.register('broken', () =>
      createFakeService('broken', [], { load: (): Promise<void> => Promise.reject(new Error('no data')) })
    );
    const manager = new OCRManager(factory);

    await expect(manager.setEngine('broken')).rejects.toThrow('no data');
    expect(manager.getLoadingState()).toBe(false);
    expect(() => manager.getEngine()).toThrow('Engine not initialized');
  });

  it('destroys the active engine', async () => {
    const factory = new EngineFactory();
    let destroyed = false;
    factory.register('a', () =>
      createFakeService('a', [], {
        destroy: (): Promise<void> => {
          destroyed = true;
          return Promise.resolve();
        },
      })
    );
    const manager = new OCRManager(factory);
    await manager.setEngine('a');

    await manager.destroy();

    expect(destroyed).toBe(true);
    expect(() => manager.getEngine()).toThrow('Engine not initialized');
  });
});
