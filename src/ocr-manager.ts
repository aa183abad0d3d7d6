import { EngineFactory, type EngineOptions } from '@/engines/engine-factory';
import { LockedOcrEngine } from '@/engines/locked-engine';

export class OCRManager {
  private readonly factory: EngineFactory;
  private activeEngine: LockedOcrEngine | null = null;
  private loading = false;

  constructor(factory: EngineFactory) {
    this.factory = factory;
  }

  async setEngine(id: string, options?: EngineOptions): Promise<LockedOcrEngine> {
    if (this.activeEngine) {
      await this.activeEngine.destroy();
      this.activeEngine = null;
    }

    this.loading = true;
    try {
      const service = await this.factory.create(id, options);
      await service.load();
      this.activeEngine = new LockedOcrEngine(service);
      return this.activeEngine;
    } finally {
      this.loading = false;
    }
  }

  getEngine(): LockedOcrEngine {
    if (!this.activeEngine) {
      throw new Error('Engine not initialized.');
    }

    return this.activeEngine;
  }

  getLoadingState(): boolean {
    return this.loading;
  }

  async destroy(): Promise<void> {
    if (this.activeEngine) {
      await this.activeEngine.destroy();
      this.activeEngine = null;
    }
  }
}
