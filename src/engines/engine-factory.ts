import type { IOcrService } from '@/types/ocr-service';
import { createInvalidConfigError } from '@/utils/error-handling';

export interface EngineOptions {
  /** Tesseract-style language code, e.g. `eng` or `deu+eng`. */
  language?: string;
  /** Directory with the language data files; engines pick an installed default when omitted. */
  langPath?: string;
}

export type EngineFactoryCreator = (options?: EngineOptions) => IOcrService | Promise<IOcrService>;

/**
 * Maps engine ids from the settings file to service constructors. An unknown
 * id is a configuration problem, so it surfaces as `INVALID_CONFIG`.
 */
export class EngineFactory {
  private readonly creators = new Map<string, EngineFactoryCreator>();

  register(id: string, creator: EngineFactoryCreator): void {
    if (this.creators.has(id)) {
      throw new Error(`Engine already registered: ${id}`);
    }
    this.creators.set(id, creator);
  }

  has(id: string): boolean {
    return this.creators.has(id);
  }

  async create(id: string, options?: EngineOptions): Promise<IOcrService> {
    const creator = this.creators.get(id);
    if (!creator) {
      const known = this.getAvailableEngines().join(', ') || 'none';
      throw createInvalidConfigError(`Engine not registered: ${id} (available: ${known})`);
    }

    const service = await creator(options);
    if (service.id !== id) {
      throw new Error(`Engine id mismatch for ${id}: service reports ${service.id}`);
    }
    return service;
  }

  /** Registered ids in registration order. */
  getAvailableEngines(): string[] {
    return [...this.creators.keys()];
  }
}
