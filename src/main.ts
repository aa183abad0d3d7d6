import { createInterface } from 'node:readline';
import { loadSettings } from '@/config/settings-loader';
import { EngineFactory } from '@/engines/engine-factory';
import { TesseractOcrService } from '@/engines/tesseract-engine';
import { OCRManager } from '@/ocr-manager';
import { OverlayRuntime } from '@/overlay-runtime';
import { ScreenshotCaptureSource } from '@/capture/screenshot-source';
import type { OcrResults } from '@/types/ocr-results';
import { formatErrorMessage, logError, logInfo } from '@/utils/error-handling';
import { sharedImageWorker } from '@/workers/image-worker';

const DEFAULT_SETTINGS_PATH = 'settings.yaml';

function printResults(results: OcrResults, limit: number): void {
  if (results.items.length === 0) {
    console.log('No items found.');
    return;
  }
  for (const item of results.items.slice(0, limit)) {
    const { min, max } = item.bounds;
    console.log(`${item.name}  [${min.x},${min.y} - ${max.x},${max.y}]`);
  }
}

async function main(): Promise<void> {
  const settingsPath = process.argv[2] ?? DEFAULT_SETTINGS_PATH;
  const settings = await loadSettings(settingsPath);

  const factory = new EngineFactory();
  factory.register('tesseract', (options) => new TesseractOcrService(options));

  const manager = new OCRManager(factory);
  logInfo(`Loading ${settings.engine.id} (${settings.engine.language})`);
  const engine = await manager.setEngine(settings.engine.id, {
    language: settings.engine.language,
    langPath: settings.engine.langPath,
  });

  const runtime = new OverlayRuntime({
    settings,
    engine,
    onResults: (results) => printResults(results, settings.maxDisplayedItems),
  });
  const source = new ScreenshotCaptureSource({ sink: runtime.sink });
  source.start();
  runtime.start();

  console.log(`Press Enter to scan (${settings.overlayKey} in the overlay), Ctrl+D to quit.`);
  const input = createInterface({ input: process.stdin });
  input.on('line', () => {
    const outcome = runtime.requestOcr();
    if (outcome !== 'started') {
      logInfo(`Scan not started: ${outcome}`);
    }
  });
  input.on('close', () => {
    source.stop();
    runtime.stop();
    void Promise.all([manager.destroy(), sharedImageWorker.close()]).catch((error: unknown) => logError(error));
  });
}

main().catch((error: unknown) => {
  const { message, recoverySuggestion } = formatErrorMessage(error);
  logError(error);
  console.error(recoverySuggestion ? `${message} ${recoverySuggestion}` : message);
  process.exitCode = 1;
});
