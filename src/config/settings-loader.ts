import { access, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { dump, load } from 'js-yaml';
import { DEFAULT_SETTINGS, parseSettings, serializeSettings, type OverlaySettings } from './settings';
import { createInvalidConfigError, logError, logInfo } from '@/utils/error-handling';

const HEADER = '# Settings for screen-item-ocr\n';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** `settings.yaml` -> `settings.bak.yaml` */
export function backupPathFor(path: string): string {
  return /\.ya?ml$/.test(path) ? path.replace(/\.(ya?ml)$/, '.bak.$1') : `${path}.bak`;
}

export async function saveSettings(path: string, settings: OverlaySettings): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, HEADER + dump(serializeSettings(settings), { lineWidth: -1 }), 'utf8');
}

/**
 * Appends the top-level keys `source` lacks, with their values from
 * `settings`, and returns their names. Everything already in the file,
 * comments included, stays as written.
 */
export async function mergeAndSave(
  path: string,
  source: string,
  document: unknown,
  settings: OverlaySettings
): Promise<string[]> {
  const present = typeof document === 'object' && document !== null ? Object.keys(document) : [];
  const serialized: Record<string, unknown> = serializeSettings(settings);
  const additions = Object.fromEntries(Object.entries(serialized).filter(([key]) => !present.includes(key)));
  const added = Object.keys(additions);
  if (added.length === 0) {
    return added;
  }

  const kept = source.trim().length === 0 ? HEADER : source.endsWith('\n') ? source : `${source}\n`;
  await writeFile(path, kept + dump(additions, { lineWidth: -1 }), 'utf8');
  logInfo(`Added default settings to ${path}: ${added.join(', ')}`);
  return added;
}

/**
 * Reads settings from a YAML file. A missing file is created with defaults.
 * An unreadable or invalid file is moved aside to its `.bak` name and
 * replaced by defaults, unless a backup already exists, in which case
 * loading fails rather than overwrite it. Keys added in newer versions are
 * written into an existing file with their defaults.
 */
export async function loadSettings(path: string): Promise<OverlaySettings> {
  if (!(await exists(path))) {
    await saveSettings(path, DEFAULT_SETTINGS);
    return DEFAULT_SETTINGS;
  }

  let source: string;
  let document: unknown;
  let settings: OverlaySettings;
  try {
    source = await readFile(path, 'utf8');
    document = load(source);
    settings = parseSettings(document);
  } catch (error) {
    logError(error);
    const backupPath = backupPathFor(path);
    if (await exists(backupPath)) {
      throw createInvalidConfigError(
        `Could not back up invalid settings file: ${backupPath} already exists.`
      );
    }
    await rename(path, backupPath);
    await saveSettings(path, DEFAULT_SETTINGS);
    return DEFAULT_SETTINGS;
  }

  await mergeAndSave(path, source, document, settings);
  return settings;
}
