import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { RgbaImage } from '@/types/frame';
import { sharedImageWorker, type ImageWorker } from '@/workers/image-worker';

/** `2024-05-01_12_30_05Z.png`: second precision, no characters filesystems reject. */
export function captureFileName(date: Date = new Date()): string {
  const timestamp = date
    .toISOString()
    .replace(/\.\d+Z$/, 'Z')
    .replace('T', '_')
    .replace(/:/g, '_');
  return `${timestamp}.png`;
}

export async function saveCapture(
  image: RgbaImage,
  directory: string,
  date: Date = new Date(),
  images: ImageWorker = sharedImageWorker
): Promise<string> {
  // The pixels are copied to the worker before this call returns.
  const png = await images.encodePng(image);
  await mkdir(directory, { recursive: true });
  const path = join(directory, captureFileName(date));
  await writeFile(path, png);
  return path;
}
