import { copyFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

/** Stylesheet and gallery script shipped beside the sources. */
export const RESOURCE_FILES = ['style.css', 'gallery.js'] as const;

/** `resources/` of the exporter package, from both src/ and dist/. */
export const RESOURCES_SOURCE_DIR = fileURLToPath(new URL('../../../resources/', import.meta.url));

/** Copy the shared page resources into the export, overwriting older copies. */
export async function copyResources(targetDir: string, sourceDir: string = RESOURCES_SOURCE_DIR): Promise<void> {
  await mkdir(targetDir, { recursive: true });
  for (const name of RESOURCE_FILES) {
    await copyFile(join(sourceDir, name), join(targetDir, name));
  }
}
