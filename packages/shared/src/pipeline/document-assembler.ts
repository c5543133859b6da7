/**
 * Document Assembler
 *
 * Turns a folder of page images into one document text. Pages are read in
 * filename order and concatenated with no separator.
 */

import { readdir, stat } from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import { logger } from '../logger';
import type { ImageExtension, PageImage } from '../types';
import type { StageDeps } from './deps';
import { mapWithConcurrency } from './concurrency';
import { extractPage } from './page-extractor';

const MIME_TYPES: Record<ImageExtension, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  bmp: 'image/bmp',
  tiff: 'image/tiff',
  webp: 'image/webp',
};

function isImageExtension(value: string): value is ImageExtension {
  return Object.prototype.hasOwnProperty.call(MIME_TYPES, value);
}

/**
 * MIME type for a filename, or null when the extension is not a page image.
 */
export function mimeTypeFor(filename: string): string | null {
  const extension = path.extname(filename).slice(1).toLowerCase();
  return isImageExtension(extension) ? MIME_TYPES[extension] : null;
}

/**
 * Regular files and links to them count as pages. A dangling link is kept so
 * that reading it fails the page instead of dropping it.
 */
async function isPageEntry(entry: Dirent, fullPath: string): Promise<boolean> {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return (await stat(fullPath)).isFile();
  } catch (error) {
    logger.warn('Unresolvable page link', {
      path: fullPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return true;
  }
}

export async function listPageImages(folder: string): Promise<PageImage[]> {
  const entries = await readdir(folder, { withFileTypes: true });
  const pages: PageImage[] = [];

  for (const entry of entries) {
    const mimeType = mimeTypeFor(entry.name);
    if (!mimeType) continue;
    const fullPath = path.join(folder, entry.name);
    if (await isPageEntry(entry, fullPath)) {
      pages.push(Object.freeze({ path: fullPath, filename: entry.name, mimeType }));
    }
  }

  // Code-unit order, not locale order
  return pages.sort((a, b) => (a.filename < b.filename ? -1 : a.filename > b.filename ? 1 : 0));
}

export async function assembleDocument(
  folder: string,
  contractId: string,
  deps: StageDeps
): Promise<string> {
  const pages = await listPageImages(folder);

  if (pages.length === 0) {
    logger.warn('No page images found', { contractId, folder });
    return '';
  }

  logger.info('Assembling document', {
    contractId,
    folder,
    pages: pages.length,
    concurrency: deps.settings.pageConcurrency,
  });

  const texts = await mapWithConcurrency(pages, deps.settings.pageConcurrency, (page) =>
    extractPage(page, contractId, deps)
  );

  return texts.join('');
}
