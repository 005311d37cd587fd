import * as path from 'path';
import * as fs from 'fs-extra';
import { errorMessage } from '@sheetmark/errors';
import { SheetImage, TabularDocument } from '../models/document.model';
import { logger as rootLogger } from '../utils/logger';

const logger = rootLogger.child({ component: 'image-writer' });

const MAX_NAME_LENGTH = 50;

export interface ImageEntry {
  sheetName: string;
  image: SheetImage;
}

export interface ImageWriteResult {
  count: number;
  paths: string[];
}

export function sanitizeFileName(name: string): string {
  const cleaned = name.replace(/[\\/:*?"<>|]/g, '_').trim().slice(0, MAX_NAME_LENGTH);
  return cleaned || 'sheet';
}

export function imageFileName(entry: ImageEntry): string {
  const extension = entry.image.extension.replace(/^\./, '').toLowerCase() || 'png';
  return `${sanitizeFileName(entry.sheetName)}_${entry.image.index}.${extension}`;
}

/** `name`, or `stem-2.ext`, `stem-3.ext`, ... when it is already taken */
export function claimFileName(name: string, taken: Set<string>): string {
  const dot = name.lastIndexOf('.');
  const stem = dot > 0 ? name.slice(0, dot) : name;
  const extension = dot > 0 ? name.slice(dot) : '';
  let candidate = name;
  for (let n = 2; taken.has(candidate.toLowerCase()); n++) {
    candidate = `${stem}-${n}${extension}`;
  }
  taken.add(candidate.toLowerCase());
  return candidate;
}

export function collectImages(document: TabularDocument): ImageEntry[] {
  return document.sheets.flatMap((sheet) => sheet.images.map((image) => ({ sheetName: sheet.name, image })));
}

/**
 * Write embedded images under `dir`. Names that collide after
 * sanitising get a numeric suffix. A failed write is logged and skipped;
 * the rest are still written.
 */
export async function writeImages(images: readonly ImageEntry[], dir: string): Promise<ImageWriteResult> {
  if (images.length === 0) {
    return { count: 0, paths: [] };
  }

  await fs.ensureDir(dir);
  const paths: string[] = [];
  const taken = new Set<string>();

  for (const entry of images) {
    const target = path.join(dir, claimFileName(imageFileName(entry), taken));
    try {
      await fs.writeFile(target, entry.image.data);
      paths.push(target);
    } catch (error) {
      logger.warn('Failed to write image', { path: target, error: errorMessage(error) });
    }
  }

  logger.info('Extracted images', { dir, count: paths.length });
  return { count: paths.length, paths };
}
