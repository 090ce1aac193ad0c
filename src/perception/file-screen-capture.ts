import { readFile } from 'fs/promises';
import path from 'path';
import type { IScreenCapture } from './index.js';
import type { SnapshotImage } from '../types/index.js';

const MIME_BY_EXTENSION: Readonly<Record<string, SnapshotImage['mimeType']>> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.gif': 'image/gif',
};

/**
 * Reads the most recent screenshot from a file that an external capture
 * tool keeps up to date.
 */
export class FileScreenCapture implements IScreenCapture {
  private mimeType: SnapshotImage['mimeType'];

  constructor(private filePath: string) {
    const mimeType = MIME_BY_EXTENSION[path.extname(filePath).toLowerCase()];
    if (!mimeType) {
      throw new Error(`Unsupported screenshot format: ${filePath}`);
    }
    this.mimeType = mimeType;
  }

  async capture(): Promise<SnapshotImage> {
    const buffer = await readFile(this.filePath);
    return { data: buffer.toString('base64'), mimeType: this.mimeType };
  }
}
