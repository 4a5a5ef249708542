import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import { CatalogWriteError } from '../errors.js';

/**
 * Replace `filePath` with `content` through a temp file in the same directory.
 * The existing file is untouched when this throws CatalogWriteError.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = createTempPath(filePath);

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch(() => undefined);
    throw new CatalogWriteError(filePath, error);
  }
}

function createTempPath(filePath: string): string {
  const unique = crypto.randomBytes(6).toString('hex');
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${unique}.tmp`);
}
